import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "../../infrastructure/config";
import { buildSetupStages } from "./stages";

describe("buildSetupStages", () => {
  it("lists the setup commands in order", () => {
    const stages = buildSetupStages(DEFAULT_CONFIG);

    expect(stages.map((s) => [s.name, s.command.join(" "), s.critical])).toEqual([
      ["composer-install", "composer install --no-interaction --prefer-dist", true],
      ["key-generate", "php artisan key:generate --force", false],
      ["migrate", "php artisan migrate --force", true],
      ["db-seed", "php artisan db:seed --force", false],
      ["storage-link", "php artisan storage:link", false],
      ["optimize-clear", "php artisan optimize:clear", false],
    ]);
  });

  it("targets the web service as the configured user and directory", () => {
    const stages = buildSetupStages({
      ...DEFAULT_CONFIG,
      services: { database: "db", web: "app" },
      execUser: "deploy",
      containerAppDir: "/srv/app",
    });

    for (const s of stages) {
      expect(s.target).toBe("app");
      expect(s.user).toBe("deploy");
      expect(s.workdir).toBe("/srv/app");
    }
  });

  it("returns fresh command arrays on every call", () => {
    const first = buildSetupStages(DEFAULT_CONFIG);
    first[0]?.command.push("--dry-run");

    const second = buildSetupStages(DEFAULT_CONFIG);

    expect(second[0]?.command).toEqual([
      "composer",
      "install",
      "--no-interaction",
      "--prefer-dist",
    ]);
  });
});
