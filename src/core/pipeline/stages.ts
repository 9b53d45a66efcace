import type { ProvisionConfig, Stage } from "../../shared/types";

type StageTemplate = Pick<Stage, "name" | "label" | "command" | "critical">;

const SETUP_STAGES: StageTemplate[] = [
  {
    name: "composer-install",
    label: "Composer install",
    command: ["composer", "install", "--no-interaction", "--prefer-dist"],
    critical: true,
  },
  {
    name: "key-generate",
    label: "Generate application key",
    command: ["php", "artisan", "key:generate", "--force"],
    critical: false,
  },
  {
    name: "migrate",
    label: "Run migrations",
    command: ["php", "artisan", "migrate", "--force"],
    critical: true,
  },
  {
    name: "db-seed",
    label: "Seed database",
    command: ["php", "artisan", "db:seed", "--force"],
    critical: false,
  },
  {
    name: "storage-link",
    label: "Link public storage",
    command: ["php", "artisan", "storage:link"],
    critical: false,
  },
  {
    name: "optimize-clear",
    label: "Clear cached bootstrap files",
    command: ["php", "artisan", "optimize:clear"],
    critical: false,
  },
];

export const buildSetupStages = (config: ProvisionConfig): Stage[] =>
  SETUP_STAGES.map((template) => ({
    ...template,
    command: [...template.command],
    target: config.services.web,
    user: config.execUser,
    workdir: config.containerAppDir,
  }));
