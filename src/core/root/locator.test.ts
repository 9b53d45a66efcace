import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { findRepoRoot, resolveRepoRoot, resolveToolDir } from "./locator";

describe("findRepoRoot", () => {
  let sandbox: string;

  beforeEach(() => {
    sandbox = fs.realpathSync(
      fs.mkdtempSync(path.join(os.tmpdir(), "provision-root-"))
    );
  });

  afterEach(() => {
    fs.rmSync(sandbox, { recursive: true, force: true });
  });

  it("returns the start directory when it holds the marker", () => {
    fs.writeFileSync(path.join(sandbox, "docker-compose.yml"), "services: {}\n");

    expect(findRepoRoot(sandbox)).toBe(sandbox);
  });

  it("returns the nearest ancestor holding the marker", () => {
    const project = path.join(sandbox, "project");
    const scripts = path.join(project, "tools", "scripts");
    fs.mkdirSync(scripts, { recursive: true });
    fs.writeFileSync(path.join(project, "docker-compose.yml"), "");

    expect(findRepoRoot(scripts)).toBe(project);
  });

  it("prefers the closest of several marked ancestors", () => {
    const inner = path.join(sandbox, "outer", "inner");
    const start = path.join(inner, "bin");
    fs.mkdirSync(start, { recursive: true });
    fs.writeFileSync(path.join(sandbox, "outer", "docker-compose.yml"), "");
    fs.writeFileSync(path.join(inner, "docker-compose.yml"), "");

    expect(findRepoRoot(start)).toBe(inner);
  });

  it("ignores a directory named like the marker", () => {
    const start = path.join(sandbox, "a", "b");
    fs.mkdirSync(path.join(start, "docker-compose.yml"), { recursive: true });

    expect(findRepoRoot(start, "docker-compose.yml")).not.toBe(start);
  });

  it("falls back to the parent of the start directory", () => {
    const start = path.join(sandbox, "a", "b");
    fs.mkdirSync(start, { recursive: true });

    expect(findRepoRoot(start, "no-such-marker.yml")).toBe(
      path.join(sandbox, "a")
    );
  });

  it("honours a custom marker", () => {
    const start = path.join(sandbox, "nested");
    fs.mkdirSync(start);
    fs.writeFileSync(path.join(sandbox, "compose.yaml"), "");

    expect(findRepoRoot(start, "compose.yaml")).toBe(sandbox);
  });
});

describe("resolveRepoRoot", () => {
  it("uses PROVISION_ROOT when set", () => {
    expect(
      resolveRepoRoot("/anywhere", { PROVISION_ROOT: "/srv/stack" })
    ).toBe(path.resolve("/srv/stack"));
  });

  it("ignores a blank PROVISION_ROOT", () => {
    expect(
      resolveRepoRoot("/anywhere/below", { PROVISION_ROOT: "  " }, "no-such-marker.yml")
    ).toBe(path.resolve("/anywhere"));
  });
});

describe("resolveToolDir", () => {
  it("gives the package directory for built and source entries alike", () => {
    const pkg = path.resolve("/srv/stack/provision");

    expect(resolveToolDir(path.join(pkg, "dist", "src"))).toBe(pkg);
    expect(resolveToolDir(path.join(pkg, "dist", "scripts"))).toBe(pkg);
    expect(resolveToolDir(path.join(pkg, "src"))).toBe(pkg);
    expect(resolveToolDir(path.join(pkg, "scripts"))).toBe(pkg);
  });

  it("falls back to the project above the tool in both modes", () => {
    const built = resolveRepoRoot(
      resolveToolDir("/srv/stack/provision/dist/src"),
      {},
      "no-such-marker.yml"
    );
    const source = resolveRepoRoot(
      resolveToolDir("/srv/stack/provision/src"),
      {},
      "no-such-marker.yml"
    );

    expect(built).toBe(path.resolve("/srv/stack"));
    expect(source).toBe(built);
  });

  it("leaves other directories unchanged", () => {
    expect(resolveToolDir("/opt/tools/provision")).toBe(
      path.resolve("/opt/tools/provision")
    );
  });
});
