import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Stage } from "../../shared/types";
import { runStages } from "./runner";

const stage = (name: string, critical: boolean): Stage => ({
  name,
  label: `Run ${name}`,
  target: "web",
  command: ["true"],
  critical,
});

const executorFor = (exitCodes: Record<string, number>) => {
  const executed: string[] = [];
  const execute = async (s: Stage): Promise<number> => {
    executed.push(s.name);
    return exitCodes[s.name] ?? 0;
  };
  return { executed, execute };
};

describe("runStages", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("runs every stage in order when all succeed", async () => {
    const { executed, execute } = executorFor({});

    const result = await runStages(
      [stage("a", true), stage("b", false), stage("c", true)],
      execute
    );

    expect(executed).toEqual(["a", "b", "c"]);
    expect(result).toEqual({
      ok: true,
      results: [
        { name: "a", exitCode: 0, critical: true },
        { name: "b", exitCode: 0, critical: false },
        { name: "c", exitCode: 0, critical: true },
      ],
    });
  });

  it("stops at the first failing critical stage", async () => {
    const { executed, execute } = executorFor({ b: 2 });

    const result = await runStages(
      [stage("a", true), stage("b", true), stage("c", false)],
      execute
    );

    expect(executed).toEqual(["a", "b"]);
    expect(result).toEqual({
      ok: false,
      failedStage: "b",
      exitCode: 2,
      results: [
        { name: "a", exitCode: 0, critical: true },
        { name: "b", exitCode: 2, critical: true },
      ],
    });
    expect(console.error).toHaveBeenCalledWith(
      "[error]",
      "Run b failed with exit code 2."
    );
  });

  it("continues past a failing best-effort stage", async () => {
    const { executed, execute } = executorFor({ a: 1, c: 5 });

    const result = await runStages(
      [stage("a", false), stage("b", true), stage("c", false)],
      execute
    );

    expect(executed).toEqual(["a", "b", "c"]);
    expect(result.ok).toBe(true);
    expect(console.warn).toHaveBeenCalledWith(
      "[warn]",
      "Run a failed with exit code 1; continuing."
    );
  });

  it("logs each label as a step before executing it", async () => {
    const order: string[] = [];
    vi.mocked(console.info).mockImplementation((...args: unknown[]) => {
      order.push(args.join(" "));
    });

    await runStages([stage("only", true)], async () => {
      order.push("executed");
      return 0;
    });

    expect(order).toEqual(["[step] Run only", "executed"]);
  });

  it("succeeds with nothing to run", async () => {
    expect(await runStages([], async () => 1)).toEqual({
      ok: true,
      results: [],
    });
  });
});
