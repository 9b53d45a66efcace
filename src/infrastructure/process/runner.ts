import { spawn } from "child_process";
import { logger } from "../logger";

export type OutputMode = "inherit" | "capture" | "ignore";

export type RunOptions = {
  output?: OutputMode;
  cwd?: string;
  env?: Record<string, string | undefined>;
};

export type CommandResult = {
  exitCode: number;
  stdout: string;
};

export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunOptions
) => Promise<CommandResult>;

// シェルで「コマンドが見つからない」場合と同じ終了コード
export const SPAWN_FAILURE_EXIT_CODE = 127;

export const runCommand: CommandRunner = (command, args, options = {}) => {
  const output = options.output ?? "inherit";

  return new Promise((resolve) => {
    logger.debug("Running command:", command, args);

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: [
        "ignore",
        output === "capture" ? "pipe" : output,
        output === "inherit" ? "inherit" : "ignore",
      ],
    });

    let stdout = "";
    child.stdout?.on("data", (data: Buffer) => {
      stdout += data.toString();
    });

    let settled = false;

    child.on("error", (error: Error) => {
      if (settled) return;
      settled = true;
      logger.error(`Failed to run ${command}:`, error.message);
      resolve({ exitCode: SPAWN_FAILURE_EXIT_CODE, stdout });
    });

    child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
      if (settled) return;
      settled = true;
      if (signal) {
        logger.debug(`${command} terminated by ${signal}`);
      }
      resolve({ exitCode: code ?? 1, stdout });
    });
  });
};
