import type { DatabaseCredentials, Stage } from "../../shared/types";
import type { CommandRunner, OutputMode } from "../../infrastructure/process";
import { runCommand } from "../../infrastructure/process";
import type { Probe } from "../readiness";
import { logger } from "../../infrastructure/logger";

export type ExecOptions = {
  user?: string;
  workdir?: string;
  output?: OutputMode;
};

export type ComposeClientOptions = {
  projectDir: string;
  runner?: CommandRunner;
};

export class ComposeClient {
  private projectDir: string;
  private runner: CommandRunner;

  constructor(options: ComposeClientOptions) {
    this.projectDir = options.projectDir;
    this.runner = options.runner ?? runCommand;
  }

  private compose = (args: string[], output: OutputMode = "inherit") =>
    this.runner("docker", ["compose", ...args], {
      cwd: this.projectDir,
      output,
    });

  public isRunning = async (service: string): Promise<boolean> => {
    const result = await this.compose(["ps", "-q", service], "capture");
    return result.exitCode === 0 && result.stdout.trim() !== "";
  };

  /**
   * サービスが起動していなければ起動する。
   * 戻り値は docker compose up の終了コード（起動済みなら 0）。
   */
  public ensureRunning = async (service: string): Promise<number> => {
    if (await this.isRunning(service)) {
      logger.debug(`Service ${service} is already running`);
      return 0;
    }

    logger.info(`Starting service ${service}`);
    const result = await this.compose(["up", "-d", service]);
    return result.exitCode;
  };

  public exec = async (
    service: string,
    command: string[],
    options: ExecOptions = {}
  ): Promise<number> => {
    // -T: TTY を割り当てない（非対話実行）
    const args = ["exec", "-T"];
    if (options.user) args.push("-u", options.user);
    if (options.workdir) args.push("-w", options.workdir);
    args.push(service, ...command);

    const result = await this.compose(args, options.output ?? "inherit");
    return result.exitCode;
  };

  public execStage = (stage: Stage): Promise<number> =>
    this.exec(stage.target, stage.command, {
      user: stage.user,
      workdir: stage.workdir,
    });

  public databaseProbe = (
    service: string,
    database: DatabaseCredentials,
    user?: string
  ): Probe => {
    const command = [
      "mysqladmin",
      "ping",
      "-h",
      database.host,
      `-u${database.user}`,
      `-p${database.password}`,
      "--silent",
    ];

    return async () => {
      const exitCode = await this.exec(service, command, {
        user,
        output: "ignore",
      });
      return exitCode === 0;
    };
  };
}
