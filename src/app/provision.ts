import path from "path";
import type { ProvisionConfig } from "../shared/types";
import type { ComposeClient } from "../core/compose";
import type { Clock, Sleep } from "../core/readiness";
import { waitForReady } from "../core/readiness";
import { ensureEnvFile } from "../core/env";
import { buildSetupStages, runStages } from "../core/pipeline";
import { logger } from "../infrastructure/logger";

export type ComposeOperations = Pick<
  ComposeClient,
  "ensureRunning" | "execStage" | "databaseProbe"
>;

export type ProvisionContext = {
  repoRoot: string;
  config: ProvisionConfig;
  compose: ComposeOperations;
  clock?: Clock;
  sleep?: Sleep;
};

const APP_URL_KEY = "APP_URL";

export const joinUrl = (base: string, suffix: string): string =>
  `${base.replace(/\/+$/, "")}/${suffix.replace(/^\/+/, "")}`;

const startServices = async (ctx: ProvisionContext): Promise<number> => {
  const { database, web } = ctx.config.services;
  logger.step(`Starting required services (${database}, ${web}) if needed…`);

  for (const service of [database, web]) {
    const exitCode = await ctx.compose.ensureRunning(service);
    if (exitCode !== 0) {
      logger.error(`Failed to start service ${service} (exit code ${exitCode}).`);
      return exitCode;
    }
  }
  return 0;
};

const waitForDatabase = async (ctx: ProvisionContext): Promise<void> => {
  const { config } = ctx;
  logger.step("Waiting for database to be ready…");

  const probe = ctx.compose.databaseProbe(
    config.services.web,
    config.database,
    config.execUser
  );
  const result = await waitForReady(probe, {
    intervalMs: config.readiness.intervalMs,
    timeoutMs: config.readiness.timeoutMs,
    clock: ctx.clock,
    sleep: ctx.sleep,
  });

  if (result.status === "ready") {
    logger.ok("Database is ready.");
    return;
  }
  // タイムアウトしても続行する（後続ステージで失敗が表面化する）
  const seconds = Math.round(config.readiness.timeoutMs / 1000);
  logger.warn(`DB not ready after ${seconds}s; continuing anyway.`);
};

const prepareEnv = (ctx: ProvisionContext): void => {
  const { config } = ctx;
  logger.step(`Preparing ${config.envFile}`);

  const result = ensureEnvFile({
    dir: path.resolve(ctx.repoRoot, config.hostAppDir),
    envFile: config.envFile,
    template: config.envTemplate,
    key: APP_URL_KEY,
    value: config.appUrl,
  });

  if (result.created) {
    logger.info(
      result.fromTemplate
        ? `Created ${result.path} from ${config.envTemplate}`
        : `Created ${result.path}`
    );
  } else if (result.changed) {
    logger.info(`Updated ${APP_URL_KEY} in ${result.path}`);
  } else {
    logger.debug(`${result.path} is up to date`);
  }
};

const printSummary = (config: ProvisionConfig): void => {
  logger.done(`Laravel ready at: ${config.appUrl}`);
  logger.info(`Filament admin: ${joinUrl(config.appUrl, config.adminPath)}`);
  logger.info(`Default login: ${config.defaultLogin} (if seed applied).`);
};

/**
 * 初回セットアップを順番に実行し、プロセスの終了コードを返す。
 */
export const provision = async (ctx: ProvisionContext): Promise<number> => {
  logger.init("Laravel initialization starting…");
  logger.info(`Repository root: ${ctx.repoRoot}`);

  const startCode = await startServices(ctx);
  if (startCode !== 0) return startCode;

  await waitForDatabase(ctx);
  prepareEnv(ctx);

  const result = await runStages(
    buildSetupStages(ctx.config),
    ctx.compose.execStage
  );
  if (!result.ok) {
    return result.exitCode;
  }

  printSummary(ctx.config);
  return 0;
};
