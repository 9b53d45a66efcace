#!/usr/bin/env node
import { provision } from "./app";
import { ComposeClient } from "./core/compose";
import { resolveRepoRoot, resolveToolDir } from "./core/root";
import {
  loadConfig,
  loadProjectEnv,
  resolveAppEnvPath,
  validateConfig,
} from "./infrastructure/config";
import { logger } from "./infrastructure/logger";

const main = async (): Promise<number> => {
  const repoRoot = resolveRepoRoot(resolveToolDir(__dirname));

  // プロジェクトルートの .env を読み込み（既存の環境変数が優先）
  loadProjectEnv(repoRoot, resolveAppEnvPath(repoRoot, loadConfig(repoRoot)));

  // 設定を読み込み
  const config = loadConfig(repoRoot);
  validateConfig(config);

  logger.debug("Configuration loaded", {
    appUrl: config.appUrl,
    services: config.services,
    readiness: config.readiness,
  });

  const compose = new ComposeClient({ projectDir: repoRoot });
  return provision({ repoRoot, config, compose });
};

// 中断時は後始末をせずに終了する
process.on("SIGINT", () => {
  logger.warn("Interrupted; stopping.");
  process.exit(130);
});

process.on("SIGTERM", () => {
  logger.warn("Terminated; stopping.");
  process.exit(143);
});

main()
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((error) => {
    logger.error(
      "Provisioning failed:",
      error instanceof Error ? error.message : String(error)
    );
    process.exit(1);
  });
