#!/usr/bin/env node

import path from "path";
import { resolveRepoRoot, resolveToolDir } from "../src/core/root";
import {
  CONFIG_FILE_NAME,
  loadConfig,
  loadProjectEnv,
  resolveAppEnvPath,
  validateConfig,
} from "../src/infrastructure/config";

console.log("🔍 Checking configuration...");

try {
  const repoRoot = resolveRepoRoot(resolveToolDir(__dirname));
  loadProjectEnv(repoRoot, resolveAppEnvPath(repoRoot, loadConfig(repoRoot)));

  const config = loadConfig(repoRoot);
  validateConfig(config);

  console.log("✅ Configuration is valid!");
  console.log("📊 Configuration details:");
  console.log(`   Repository root: ${repoRoot}`);
  console.log(`   Config file: ${path.join(repoRoot, CONFIG_FILE_NAME)}`);
  console.log(`   App URL: ${config.appUrl}`);
  console.log(
    `   Services: ${config.services.database}, ${config.services.web}`
  );
  console.log(
    `   App directory: ${config.hostAppDir} -> ${config.containerAppDir}`
  );
  console.log(
    `   DB wait: ${config.readiness.timeoutMs}ms (every ${config.readiness.intervalMs}ms)`
  );
} catch (error) {
  console.error(
    "❌ Configuration error:",
    error instanceof Error ? error.message : String(error)
  );
  process.exit(1);
}
