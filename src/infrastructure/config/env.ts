import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import type { ProvisionConfig } from "../../shared/types";

type Env = Record<string, string | undefined>;

export const PROJECT_ENV_FILE = ".env";

export const resolveAppEnvPath = (
  repoRoot: string,
  config: Pick<ProvisionConfig, "hostAppDir" | "envFile">
): string => path.resolve(repoRoot, config.hostAppDir, config.envFile);

/**
 * プロジェクトルートの .env を env に読み込む（既存の値が優先）。
 * それがこのツールの書き込むアプリの .env と同じファイルなら読み込まない。
 */
export const loadProjectEnv = (
  repoRoot: string,
  appEnvPath: string,
  env: Env = process.env
): boolean => {
  const envPath = path.resolve(repoRoot, PROJECT_ENV_FILE);
  if (envPath === path.resolve(appEnvPath)) return false;
  if (!fs.existsSync(envPath)) return false;

  const parsed = dotenv.parse(fs.readFileSync(envPath, "utf-8"));
  for (const [key, value] of Object.entries(parsed)) {
    if (env[key] === undefined) env[key] = value;
  }
  return true;
};
