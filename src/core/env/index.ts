export { ensureEnvFile, upsertEnvValue } from "./upsert";
export type { EnsureEnvFileOptions, EnsureEnvFileResult } from "./upsert";
