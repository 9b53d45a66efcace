export {
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  applyEnvOverrides,
  loadConfig,
  mergeConfig,
} from "./loader";
export { validateConfig } from "./validator";
export { PROJECT_ENV_FILE, loadProjectEnv, resolveAppEnvPath } from "./env";
