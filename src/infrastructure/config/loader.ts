import fs from "fs";
import path from "path";
import type { ProvisionConfig } from "../../shared/types";

export const CONFIG_FILE_NAME = "provision.config.json";

export const DEFAULT_CONFIG: ProvisionConfig = {
  appUrl: "http://web.localhost",
  services: {
    database: "db",
    web: "web",
  },
  execUser: "www-data",
  containerAppDir: "/var/www/html/laravel",
  hostAppDir: "laravel",
  envFile: ".env",
  envTemplate: ".env.example",
  database: {
    host: "db",
    user: "root",
    password: "rootpass",
  },
  readiness: {
    timeoutMs: 60_000,
    intervalMs: 2_000,
  },
  adminPath: "/admin",
  defaultLogin: "admin@example.com / password",
};

type Env = Record<string, string | undefined>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const pickString = (
  source: Record<string, unknown>,
  key: string,
  fallback: string,
  field: string = key
): string => {
  const value = source[key];
  if (value === undefined) return fallback;
  if (typeof value !== "string") {
    throw new Error(`"${field}" in ${CONFIG_FILE_NAME} must be a string`);
  }
  return value;
};

const pickNumber = (
  source: Record<string, unknown>,
  key: string,
  fallback: number,
  field: string
): number => {
  const value = source[key];
  if (value === undefined) return fallback;
  if (typeof value !== "number") {
    throw new Error(`"${field}" in ${CONFIG_FILE_NAME} must be a number`);
  }
  return value;
};

const pickSection = (
  source: Record<string, unknown>,
  key: string
): Record<string, unknown> => {
  const value = source[key];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new Error(`"${key}" in ${CONFIG_FILE_NAME} must be an object`);
  }
  return value;
};

export const mergeConfig = (
  base: ProvisionConfig,
  raw: unknown
): ProvisionConfig => {
  if (!isRecord(raw)) {
    throw new Error(`${CONFIG_FILE_NAME} must contain a JSON object`);
  }

  const services = pickSection(raw, "services");
  const database = pickSection(raw, "database");
  const readiness = pickSection(raw, "readiness");

  return {
    appUrl: pickString(raw, "appUrl", base.appUrl),
    services: {
      database: pickString(
        services,
        "database",
        base.services.database,
        "services.database"
      ),
      web: pickString(services, "web", base.services.web, "services.web"),
    },
    execUser: pickString(raw, "execUser", base.execUser),
    containerAppDir: pickString(raw, "containerAppDir", base.containerAppDir),
    hostAppDir: pickString(raw, "hostAppDir", base.hostAppDir),
    envFile: pickString(raw, "envFile", base.envFile),
    envTemplate: pickString(raw, "envTemplate", base.envTemplate),
    database: {
      host: pickString(database, "host", base.database.host, "database.host"),
      user: pickString(database, "user", base.database.user, "database.user"),
      password: pickString(
        database,
        "password",
        base.database.password,
        "database.password"
      ),
    },
    readiness: {
      timeoutMs: pickNumber(
        readiness,
        "timeoutMs",
        base.readiness.timeoutMs,
        "readiness.timeoutMs"
      ),
      intervalMs: pickNumber(
        readiness,
        "intervalMs",
        base.readiness.intervalMs,
        "readiness.intervalMs"
      ),
    },
    adminPath: pickString(raw, "adminPath", base.adminPath),
    defaultLogin: pickString(raw, "defaultLogin", base.defaultLogin),
  };
};

const parseNumberEnv = (name: string, value: string): number => {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new Error(`${name} must be a number, got "${value}"`);
  }
  return parsed;
};

export const applyEnvOverrides = (
  config: ProvisionConfig,
  env: Env
): ProvisionConfig => {
  const next: ProvisionConfig = {
    ...config,
    services: { ...config.services },
    database: { ...config.database },
    readiness: { ...config.readiness },
  };

  // 環境変数による設定の上書き
  if (env.APP_URL) next.appUrl = env.APP_URL;
  if (env.PROVISION_APP_DIR) next.hostAppDir = env.PROVISION_APP_DIR;
  if (env.DB_HOST) next.database.host = env.DB_HOST;
  if (env.DB_ROOT_USER) next.database.user = env.DB_ROOT_USER;
  if (env.DB_ROOT_PASSWORD) next.database.password = env.DB_ROOT_PASSWORD;
  if (env.DB_READY_TIMEOUT_MS) {
    next.readiness.timeoutMs = parseNumberEnv(
      "DB_READY_TIMEOUT_MS",
      env.DB_READY_TIMEOUT_MS
    );
  }
  if (env.DB_READY_INTERVAL_MS) {
    next.readiness.intervalMs = parseNumberEnv(
      "DB_READY_INTERVAL_MS",
      env.DB_READY_INTERVAL_MS
    );
  }

  return next;
};

export const loadConfig = (
  repoRoot: string,
  env: Env = process.env
): ProvisionConfig => {
  const configPath = path.join(repoRoot, CONFIG_FILE_NAME);

  let config = DEFAULT_CONFIG;
  if (fs.existsSync(configPath)) {
    const configData = fs.readFileSync(configPath, "utf-8");
    let raw: unknown;
    try {
      raw = JSON.parse(configData);
    } catch (error) {
      throw new Error(
        `${CONFIG_FILE_NAME} is not valid JSON: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
    config = mergeConfig(config, raw);
  }

  return applyEnvOverrides(config, env);
};
