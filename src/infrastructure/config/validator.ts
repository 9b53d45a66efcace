import type { ProvisionConfig } from "../../shared/types";

const requireText = (value: string, field: string): void => {
  if (!value.trim()) {
    throw new Error(`${field} must not be empty`);
  }
};

export const validateConfig = (config: ProvisionConfig): void => {
  // URL パーサーは改行を黙って取り除くため、先に検査する
  if (/[\r\n]/.test(config.appUrl)) {
    throw new Error("APP_URL must not contain line breaks");
  }

  let url: URL;
  try {
    url = new URL(config.appUrl);
  } catch {
    throw new Error(`APP_URL is not a valid URL: "${config.appUrl}"`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new Error(`APP_URL must use http or https: "${config.appUrl}"`);
  }

  requireText(config.services.database, "services.database");
  requireText(config.services.web, "services.web");
  requireText(config.containerAppDir, "containerAppDir");
  requireText(config.envFile, "envFile");
  requireText(config.database.host, "database.host");
  requireText(config.database.user, "database.user");

  if (config.readiness.timeoutMs < 0) {
    throw new Error("readiness.timeoutMs must not be negative");
  }
  if (config.readiness.intervalMs <= 0) {
    throw new Error("readiness.intervalMs must be greater than zero");
  }
};
