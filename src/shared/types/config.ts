export type ServiceNames = {
  database: string;
  web: string;
};

export type DatabaseCredentials = {
  host: string;
  user: string;
  password: string;
};

export type ReadinessSettings = {
  timeoutMs: number;
  intervalMs: number;
};

export type ProvisionConfig = {
  appUrl: string;
  services: ServiceNames;
  execUser: string;
  containerAppDir: string;
  hostAppDir: string;
  envFile: string;
  envTemplate: string;
  database: DatabaseCredentials;
  readiness: ReadinessSettings;
  adminPath: string;
  defaultLogin: string;
};
