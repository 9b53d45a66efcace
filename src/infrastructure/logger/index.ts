export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

export type LogLevelValue = {
  DEBUG: 0;
  INFO: 1;
  WARN: 2;
  ERROR: 3;
};

export const LOG_LEVELS: LogLevelValue = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
} as const;

export type LogTag =
  | "debug"
  | "init"
  | "info"
  | "step"
  | "ok"
  | "warn"
  | "error"
  | "done";

const TAG_LEVELS: Record<LogTag, LogLevel> = {
  debug: "DEBUG",
  init: "INFO",
  info: "INFO",
  step: "INFO",
  ok: "INFO",
  warn: "WARN",
  error: "ERROR",
  done: "INFO",
};

export const isLogLevel = (value: string): value is LogLevel =>
  Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);

export class Logger {
  private level: number;
  private timestamps: boolean;

  constructor(level: LogLevel = "INFO", timestamps: boolean = false) {
    this.level = LOG_LEVELS[level];
    this.timestamps = timestamps;
  }

  private log = (tag: LogTag, message: string, ...args: unknown[]): void => {
    const level = TAG_LEVELS[tag];
    if (LOG_LEVELS[level] < this.level) return;

    const prefix = this.timestamps
      ? `[${new Date().toISOString()}] [${tag}]`
      : `[${tag}]`;

    switch (level) {
      case "DEBUG":
        console.debug(prefix, message, ...args);
        break;
      case "INFO":
        console.info(prefix, message, ...args);
        break;
      case "WARN":
        console.warn(prefix, message, ...args);
        break;
      case "ERROR":
        console.error(prefix, message, ...args);
        break;
    }
  };

  debug = (message: string, ...args: unknown[]): void => {
    this.log("debug", message, ...args);
  };

  init = (message: string, ...args: unknown[]): void => {
    this.log("init", message, ...args);
  };

  info = (message: string, ...args: unknown[]): void => {
    this.log("info", message, ...args);
  };

  step = (message: string, ...args: unknown[]): void => {
    this.log("step", message, ...args);
  };

  ok = (message: string, ...args: unknown[]): void => {
    this.log("ok", message, ...args);
  };

  warn = (message: string, ...args: unknown[]): void => {
    this.log("warn", message, ...args);
  };

  error = (message: string, ...args: unknown[]): void => {
    this.log("error", message, ...args);
  };

  done = (message: string, ...args: unknown[]): void => {
    this.log("done", message, ...args);
  };

  setLevel = (level: LogLevel): void => {
    this.level = LOG_LEVELS[level];
  };
}

const resolveLevel = (): LogLevel => {
  const fromEnv = process.env.LOG_LEVEL?.toUpperCase();
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
  return process.env.NODE_ENV === "development" ? "DEBUG" : "INFO";
};

// デフォルトロガーインスタンス
export const logger = new Logger(
  resolveLevel(),
  process.env.LOG_TIMESTAMPS === "1"
);
