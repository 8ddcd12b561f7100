import type { LogLevel } from "@formwork/types";

export type LogFormat = "json" | "human" | "auto";

export type LoggerConfig = {
  logLevel: LogLevel;
  logFormat: LogFormat;
  logFilePath: string | null;
  redactKeys: string[];
  /** True when running on a developer machine (`FORMWORK_ENV` unset or `local`). */
  local: boolean;
};

const VALID_LOG_LEVELS = new Set<string>(["debug", "info", "warn", "error"]);
const VALID_LOG_FORMATS = new Set<string>(["json", "human", "auto"]);

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && VALID_LOG_LEVELS.has(value);
}

function isLogFormat(value: string | undefined): value is LogFormat {
  return value !== undefined && VALID_LOG_FORMATS.has(value);
}

export function readLoggerEnv(): LoggerConfig {
  const rawLevel = process.env.FORMWORK_LOG_LEVEL;
  const rawFormat = process.env.FORMWORK_LOG_FORMAT;
  const env = process.env.FORMWORK_ENV;

  return {
    logLevel: isLogLevel(rawLevel) ? rawLevel : "info",
    logFormat: isLogFormat(rawFormat) ? rawFormat : "auto",
    logFilePath: process.env.FORMWORK_LOG_FILE_PATH ?? null,
    redactKeys: parseRedactKeys(process.env.FORMWORK_LOG_REDACT_KEYS),
    local: !env || env === "local",
  };
}

function parseRedactKeys(keys: string | undefined): string[] {
  if (!keys) return [];
  return keys
    .split(",")
    .map((k) => k.trim())
    .filter(Boolean);
}
