import pino from "pino";
import type { Logger, LogLevel } from "@formwork/types";
import type { LoggerConfig } from "./env";

/**
 * The `Logger` models write through when one is passed in `ModelOptions`.
 * Models take a `formwork.model` child tagged with the schema name and
 * report failed validations at debug with the error count. The rejected
 * input is never logged.
 */
export class FormworkLoggerImpl implements Logger {
  constructor(private pinoLogger: pino.Logger) {}

  debug(message: string, attributes?: Record<string, unknown>): void {
    this.log("debug", message, attributes);
  }

  info(message: string, attributes?: Record<string, unknown>): void {
    this.log("info", message, attributes);
  }

  warn(message: string, attributes?: Record<string, unknown>): void {
    this.log("warn", message, attributes);
  }

  error(message: string, attributes?: Record<string, unknown>): void {
    this.log("error", message, attributes);
  }

  private log(level: LogLevel, message: string, attributes?: Record<string, unknown>): void {
    const fn = this.pinoLogger[level].bind(this.pinoLogger);
    if (attributes) fn(attributes, message);
    else fn(message);
  }

  child(name: string, attributes?: Record<string, unknown>): Logger {
    return new FormworkLoggerImpl(this.pinoLogger.child({ name, ...attributes }));
  }

  withContext(attributes: Record<string, unknown>): Logger {
    return new FormworkLoggerImpl(this.pinoLogger.child(attributes));
  }

  /** Raises or lowers the threshold, e.g. to surface validation failures while debugging. */
  setLevel(level: LogLevel): void {
    this.pinoLogger.level = level;
  }
}

export function useHumanFormat(config: LoggerConfig): boolean {
  return config.logFormat === "human" || (config.logFormat === "auto" && config.local);
}

/** Builds the logger from `readLoggerEnv()` output. */
export function createLogger(config: LoggerConfig): FormworkLoggerImpl {
  const streams: pino.StreamEntry[] = [];

  if (useHumanFormat(config)) {
    // pino-pretty runs in a worker thread; local development only
    streams.push({
      level: config.logLevel,
      stream: pino.transport({ target: "pino-pretty", options: { destination: 1 } }),
    });
  } else {
    streams.push({ level: config.logLevel, stream: pino.destination(1) });
  }

  if (config.logFilePath) {
    streams.push({
      level: config.logLevel,
      stream: pino.destination(config.logFilePath),
    });
  }

  const logger = pino(
    {
      level: config.logLevel,
      redact:
        config.redactKeys.length > 0
          ? { paths: config.redactKeys, censor: "[REDACTED]" }
          : undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(streams),
  );

  return new FormworkLoggerImpl(logger);
}
