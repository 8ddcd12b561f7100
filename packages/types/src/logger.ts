export type LogLevel = "debug" | "info" | "warn" | "error";

/** Structured logger accepted by the engine. Implementations live in `@formwork/logger`. */
export interface Logger {
  debug(message: string, attributes?: Record<string, unknown>): void;
  info(message: string, attributes?: Record<string, unknown>): void;
  warn(message: string, attributes?: Record<string, unknown>): void;
  error(message: string, attributes?: Record<string, unknown>): void;

  /** Create a named child logger. Adds the name to all log records. */
  child(name: string, attributes?: Record<string, unknown>): Logger;

  /** Create a logger enriched with additional context attributes. */
  withContext(attributes: Record<string, unknown>): Logger;
}
