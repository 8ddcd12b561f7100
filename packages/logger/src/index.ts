export { FormworkLoggerImpl, createLogger, useHumanFormat } from "./logger";
export { readLoggerEnv } from "./env";
export type { LoggerConfig, LogFormat } from "./env";
export { NoopLogger, NOOP_LOGGER } from "./noop";
