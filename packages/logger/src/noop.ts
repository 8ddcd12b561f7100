import type { Logger } from "@formwork/types";

export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}

  child(): Logger {
    return this;
  }

  withContext(): Logger {
    return this;
  }
}

export const NOOP_LOGGER: Logger = new NoopLogger();
