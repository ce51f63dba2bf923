import type { Logger } from "../interfaces/logger.js";

export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/** Used by breakers created without a logger. */
export const noopLogger: Logger = new NoopLogger();
