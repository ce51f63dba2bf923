/**
 * Minimal structured logger interface.
 * The breaker and its adapters program to this; pass a StructuredLogger or
 * any object with the same shape.
 * @module
 */

/** Structured fields attached to a log line, e.g. `{ circuit, from, to }`. */
export type LogContext = Record<string, unknown>;

/** Structured logger with optional debug level. */
export interface Logger {
  debug?(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
}
