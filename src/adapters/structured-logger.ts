import type { LogContext, Logger } from "../interfaces/logger.js";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error",
};

const RESERVED_FIELDS = new Set(["time", "level", "msg", "component"]);

export interface StructuredLoggerOptions {
  writer?: (line: string) => void;
  level?: LogLevel;
  component?: string;
  /** Fields added to every entry, e.g. `{ circuit: "payments" }`. */
  bindings?: Record<string, unknown>;
}

/**
 * JSON-lines logger. Each entry carries `time`, `level`, `msg`, the bound
 * fields and the call's context; Error values are flattened to their
 * message, stack and (when present) code.
 */
export class StructuredLogger implements Logger {
  private writer: (line: string) => void;
  private level: LogLevel;
  private component: string | undefined;
  private bindings: Record<string, unknown>;

  constructor(options: StructuredLoggerOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.level = options.level ?? LogLevel.INFO;
    this.component = options.component;
    this.bindings = options.bindings ?? {};
  }

  /** Logger sharing this one's writer and level, with extra bound fields. */
  child(bindings: Record<string, unknown>): StructuredLogger {
    return new StructuredLogger({
      writer: this.writer,
      level: this.level,
      component: this.component,
      bindings: { ...this.bindings, ...bindings },
    });
  }

  debug(msg: string, ctx?: LogContext): void {
    this.emit(LogLevel.DEBUG, msg, ctx);
  }

  info(msg: string, ctx?: LogContext): void {
    this.emit(LogLevel.INFO, msg, ctx);
  }

  warn(msg: string, ctx?: LogContext): void {
    this.emit(LogLevel.WARN, msg, ctx);
  }

  error(msg: string, ctx?: LogContext): void {
    this.emit(LogLevel.ERROR, msg, ctx);
  }

  private emit(level: LogLevel, msg: string, ctx?: LogContext): void {
    if (level < this.level) return;

    const entry: Record<string, unknown> = {
      time: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      msg,
    };

    if (this.component) entry.component = this.component;

    for (const [key, value] of Object.entries({ ...this.bindings, ...ctx })) {
      if (RESERVED_FIELDS.has(key)) continue;
      if (value instanceof Error) {
        entry[key] = value.message;
        entry[`${key}Stack`] = value.stack;
        if ("code" in value && typeof value.code === "string") entry[`${key}Code`] = value.code;
      } else {
        entry[key] = value;
      }
    }

    try {
      this.writer(JSON.stringify(entry));
    } catch {
      // Circular reference or serialization failure: emit safe fallback
      this.writer(
        JSON.stringify({ time: entry.time, level: entry.level, msg, serializationError: true }),
      );
    }
  }
}
