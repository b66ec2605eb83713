import type { Logger } from "../interfaces/logger.js";

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

const RESERVED_KEYS: ReadonlySet<string> = new Set(["time", "level", "msg", "component"]);

export interface StructuredLoggerOptions {
  writer?: (line: string) => void;
  level?: LogLevel;
  component?: string;
  /** Fields stamped on every entry (e.g. the entity kind a logger serves). */
  bindings?: Record<string, unknown>;
}

/** JSON-lines logger. One object per entry, written to stderr unless a writer is given. */
export class StructuredLogger implements Logger {
  private readonly writer: (line: string) => void;
  private readonly level: LogLevel;
  private readonly component: string | undefined;
  private readonly bindings: Record<string, unknown>;

  constructor(options: StructuredLoggerOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.level = options.level ?? LogLevel.DEBUG;
    this.component = options.component;
    this.bindings = options.bindings ?? {};
  }

  /** Same writer and level; new component, extra bindings merged over the parent's. */
  child(component: string, bindings: Record<string, unknown> = {}): StructuredLogger {
    return new StructuredLogger({
      writer: this.writer,
      level: this.level,
      component,
      bindings: { ...this.bindings, ...bindings },
    });
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.DEBUG, msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.INFO, msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.WARN, msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.ERROR, msg, ctx);
  }

  private emit(level: LogLevel, msg: string, ctx?: Record<string, unknown>): void {
    if (level < this.level) return;

    const entry: Record<string, unknown> = {
      time: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      msg,
    };

    if (this.component) entry.component = this.component;

    for (const fields of [this.bindings, ctx ?? {}]) {
      for (const [key, value] of Object.entries(fields)) {
        if (RESERVED_KEYS.has(key)) continue;
        if (value instanceof Error) {
          entry[key] = value.message;
          entry[`${key}Stack`] = value.stack;
        } else {
          entry[key] = value;
        }
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
