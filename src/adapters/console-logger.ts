/**
 * Console-based Logger implementation.
 * Prefixes output with a tag (default: "lifecycle") and drops entries below `level`.
 */

import type { Logger } from "../interfaces/logger.js";
import { LogLevel } from "./structured-logger.js";

export interface ConsoleLoggerOptions {
  prefix?: string;
  level?: LogLevel;
}

type ConsoleMethod = "debug" | "log" | "warn" | "error";

export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly level: LogLevel;

  constructor(options: ConsoleLoggerOptions | string = {}) {
    const resolved = typeof options === "string" ? { prefix: options } : options;
    this.prefix = resolved.prefix ?? "lifecycle";
    this.level = resolved.level ?? LogLevel.DEBUG;
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, "debug", msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, "log", msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, "warn", msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, "error", msg, ctx);
  }

  private write(
    level: LogLevel,
    method: ConsoleMethod,
    msg: string,
    ctx?: Record<string, unknown>,
  ): void {
    if (level < this.level) return;
    const formatted = `[${this.prefix}] ${msg}`;
    if (ctx) {
      console[method](formatted, ctx);
    } else {
      console[method](formatted);
    }
  }
}
