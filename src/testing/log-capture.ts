import { LogLevel, StructuredLogger } from "../adapters/structured-logger.js";

export interface CapturedEntry {
  level: string;
  msg: string;
  [key: string]: unknown;
}

/** StructuredLogger writing parsed entries into an array. */
export function captureLogs(level: LogLevel = LogLevel.DEBUG): {
  logger: StructuredLogger;
  entries: CapturedEntry[];
} {
  const entries: CapturedEntry[] = [];
  const logger = new StructuredLogger({
    level,
    writer: (line) => entries.push(JSON.parse(line)),
  });
  return { logger, entries };
}
