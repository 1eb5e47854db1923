import path from "node:path";
import { Logger } from "./logger";
import type { LoggingConfig } from "../types";

/**
 * Default log file: faims-split_log_<yyyy-mm-dd>.txt in the working directory
 */
export function defaultLogFilePath(now: Date = new Date()): string {
  const date = now.toISOString().slice(0, 10);
  return path.resolve(`faims-split_log_${date}.txt`);
}

export function createLogger(logging: LoggingConfig): Logger {
  const logFile = logging.logToFile
    ? logging.file
      ? path.resolve(logging.file)
      : defaultLogFilePath()
    : null;
  return new Logger(logging.level, logFile);
}
