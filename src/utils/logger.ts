/**
 * Logger Utility
 * Handles console output with different log levels, optionally mirrored to a log file
 */

import { appendFileSync } from "node:fs";
import chalk from "chalk";
import type { LogLevel } from "../types";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  constructor(
    private level: LogLevel = "info",
    private logFilePath: string | null = null,
  ) {}

  debug(message: string): void {
    this.write("debug", message);
    if (this.enabled("debug")) {
      console.log(chalk.gray(`[DEBUG] ${message}`));
    }
  }

  info(message: string): void {
    this.write("info", message);
    if (this.enabled("info")) {
      console.log(message);
    }
  }

  warn(message: string): void {
    this.write("warn", message);
    if (this.enabled("warn")) {
      console.warn(chalk.yellow(`[WARN] ${message}`));
    }
  }

  error(message: string, error?: unknown): void {
    const detail = error instanceof Error ? error.message : undefined;
    this.write("error", detail ? `${message}: ${detail}` : message);
    console.error(chalk.red(`[ERROR] ${message}`));
    if (error) {
      console.error(error);
    }
  }

  /**
   * Debug-styled output that bypasses the level filter and the log file
   * Used for preview command lines, which are always shown
   */
  command(message: string): void {
    console.log(chalk.gray(message));
  }

  get logFile(): string | null {
    return this.logFilePath;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private write(level: LogLevel, message: string): void {
    if (!this.logFilePath || !this.enabled(level)) return;
    const line = `${new Date().toISOString()}\t${level.toUpperCase()}\t${message}\n`;
    appendFileSync(this.logFilePath, line, "utf-8");
  }
}
