/**
 * Logger Utility
 * Handles console output with different log levels.
 * Everything goes to stderr: stdout is reserved for the JSON result.
 */

import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

type MessageLevel = Exclude<LogLevel, "silent">;

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LABELS: Record<MessageLevel, string> = {
  debug: chalk.dim("[DEBUG]"),
  info: chalk.cyan("[INFO]"),
  warn: chalk.yellow("[WARN]"),
  error: chalk.red("[ERROR]"),
};

export class Logger {
  constructor(protected level: LogLevel = "info") {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: MessageLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.level];
  }

  debug(message: string): void {
    if (this.isEnabled("debug")) {
      this.write("debug", message);
    }
  }

  info(message: string): void {
    if (this.isEnabled("info")) {
      this.write("info", message);
    }
  }

  warn(message: string): void {
    if (this.isEnabled("warn")) {
      this.write("warn", message);
    }
  }

  error(message: string, error?: unknown): void {
    if (!this.isEnabled("error")) return;
    this.write("error", message);
    if (error !== undefined && this.isEnabled("debug")) {
      console.error(error);
    }
  }

  protected write(level: MessageLevel, message: string): void {
    console.error(`${LABELS[level]} ${message}`);
  }
}
