/**
 * Logger Utility
 * Handles console output with different log levels
 */

import type { LogLevel } from "../types/config";

/**
 * Where log lines go; the CLI swaps this for one that keeps the spinner intact
 */
export interface LogSink {
  log(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  constructor(
    private level: LogLevel = "info",
    private sink: LogSink = console,
  ) {}

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string): void {
    if (this.enabled("debug")) {
      this.sink.log(`[DEBUG] ${message}`);
    }
  }

  info(message: string): void {
    if (this.enabled("info")) {
      this.sink.log(`[INFO] ${message}`);
    }
  }

  warn(message: string): void {
    if (this.enabled("warn")) {
      this.sink.warn(`[WARN] ${message}`);
    }
  }

  error(message: string, error?: unknown): void {
    this.sink.error(`[ERROR] ${message}`);
    if (error instanceof Error && error.stack) {
      this.sink.error(error.stack);
    }
  }
}
