import { LogLevel } from "../config/env.js";

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Writes every level to stderr: stdout carries the MCP stdio transport.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;

  constructor(options: { level?: LogLevel } = {}) {
    this.minLevel = options.level ?? "info";
  }

  debug(message: string, context?: Record<string, unknown>) {
    this.log("debug", message, context);
  }

  info(message: string, context?: Record<string, unknown>) {
    this.log("info", message, context);
  }

  warn(message: string, context?: Record<string, unknown>) {
    this.log("warn", message, context);
  }

  error(message: string, context?: Record<string, unknown>) {
    this.log("error", message, context);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>) {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const line = `${new Date().toISOString()} [${level.toUpperCase()}] ${message}`;
    if (context && Object.keys(context).length > 0) {
      console.error(line, JSON.stringify(context));
      return;
    }
    console.error(line);
  }
}

export class NullLogger implements Logger {
  debug() {}

  info() {}

  warn() {}

  error() {}
}
