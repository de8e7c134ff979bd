import type { LogLevelName } from "../types/config.js";

/**
 * Structured JSON-lines logger.
 *
 * Writes to stderr by default: stdout carries the MCP protocol when serving.
 */

export type LogEntry = {
  timestamp: string;
  level: LogLevelName;
  message: string;
  context?: Record<string, unknown>;
  error?: { name: string; message: string; stack?: string };
};

export type LogSink = (line: string) => void;

const LEVEL_ORDER: Record<LogLevelName, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export class Logger {
  constructor(
    private level: LogLevelName = "info",
    private readonly sink: LogSink = (line) => process.stderr.write(line),
    private readonly bindings: Record<string, unknown> = {},
  ) {}

  setLevel(level: LogLevelName): void {
    this.level = level;
  }

  /** Child logger that stamps `bindings` onto every entry's context. */
  child(bindings: Record<string, unknown>): Logger {
    return new Logger(this.level, this.sink, { ...this.bindings, ...bindings });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log("warn", message, context);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    const errorInfo =
      error instanceof Error ? { name: error.name, message: error.message, stack: error.stack } : undefined;
    this.log("error", message, context, errorInfo);
  }

  private log(level: LogLevelName, message: string, context?: Record<string, unknown>, error?: LogEntry["error"]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const merged = { ...this.bindings, ...context };
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(Object.keys(merged).length > 0 && { context: merged }),
      ...(error && { error }),
    };
    this.sink(JSON.stringify(entry) + "\n");
  }
}

export const logger = new Logger();
