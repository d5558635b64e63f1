/**
 * Lightweight logging utility.
 * Outputs to both console and log file with timestamps and run ID.
 *
 * Concurrent runs share the log file, so every entry carries the run ID of
 * the logger that wrote it. Child loggers add fixed bindings (e.g. the stage
 * name) that are merged into each entry's context.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Directory for log files */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  /** Enable console output */
  console?: boolean;
  /** Enable file output */
  file?: boolean;
  /** Run ID stamped on entries; falls back to the process run ID */
  runId?: string;
  /** Fields merged into every entry's context */
  bindings?: Record<string, unknown>;
  /** Receives each formatted entry in addition to console/file output */
  sink?: (entry: string) => void;
}

const DEFAULT_OPTIONS = {
  level: "info",
  logDir: "output/logs",
  logFile: "app.log",
  console: true,
  file: true,
} satisfies LoggerOptions;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Derive a logger that adds `bindings` (and optionally a run ID) to every entry. */
  child(bindings: Record<string, unknown>, runId?: string): Logger;
}

/**
 * Narrow an arbitrary string (e.g. from LOG_LEVEL) to a LogLevel.
 */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Format a log entry with timestamp, level, run ID, and message.
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  runId: string,
  context?: Record<string, unknown>,
  now: Date = new Date()
): string {
  const levelStr = level.toUpperCase().padEnd(5);

  let entry = `[${now.toISOString()}] [${levelStr}] [${runId}] ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }

  return entry;
}

/**
 * Get console method for log level.
 */
function getConsoleMethod(level: LogLevel): typeof console.log {
  switch (level) {
    case "debug":
      return console.debug;
    case "info":
      return console.info;
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const logFilePath = join(opts.logDir, opts.logFile);

  // Ensure log directory exists
  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>
  ): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
      return;
    }

    const merged = opts.bindings ? { ...opts.bindings, ...context } : context;
    const entry = formatLogEntry(
      level,
      message,
      opts.runId ?? getRunId() ?? "no-run-id",
      merged
    );

    if (opts.console) {
      getConsoleMethod(level)(entry);
    }

    if (opts.file) {
      try {
        appendFileSync(logFilePath, entry + "\n");
      } catch (err) {
        // Fallback to console if file write fails
        console.error(`Failed to write to log file: ${err}`);
      }
    }

    opts.sink?.(entry);
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (bindings, runId) =>
      createLogger({
        ...options,
        runId: runId ?? opts.runId,
        bindings: { ...opts.bindings, ...bindings },
      }),
  };
}

/**
 * A logger that discards everything. Used as the default for library
 * entry points that are called without a logger.
 */
export const silentLogger: Logger = createLogger({ console: false, file: false });
