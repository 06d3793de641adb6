/**
 * Lightweight logging utility.
 * Outputs to console and/or a log file with timestamps and a run ID.
 *
 * Child loggers carry their own run ID and base context, so concurrent
 * research sessions write correlated lines without sharing state.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

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
  /** Run ID printed on every line; defaults to the process run ID */
  runId?: string;
  /** Fields merged into the context of every entry */
  context?: Record<string, unknown>;
}

type ResolvedOptions = Required<Omit<LoggerOptions, "runId">> & { runId?: string };

const DEFAULT_OPTIONS: ResolvedOptions = {
  level: "info",
  logDir: "output/logs",
  logFile: "app.log",
  console: true,
  file: true,
  context: {},
};

export interface ChildLoggerOptions {
  runId?: string;
  context?: Record<string, unknown>;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Derive a logger that shares sinks and level but tags entries differently. */
  child(options: ChildLoggerOptions): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_PRIORITY, value);
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
  const opts: ResolvedOptions = { ...DEFAULT_OPTIONS, ...options };
  const logFilePath = join(opts.logDir, opts.logFile);

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

    const runId = opts.runId ?? getRunId() ?? "no-run-id";
    const entry = formatLogEntry(level, message, runId, { ...opts.context, ...context });

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
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (child) =>
      createLogger({
        ...opts,
        runId: child.runId ?? opts.runId,
        context: { ...opts.context, ...child.context },
      }),
  };
}

/**
 * Logger that drops every entry. Used where no sink is wanted (tests,
 * library callers that bring their own logging).
 */
export function createSilentLogger(): Logger {
  return createLogger({ console: false, file: false });
}
