/**
 * Leveled logger.
 *
 * Lines look like `[timestamp] [LEVEL] [runId] [scope] message {context}` and
 * go to the console and, when enabled, to an append-only log file. Library
 * code receives a Logger from its caller; `silentLogger` is the default.
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

export type LogContext = Record<string, unknown>;

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Component name rendered after the run ID */
  scope?: string;
  /** Enable console output */
  console?: boolean;
  /** Send every console line to stderr, keeping stdout for program output */
  stderr?: boolean;
  /** Enable file output */
  file?: boolean;
  /** Directory for log files */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
}

const DEFAULT_OPTIONS: Required<Omit<LoggerOptions, "scope">> = {
  level: "info",
  console: true,
  stderr: false,
  file: false,
  logDir: "output/logs",
  logFile: "promptpack.log",
};

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Derive a logger that shares this one's sinks under a nested scope. */
  child(scope: string): Logger;
}

/**
 * Format a log entry with timestamp, level, run ID, scope and message.
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  scope?: string,
  now: Date = new Date()
): string {
  const runId = getRunId() ?? "no-run-id";
  const levelStr = level.toUpperCase().padEnd(5);
  const scopeStr = scope ? ` [${scope}]` : "";

  let entry = `[${now.toISOString()}] [${levelStr}] [${runId}]${scopeStr} ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }

  return entry;
}

function getConsoleMethod(level: LogLevel): (line: string) => void {
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
  const { scope, ...rest } = options;
  const opts = { ...DEFAULT_OPTIONS, ...rest };
  const logFilePath = join(opts.logDir, opts.logFile);

  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function build(currentScope: string | undefined): Logger {
    function log(level: LogLevel, message: string, context?: LogContext): void {
      if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
        return;
      }

      const entry = formatLogEntry(level, message, context, currentScope);

      if (opts.console) {
        (opts.stderr ? console.error : getConsoleMethod(level))(entry);
      }

      if (opts.file) {
        try {
          appendFileSync(logFilePath, entry + "\n");
        } catch (err) {
          console.error(`Failed to write to log file ${logFilePath}: ${String(err)}`);
        }
      }
    }

    return {
      debug: (message, context) => log("debug", message, context),
      info: (message, context) => log("info", message, context),
      warn: (message, context) => log("warn", message, context),
      error: (message, context) => log("error", message, context),
      child: (childScope) =>
        build(currentScope ? `${currentScope}:${childScope}` : childScope),
    };
  }

  return build(scope);
}

/** Logger that drops every entry. */
export const silentLogger: Logger = createLogger({ console: false, file: false });
