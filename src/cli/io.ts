/**
 * Shared CLI plumbing: output sinks, ANSI colors, exit codes.
 *
 * Commands write through a CliIO instead of the console so tests can run
 * them in-process and inspect what was printed.
 */

import { loadConfig, type AppConfig } from "../config/index.js";
import { createLogger, initRunId, type Logger } from "../logging/index.js";

export const EXIT_CODES = {
  success: 0,
  error: 1,
  /** render-prompt: the checked output has blocking guardrail violations */
  blocked: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  color: boolean;
}

export const processIO: CliIO = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  color: Boolean(process.stdout.isTTY) && !process.env.NO_COLOR,
};

/** Collects output in memory. */
export function createBufferedIO(): CliIO & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
    color: false,
  };
}

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

export type Color = Exclude<keyof typeof COLORS, "reset">;

export function paint(io: CliIO, color: Color, text: string): string {
  return io.color ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export interface CliContext {
  config: AppConfig;
  logger: Logger;
}

/**
 * Load configuration, start a run and build the command's logger. Log lines
 * go to stderr so stdout carries only the command's output.
 */
export function createCliContext(command: string): CliContext {
  const config = loadConfig();
  initRunId();
  const logger = createLogger({
    level: config.logLevel,
    scope: command,
    stderr: true,
    file: config.logToFile,
    logDir: config.logDir,
    logFile: `${config.appName}.log`,
  });
  return { config, logger };
}

/** True when `argv[1]` is this command's script (not an importing test). */
export function isDirectExecution(command: string): boolean {
  const script = process.argv[1];
  return script !== undefined && (script.endsWith(`${command}.ts`) || script.endsWith(`${command}.js`));
}
