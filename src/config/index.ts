/**
 * Application configuration.
 *
 * Values come from the environment (and `.env`). Library entry points never
 * read this module; only the CLIs do, and pass the values down explicitly.
 */

import { optionalEnv, optionalEnvBool, optionalEnvEnum, optionalEnvInt } from "./env.js";
import type { LogLevel } from "../logging/index.js";

export {
  ConfigError,
  requireEnv,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
  optionalEnvEnum,
} from "./env.js";

export const RUNTIME_ENVIRONMENTS = ["development", "production", "test"] as const;
export type RuntimeEnvironment = (typeof RUNTIME_ENVIRONMENTS)[number];

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/** Default ceiling for nested `{{fragment:…}}` expansion. */
export const DEFAULT_MAX_FRAGMENT_DEPTH = 32;

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: RuntimeEnvironment;
  /** Enable debug mode (forces debug log level) */
  readonly debug: boolean;
  readonly logLevel: LogLevel;
  readonly appName: string;
  /** Also append log lines to `${logDir}/${appName}.log` */
  readonly logToFile: boolean;
  readonly logDir: string;
  /** Default strictness for prompt rendering in the CLIs */
  readonly strictRendering: boolean;
  readonly maxFragmentDepth: number;
}

/**
 * Read configuration from the current environment.
 * Throws ConfigError on the first malformed value.
 */
export function loadConfig(): AppConfig {
  const debug = optionalEnvBool("DEBUG", false);
  return Object.freeze({
    env: optionalEnvEnum("NODE_ENV", RUNTIME_ENVIRONMENTS, "development"),
    debug,
    logLevel: debug ? "debug" : optionalEnvEnum("LOG_LEVEL", LOG_LEVELS, "info"),
    appName: optionalEnv("APP_NAME", "promptpack-engine"),
    logToFile: optionalEnvBool("LOG_TO_FILE", false),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    strictRendering: optionalEnvBool("PROMPTPACK_STRICT", false),
    maxFragmentDepth: optionalEnvInt(
      "PROMPTPACK_MAX_FRAGMENT_DEPTH",
      DEFAULT_MAX_FRAGMENT_DEPTH,
      1
    ),
  });
}
