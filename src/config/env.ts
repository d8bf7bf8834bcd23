/**
 * Environment variable access.
 *
 * Loads `.env` (via dotenv) once on import, then exposes typed readers that
 * throw ConfigError on malformed values instead of silently defaulting.
 */

import "dotenv/config";

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly key?: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

function readEnv(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

/**
 * Get a required environment variable.
 * Throws ConfigError if the variable is missing or blank.
 */
export function requireEnv(key: string): string {
  const value = readEnv(key);
  if (value === undefined) {
    throw new ConfigError(`Missing required environment variable: ${key}`, key);
  }
  return value;
}

/**
 * Get an optional environment variable with a default value.
 */
export function optionalEnv(key: string, defaultValue: string): string {
  return readEnv(key) ?? defaultValue;
}

/**
 * Get an optional environment variable as an integer no smaller than `min`.
 */
export function optionalEnvInt(key: string, defaultValue: number, min = Number.MIN_SAFE_INTEGER): number {
  const value = readEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  if (!/^-?\d+$/.test(value)) {
    throw new ConfigError(
      `Environment variable ${key} must be a valid integer, got: ${value}`,
      key
    );
  }
  const parsed = Number.parseInt(value, 10);
  if (parsed < min) {
    throw new ConfigError(
      `Environment variable ${key} must be >= ${min}, got: ${parsed}`,
      key
    );
  }
  return parsed;
}

/**
 * Get an optional environment variable as a boolean.
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
export function optionalEnvBool(key: string, defaultValue: boolean): boolean {
  const value = readEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  const normalized = value.toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no"].includes(normalized)) {
    return false;
  }
  throw new ConfigError(
    `Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`,
    key
  );
}

/**
 * Get an optional environment variable restricted to a fixed set of values.
 */
export function optionalEnvEnum<T extends string>(
  key: string,
  allowed: readonly T[],
  defaultValue: T
): T {
  const value = readEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  const match = allowed.find((candidate) => candidate === value.toLowerCase());
  if (match === undefined) {
    throw new ConfigError(
      `Invalid ${key}: ${value}. Must be one of: ${allowed.join(", ")}.`,
      key
    );
  }
  return match;
}
