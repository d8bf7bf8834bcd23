/**
 * PromptPack parser.
 *
 * Responsible for:
 * - Decoding pack JSON from a string or a file
 * - Validating it against PromptPackSchema, reporting every violated
 *   constraint at once
 * - Freezing the result so a parsed pack is immutable
 *
 * A pack is either fully valid or not constructed at all.
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { ZodIssue } from "zod";

import { PromptPackSchema, type PromptPack } from "./schema.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * One violated field constraint.
 */
export interface PackIssue {
  /** Path to the invalid field, e.g. ["prompts", "support", "version"] */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Violated rule kind (zod issue code) */
  code: string;
}

export class PromptPackParseError extends Error {
  public readonly errors: PackIssue[];

  constructor(message: string, errors: PackIssue[] = [], options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PromptPackParseError";
    this.errors = errors;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    if (this.errors.length === 0) {
      return this.message;
    }
    const lines = [this.message];
    for (const issue of this.errors) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message} [${issue.code}]`);
    }
    return lines.join("\n");
  }
}

/**
 * The pack file does not exist. Kept apart from PromptPackParseError so
 * callers can tell "nothing there" from "something broken there".
 */
export class PromptPackNotFoundError extends Error {
  constructor(public readonly filePath: string) {
    super(`PromptPack file not found: ${filePath}`);
    this.name = "PromptPackNotFoundError";
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toPackIssues(zodIssues: ZodIssue[]): PackIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const key of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, key);
    if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export type PackValidationResult =
  | { success: true; pack: PromptPack }
  | { success: false; errors: PackIssue[] };

/**
 * Validate already-decoded JSON without throwing.
 */
export function validatePromptPack(input: unknown): PackValidationResult {
  const result = PromptPackSchema.safeParse(input);
  if (result.success) {
    return { success: true, pack: deepFreeze(result.data) };
  }
  return { success: false, errors: toPackIssues(result.error.issues) };
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse a PromptPack from a JSON string.
 *
 * @throws PromptPackParseError on malformed JSON ("Invalid JSON: …") or on
 *         schema violations ("PromptPack validation failed: N error(s)")
 */
export function parsePromptPackString(content: string): PromptPack {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PromptPackParseError(`Invalid JSON: ${reason}`, [], { cause: err });
  }

  const result = validatePromptPack(data);
  if (!result.success) {
    throw new PromptPackParseError(
      `PromptPack validation failed: ${result.errors.length} error(s)`,
      result.errors
    );
  }
  return result.pack;
}

/**
 * Parse a PromptPack from a JSON file.
 *
 * @throws PromptPackNotFoundError if the path does not exist
 * @throws PromptPackParseError    if the file cannot be read or parsed
 */
export function parsePromptPack(path: string): PromptPack {
  const filePath = resolve(path);

  if (!existsSync(filePath)) {
    throw new PromptPackNotFoundError(filePath);
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PromptPackParseError(`Failed to read PromptPack file: ${reason}`, [], {
      cause: err,
    });
  }

  return parsePromptPackString(content);
}
