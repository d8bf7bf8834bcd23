/**
 * Variable validation.
 *
 * Coerces caller-supplied values to a variable's declared type, applies its
 * constraint block, and fills in defaults for absent values.
 *
 *   absent (undefined or null)
 *     required, no default  → "Required variable is missing"
 *     otherwise             → the default (or null)
 *
 *   string   strings pass; numbers/booleans via String(); arrays/objects
 *            as canonical JSON
 *   number   booleans rejected; numbers pass; decimal strings parsed
 *            (plus inf/infinity/nan), radix literals rejected
 *   boolean  booleans pass; "true"/"1"/"yes", "false"/"0"/"no" (any case)
 *   object   plain object only
 *   array    array only
 *
 * Constraints run on the coerced value and fail fast on the first broken
 * rule.
 */

import { isDeepStrictEqual } from "node:util";

import {
  isJsonObject,
  jsonKind,
  toCanonicalJson,
  type JsonValue,
} from "../pack/json.js";
import type { Variable, VariableValidation } from "../pack/schema.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class VariableValidationError extends Error {
  constructor(
    public readonly variableName: string,
    public readonly reason: string
  ) {
    super(`Variable '${variableName}': ${reason}`);
    this.name = "VariableValidationError";
  }
}

/** Caller-supplied values; `undefined` and `null` both mean "absent". */
export type VariableValues = Readonly<Record<string, JsonValue | undefined>>;

export type ResolvedVariables = Record<string, JsonValue>;

export interface ValidateVariablesOptions {
  /** Reject keys that match no declared variable (default: true). */
  strict?: boolean;
}

// ---------------------------------------------------------------------------
// Type coercion
// ---------------------------------------------------------------------------

const TRUE_STRINGS = new Set(["true", "1", "yes"]);
const FALSE_STRINGS = new Set(["false", "0", "no"]);

function typeMismatch(variable: Variable, value: JsonValue): VariableValidationError {
  return new VariableValidationError(
    variable.name,
    `Expected ${variable.type}, got ${jsonKind(value)}`
  );
}

/** Decimal notation only; radix prefixes such as 0x and 0b are not numbers. */
const DECIMAL_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;
const SPECIAL_RE = /^([+-]?)(inf|infinity|nan)$/i;

function parseNumber(text: string): number | undefined {
  const trimmed = text.trim();
  if (DECIMAL_RE.test(trimmed)) return Number(trimmed);

  const special = SPECIAL_RE.exec(trimmed);
  if (special === null) return undefined;
  if (special[2]?.toLowerCase() === "nan") return Number.NaN;
  return special[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
}

function coerce(variable: Variable, value: JsonValue): JsonValue {
  switch (variable.type) {
    case "string":
      if (typeof value === "string") return value;
      if (typeof value === "object" && value !== null) return toCanonicalJson(value);
      return String(value);

    case "number": {
      if (typeof value === "number") return value;
      if (typeof value === "string") {
        const parsed = parseNumber(value);
        if (parsed !== undefined) return parsed;
      }
      throw typeMismatch(variable, value);
    }

    case "boolean": {
      if (typeof value === "boolean") return value;
      if (typeof value === "string") {
        const normalized = value.toLowerCase();
        if (TRUE_STRINGS.has(normalized)) return true;
        if (FALSE_STRINGS.has(normalized)) return false;
      }
      throw typeMismatch(variable, value);
    }

    case "object":
      if (isJsonObject(value)) return value;
      throw typeMismatch(variable, value);

    case "array":
      if (Array.isArray(value)) return value;
      throw typeMismatch(variable, value);
  }
}

// ---------------------------------------------------------------------------
// Constraints
// ---------------------------------------------------------------------------

function codePointLength(text: string): number {
  return [...text].length;
}

function checkConstraints(variable: Variable, rules: VariableValidation, value: JsonValue): void {
  const fail = (reason: string) => new VariableValidationError(variable.name, reason);

  if (typeof value === "string") {
    // Sticky flag anchors the match at index 0 without requiring a full match.
    if (rules.pattern !== undefined && !new RegExp(rules.pattern, "y").test(value)) {
      throw fail(`Value does not match pattern: ${rules.pattern}`);
    }

    const length = codePointLength(value);
    if (rules.min_length !== undefined && length < rules.min_length) {
      throw fail(`String too short (min: ${rules.min_length})`);
    }
    if (rules.max_length !== undefined && length > rules.max_length) {
      throw fail(`String too long (max: ${rules.max_length})`);
    }
  }

  if (typeof value === "number") {
    if (rules.minimum !== undefined && value < rules.minimum) {
      throw fail(`Value below minimum: ${rules.minimum}`);
    }
    if (rules.maximum !== undefined && value > rules.maximum) {
      throw fail(`Value above maximum: ${rules.maximum}`);
    }
  }

  if (rules.enum !== undefined && !rules.enum.some((allowed) => isDeepStrictEqual(allowed, value))) {
    throw fail(`Value not in allowed values: ${toCanonicalJson(rules.enum)}`);
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Validate one value against its declaration.
 *
 * @returns the coerced value, or the default when the value is absent
 * @throws VariableValidationError on a missing required value, a type
 *         mismatch, or a broken constraint
 */
export function validateVariable(variable: Variable, value: JsonValue | undefined): JsonValue {
  if (value === undefined || value === null) {
    const fallback = variable.default ?? null;
    if (variable.required && fallback === null) {
      throw new VariableValidationError(variable.name, "Required variable is missing");
    }
    return fallback;
  }

  const coerced = coerce(variable, value);

  if (variable.validation !== undefined) {
    checkConstraints(variable, variable.validation, coerced);
  }

  return coerced;
}

/**
 * Validate a batch of values against a prompt's declarations.
 *
 * Every declared variable appears in the result, in declaration order. In
 * strict mode an undeclared key throws "Unknown variable"; otherwise such
 * keys are dropped.
 */
export function validateVariables(
  variables: readonly Variable[],
  values: VariableValues,
  options: ValidateVariablesOptions = {}
): ResolvedVariables {
  const { strict = true } = options;

  if (strict) {
    const declared = new Set(variables.map((variable) => variable.name));
    for (const name of Object.keys(values)) {
      if (!declared.has(name)) {
        throw new VariableValidationError(name, "Unknown variable");
      }
    }
  }

  const resolved: ResolvedVariables = {};
  for (const variable of variables) {
    const value = Object.hasOwn(values, variable.name) ? values[variable.name] : undefined;
    resolved[variable.name] = validateVariable(variable, value);
  }
  return resolved;
}
