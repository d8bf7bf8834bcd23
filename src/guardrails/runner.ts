/**
 * Output guardrail runner.
 *
 * Applies a prompt's validators to generated text. The runner is total: it
 * always walks the whole list and returns an aggregate ValidationResult.
 * A misconfigured validator (bad regex, malformed params) is reported as a
 * violation of that validator rather than thrown.
 *
 *   banned_words   { words: string[] }
 *   max_length     { max_characters: number }   0 or absent: no check
 *   min_length     { min_characters: number }   0 or absent: no check
 *   regex_match    { pattern: string, must_match?: boolean = true }
 *
 * json_schema, sentiment, toxicity, pii_detection and custom are accepted
 * by the schema but have no checks yet; they never produce a violation.
 */

import { z } from "zod";

import type { JsonObject } from "../pack/json.js";
import type { Validator, ValidatorType } from "../pack/schema.js";
import {
  createValidationResult,
  type ValidationResult,
  type ValidationViolation,
} from "./result.js";

// ---------------------------------------------------------------------------
// Params
// ---------------------------------------------------------------------------

const BannedWordsParams = z.object({
  words: z.array(z.string()).default([]),
});

const MaxLengthParams = z.object({
  max_characters: z.number().int().optional(),
});

const MinLengthParams = z.object({
  min_characters: z.number().int().optional(),
});

const RegexMatchParams = z.object({
  pattern: z.string().optional(),
  must_match: z.boolean().default(true),
});

type Check = (content: string) => string | null;

function contentLength(content: string): number {
  return [...content].length;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(params)"}: ${issue.message}`)
    .join("; ");
}

// ---------------------------------------------------------------------------
// Checks
// ---------------------------------------------------------------------------

function bannedWords({ words }: z.infer<typeof BannedWordsParams>): Check {
  return (content) => {
    const haystack = content.toLowerCase();
    const found = words.filter((word) => haystack.includes(word.toLowerCase()));
    return found.length > 0 ? `Content contains banned words: ${found.join(", ")}` : null;
  };
}

function maxLength({ max_characters: max }: z.infer<typeof MaxLengthParams>): Check {
  return (content) => {
    const length = contentLength(content);
    return max !== undefined && max !== 0 && length > max
      ? `Content exceeds max length: ${length} > ${max}`
      : null;
  };
}

function minLength({ min_characters: min }: z.infer<typeof MinLengthParams>): Check {
  return (content) => {
    const length = contentLength(content);
    return min !== undefined && min !== 0 && length < min
      ? `Content below min length: ${length} < ${min}`
      : null;
  };
}

function regexMatch({ pattern, must_match: mustMatch }: z.infer<typeof RegexMatchParams>): Check {
  return (content) => {
    if (!pattern) return null;

    let regex: RegExp;
    try {
      regex = new RegExp(pattern);
    } catch (err) {
      return `Invalid regex pattern: ${err instanceof Error ? err.message : String(err)}`;
    }

    const matches = regex.test(content);
    if (mustMatch && !matches) {
      return `Content does not match required pattern: ${pattern}`;
    }
    if (!mustMatch && matches) {
      return `Content matches forbidden pattern: ${pattern}`;
    }
    return null;
  };
}

/**
 * Build the check for one validator kind. Returns a violation message when
 * params do not parse, or null for kinds without runtime semantics.
 */
function buildCheck(type: ValidatorType, params: JsonObject): Check | string | null {
  function withParams<S extends z.ZodTypeAny>(
    schema: S,
    make: (parsed: z.infer<S>) => Check
  ): Check | string {
    const parsed = schema.safeParse(params);
    return parsed.success
      ? make(parsed.data)
      : `Invalid ${type} params: ${describeIssues(parsed.error)}`;
  }

  switch (type) {
    case "banned_words":
      return withParams(BannedWordsParams, bannedWords);
    case "max_length":
      return withParams(MaxLengthParams, maxLength);
    case "min_length":
      return withParams(MinLengthParams, minLength);
    case "regex_match":
      return withParams(RegexMatchParams, regexMatch);
    case "json_schema":
    case "sentiment":
    case "toxicity":
    case "pii_detection":
    case "custom":
      return null;
    default: {
      const unreachable: never = type;
      return unreachable;
    }
  }
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

/**
 * Run one validator; null when the content passes (or the kind is reserved).
 */
export function runValidator(content: string, validator: Validator): ValidationViolation | null {
  const check = buildCheck(validator.type, validator.params ?? {});
  if (check === null) return null;

  const message = typeof check === "string" ? check : check(content);
  if (message === null) return null;

  return {
    validatorType: validator.type,
    message,
    failOnViolation: validator.fail_on_violation,
  };
}

/**
 * Run every enabled validator, in order, over `content`.
 */
export function runValidators(
  content: string,
  validators: readonly Validator[]
): ValidationResult {
  const violations: ValidationViolation[] = [];

  for (const validator of validators) {
    if (!validator.enabled) continue;

    const violation = runValidator(content, validator);
    if (violation !== null) {
      violations.push(violation);
    }
  }

  return createValidationResult(content, violations);
}

export interface Guardrail {
  readonly validators: readonly Validator[];
  validate(content: string): ValidationResult;
}

/**
 * Bind a validator list once and reuse it across many outputs.
 */
export function createGuardrail(validators: readonly Validator[]): Guardrail {
  const bound = Object.freeze([...validators]);
  return {
    validators: bound,
    validate: (content) => runValidators(content, bound),
  };
}
