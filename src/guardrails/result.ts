import type { ValidatorType } from "../pack/schema.js";

/**
 * A single guardrail violation.
 */
export interface ValidationViolation {
  readonly validatorType: ValidatorType;
  readonly message: string;
  /** Copied from the validator that produced it. */
  readonly failOnViolation: boolean;
}

/**
 * Outcome of running a list of validators over one piece of content.
 *
 * Non-blocking violations stay in `violations` but do not affect `isValid`.
 */
export interface ValidationResult {
  readonly isValid: boolean;
  readonly violations: readonly ValidationViolation[];
  readonly content: string;
  readonly hasBlockingViolations: boolean;
}

export function createValidationResult(
  content: string,
  violations: readonly ValidationViolation[]
): ValidationResult {
  const hasBlockingViolations = violations.some((violation) => violation.failOnViolation);
  return Object.freeze({
    isValid: !hasBlockingViolations,
    violations: Object.freeze([...violations]),
    content,
    hasBlockingViolations,
  });
}

/**
 * Split violations by severity, preserving order within each group.
 */
export function partitionViolations(result: ValidationResult): {
  blocking: ValidationViolation[];
  nonBlocking: ValidationViolation[];
} {
  const blocking: ValidationViolation[] = [];
  const nonBlocking: ValidationViolation[] = [];
  for (const violation of result.violations) {
    (violation.failOnViolation ? blocking : nonBlocking).push(violation);
  }
  return { blocking, nonBlocking };
}

/**
 * One line per violation, tagged with its severity.
 */
export function formatValidationResult(result: ValidationResult): string {
  if (result.violations.length === 0) {
    return "No violations.";
  }
  return result.violations
    .map((v) => `[${v.failOnViolation ? "blocking" : "warning"}] ${v.validatorType}: ${v.message}`)
    .join("\n");
}
