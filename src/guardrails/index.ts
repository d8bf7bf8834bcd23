/**
 * Output guardrails.
 *
 * ```typescript
 * const result = runValidators(llmOutput, prompt.validators ?? []);
 * if (result.hasBlockingViolations) {
 *   // caller decides whether to retry, reject or log
 * }
 * ```
 */

export {
  runValidators,
  runValidator,
  createGuardrail,
  type Guardrail,
} from "./runner.js";

export {
  createValidationResult,
  partitionViolations,
  formatValidationResult,
  type ValidationResult,
  type ValidationViolation,
} from "./result.js";
