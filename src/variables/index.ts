/**
 * Variable coercion and constraint checking.
 */

export {
  validateVariable,
  validateVariables,
  VariableValidationError,
  type VariableValues,
  type ResolvedVariables,
  type ValidateVariablesOptions,
} from "./validator.js";
