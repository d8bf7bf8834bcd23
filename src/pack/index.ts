/**
 * PromptPack model: schema, parsing, serialization, lookups and reference
 * lint.
 */

export * from "./schema.js";

export {
  PromptPackParseError,
  PromptPackNotFoundError,
  validatePromptPack,
  parsePromptPack,
  parsePromptPackString,
  deepFreeze,
  type PackIssue,
  type PackValidationResult,
} from "./parser.js";

export { serializePromptPack, getPackFilename } from "./serialization.js";

export {
  getPrompt,
  getTool,
  getFragment,
  getVariable,
  getToolsForPrompt,
  listPromptNames,
} from "./accessors.js";

export {
  checkPackReferences,
  hasReferenceErrors,
  type PackReferenceIssue,
  type PackReferenceIssueKind,
  type IssueSeverity,
} from "./references.js";

export {
  JsonValueSchema,
  JsonObjectSchema,
  isJsonObject,
  jsonKind,
  toCanonicalJson,
  type JsonValue,
  type JsonObject,
  type JsonKind,
} from "./json.js";
