/**
 * Prompt resolution: model overrides plus the resolver that renders a
 * prompt from a pack.
 */

export {
  PromptResolver,
  PromptNotFoundError,
  getInputVariables,
  type PromptResolverOptions,
  type ResolveOptions,
  type ResolvedPrompt,
} from "./resolver.js";

export { getModelOverride, resolveSystemTemplate, resolveParameters } from "./overrides.js";
