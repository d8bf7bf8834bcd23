/**
 * Prompt resolution.
 *
 * Ties a parsed pack to the engines: look up the prompt, validate the
 * caller's variables, pick the model-specific template and parameters,
 * render, and collect the tools and guardrails the caller needs to run it.
 *
 * ```typescript
 * const resolver = new PromptResolver(pack, { logger });
 * const resolved = resolver.resolve("support", { role: "agent" }, { modelName: "gpt-4" });
 * // later, on the model's reply:
 * const result = resolver.validateOutput("support", reply);
 * ```
 */

import { getPrompt, getToolsForPrompt, listPromptNames } from "../pack/accessors.js";
import type { Parameters, Prompt, PromptPack, Tool, ToolPolicy, Validator } from "../pack/schema.js";
import { FragmentResolver } from "../template/fragments.js";
import {
  validateVariables,
  type ResolvedVariables,
  type VariableValues,
} from "../variables/validator.js";
import { runValidators, type ValidationResult } from "../guardrails/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { resolveParameters, resolveSystemTemplate } from "./overrides.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class PromptNotFoundError extends Error {
  constructor(
    public readonly promptName: string,
    public readonly availablePrompts: readonly string[]
  ) {
    const available = availablePrompts.length > 0 ? availablePrompts.join(", ") : "(none)";
    super(`Prompt not found: ${promptName}. Available prompts: ${available}`);
    this.name = "PromptNotFoundError";
  }
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PromptResolverOptions {
  logger?: Logger;
  /** Ceiling for nested fragment expansion. */
  maxFragmentDepth?: number;
}

export interface ResolveOptions {
  /** Key into the prompt's `model_overrides`. */
  modelName?: string;
  /**
   * Strict mode rejects unknown variables and leaves no token unresolved.
   * Default false: unknown variables are dropped and unresolved tokens kept.
   */
  strict?: boolean;
}

export interface ResolvedPrompt {
  promptName: string;
  promptId: string;
  version: string;
  modelName?: string;
  systemPrompt: string;
  variables: ResolvedVariables;
  parameters: Parameters;
  tools: Tool[];
  toolPolicy?: ToolPolicy;
  validators: Validator[];
}

/**
 * Names of the variables a caller must supply: required with no default.
 */
export function getInputVariables(prompt: Prompt): string[] {
  return (prompt.variables ?? [])
    .filter((variable) => variable.required && variable.default === undefined)
    .map((variable) => variable.name);
}

// ---------------------------------------------------------------------------
// Resolver
// ---------------------------------------------------------------------------

export class PromptResolver {
  private readonly fragments: FragmentResolver;
  private readonly logger: Logger;

  constructor(
    readonly pack: PromptPack,
    options: PromptResolverOptions = {}
  ) {
    this.fragments = new FragmentResolver(pack, { maxDepth: options.maxFragmentDepth });
    this.logger = options.logger ?? silentLogger;
  }

  listPrompts(): string[] {
    return listPromptNames(this.pack);
  }

  /**
   * @throws PromptNotFoundError when the pack has no prompt by that name
   */
  getPrompt(promptName: string): Prompt {
    const prompt = getPrompt(this.pack, promptName);
    if (prompt === undefined) {
      throw new PromptNotFoundError(promptName, this.listPrompts());
    }
    return prompt;
  }

  /**
   * Render a prompt's system prompt and gather what is needed to run it.
   *
   * @throws PromptNotFoundError, VariableValidationError, TemplateError
   */
  resolve(
    promptName: string,
    values: VariableValues,
    options: ResolveOptions = {}
  ): ResolvedPrompt {
    const { modelName, strict = false } = options;
    const prompt = this.getPrompt(promptName);

    this.logger.debug("Resolving prompt", { prompt: promptName, model: modelName ?? null, strict });

    const variables = validateVariables(prompt.variables ?? [], values, { strict });
    const template = resolveSystemTemplate(prompt, modelName);
    const systemPrompt = this.fragments.resolveTemplate(template, variables, { strict });
    const tools = getToolsForPrompt(this.pack, promptName);

    this.logger.info("Prompt resolved", {
      prompt: promptName,
      chars: systemPrompt.length,
      tools: tools.length,
    });

    return {
      promptName,
      promptId: prompt.id,
      version: prompt.version,
      ...(modelName !== undefined ? { modelName } : {}),
      systemPrompt,
      variables,
      parameters: resolveParameters(prompt, modelName),
      tools,
      ...(prompt.tool_policy !== undefined ? { toolPolicy: prompt.tool_policy } : {}),
      validators: [...(prompt.validators ?? [])],
    };
  }

  /**
   * Run a prompt's output guardrails over generated content.
   */
  validateOutput(promptName: string, content: string): ValidationResult {
    const prompt = this.getPrompt(promptName);
    const result = runValidators(content, prompt.validators ?? []);

    if (result.violations.length > 0) {
      const context = {
        prompt: promptName,
        violations: result.violations.map((v) => v.validatorType),
      };
      if (result.hasBlockingViolations) {
        this.logger.warn("Output failed guardrails", context);
      } else {
        this.logger.info("Output has non-blocking guardrail violations", context);
      }
    }

    return result;
  }
}
