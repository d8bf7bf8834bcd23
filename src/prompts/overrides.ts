/**
 * Model-specific overrides.
 *
 * A prompt may carry `model_overrides` keyed by model name. Templates and
 * parameters are resolved independently:
 *
 *   template    override.system_template replaces the base outright;
 *               otherwise prefix + base + suffix (each part optional)
 *   parameters  field by field; a field set on the override wins, every
 *               other field keeps the base value
 *
 * An unknown model name (or none) yields the base template and parameters.
 */

import type { ModelOverride, Parameters, Prompt } from "../pack/schema.js";

const PARAMETER_KEYS = [
  "temperature",
  "max_tokens",
  "top_p",
  "top_k",
  "frequency_penalty",
  "presence_penalty",
] as const satisfies readonly (keyof Parameters)[];

export function getModelOverride(
  prompt: Prompt,
  modelName: string | undefined
): ModelOverride | undefined {
  if (modelName === undefined || prompt.model_overrides === undefined) {
    return undefined;
  }
  return Object.hasOwn(prompt.model_overrides, modelName)
    ? prompt.model_overrides[modelName]
    : undefined;
}

export function resolveSystemTemplate(prompt: Prompt, modelName?: string): string {
  const override = getModelOverride(prompt, modelName);
  if (override === undefined) {
    return prompt.system_template;
  }
  if (override.system_template !== undefined) {
    return override.system_template;
  }
  const prefix = override.system_template_prefix ?? "";
  const suffix = override.system_template_suffix ?? "";
  return `${prefix}${prompt.system_template}${suffix}`;
}

export function resolveParameters(prompt: Prompt, modelName?: string): Parameters {
  const merged: Parameters = { ...(prompt.parameters ?? {}) };
  const overrideParams = getModelOverride(prompt, modelName)?.parameters;
  if (overrideParams === undefined) {
    return merged;
  }

  for (const key of PARAMETER_KEYS) {
    const value = overrideParams[key];
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
}
