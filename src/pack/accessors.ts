/**
 * Lookups over a parsed PromptPack.
 *
 * None of these throw on a missing key; they return `undefined` (or an
 * empty list) so callers decide whether absence is an error. Lookups only
 * consider own keys, so names like "constructor" never hit the prototype.
 */

import type { Prompt, PromptPack, Tool, Variable } from "./schema.js";

function lookup<T>(table: Readonly<Record<string, T>> | undefined, key: string): T | undefined {
  if (table === undefined || !Object.hasOwn(table, key)) {
    return undefined;
  }
  return table[key];
}

export function getPrompt(pack: PromptPack, name: string): Prompt | undefined {
  return lookup(pack.prompts, name);
}

export function getTool(pack: PromptPack, name: string): Tool | undefined {
  return lookup(pack.tools, name);
}

export function getFragment(pack: PromptPack, name: string): string | undefined {
  return lookup(pack.fragments, name);
}

/** Names of all prompts in declaration order. */
export function listPromptNames(pack: PromptPack): string[] {
  return Object.keys(pack.prompts);
}

/**
 * First variable declared with `name`, in declaration order.
 */
export function getVariable(prompt: Prompt, name: string): Variable | undefined {
  return prompt.variables?.find((variable) => variable.name === name);
}

/**
 * Tools a prompt actually exposes.
 *
 * Follows the prompt's `tools` order, drops names on the prompt's
 * `tool_policy.blocklist`, and skips names missing from the pack's tool
 * table (a dangling reference is not an error).
 */
export function getToolsForPrompt(pack: PromptPack, promptName: string): Tool[] {
  const prompt = getPrompt(pack, promptName);
  if (prompt?.tools === undefined || pack.tools === undefined) {
    return [];
  }

  const blocklist = new Set(prompt.tool_policy?.blocklist ?? []);
  const tools: Tool[] = [];

  for (const toolName of prompt.tools) {
    if (blocklist.has(toolName)) continue;
    const tool = getTool(pack, toolName);
    if (tool !== undefined) {
      tools.push(tool);
    }
  }

  return tools;
}
