/**
 * promptpack-engine
 *
 * Load a PromptPack, render its prompts with validated variables and
 * fragments, and check model output against the prompt's guardrails.
 *
 * ```typescript
 * import { parsePromptPack, PromptResolver } from "promptpack-engine";
 *
 * const pack = parsePromptPack("packs/customer-support.pack.json");
 * const resolver = new PromptResolver(pack);
 * const { systemPrompt, tools } = resolver.resolve("support", { role: "agent" });
 * ```
 *
 * Configuration (`src/config`) is only read by the CLIs and is not
 * re-exported here.
 */

export * from "./pack/index.js";
export * from "./template/index.js";
export * from "./variables/index.js";
export * from "./guardrails/index.js";
export * from "./prompts/index.js";
export * from "./tools/index.js";
export * from "./media/index.js";
export {
  createLogger,
  silentLogger,
  initRunId,
  getRunId,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logging/index.js";
