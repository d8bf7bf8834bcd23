/**
 * Tool binding.
 *
 * Turns a pack's declarative Tool into something a caller can invoke: an
 * argument schema derived from the tool's JSON Schema `parameters`, plus an
 * optional handler. Tools without a handler still bind (so they can be
 * advertised to a model) but throw when invoked.
 *
 * JSON Schema → zod:
 *   string → string    integer → int    number → number    boolean → boolean
 *   array → JSON array    object → JSON object    anything else → string
 *
 * Properties listed in `required` are required; the rest are optional, and
 * take their `default` when one is declared.
 */

import { z } from "zod";

import { getToolsForPrompt } from "../pack/accessors.js";
import { isJsonObject, JsonObjectSchema, JsonValueSchema, type JsonValue } from "../pack/json.js";
import type { PromptPack, Tool, ToolParameters } from "../pack/schema.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class ToolHandlerMissingError extends Error {
  constructor(public readonly toolName: string) {
    super(`Tool '${toolName}' has no handler configured`);
    this.name = "ToolHandlerMissingError";
  }
}

export class ToolArgumentsError extends Error {
  constructor(
    public readonly toolName: string,
    public readonly issues: readonly string[]
  ) {
    super(`Invalid arguments for tool '${toolName}': ${issues.length} error(s)`);
    this.name = "ToolArgumentsError";
  }

  format(): string {
    return [this.message, ...this.issues.map((issue) => `  - ${issue}`)].join("\n");
  }
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ToolArgs = Record<string, unknown>;
export type ToolHandler = (args: ToolArgs) => unknown;
export type ToolArgsSchema = z.ZodObject<Record<string, z.ZodTypeAny>>;

export interface BoundTool {
  readonly name: string;
  readonly description: string;
  readonly parameters?: ToolParameters;
  readonly argsSchema: ToolArgsSchema;
  readonly hasHandler: boolean;
  /**
   * Validate `args` and call the handler with the parsed arguments.
   * Returns whatever the handler returns (a promise, for async handlers).
   *
   * @throws ToolArgumentsError, ToolHandlerMissingError
   */
  invoke(args: unknown): unknown;
}

export interface BindToolsOptions {
  /** Bind only the tools this prompt exposes (blocklist applied). */
  promptName?: string;
  handlers?: Readonly<Record<string, ToolHandler>>;
}

// ---------------------------------------------------------------------------
// Schema derivation
// ---------------------------------------------------------------------------

function schemaForType(type: JsonValue | undefined): z.ZodTypeAny {
  switch (type) {
    case "string":
      return z.string();
    case "integer":
      return z.number().int();
    case "number":
      return z.number();
    case "boolean":
      return z.boolean();
    case "array":
      return z.array(JsonValueSchema);
    case "object":
      return JsonObjectSchema;
    default:
      return z.string();
  }
}

function propertySchema(definition: JsonValue, required: boolean): z.ZodTypeAny {
  if (!isJsonObject(definition)) {
    return required ? z.string() : z.string().optional();
  }

  let schema = schemaForType(definition["type"]);
  const description = definition["description"];
  if (typeof description === "string") {
    schema = schema.describe(description);
  }

  if (required) return schema;

  const fallback = definition["default"];
  return fallback === undefined ? schema.optional() : schema.default(fallback);
}

export function buildArgsSchema(tool: Tool): ToolArgsSchema {
  const properties = tool.parameters?.properties ?? {};
  const required = new Set(tool.parameters?.required ?? []);

  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [name, definition] of Object.entries(properties)) {
    shape[name] = propertySchema(definition, required.has(name));
  }
  return z.object(shape);
}

// ---------------------------------------------------------------------------
// Binding
// ---------------------------------------------------------------------------

export function bindTool(tool: Tool, handler?: ToolHandler): BoundTool {
  const argsSchema = buildArgsSchema(tool);

  return {
    name: tool.name,
    description: tool.description,
    ...(tool.parameters !== undefined ? { parameters: tool.parameters } : {}),
    argsSchema,
    hasHandler: handler !== undefined,
    invoke(args: unknown): unknown {
      const parsed = argsSchema.safeParse(args);
      if (!parsed.success) {
        throw new ToolArgumentsError(
          tool.name,
          parsed.error.issues.map((issue) => `${issue.path.join(".") || "(args)"}: ${issue.message}`)
        );
      }
      if (handler === undefined) {
        throw new ToolHandlerMissingError(tool.name);
      }
      return handler(parsed.data);
    },
  };
}

/**
 * Bind a pack's tools, in declaration order (or the prompt's order when
 * `promptName` is given). Handlers are matched by tool name.
 */
export function bindTools(pack: PromptPack, options: BindToolsOptions = {}): BoundTool[] {
  const { promptName, handlers = {} } = options;
  const tools =
    promptName !== undefined ? getToolsForPrompt(pack, promptName) : Object.values(pack.tools ?? {});

  return tools.map((tool) =>
    bindTool(tool, Object.hasOwn(handlers, tool.name) ? handlers[tool.name] : undefined)
  );
}
