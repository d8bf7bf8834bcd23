#!/usr/bin/env node
/**
 * Render a prompt from a pack, and optionally check a model's output
 * against that prompt's guardrails.
 *
 * The rendered system prompt is the only thing written to stdout (unless
 * --json), so it can be piped straight into another tool. Headers, guardrail
 * reports and log lines go to stderr.
 *
 * Usage:
 *   npm run render-prompt -- --pack packs/customer-support.pack.json --prompt support --var role=agent
 *   npm run render-prompt -- --pack <file> --prompt support --vars vars.json --model gpt-4
 *   npm run render-prompt -- --pack <file> --prompt support --var role=agent --output reply.txt
 *
 * Options:
 *   --pack <path>      PromptPack JSON file (required)
 *   --prompt <name>    Prompt name within the pack (required)
 *   --var k=v          Variable value; repeatable, wins over --vars
 *   --vars <path>      JSON object of variable values
 *   --model <name>     Apply this model's overrides
 *   --strict           Reject unknown variables and unresolved tokens
 *   --output <path>    Run the prompt's validators over this file
 *   --json             Emit a JSON report on stdout
 *   --no-color         Disable ANSI colors
 *   -h, --help         Show help
 *
 * Exit codes:
 *   0 - Rendered (and output, if given, has no blocking violations)
 *   1 - Error (bad arguments, invalid pack, variable or template error)
 *   2 - --output has blocking guardrail violations
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parseArgs } from "node:util";

import { JsonObjectSchema, type JsonValue } from "../pack/json.js";
import { parsePromptPack, PromptPackParseError } from "../pack/parser.js";
import { PromptResolver, type ResolvedPrompt } from "../prompts/index.js";
import { formatValidationResult, type ValidationResult } from "../guardrails/index.js";
import {
  CliUsageError,
  EXIT_CODES,
  createCliContext,
  isDirectExecution,
  paint,
  processIO,
  type CliContext,
  type CliIO,
  type ExitCode,
} from "./io.js";

const COMMAND = "render-prompt";

const USAGE = `
Usage: render-prompt --pack <path> --prompt <name> [options]

Options:
  --pack <path>      PromptPack JSON file (required)
  --prompt <name>    Prompt name within the pack (required)
  --var k=v          Variable value; repeatable, wins over --vars
  --vars <path>      JSON object of variable values
  --model <name>     Apply this model's overrides
  --strict           Reject unknown variables and unresolved tokens
  --output <path>    Run the prompt's validators over this file
  --json             Emit a JSON report on stdout
  --no-color         Disable ANSI colors
  -h, --help         Show this help message

Exit codes:
  0 - Rendered (and output, if given, has no blocking violations)
  1 - Error (bad arguments, invalid pack, variable or template error)
  2 - --output has blocking guardrail violations
`;

// ============================================================
// Argument handling
// ============================================================

export interface RenderPromptArgs {
  pack: string;
  prompt: string;
  vars: string[];
  varsFile?: string;
  model?: string;
  strict: boolean;
  output?: string;
  json: boolean;
  noColor: boolean;
}

export type ParsedRenderArgs = { help: true } | ({ help: false } & RenderPromptArgs);

export function parseRenderArgs(argv: readonly string[]): ParsedRenderArgs {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      pack: { type: "string" },
      prompt: { type: "string" },
      var: { type: "string", multiple: true, default: [] },
      vars: { type: "string" },
      model: { type: "string" },
      strict: { type: "boolean", default: false },
      output: { type: "string" },
      json: { type: "boolean", default: false },
      "no-color": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    return { help: true };
  }
  if (values.pack === undefined) {
    throw new CliUsageError("--pack is required");
  }
  if (values.prompt === undefined) {
    throw new CliUsageError("--prompt is required");
  }

  return {
    help: false,
    pack: values.pack,
    prompt: values.prompt,
    vars: values.var,
    varsFile: values.vars,
    model: values.model,
    strict: values.strict,
    output: values.output,
    json: values.json,
    noColor: values["no-color"],
  };
}

/**
 * Parse repeated `--var key=value` flags. The value is everything after the
 * first "=", so it may itself contain "=". Later pairs win.
 */
export function parseVarPairs(pairs: readonly string[]): Record<string, string> {
  const values: Record<string, string> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf("=");
    if (separator <= 0) {
      throw new CliUsageError(`Invalid --var "${pair}": expected key=value`);
    }
    values[pair.slice(0, separator)] = pair.slice(separator + 1);
  }
  return values;
}

/**
 * Read a JSON object of variable values.
 */
export function readVariablesFile(path: string): Record<string, JsonValue> {
  const absolutePath = resolve(path);
  if (!existsSync(absolutePath)) {
    throw new CliUsageError(`Variables file not found: ${absolutePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(absolutePath, "utf-8"));
  } catch (err) {
    throw new CliUsageError(
      `Invalid JSON in variables file: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const parsed = JsonObjectSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CliUsageError("Variables file must contain a JSON object");
  }
  return parsed.data;
}

export function exitCodeFor(validation: ValidationResult | undefined): ExitCode {
  return validation?.hasBlockingViolations ? EXIT_CODES.blocked : EXIT_CODES.success;
}

// ============================================================
// Output
// ============================================================

function printHuman(io: CliIO, resolved: ResolvedPrompt, validation?: ValidationResult): void {
  const title = `── ${resolved.promptName} (${resolved.promptId} v${resolved.version}) ──`;
  io.stderr(paint(io, "bold", paint(io, "cyan", title)));
  if (resolved.modelName !== undefined) {
    io.stderr(paint(io, "dim", `model:      ${resolved.modelName}`));
  }
  io.stderr(paint(io, "dim", `parameters: ${JSON.stringify(resolved.parameters)}`));
  const toolNames = resolved.tools.map((tool) => tool.name);
  io.stderr(paint(io, "dim", `tools:      ${toolNames.length > 0 ? toolNames.join(", ") : "(none)"}`));

  io.stdout(resolved.systemPrompt);

  if (validation !== undefined) {
    const status = validation.isValid
      ? paint(io, "green", "Output check passed")
      : paint(io, "red", "Output check failed");
    io.stderr(status);
    if (validation.violations.length > 0) {
      io.stderr(formatValidationResult(validation));
    }
  }
}

function printJson(io: CliIO, packId: string, resolved: ResolvedPrompt, validation?: ValidationResult): void {
  io.stdout(
    JSON.stringify(
      {
        pack: packId,
        prompt: resolved.promptName,
        promptId: resolved.promptId,
        version: resolved.version,
        model: resolved.modelName ?? null,
        systemPrompt: resolved.systemPrompt,
        variables: resolved.variables,
        parameters: resolved.parameters,
        tools: resolved.tools.map((tool) => tool.name),
        toolPolicy: resolved.toolPolicy ?? null,
        validation:
          validation === undefined
            ? null
            : {
                isValid: validation.isValid,
                hasBlockingViolations: validation.hasBlockingViolations,
                violations: validation.violations,
              },
      },
      null,
      2
    )
  );
}

function describeError(err: unknown): string {
  if (err instanceof PromptPackParseError) return err.format();
  return err instanceof Error ? err.message : String(err);
}

// ============================================================
// Command
// ============================================================

export interface RunOptions {
  io?: CliIO;
  /** Config and logger; built from the environment when omitted. */
  context?: CliContext;
}

export function runRenderPrompt(argv: readonly string[], options: RunOptions = {}): ExitCode {
  let io = options.io ?? processIO;

  let args: ParsedRenderArgs;
  try {
    args = parseRenderArgs(argv);
  } catch (err) {
    io.stderr(paint(io, "red", `Error: ${describeError(err)}`));
    return EXIT_CODES.error;
  }

  if (args.help) {
    io.stdout(USAGE);
    return EXIT_CODES.success;
  }
  if (args.noColor) {
    io = { ...io, color: false };
  }

  let context: CliContext;
  try {
    context = options.context ?? createCliContext(COMMAND);
  } catch (err) {
    io.stderr(paint(io, "red", `Error: ${describeError(err)}`));
    return EXIT_CODES.error;
  }
  const { config, logger } = context;

  try {
    const values = {
      ...(args.varsFile !== undefined ? readVariablesFile(args.varsFile) : {}),
      ...parseVarPairs(args.vars),
    };

    const pack = parsePromptPack(args.pack);
    logger.debug("Pack loaded", { pack: pack.id, version: pack.version });

    const resolver = new PromptResolver(pack, {
      logger,
      maxFragmentDepth: config.maxFragmentDepth,
    });
    const resolved = resolver.resolve(args.prompt, values, {
      modelName: args.model,
      strict: args.strict || config.strictRendering,
    });

    let validation: ValidationResult | undefined;
    if (args.output !== undefined) {
      const outputPath = resolve(args.output);
      if (!existsSync(outputPath)) {
        throw new CliUsageError(`Output file not found: ${outputPath}`);
      }
      validation = resolver.validateOutput(args.prompt, readFileSync(outputPath, "utf-8"));
    }

    if (args.json) {
      printJson(io, pack.id, resolved, validation);
    } else {
      printHuman(io, resolved, validation);
    }

    return exitCodeFor(validation);
  } catch (err) {
    logger.debug("Render failed", { error: err instanceof Error ? err.name : "unknown" });
    io.stderr(paint(io, "red", `Error: ${describeError(err)}`));
    return EXIT_CODES.error;
  }
}

if (isDirectExecution(COMMAND)) {
  process.exitCode = runRenderPrompt(process.argv.slice(2));
}
