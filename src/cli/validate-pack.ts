#!/usr/bin/env node
/**
 * Validate a PromptPack file: schema first, then cross-references
 * (fragments, tool names, fragment cycles).
 *
 * Usage:
 *   npm run validate-pack -- --pack packs/customer-support.pack.json
 *   npm run validate-pack -- --pack <file> --json
 *
 * Options:
 *   --pack <path>   PromptPack JSON file (required)
 *   --json          Output the report as JSON (for CI parsing)
 *   --no-color      Disable ANSI colors
 *   -h, --help      Show help
 *
 * Exit codes:
 *   0 - Valid; reference warnings allowed
 *   1 - Schema errors, reference errors, or bad arguments
 */

import { parseArgs } from "node:util";

import {
  parsePromptPack,
  PromptPackParseError,
  type PackIssue,
} from "../pack/parser.js";
import {
  checkPackReferences,
  hasReferenceErrors,
  type PackReferenceIssue,
} from "../pack/references.js";
import type { PromptPack } from "../pack/schema.js";
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

const COMMAND = "validate-pack";

const USAGE = `
Usage: validate-pack --pack <path> [options]

Options:
  --pack <path>   PromptPack JSON file (required)
  --json          Output the report as JSON (for CI parsing)
  --no-color      Disable ANSI colors
  -h, --help      Show this help message

Exit codes:
  0 - Valid; reference warnings allowed
  1 - Schema errors, reference errors, or bad arguments
`;

export interface PackReport {
  valid: boolean;
  pack: { id: string; name: string; version: string; prompts: string[] } | null;
  /** Schema or syntax problems; empty when the pack parsed. */
  errors: PackIssue[];
  references: PackReferenceIssue[];
  message?: string;
}

/**
 * Parse and lint a pack file into a report. Never throws for a bad pack;
 * only the report's `valid` flag says whether it passed.
 */
export function buildPackReport(path: string): PackReport {
  let pack: PromptPack;
  try {
    pack = parsePromptPack(path);
  } catch (err) {
    if (err instanceof PromptPackParseError) {
      return { valid: false, pack: null, errors: err.errors, references: [], message: err.message };
    }
    return {
      valid: false,
      pack: null,
      errors: [],
      references: [],
      message: err instanceof Error ? err.message : String(err),
    };
  }

  const references = checkPackReferences(pack);
  return {
    valid: !hasReferenceErrors(references),
    pack: {
      id: pack.id,
      name: pack.name,
      version: pack.version,
      prompts: Object.keys(pack.prompts),
    },
    errors: [],
    references,
  };
}

function printReport(io: CliIO, report: PackReport): void {
  const fail = paint(io, "red", "✗");
  const ok = paint(io, "green", "✓");

  if (report.pack === null) {
    io.stdout(`${fail} ${paint(io, "bold", "PromptPack")}: ${report.message ?? "invalid"}`);
    for (const issue of report.errors) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      io.stdout(`    ${path}: ${issue.message}`);
    }
    return;
  }

  const { id, version, prompts } = report.pack;
  io.stdout(`${ok} ${paint(io, "bold", "PromptPack")}: ${id} v${version} (${prompts.length} prompt(s): ${prompts.join(", ")})`);

  for (const issue of report.references) {
    const mark = issue.severity === "error" ? fail : paint(io, "yellow", "⚠");
    io.stdout(`  ${mark} [${issue.kind}] ${issue.location}: ${issue.message}`);
  }

  const errorCount = report.references.filter((issue) => issue.severity === "error").length;
  const warningCount = report.references.length - errorCount;
  if (errorCount > 0) {
    io.stdout(paint(io, "red", `✗ ${errorCount} reference error(s)`));
  } else if (warningCount > 0) {
    io.stdout(paint(io, "green", `✓ Valid with ${warningCount} warning(s)`));
  } else {
    io.stdout(paint(io, "green", "✓ All checks passed"));
  }
}

export interface RunOptions {
  io?: CliIO;
  context?: CliContext;
}

export function runValidatePack(argv: readonly string[], options: RunOptions = {}): ExitCode {
  let io = options.io ?? processIO;

  let values: { pack?: string; json: boolean; "no-color": boolean; help: boolean };
  try {
    ({ values } = parseArgs({
      args: [...argv],
      options: {
        pack: { type: "string" },
        json: { type: "boolean", default: false },
        "no-color": { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    }));
    if (!values.help && values.pack === undefined) {
      throw new CliUsageError("--pack is required");
    }
  } catch (err) {
    io.stderr(paint(io, "red", `Error: ${err instanceof Error ? err.message : String(err)}`));
    return EXIT_CODES.error;
  }

  if (values.help || values.pack === undefined) {
    io.stdout(USAGE);
    return EXIT_CODES.success;
  }
  if (values["no-color"]) {
    io = { ...io, color: false };
  }

  let context: CliContext;
  try {
    context = options.context ?? createCliContext(COMMAND);
  } catch (err) {
    io.stderr(paint(io, "red", `Error: ${err instanceof Error ? err.message : String(err)}`));
    return EXIT_CODES.error;
  }
  const { logger } = context;
  const report = buildPackReport(values.pack);
  logger.info("Pack validated", {
    pack: report.pack?.id ?? null,
    valid: report.valid,
    errors: report.errors.length,
    references: report.references.length,
  });

  if (values.json) {
    io.stdout(JSON.stringify(report, null, 2));
  } else {
    printReport(io, report);
  }

  return report.valid ? EXIT_CODES.success : EXIT_CODES.error;
}

if (isDirectExecution(COMMAND)) {
  process.exitCode = runValidatePack(process.argv.slice(2));
}
