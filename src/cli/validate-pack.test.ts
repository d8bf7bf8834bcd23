/**
 * Tests for the validate-pack CLI.
 *
 * Run: node --import tsx src/cli/validate-pack.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { fileURLToPath } from "node:url";

import { buildPackReport, runValidatePack } from "./validate-pack.js";
import { createBufferedIO, type CliContext } from "./io.js";
import { silentLogger } from "../logging/index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

const FIXTURE = fileURLToPath(new URL("../../packs/customer-support.pack.json", import.meta.url));

const context: CliContext = {
  config: {
    env: "test",
    debug: false,
    logLevel: "info",
    appName: "promptpack-engine",
    logToFile: false,
    logDir: "output/logs",
    strictRendering: false,
    maxFragmentDepth: 32,
  },
  logger: silentLogger,
};

function run(argv: string[]) {
  const io = createBufferedIO();
  const code = runValidatePack(argv, { io, context });
  return { code, out: io.out, err: io.err };
}

function withEnv<T>(vars: Record<string, string | undefined>, fn: () => T): T {
  const saved = new Map(Object.keys(vars).map((key) => [key, process.env[key]]));
  for (const [key, value] of Object.entries(vars)) {
    if (value === undefined) delete process.env[key];
    else process.env[key] = value;
  }
  try {
    return fn();
  } finally {
    for (const [key, value] of saved) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  }
}

const tmp = mkdtempSync(join(tmpdir(), "validate-pack-"));

function writePack(name: string, pack: unknown): string {
  const path = join(tmp, name);
  writeFileSync(path, JSON.stringify(pack, null, 2));
  return path;
}

function packWith(prompt: Record<string, unknown>, extra: Record<string, unknown> = {}): unknown {
  return {
    id: "lint-demo",
    name: "Lint Demo",
    version: "2.0.0",
    template_engine: { version: "v1", syntax: "{{variable}}" },
    prompts: {
      main: { id: "main", name: "Main", version: "1.0.0", system_template: "Hi", ...prompt },
    },
    ...extra,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// REPORT
// ═══════════════════════════════════════════════════════════════════════════

section("buildPackReport");

test("sample pack is valid with no issues", () => {
  assert.deepEqual(buildPackReport(FIXTURE), {
    valid: true,
    pack: {
      id: "customer-support",
      name: "Customer Support Pack",
      version: "1.0.0",
      prompts: ["support", "sales"],
    },
    errors: [],
    references: [],
  });
});

test("schema failures carry their issues", () => {
  const report = buildPackReport(writePack("schema.pack.json", { id: "test" }));
  assert.equal(report.valid, false);
  assert.equal(report.pack, null);
  assert.equal(report.message, "PromptPack validation failed: 4 error(s)");
  assert.equal(report.errors.length, 4);
});

test("warnings alone keep the pack valid", () => {
  const report = buildPackReport(writePack("warn.pack.json", packWith({ tools: ["ghost"] })));
  assert.equal(report.valid, true);
  assert.deepEqual(report.references.map((issue) => issue.kind), ["dangling_tool"]);
});

test("reference errors make the pack invalid", () => {
  const report = buildPackReport(
    writePack("missing.pack.json", packWith({ system_template: "{{fragment:nope}}" }))
  );
  assert.equal(report.valid, false);
  assert.deepEqual(report.references.map((issue) => issue.kind), ["missing_fragment"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND
// ═══════════════════════════════════════════════════════════════════════════

section("runValidatePack");

test("valid pack exits with 0", () => {
  const { code, out } = run(["--pack", FIXTURE]);
  assert.equal(code, 0);
  assert.deepEqual(out, [
    "✓ PromptPack: customer-support v1.0.0 (2 prompt(s): support, sales)",
    "✓ All checks passed",
  ]);
});

test("warnings are listed and still exit with 0", () => {
  const path = writePack("warn-cli.pack.json", packWith({ tools: ["ghost"] }));
  const { code, out } = run(["--pack", path]);
  assert.equal(code, 0);
  assert.deepEqual(out, [
    "✓ PromptPack: lint-demo v2.0.0 (1 prompt(s): main)",
    "  ⚠ [dangling_tool] prompts.main.tools: Tool 'ghost' is not defined in the pack",
    "✓ Valid with 1 warning(s)",
  ]);
});

test("reference errors exit with 1", () => {
  const path = writePack(
    "cycle-cli.pack.json",
    packWith({ system_template: "{{fragment:loop}}" }, { fragments: { loop: "{{fragment:loop}}" } })
  );
  const { code, out } = run(["--pack", path]);
  assert.equal(code, 1);
  assert.deepEqual(out, [
    "✓ PromptPack: lint-demo v2.0.0 (1 prompt(s): main)",
    "  ✗ [fragment_cycle] fragments.loop: Fragment cycle detected: loop -> loop",
    "✗ 1 reference error(s)",
  ]);
});

test("schema errors are listed by path", () => {
  const path = writePack("bad-id.pack.json", packWith({}, { id: "Bad_ID" }));
  const { code, out } = run(["--pack", path]);
  assert.equal(code, 1);
  assert.deepEqual(out, [
    "✗ PromptPack: PromptPack validation failed: 1 error(s)",
    "    id: Pack ID must be lowercase alphanumeric with dashes, starting with a letter",
  ]);
});

test("malformed JSON is reported", () => {
  const path = join(tmp, "garbage.pack.json");
  writeFileSync(path, "{ nope");
  const { code, out } = run(["--pack", path]);
  assert.equal(code, 1);
  assert.equal(out.length, 1);
  assert.ok(out[0]?.startsWith("✗ PromptPack: Invalid JSON: "));
});

test("missing file is reported", () => {
  const path = join(tmp, "absent.pack.json");
  const { code, out } = run(["--pack", path]);
  assert.equal(code, 1);
  assert.deepEqual(out, [`✗ PromptPack: PromptPack file not found: ${path}`]);
});

test("--json prints the report", () => {
  const { code, out } = run(["--pack", FIXTURE, "--json"]);
  assert.equal(code, 0);
  assert.deepEqual(JSON.parse(out[0] ?? ""), buildPackReport(FIXTURE));
});

test("--pack is required", () => {
  const { code, err } = run([]);
  assert.equal(code, 1);
  assert.deepEqual(err, ["Error: --pack is required"]);
});

test("--help prints usage", () => {
  const { code, out } = run(["--help"]);
  assert.equal(code, 0);
  assert.ok(out[0]?.includes("Usage: validate-pack --pack <path> [options]"));
});

test("malformed environment config exits with 1", () => {
  const io = createBufferedIO();
  const code = withEnv({ NODE_ENV: undefined, DEBUG: undefined, LOG_LEVEL: "verbose" }, () =>
    runValidatePack(["--pack", FIXTURE], { io })
  );
  assert.equal(code, 1);
  assert.deepEqual(io.out, []);
  assert.deepEqual(io.err, [
    "Error: Invalid LOG_LEVEL: verbose. Must be one of: debug, info, warn, error.",
  ]);
});

// ═══════════════════════════════════════════════════════════════════════════
// Cleanup & Summary
// ═══════════════════════════════════════════════════════════════════════════

rmSync(tmp, { recursive: true, force: true });

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
