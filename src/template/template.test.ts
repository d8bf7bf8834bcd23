/**
 * Template engine tests.
 *
 * Run: node --import tsx src/template/template.test.ts
 *
 * Tests cover:
 *   1. Variable substitution and value formatting
 *   2. Strict and lenient handling of undefined names
 *   3. Fragments, including cycles and depth limits
 *   4. Name extraction
 *   5. FragmentResolver over a parsed pack
 */

import { strict as assert } from "node:assert";
import { fileURLToPath } from "node:url";

import {
  TemplateEngine,
  TemplateError,
  FragmentCycleError,
  FragmentDepthError,
  DEFAULT_MAX_DEPTH,
} from "./engine.js";
import { formatValue } from "./format.js";
import { FragmentResolver } from "./fragments.js";
import { parsePromptPack } from "../pack/parser.js";

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

const engine = new TemplateEngine();

// ═══════════════════════════════════════════════════════════════════════════
// SUBSTITUTION
// ═══════════════════════════════════════════════════════════════════════════

section("Substitution");

test("replaces variables", () => {
  assert.equal(engine.render("Hello {{name}}!", { name: "Ada" }), "Hello Ada!");
});

test("replaces every occurrence", () => {
  assert.equal(engine.render("{{x}}-{{x}}", { x: "a" }), "a-a");
});

test("whitespace inside braces is plain text", () => {
  assert.equal(engine.render("{{ name }}", {}), "{{ name }}");
});

test("substituted text is not rescanned", () => {
  assert.equal(engine.render("{{a}}", { a: "{{b}}", b: "x" }), "{{b}}");
});

test("non-fragment prefixes are looked up as whole keys", () => {
  assert.equal(engine.render("{{other:name}}", { "other:name": "v" }), "v");
  assert.throws(
    () => engine.render("{{other:name}}", { name: "v" }),
    (err: unknown) => err instanceof TemplateError && err.message === "Undefined variable: other:name"
  );
});

section("Value formatting");

test("formats scalars", () => {
  assert.equal(formatValue(null), "");
  assert.equal(formatValue(true), "true");
  assert.equal(formatValue(false), "false");
  assert.equal(formatValue(3), "3");
  assert.equal(formatValue(1.5), "1.5");
  assert.equal(formatValue("text"), "text");
});

test("formats arrays and objects as spaced JSON in key order", () => {
  assert.equal(formatValue([1, "a"]), '[1, "a"]');
  assert.equal(formatValue({ b: 1, a: [true, null] }), '{"b": 1, "a": [true, null]}');
  assert.equal(engine.render("tags={{tags}}", { tags: ["x", "y"] }), 'tags=["x", "y"]');
});

test("null renders as an empty string", () => {
  assert.equal(engine.render("[{{v}}]", { v: null }), "[]");
});

// ═══════════════════════════════════════════════════════════════════════════
// UNDEFINED NAMES
// ═══════════════════════════════════════════════════════════════════════════

section("Undefined names");

test("strict mode throws on undefined variables", () => {
  assert.throws(
    () => engine.render("Hi {{name}}", {}),
    (err: unknown) => err instanceof TemplateError && err.message === "Undefined variable: name"
  );
});

test("lenient mode leaves undefined variables verbatim", () => {
  assert.equal(engine.render("Hi {{name}} {{known}}", { known: "k" }, { strict: false }), "Hi {{name}} k");
});

test("strict mode throws on undefined fragments", () => {
  assert.throws(
    () => engine.render("{{fragment:nope}}", {}),
    (err: unknown) => err instanceof TemplateError && err.message === "Undefined fragment: nope"
  );
});

test("lenient mode leaves undefined fragments verbatim", () => {
  assert.equal(engine.render("a {{fragment:nope}} b", {}, { strict: false }), "a {{fragment:nope}} b");
});

// ═══════════════════════════════════════════════════════════════════════════
// FRAGMENTS
// ═══════════════════════════════════════════════════════════════════════════

section("Fragments");

const withFragments = new TemplateEngine({
  fragments: {
    greet: "Hi {{name}}",
    outer: "[{{fragment:greet}}]",
    loose: "({{unknown}})",
  },
});

test("fragments render against the same variables", () => {
  assert.equal(withFragments.render("{{fragment:outer}}", { name: "Bo" }), "[Hi Bo]");
});

test("a fragment may be used more than once", () => {
  assert.equal(
    withFragments.render("{{fragment:greet}} {{fragment:greet}}", { name: "Bo" }),
    "Hi Bo Hi Bo"
  );
});

test("lenient mode applies inside fragments", () => {
  assert.equal(withFragments.render("{{fragment:loose}}", {}, { strict: false }), "({{unknown}})");
});

test("hasFragment only sees own keys", () => {
  assert.equal(withFragments.hasFragment("greet"), true);
  assert.equal(withFragments.hasFragment("toString"), false);
});

section("Fragment cycles");

const cyclic = new TemplateEngine({
  fragments: { a: "A{{fragment:b}}", b: "B{{fragment:a}}", self: "{{fragment:self}}" },
});

test("mutual inclusion raises FragmentCycleError", () => {
  assert.throws(
    () => cyclic.render("{{fragment:a}}", {}),
    (err: unknown) =>
      err instanceof FragmentCycleError &&
      err instanceof TemplateError &&
      err.message === "Fragment cycle detected: a -> b -> a" &&
      err.cycle.join(",") === "a,b,a"
  );
});

test("cycles raise in lenient mode too", () => {
  assert.throws(
    () => cyclic.render("{{fragment:self}}", {}, { strict: false }),
    (err: unknown) =>
      err instanceof FragmentCycleError && err.message === "Fragment cycle detected: self -> self"
  );
});

section("Fragment depth");

const chain = { f0: "{{fragment:f1}}", f1: "{{fragment:f2}}", f2: "end" };

test("default depth limit", () => {
  assert.equal(DEFAULT_MAX_DEPTH, 32);
  assert.equal(new TemplateEngine().maxDepth, 32);
  assert.equal(new TemplateEngine().syntax, "{{variable}}");
});

test("nesting within the limit renders", () => {
  const deep = new TemplateEngine({ fragments: chain, maxDepth: 3 });
  assert.equal(deep.render("{{fragment:f0}}", {}), "end");
});

test("nesting past the limit raises FragmentDepthError", () => {
  const shallow = new TemplateEngine({ fragments: chain, maxDepth: 2 });
  assert.throws(
    () => shallow.render("{{fragment:f0}}", {}),
    (err: unknown) =>
      err instanceof FragmentDepthError &&
      err.fragmentName === "f2" &&
      err.maxDepth === 2 &&
      err.message === "Fragment nesting exceeds maximum depth of 2 at: f2"
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// EXTRACTION
// ═══════════════════════════════════════════════════════════════════════════

section("Extraction");

const sample = "{{a}} {{fragment:x}} {{b}} {{a}} {{o:p}} {{ c }}";

test("extractVariables returns plain names only", () => {
  assert.deepEqual([...engine.extractVariables(sample)], ["a", "b"]);
});

test("extractFragments returns fragment names only", () => {
  assert.deepEqual([...engine.extractFragments(sample)], ["x"]);
});

test("extraction does not look inside fragments", () => {
  assert.deepEqual([...withFragments.extractVariables("{{fragment:greet}}")], []);
});

// ═══════════════════════════════════════════════════════════════════════════
// FRAGMENT RESOLVER
// ═══════════════════════════════════════════════════════════════════════════

section("FragmentResolver");

const pack = parsePromptPack(
  fileURLToPath(new URL("../../packs/customer-support.pack.json", import.meta.url))
);
const resolver = new FragmentResolver(pack);

test("resolves nested pack fragments", () => {
  assert.equal(
    resolver.resolveTemplate("{{fragment:escalation}}", { customer_name: "Dana" }),
    "Hand Dana over to a human for refunds. Be helpful, concise and polite."
  );
});

test("lists required fragments", () => {
  assert.deepEqual([...resolver.getRequiredFragments("{{fragment:a}}{{fragment:b}}")], ["a", "b"]);
});

test("validateFragments returns missing names sorted", () => {
  assert.deepEqual(
    resolver.validateFragments("{{fragment:zeta}} {{fragment:guidelines}} {{fragment:alpha}}"),
    ["alpha", "zeta"]
  );
});

test("uses the pack's syntax and the given depth", () => {
  const limited = new FragmentResolver(pack, { maxDepth: 5 });
  assert.equal(limited.engine.maxDepth, 5);
  assert.equal(limited.engine.syntax, "{{variable}}");
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
