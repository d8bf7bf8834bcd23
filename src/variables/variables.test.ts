/**
 * Variable validation tests.
 *
 * Run: node --import tsx src/variables/variables.test.ts
 *
 * Tests cover:
 *   1. Absent values, defaults and required checks
 *   2. Type coercion per declared type
 *   3. Constraint checks on coerced values
 *   4. Batch validation, strict and lenient
 */

import { strict as assert } from "node:assert";

import {
  validateVariable,
  validateVariables,
  VariableValidationError,
} from "./validator.js";
import type { Variable } from "../pack/schema.js";
import type { JsonValue } from "../pack/json.js";

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

function declare(partial: Partial<Variable> & Pick<Variable, "name" | "type">): Variable {
  return { required: false, ...partial };
}

function expectFailure(variable: Variable, value: JsonValue | undefined, message: string): void {
  assert.throws(
    () => validateVariable(variable, value),
    (err: unknown) =>
      err instanceof VariableValidationError &&
      err.variableName === variable.name &&
      err.message === message
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// ABSENT VALUES
// ═══════════════════════════════════════════════════════════════════════════

section("Absent values");

test("required variable without default is missing", () => {
  const role = declare({ name: "role", type: "string", required: true });
  expectFailure(role, undefined, "Variable 'role': Required variable is missing");
  expectFailure(role, null, "Variable 'role': Required variable is missing");
});

test("required variable with a null default is still missing", () => {
  expectFailure(
    declare({ name: "role", type: "string", required: true, default: null }),
    undefined,
    "Variable 'role': Required variable is missing"
  );
});

test("absent values take the default", () => {
  assert.equal(validateVariable(declare({ name: "n", type: "string", default: "Guest" }), undefined), "Guest");
  assert.equal(
    validateVariable(declare({ name: "n", type: "string", required: true, default: "Guest" }), null),
    "Guest"
  );
});

test("optional variable without default resolves to null", () => {
  assert.equal(validateVariable(declare({ name: "n", type: "number" }), undefined), null);
});

test("reason is kept separately from the message", () => {
  try {
    validateVariable(declare({ name: "role", type: "string", required: true }), undefined);
    assert.fail("Expected VariableValidationError");
  } catch (err) {
    assert.ok(err instanceof VariableValidationError);
    assert.equal(err.reason, "Required variable is missing");
    assert.equal(err.name, "VariableValidationError");
  }
});

// ═══════════════════════════════════════════════════════════════════════════
// COERCION
// ═══════════════════════════════════════════════════════════════════════════

section("string");

const text = declare({ name: "text", type: "string" });

test("strings pass unchanged", () => {
  assert.equal(validateVariable(text, "hello"), "hello");
});

test("scalars are stringified", () => {
  assert.equal(validateVariable(text, 42), "42");
  assert.equal(validateVariable(text, true), "true");
});

test("arrays and objects become spaced JSON", () => {
  assert.equal(validateVariable(text, [1, "a"]), '[1, "a"]');
  assert.equal(validateVariable(text, { k: "v", n: 2 }), '{"k": "v", "n": 2}');
});

section("number");

const count = declare({ name: "count", type: "number" });

test("numbers pass", () => {
  assert.equal(validateVariable(count, 2.5), 2.5);
  assert.equal(validateVariable(count, -3), -3);
});

test("numeric strings are parsed", () => {
  assert.equal(validateVariable(count, "3.5"), 3.5);
  assert.equal(validateVariable(count, " 7 "), 7);
});

test("exponents and special values are parsed", () => {
  assert.equal(validateVariable(count, "1e3"), 1000);
  assert.equal(validateVariable(count, ".5"), 0.5);
  assert.equal(validateVariable(count, "-Infinity"), Number.NEGATIVE_INFINITY);
  assert.equal(validateVariable(count, "inf"), Number.POSITIVE_INFINITY);
  assert.ok(Number.isNaN(validateVariable(count, "NaN")));
});

test("radix literals are not numbers", () => {
  expectFailure(count, "0x10", "Variable 'count': Expected number, got string");
  expectFailure(count, "0b101", "Variable 'count': Expected number, got string");
  expectFailure(count, "0o17", "Variable 'count': Expected number, got string");
});

test("blank and non-numeric strings fail", () => {
  expectFailure(count, "", "Variable 'count': Expected number, got string");
  expectFailure(count, "abc", "Variable 'count': Expected number, got string");
});

test("booleans are not numbers", () => {
  expectFailure(count, true, "Variable 'count': Expected number, got boolean");
});

test("arrays are not numbers", () => {
  expectFailure(count, [1], "Variable 'count': Expected number, got array");
});

section("boolean");

const flag = declare({ name: "flag", type: "boolean" });

test("booleans pass", () => {
  assert.equal(validateVariable(flag, false), false);
});

test("truthy and falsy words are accepted in any case", () => {
  assert.equal(validateVariable(flag, "YES"), true);
  assert.equal(validateVariable(flag, "True"), true);
  assert.equal(validateVariable(flag, "1"), true);
  assert.equal(validateVariable(flag, "no"), false);
  assert.equal(validateVariable(flag, "0"), false);
  assert.equal(validateVariable(flag, "FALSE"), false);
});

test("other values fail", () => {
  expectFailure(flag, "maybe", "Variable 'flag': Expected boolean, got string");
  expectFailure(flag, 1, "Variable 'flag': Expected boolean, got number");
});

section("object and array");

test("object requires a plain object", () => {
  const obj = declare({ name: "obj", type: "object" });
  assert.deepEqual(validateVariable(obj, { a: 1 }), { a: 1 });
  expectFailure(obj, [1], "Variable 'obj': Expected object, got array");
  expectFailure(obj, "x", "Variable 'obj': Expected object, got string");
});

test("array requires an array", () => {
  const list = declare({ name: "list", type: "array" });
  assert.deepEqual(validateVariable(list, [1, 2]), [1, 2]);
  expectFailure(list, { a: 1 }, "Variable 'list': Expected array, got object");
});

// ═══════════════════════════════════════════════════════════════════════════
// CONSTRAINTS
// ═══════════════════════════════════════════════════════════════════════════

section("Constraints");

test("pattern is anchored at the start only", () => {
  const code = declare({ name: "code", type: "string", validation: { pattern: "[A-Z]{3}" } });
  assert.equal(validateVariable(code, "ABCdef"), "ABCdef");
  expectFailure(code, "xABC", "Variable 'code': Value does not match pattern: [A-Z]{3}");
});

test("string length bounds", () => {
  const name = declare({ name: "name", type: "string", validation: { min_length: 2, max_length: 3 } });
  expectFailure(name, "a", "Variable 'name': String too short (min: 2)");
  expectFailure(name, "abcd", "Variable 'name': String too long (max: 3)");
  assert.equal(validateVariable(name, "abc"), "abc");
});

test("lengths count code points", () => {
  const name = declare({ name: "name", type: "string", validation: { max_length: 3 } });
  assert.equal(validateVariable(name, "😀😀😀"), "😀😀😀");
  expectFailure(name, "😀😀😀😀", "Variable 'name': String too long (max: 3)");
});

test("numeric bounds apply after coercion", () => {
  const priority = declare({ name: "priority", type: "number", validation: { minimum: 1, maximum: 5 } });
  expectFailure(priority, 0, "Variable 'priority': Value below minimum: 1");
  expectFailure(priority, "6", "Variable 'priority': Value above maximum: 5");
  assert.equal(validateVariable(priority, "5"), 5);
});

test("enum membership", () => {
  const plan = declare({ name: "plan", type: "string", validation: { enum: ["basic", "pro"] } });
  assert.equal(validateVariable(plan, "pro"), "pro");
  expectFailure(plan, "gold", `Variable 'plan': Value not in allowed values: ["basic", "pro"]`);
});

test("enum compares structured values deeply", () => {
  const shape = declare({ name: "shape", type: "object", validation: { enum: [{ a: 1 }] } });
  assert.deepEqual(validateVariable(shape, { a: 1 }), { a: 1 });
  expectFailure(shape, { a: 2 }, `Variable 'shape': Value not in allowed values: [{"a": 1}]`);
});

test("constraints are skipped for absent values", () => {
  const bounded = declare({ name: "b", type: "number", default: 99, validation: { maximum: 5 } });
  assert.equal(validateVariable(bounded, undefined), 99);
});

// ═══════════════════════════════════════════════════════════════════════════
// BATCH VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

section("validateVariables");

const declared: Variable[] = [
  declare({ name: "role", type: "string", required: true }),
  declare({ name: "customer_name", type: "string", default: "Guest" }),
  declare({ name: "priority", type: "number" }),
];

test("resolves every declared variable in order", () => {
  const resolved = validateVariables(declared, { priority: "2", role: "agent" });
  assert.deepEqual(Object.entries(resolved), [
    ["role", "agent"],
    ["customer_name", "Guest"],
    ["priority", 2],
  ]);
});

test("strict mode rejects unknown variables", () => {
  assert.throws(
    () => validateVariables(declared, { role: "agent", extra: "x" }),
    (err: unknown) =>
      err instanceof VariableValidationError && err.message === "Variable 'extra': Unknown variable"
  );
});

test("lenient mode drops unknown variables", () => {
  const resolved = validateVariables(declared, { role: "agent", extra: "x" }, { strict: false });
  assert.equal(Object.hasOwn(resolved, "extra"), false);
  assert.equal(resolved["role"], "agent");
});

test("missing required variable fails in both modes", () => {
  assert.throws(
    () => validateVariables(declared, {}, { strict: false }),
    (err: unknown) =>
      err instanceof VariableValidationError && err.variableName === "role"
  );
});

test("duplicate declarations are each validated and the last value is kept", () => {
  const duplicated: Variable[] = [
    declare({ name: "tone", type: "string", default: "warm" }),
    declare({ name: "tone", type: "string", default: "formal" }),
  ];
  assert.deepEqual(validateVariables(duplicated, {}), { tone: "formal" });

  const conflicting: Variable[] = [
    declare({ name: "level", type: "string" }),
    declare({ name: "level", type: "number" }),
  ];
  assert.throws(
    () => validateVariables(conflicting, { level: "high" }),
    (err: unknown) =>
      err instanceof VariableValidationError &&
      err.message === "Variable 'level': Expected number, got string"
  );
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
