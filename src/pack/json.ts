/**
 * JSON value model.
 *
 * Variable values, defaults, validator params and free-form metadata all
 * arrive as untyped JSON. They are modelled as a closed union so every
 * consumer narrows explicitly instead of passing `unknown` around.
 */

import { z } from "zod";

export type JsonPrimitive = string | number | boolean | null;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(z.string(), JsonValueSchema);

/** Kind tag for a JSON value, used in error messages. */
export type JsonKind = "string" | "number" | "boolean" | "null" | "array" | "object";

export function jsonKind(value: JsonValue): JsonKind {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  switch (typeof value) {
    case "string":
      return "string";
    case "number":
      return "number";
    case "boolean":
      return "boolean";
    default:
      return "object";
  }
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Serialize a JSON value with `", "` / `": "` separators, keeping object keys
 * in insertion order. This is the text form used when a list or object is
 * substituted into a template.
 */
export function toCanonicalJson(value: JsonValue): string {
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(toCanonicalJson).join(", ")}]`;
  }
  const entries = Object.entries(value).map(
    ([key, item]) => `${JSON.stringify(key)}: ${toCanonicalJson(item)}`
  );
  return `{${entries.join(", ")}}`;
}
