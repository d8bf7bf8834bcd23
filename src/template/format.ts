import { toCanonicalJson, type JsonValue } from "../pack/json.js";

/**
 * Text substituted for a variable value.
 *
 *   null            → ""
 *   true / false    → "true" / "false"
 *   arrays, objects → JSON with ", " and ": " separators, keys in source order
 *   everything else → String(value)
 */
export function formatValue(value: JsonValue): string {
  if (value === null) return "";
  if (typeof value === "object") return toCanonicalJson(value);
  return String(value);
}
