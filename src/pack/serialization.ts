/**
 * PromptPack serialization.
 *
 * A parsed pack keeps the file format's keys, so serializing it and parsing
 * the result yields an equal pack (defaults filled in by the schema are
 * written out explicitly).
 */

import type { PromptPack } from "./schema.js";

/**
 * Serialize a pack to a JSON string.
 *
 * @param pretty - Whether to format with indentation (default: true)
 */
export function serializePromptPack(pack: PromptPack, pretty = true): string {
  return JSON.stringify(pack, null, pretty ? 2 : undefined);
}

/**
 * Standard filename for a pack: `<id>.pack.json`.
 */
export function getPackFilename(pack: Pick<PromptPack, "id">): string {
  return `${pack.id}.pack.json`;
}
