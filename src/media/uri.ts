/**
 * Media reference → URI.
 *
 * A MediaReference may point at its payload three ways; the first one set
 * wins: `url` as-is, inline `base64` as a data URI, then `file_path` as a
 * file URI.
 */

import type { ContentPart, MediaReference } from "../pack/schema.js";

export function resolveMediaUri(media: MediaReference): string | undefined {
  if (media.url) {
    return media.url;
  }
  if (media.base64) {
    return `data:${media.mime_type};base64,${media.base64}`;
  }
  if (media.file_path) {
    return `file://${media.file_path}`;
  }
  return undefined;
}

/** Text of a content part, or the URI of its media. */
export function describeContentPart(part: ContentPart): string | undefined {
  if (part.type === "text") {
    return part.text;
  }
  return part.media !== undefined ? resolveMediaUri(part.media) : undefined;
}
