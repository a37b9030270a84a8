import { z } from "zod";

/**
 * Lowercase, without leading `#` or surrounding whitespace. Idempotent:
 * normalizeHashtag(normalizeHashtag(x)) === normalizeHashtag(x).
 */
export function normalizeHashtag(raw: string): string {
  return raw.replace(/^[\s#]+/, "").trimEnd().toLowerCase();
}

export const hashtagNameSchema = z
  .string()
  .transform(normalizeHashtag)
  .pipe(
    z
      .string()
      .min(1, "hashtag name is empty")
      .regex(/^[^\s#]+$/, "hashtag name must be a single word")
  );

export function toHashtagUrl(baseUrl: string, name: string): string {
  return `${baseUrl}/explore/tags/${encodeURIComponent(name)}/`;
}
