import type { MediaType } from "../value-objects/MediaType.js";

export interface Post {
  id: string;
  type: MediaType;
  shortCode: string;
  caption: string;
  hashtags: string[];
  mentions: string[];
  url: string;
}

/**
 * Pull `#tags` and `@mentions` out of a caption, in first-seen order.
 * Hashtags are lowercased so they compare like hashtag names do.
 */
export function extractCaptionTags(caption: string): {
  hashtags: string[];
  mentions: string[];
} {
  const hashtags = new Set<string>();
  const mentions = new Set<string>();

  for (const match of caption.matchAll(/#([\p{L}\p{N}_]+)/gu)) {
    hashtags.add(match[1].toLowerCase());
  }
  for (const match of caption.matchAll(/@([\p{L}\p{N}_.]+)/gu)) {
    mentions.add(match[1].replace(/\.+$/, ""));
  }

  return { hashtags: [...hashtags], mentions: [...mentions] };
}
