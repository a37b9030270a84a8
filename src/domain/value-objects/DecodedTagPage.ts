import type { Post } from "../entities/Post.js";

export interface RawRelatedHashtag {
  name: string;
  /** e.g. "1.96 g"; absent when the page showed no count */
  magnitudeText?: string;
}

/**
 * What the page decoder could read from one response. Optional fields are
 * absent when the page did not carry them.
 */
export interface DecodedTagPage {
  displayName?: string;
  postsCount?: number;
  topPosts: Post[];
  latestPosts: Post[];
  nextCursor?: string;
  related: RawRelatedHashtag[];
}
