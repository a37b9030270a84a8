import type { Post } from "./Post.js";

export interface RelatedHashtagEntry {
  /** Hashtag with its leading `#`, e.g. "#instagood" */
  readonly hash: string;
  /** Humanized magnitude, e.g. "1.96 G" */
  readonly info: string;
}

export interface LiteralTiers {
  frequent: RelatedHashtagEntry[];
  average: RelatedHashtagEntry[];
  rare: RelatedHashtagEntry[];
}

export interface SemanticTiers {
  relatedFrequent: RelatedHashtagEntry[];
  relatedAverage: RelatedHashtagEntry[];
  relatedRare: RelatedHashtagEntry[];
}

export interface HashtagRecord extends Readonly<LiteralTiers>, Readonly<SemanticTiers> {
  readonly name: string;
  /** null when the page did not reveal a count */
  readonly postsCount: number | null;
  readonly posts: string | null;
  readonly url: string;
  readonly postsPerDay: number | null;
  readonly related: RelatedHashtagEntry[];
  readonly topPosts: Post[];
}
