import { load, type CheerioAPI } from "cheerio";
import { z } from "zod";
import type { PageDecoder } from "../../domain/repositories/PageDecoder.js";
import type {
  DecodedTagPage,
  RawRelatedHashtag,
} from "../../domain/value-objects/DecodedTagPage.js";
import { extractCaptionTags, type Post } from "../../domain/entities/Post.js";
import { MediaType, toMediaType } from "../../domain/value-objects/MediaType.js";
import { ScrapeError } from "../../domain/errors/ScrapeError.js";
import { logger } from "../../shared/utils/logger.js";

const MAX_FALLBACK_CARDS = 12;

const postEdgeSchema = z.object({
  node: z.object({
    id: z.union([z.string(), z.number()]).transform(String),
    __typename: z.string().optional(),
    shortcode: z.string().optional(),
    is_video: z.boolean().optional(),
    display_url: z.string().optional(),
    edge_media_to_caption: z
      .object({
        edges: z.array(z.object({ node: z.object({ text: z.string() }) })),
      })
      .optional(),
  }),
});

const relatedEdgeSchema = z.object({
  node: z.object({
    name: z.string().min(1),
    formatted_media_count: z.string().optional(),
    media_count: z.union([z.number(), z.string()]).optional(),
    edge_hashtag_to_media: z.object({ count: z.number() }).optional(),
  }),
});

const edgeListSchema = z
  .object({ edges: z.array(z.unknown()).default([]) })
  .optional();

const hashtagNodeSchema = z.object({
  name: z.string().optional(),
  edge_hashtag_to_media: z
    .object({
      count: z.number().int().nonnegative().optional(),
      page_info: z
        .object({
          has_next_page: z.boolean().optional(),
          end_cursor: z.string().nullable().optional(),
        })
        .optional(),
      edges: z.array(z.unknown()).default([]),
    })
    .optional(),
  edge_hashtag_to_top_posts: edgeListSchema,
  edge_hashtag_to_related_tags: edgeListSchema,
});

type HashtagNode = z.infer<typeof hashtagNodeSchema>;

const sharedDataShape = z.object({
  entry_data: z.object({
    TagPage: z
      .array(z.object({ graphql: z.object({ hashtag: z.unknown() }) }))
      .min(1),
  }),
});

const graphqlShape = z.object({
  graphql: z.object({ hashtag: z.unknown() }),
});

const EMBEDDED_JSON_PATTERNS = [
  /window\._sharedData\s*=\s*(\{[\s\S]*\})/,
  /window\.__additionalDataLoaded\(\s*'[^']*'\s*,\s*(\{[\s\S]*\})\s*\)/,
];

const POST_HREF_PATTERN = /\/p\/([A-Za-z0-9_-]+)\/?(?:[?#].*)?$/;

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export class TagPageDecoderImpl implements PageDecoder {
  constructor(private readonly baseUrl: string) {}

  decode(payload: string, context: { hashtag: string }): DecodedTagPage {
    const trimmed = payload.trim();
    const $ = trimmed.startsWith("{") ? undefined : load(payload);
    const document = $ === undefined ? this.parseRawJson(trimmed) : this.extractDocument($);
    const rawNode = document === undefined ? undefined : this.findHashtagNode(document);

    if (rawNode === undefined) {
      const cards = $ === undefined ? [] : this.extractPostCards($);
      if (cards.length === 0) {
        throw new ScrapeError(
          "DecodeError",
          `No recognizable hashtag data for #${context.hashtag}`
        );
      }
      logger.debug(
        { hashtag: context.hashtag, cards: cards.length },
        "Decoded post cards from HTML fallback"
      );
      return { topPosts: cards, latestPosts: [], related: [] };
    }

    const parsed = hashtagNodeSchema.safeParse(rawNode);
    if (!parsed.success) {
      throw new ScrapeError(
        "DecodeError",
        `Unexpected hashtag node structure for #${context.hashtag}: ${parsed.error.issues[0]?.message ?? "invalid"}`,
        { cause: parsed.error }
      );
    }

    return this.toDecodedPage(parsed.data, context.hashtag);
  }

  private parseRawJson(payload: string): unknown {
    const document = tryParseJson(payload);
    if (document === undefined) {
      throw new ScrapeError("DecodeError", "Malformed JSON payload");
    }
    return document;
  }

  private extractDocument($: CheerioAPI): unknown {
    const scripts = $("script:not([src])")
      .toArray()
      .map((element) => $(element).text());

    for (const pattern of EMBEDDED_JSON_PATTERNS) {
      for (const script of scripts) {
        const match = pattern.exec(script);
        if (!match) continue;
        const document = tryParseJson(match[1]);
        if (document !== undefined) return document;
        logger.debug({ pattern: pattern.source }, "Embedded JSON did not parse");
      }
    }

    for (const element of $('script[type="application/ld+json"]').toArray()) {
      const document = tryParseJson($(element).text().trim());
      if (typeof document === "object" && document !== null && !Array.isArray(document)) {
        return document;
      }
    }

    return undefined;
  }

  private findHashtagNode(document: unknown): unknown {
    const sharedData = sharedDataShape.safeParse(document);
    if (sharedData.success) {
      return sharedData.data.entry_data.TagPage[0].graphql.hashtag;
    }

    const graphql = graphqlShape.safeParse(document);
    if (graphql.success) {
      return graphql.data.graphql.hashtag;
    }

    return undefined;
  }

  private toDecodedPage(node: HashtagNode, hashtag: string): DecodedTagPage {
    const media = node.edge_hashtag_to_media;
    const pageInfo = media?.page_info;
    const endCursor = pageInfo?.end_cursor ?? undefined;

    return {
      displayName: node.name,
      postsCount: media?.count,
      topPosts: this.parsePosts(node.edge_hashtag_to_top_posts?.edges ?? [], hashtag),
      latestPosts: this.parsePosts(media?.edges ?? [], hashtag),
      nextCursor:
        pageInfo?.has_next_page === false || !endCursor ? undefined : endCursor,
      related: this.parseRelated(node.edge_hashtag_to_related_tags?.edges ?? [], hashtag),
    };
  }

  private parsePosts(edges: unknown[], hashtag: string): Post[] {
    const posts: Post[] = [];

    for (const edge of edges) {
      const parsed = postEdgeSchema.safeParse(edge);
      if (!parsed.success || parsed.data.node.id === "") {
        logger.debug({ hashtag }, "Skipping unreadable post edge");
        continue;
      }

      const node = parsed.data.node;
      const caption = node.edge_media_to_caption?.edges[0]?.node.text ?? "";
      const shortCode = node.shortcode ?? "";

      posts.push({
        id: node.id,
        type: toMediaType(node.__typename, node.is_video),
        shortCode,
        caption,
        ...extractCaptionTags(caption),
        url: shortCode ? this.postUrl(shortCode) : (node.display_url ?? ""),
      });
    }

    return posts;
  }

  private parseRelated(edges: unknown[], hashtag: string): RawRelatedHashtag[] {
    const related: RawRelatedHashtag[] = [];

    for (const edge of edges) {
      const parsed = relatedEdgeSchema.safeParse(edge);
      if (!parsed.success) {
        logger.debug({ hashtag }, "Skipping unreadable related tag edge");
        continue;
      }

      const node = parsed.data.node;
      const count = node.media_count ?? node.edge_hashtag_to_media?.count;
      related.push({
        name: node.name,
        magnitudeText:
          node.formatted_media_count ??
          (count !== undefined ? String(count) : undefined),
      });
    }

    return related;
  }

  private extractPostCards($: CheerioAPI): Post[] {
    const cards = new Map<string, Post>();

    for (const element of $('a[href*="/p/"]').toArray()) {
      const anchor = $(element);
      const shortCode = POST_HREF_PATTERN.exec(anchor.attr("href") ?? "")?.[1];
      if (shortCode === undefined || cards.has(shortCode)) continue;

      const caption = anchor.attr("aria-label") ?? anchor.attr("title") ?? "";

      cards.set(shortCode, {
        id: shortCode,
        type: MediaType.PHOTO,
        shortCode,
        caption,
        ...extractCaptionTags(caption),
        url: this.postUrl(shortCode),
      });

      if (cards.size >= MAX_FALLBACK_CARDS) break;
    }

    return [...cards.values()];
  }

  private postUrl(shortCode: string): string {
    return `${this.baseUrl}/p/${shortCode}/`;
  }
}
