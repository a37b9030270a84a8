import type { HashtagJob } from "../../domain/entities/HashtagJob.js";
import type { Post } from "../../domain/entities/Post.js";
import type { PageDecoder } from "../../domain/repositories/PageDecoder.js";
import type { PageFetcher } from "../../domain/repositories/PageFetcher.js";
import type { DecodedTagPage } from "../../domain/value-objects/DecodedTagPage.js";
import type {
  FetchTarget,
  PaginationCursor,
} from "../../domain/value-objects/FetchAttempt.js";
import type { CollectorConfig } from "../../shared/config/index.js";
import {
  cancelledError,
  ScrapeError,
  toScrapeError,
} from "../../domain/errors/ScrapeError.js";
import { logger } from "../../shared/utils/logger.js";

export type StopReason =
  | "sample_full"
  | "no_cursor"
  | "page_limit"
  | "cursor_repeated"
  | "failed";

export interface CollectionResult {
  landing: DecodedTagPage;
  posts: Post[];
  stopReason: StopReason;
  /** Page fetches that succeeded, landing page included */
  pagesFetched: number;
  error?: ScrapeError;
}

/**
 * Paginates a hashtag's posts: landing page first (top posts, then the
 * first latest posts), then "latest" pages by cursor until the sample is
 * full, the cursor chain ends or the page ceiling is hit.
 */
export class CollectPostsUseCase {
  constructor(
    private readonly pageFetcher: PageFetcher,
    private readonly pageDecoder: PageDecoder,
    private readonly config: CollectorConfig
  ) {}

  /**
   * Throws a ScrapeError when the landing page cannot be obtained; later
   * failures end collection and keep what was already gathered.
   */
  async execute(job: HashtagJob, signal?: AbortSignal): Promise<CollectionResult> {
    const landing = await this.fetchPage({ hashtag: job.name }, signal);
    const collected = new Map<string, Post>();
    const add = (posts: Post[]) => {
      for (const post of posts) {
        if (!collected.has(post.id)) collected.set(post.id, post);
      }
    };

    add(landing.topPosts);
    add(landing.latestPosts);

    let pagesFetched = 1;
    let cursor: PaginationCursor | undefined = landing.nextCursor
      ? { token: landing.nextCursor, page: 0 }
      : undefined;
    const seenCursors = new Set<string>();
    let stopReason: StopReason;
    let error: ScrapeError | undefined;

    for (;;) {
      if (collected.size >= job.postSampleSize) {
        stopReason = "sample_full";
        break;
      }
      if (!cursor) {
        stopReason = "no_cursor";
        break;
      }
      if (pagesFetched >= this.config.maxPages) {
        stopReason = "page_limit";
        break;
      }
      if (seenCursors.has(cursor.token)) {
        stopReason = "cursor_repeated";
        break;
      }
      seenCursors.add(cursor.token);

      let page: DecodedTagPage;
      try {
        page = await this.fetchPage(
          { hashtag: job.name, cursor: cursor.token },
          signal
        );
      } catch (caught) {
        error = toScrapeError(caught);
        stopReason = "failed";
        logger.warn(
          {
            hashtag: job.name,
            page: cursor.page + 1,
            kind: error.kind,
            error: error.message,
            collected: collected.size,
          },
          "Post collection stopped early"
        );
        break;
      }

      pagesFetched++;
      const before = collected.size;
      add(page.latestPosts);
      logger.debug(
        {
          hashtag: job.name,
          page: cursor.page + 1,
          newPosts: collected.size - before,
          collected: collected.size,
        },
        "Collected page"
      );

      cursor = page.nextCursor
        ? { token: page.nextCursor, page: cursor.page + 1 }
        : undefined;
    }

    return {
      landing,
      posts: [...collected.values()].slice(0, job.postSampleSize),
      stopReason,
      pagesFetched,
      error,
    };
  }

  /**
   * Fetch then decode one page. A decode failure re-fetches fresh bytes
   * while the decode budget lasts.
   */
  async fetchPage(target: FetchTarget, signal?: AbortSignal): Promise<DecodedTagPage> {
    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) throw cancelledError();

      const result = await this.pageFetcher.fetch(target, signal);
      if (!result.ok) {
        throw new ScrapeError(
          result.kind,
          `${result.reason} after ${result.attempts} attempt(s)`
        );
      }

      try {
        return this.pageDecoder.decode(result.payload, { hashtag: target.hashtag });
      } catch (caught) {
        const error = toScrapeError(caught);
        if (error.kind !== "DecodeError" || attempt >= this.config.decodeAttempts) {
          throw error;
        }
        logger.warn(
          { hashtag: target.hashtag, cursor: target.cursor, attempt, error: error.message },
          "Decode failed, fetching the page again"
        );
      }
    }
  }
}
