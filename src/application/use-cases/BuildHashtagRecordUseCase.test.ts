import { describe, it, expect, vi } from "vitest";
import { BuildHashtagRecordUseCase } from "./BuildHashtagRecordUseCase.js";
import { CollectPostsUseCase } from "./CollectPostsUseCase.js";
import { RelationClassifier } from "../../domain/services/RelationClassifier.js";
import { HashtagRecordService } from "../../domain/services/HashtagRecordService.js";
import { createHashtagJob } from "../../domain/entities/HashtagJob.js";
import { MediaType } from "../../domain/value-objects/MediaType.js";
import { AdaptiveRateLimiterImpl } from "../../infrastructure/http/AdaptiveRateLimiterImpl.js";
import { ProxyPool } from "../../infrastructure/http/ProxyPool.js";
import { HashtagPageFetcherImpl } from "../../infrastructure/scrapers/HashtagPageFetcherImpl.js";
import { TagPageDecoderImpl } from "../../infrastructure/decoders/TagPageDecoderImpl.js";
import type { HttpRequest, HttpResponse } from "../../infrastructure/http/HttpTransport.js";
import type { Post } from "../../domain/entities/Post.js";
import type { PageDecoder } from "../../domain/repositories/PageDecoder.js";
import type { PageFetcher } from "../../domain/repositories/PageFetcher.js";
import type { DecodedTagPage } from "../../domain/value-objects/DecodedTagPage.js";
import type { FetchAttempt } from "../../domain/value-objects/FetchAttempt.js";

const post = (id: string): Post => ({
  id,
  type: MediaType.PHOTO,
  shortCode: id,
  caption: "",
  hashtags: [],
  mentions: [],
  url: `https://example.test/p/${id}/`,
});

const ok = (payload: string): FetchAttempt => ({ ok: true, payload, status: 200, attempts: 1 });

// Real collector, classifier and record service over the given page sources
const assemble = (fetcher: PageFetcher, decoder: PageDecoder) =>
  new BuildHashtagRecordUseCase(
    new CollectPostsUseCase(fetcher, decoder, { maxPages: 5, decodeAttempts: 1 }),
    new RelationClassifier({
      frequentThreshold: 10_000_000,
      averageThreshold: 1_000_000,
      minSharedStem: 4,
      maxEditDistanceRatio: 0.25,
    }),
    new HashtagRecordService({ baseUrl: "https://example.test", activityWindowDays: 1825 })
  );

// Canned fetch results keyed by cursor ("landing" for the first page)
const createUseCase = (
  routes: Record<string, FetchAttempt>,
  pages: Record<string, DecodedTagPage>
) =>
  assemble(
    { fetch: async (target) => routes[target.cursor ?? "landing"] },
    { decode: (payload) => pages[payload] }
  );

const landing: DecodedTagPage = {
  displayName: "love",
  postsCount: 2_150_000_000,
  topPosts: [post("1")],
  latestPosts: [],
  related: [
    { name: "instagood", magnitudeText: "1.96 G" },
    { name: "lovely", magnitudeText: "1.2M" },
  ],
};

describe("BuildHashtagRecordUseCase", () => {
  it("should produce a complete record for a popular hashtag", async () => {
    const useCase = createUseCase({ landing: ok("landing") }, { landing });

    const outcome = await useCase.execute(
      createHashtagJob("#love", { postSampleSize: 1, relatedDepth: 30 })
    );

    expect(outcome).toEqual({
      status: "success",
      record: {
        name: "love",
        postsCount: 2_150_000_000,
        posts: "2.15 G",
        url: "https://example.test/explore/tags/love/",
        postsPerDay: 1178082.19,
        related: [
          { hash: "#instagood", info: "1.96 G" },
          { hash: "#lovely", info: "1.2 M" },
        ],
        frequent: [{ hash: "#instagood", info: "1.96 G" }],
        average: [{ hash: "#lovely", info: "1.2 M" }],
        rare: [],
        relatedFrequent: [],
        relatedAverage: [{ hash: "#lovely", info: "1.2 M" }],
        relatedRare: [],
        topPosts: [post("1")],
      },
    });
  });

  it("should fail a hashtag that does not exist", async () => {
    const useCase = createUseCase(
      {
        landing: {
          ok: false,
          kind: "NotFound",
          retryable: false,
          reason: "HTTP 404",
          status: 404,
          attempts: 1,
        },
      },
      {}
    );

    const outcome = await useCase.execute(
      createHashtagJob("zzz_nonexistent", { postSampleSize: 12, relatedDepth: 30 })
    );

    expect(outcome).toEqual({
      status: "failure",
      reason: "NotFound",
      message: "HTTP 404 after 1 attempt(s)",
    });
  });

  it("should report a partial success when fewer posts exist than requested", async () => {
    const tenPosts = { ...landing, topPosts: Array.from({ length: 10 }, (_, i) => post(String(i))) };
    const useCase = createUseCase({ landing: ok("landing") }, { landing: tenPosts });

    const outcome = await useCase.execute(
      createHashtagJob("love", { postSampleSize: 50, relatedDepth: 30 })
    );

    expect(outcome.status).toBe("partial_success");
    if (outcome.status !== "partial_success") return;
    expect(outcome.warnings).toEqual(["Sample smaller than requested: collected 10 of 50 posts"]);
    expect(outcome.record.topPosts).toHaveLength(10);
  });

  it("should warn about missing counts and unreadable magnitudes", async () => {
    const sparse: DecodedTagPage = {
      topPosts: [post("1")],
      latestPosts: [],
      related: [{ name: "heart" }, { name: "lovely", magnitudeText: "1.2M" }],
    };
    const useCase = createUseCase({ landing: ok("landing") }, { landing: sparse });

    const outcome = await useCase.execute(
      createHashtagJob("love", { postSampleSize: 1, relatedDepth: 30 })
    );

    expect(outcome).toMatchObject({
      status: "partial_success",
      warnings: [
        "Total post count unavailable",
        "1 related hashtag(s) had no readable magnitude: heart",
      ],
      record: { postsCount: null, posts: null, postsPerDay: null },
    });
  });

  it("should keep the landing data when a later page fails", async () => {
    const useCase = createUseCase(
      {
        landing: ok("landing"),
        c1: {
          ok: false,
          kind: "Blocked",
          retryable: true,
          reason: "HTTP 403",
          status: 403,
          attempts: 3,
        },
      },
      { landing: { ...landing, nextCursor: "c1" } }
    );

    const outcome = await useCase.execute(
      createHashtagJob("love", { postSampleSize: 5, relatedDepth: 30 })
    );

    expect(outcome).toMatchObject({
      status: "partial_success",
      warnings: [
        "Sample smaller than requested: collected 1 of 5 posts",
        "Post collection stopped early (Blocked): HTTP 403 after 3 attempt(s)",
      ],
    });
  });

  it("should fail as cancelled and keep the partial record", async () => {
    const useCase = createUseCase(
      {
        landing: ok("landing"),
        c1: {
          ok: false,
          kind: "Cancelled",
          retryable: false,
          reason: "Run was cancelled",
          attempts: 0,
        },
      },
      { landing: { ...landing, nextCursor: "c1" } }
    );

    const outcome = await useCase.execute(
      createHashtagJob("love", { postSampleSize: 5, relatedDepth: 30 })
    );

    expect(outcome.status).toBe("failure");
    if (outcome.status !== "failure") return;
    expect(outcome.reason).toBe("Cancelled");
    expect(outcome.partial?.topPosts).toEqual([post("1")]);
  });

  describe("with the HTTP fetcher and page decoder", () => {
    const lovePage = JSON.stringify({
      graphql: {
        hashtag: {
          name: "love",
          edge_hashtag_to_media: {
            count: 2_150_000_000,
            page_info: { has_next_page: false },
            edges: [],
          },
          edge_hashtag_to_top_posts: {
            edges: [{ node: { id: "1", __typename: "GraphVideo", shortcode: "VID1" } }],
          },
          edge_hashtag_to_related_tags: {
            edges: [
              { node: { name: "instagood", formatted_media_count: "1.96 g" } },
              { node: { name: "fashion", formatted_media_count: "1.22 g" } },
            ],
          },
        },
      },
    });

    const createPipeline = (...responses: HttpResponse[]) => {
      const get = vi.fn<(request: HttpRequest) => Promise<HttpResponse>>();
      for (const response of responses) {
        get.mockResolvedValueOnce(response);
      }
      const clock = { now: () => 0, sleep: async () => undefined };
      const rateLimiter = new AdaptiveRateLimiterImpl(
        {
          maxRequests: 100,
          intervalMs: 1000,
          minDelayMs: 0,
          maxDelayMs: 0,
          backoffFactor: 2,
          decayFactor: 0.5,
          decayAfterSuccesses: 5,
        },
        clock
      );
      const fetcher = new HashtagPageFetcherImpl(
        { get },
        new ProxyPool([]),
        rateLimiter,
        {
          baseUrl: "https://example.test",
          userAgent: "test-agent",
          maxAttempts: 3,
          baseRetryDelayMs: 0,
          maxRetryDelayMs: 0,
          requestTimeoutMs: 1000,
        },
        clock
      );

      return { get, useCase: assemble(fetcher, new TagPageDecoderImpl("https://example.test")) };
    };

    const job = createHashtagJob("love", { postSampleSize: 1, relatedDepth: 30 });

    it("should classify both billion-scale related tags as frequent", async () => {
      const { useCase } = createPipeline({ status: 200, body: lovePage });

      const outcome = await useCase.execute(job);

      expect(outcome.status).toBe("success");
      if (outcome.status !== "success") return;
      expect(outcome.record.frequent).toEqual([
        { hash: "#instagood", info: "1.96 G" },
        { hash: "#fashion", info: "1.22 G" },
      ]);
      expect(outcome.record.topPosts).toEqual([
        {
          id: "1",
          type: MediaType.VIDEO,
          shortCode: "VID1",
          caption: "",
          hashtags: [],
          mentions: [],
          url: "https://example.test/p/VID1/",
        },
      ]);
    });

    it("should succeed after two rate-limited attempts", async () => {
      const { get, useCase } = createPipeline(
        { status: 429, body: "" },
        { status: 429, body: "" },
        { status: 200, body: lovePage }
      );

      const outcome = await useCase.execute(job);

      expect(outcome.status).toBe("success");
      expect(get).toHaveBeenCalledTimes(3);
    });

    it("should not retry a missing hashtag", async () => {
      const { get, useCase } = createPipeline({ status: 404, body: "" });

      const outcome = await useCase.execute(
        createHashtagJob("zzz_nonexistent", { postSampleSize: 1, relatedDepth: 30 })
      );

      expect(outcome).toEqual({
        status: "failure",
        reason: "NotFound",
        message: "HTTP 404 after 1 attempt(s)",
      });
      expect(get).toHaveBeenCalledTimes(1);
    });
  });
});
