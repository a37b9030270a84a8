import axios from "axios";
import type { PageFetcher } from "../../domain/repositories/PageFetcher.js";
import type {
  RateLimiter,
  RequestOutcome,
} from "../../domain/repositories/RateLimiter.js";
import type {
  FetchAttempt,
  FetchFailure,
  FetchTarget,
} from "../../domain/value-objects/FetchAttempt.js";
import type { FetcherConfig } from "../../shared/config/index.js";
import type { HttpTransport } from "../http/HttpTransport.js";
import type { ProxyPool } from "../http/ProxyPool.js";
import {
  isRetryableKind,
  isScrapeError,
  type ScrapeErrorKind,
} from "../../domain/errors/ScrapeError.js";
import { toHashtagUrl } from "../../domain/value-objects/HashtagName.js";
import { systemClock, type Clock } from "../../shared/utils/clock.js";
import { logger } from "../../shared/utils/logger.js";

// Markers of pages served instead of the hashtag page
const CHALLENGE_BODY_PATTERNS = [
  /checkpoint_required/i,
  /"challenge_required"/i,
  /"require_login"\s*:\s*true/i,
];

const CHALLENGE_REDIRECT_PATTERNS = [/\/challenge\//i, /\/accounts\/login/i];

const NOT_FOUND_PATTERNS = [
  /"HttpErrorPage"/,
  /Sorry, this page isn(?:'|&#39;|’)t available/i,
];

type Classified =
  | { ok: true }
  | { ok: false; kind: ScrapeErrorKind; reason: string };

const OUTCOME_BY_KIND: Partial<Record<ScrapeErrorKind, RequestOutcome>> = {
  RateLimited: "throttled",
  Blocked: "blocked",
  Transient: "error",
};

export function classifyResponse(
  status: number,
  body: string,
  location?: string
): Classified {
  if (status >= 200 && status < 300) {
    if (CHALLENGE_BODY_PATTERNS.some((pattern) => pattern.test(body))) {
      return { ok: false, kind: "Blocked", reason: "Challenge page served" };
    }
    if (NOT_FOUND_PATTERNS.some((pattern) => pattern.test(body))) {
      return { ok: false, kind: "NotFound", reason: "Hashtag does not exist" };
    }
    if (body.trim().length === 0) {
      return { ok: false, kind: "Transient", reason: "Empty response body" };
    }
    return { ok: true };
  }

  if (status >= 300 && status < 400) {
    if (
      location &&
      CHALLENGE_REDIRECT_PATTERNS.some((pattern) => pattern.test(location))
    ) {
      return { ok: false, kind: "Blocked", reason: `Redirected to ${location}` };
    }
    return {
      ok: false,
      kind: "Transient",
      reason: `Unexpected redirect (${status})`,
    };
  }

  if (status === 404) {
    return { ok: false, kind: "NotFound", reason: "HTTP 404" };
  }
  if (status === 429) {
    return { ok: false, kind: "RateLimited", reason: "HTTP 429" };
  }
  if (status === 401 || status === 403) {
    return { ok: false, kind: "Blocked", reason: `HTTP ${status}` };
  }
  if (status >= 500) {
    return { ok: false, kind: "Transient", reason: `HTTP ${status}` };
  }
  return { ok: false, kind: "Rejected", reason: `HTTP ${status}` };
}

export class HashtagPageFetcherImpl implements PageFetcher {
  constructor(
    private readonly transport: HttpTransport,
    private readonly proxies: ProxyPool,
    private readonly rateLimiter: RateLimiter,
    private readonly config: FetcherConfig,
    private readonly clock: Clock = systemClock
  ) {}

  buildUrl(target: FetchTarget): string {
    const landing = toHashtagUrl(this.config.baseUrl, target.hashtag);
    if (target.cursor === undefined) return landing;
    return `${landing}?__a=1&max_id=${encodeURIComponent(target.cursor)}`;
  }

  async fetch(target: FetchTarget, signal?: AbortSignal): Promise<FetchAttempt> {
    const url = this.buildUrl(target);
    let lastFailure: FetchFailure | undefined;

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      if (attempt > 1) {
        const wait = this.retryDelay(attempt - 1);
        logger.debug(
          { hashtag: target.hashtag, attempt, waitMs: wait },
          "Waiting before retry"
        );
        try {
          await this.clock.sleep(wait, signal);
        } catch (error) {
          return this.cancelledOrThrow(error, attempt - 1);
        }
      }

      const result = await this.attemptOnce(url, target, attempt, signal);
      if (result.ok) return result;

      lastFailure = result;
      if (!result.retryable) return result;

      logger.warn(
        {
          hashtag: target.hashtag,
          cursor: target.cursor,
          attempt,
          maxAttempts: this.config.maxAttempts,
          kind: result.kind,
          reason: result.reason,
        },
        "Fetch attempt failed"
      );
    }

    return (
      lastFailure ?? {
        ok: false,
        kind: "Rejected",
        retryable: false,
        reason: "Fetch attempt budget is zero",
        attempts: 0,
      }
    );
  }

  private retryDelay(failedAttempts: number): number {
    const seed = Math.max(
      this.rateLimiter.currentDelayMs(),
      this.config.baseRetryDelayMs
    );
    return Math.min(
      this.config.maxRetryDelayMs,
      seed * Math.pow(2, failedAttempts - 1)
    );
  }

  private async attemptOnce(
    url: string,
    target: FetchTarget,
    attempt: number,
    signal?: AbortSignal
  ): Promise<FetchAttempt> {
    try {
      await this.rateLimiter.acquire(signal);
    } catch (error) {
      return this.cancelledOrThrow(error, attempt - 1);
    }

    const proxy = this.proxies.next();
    logger.debug(
      { hashtag: target.hashtag, url, attempt, proxy: proxy?.label },
      "Fetching page"
    );

    try {
      const response = await this.transport.get({
        url,
        headers: {
          "User-Agent": this.config.userAgent,
          "Accept-Language": "en-US,en;q=0.9",
        },
        timeoutMs: this.config.requestTimeoutMs,
        proxy,
        signal,
      });

      const classified = classifyResponse(
        response.status,
        response.body,
        response.location
      );

      if (classified.ok) {
        this.rateLimiter.reportOutcome("success");
        return {
          ok: true,
          payload: response.body,
          status: response.status,
          attempts: attempt,
        };
      }

      this.rateLimiter.reportOutcome(
        OUTCOME_BY_KIND[classified.kind] ?? "success"
      );
      return {
        ok: false,
        kind: classified.kind,
        retryable: isRetryableKind(classified.kind),
        reason: classified.reason,
        status: response.status,
        attempts: attempt,
      };
    } catch (error) {
      if (signal?.aborted || axios.isCancel(error)) {
        return this.cancelled(attempt);
      }

      this.rateLimiter.reportOutcome("error");
      const reason = error instanceof Error ? error.message : String(error);
      return {
        ok: false,
        kind: "Transient",
        retryable: true,
        reason,
        attempts: attempt,
      };
    }
  }

  private cancelledOrThrow(error: unknown, attempts: number): FetchFailure {
    // Clock and limiter only reject on abort; anything else is a bug
    if (isScrapeError(error) && error.kind === "Cancelled") {
      return this.cancelled(attempts);
    }
    throw error;
  }

  private cancelled(attempts: number): FetchFailure {
    return {
      ok: false,
      kind: "Cancelled",
      retryable: false,
      reason: "Run was cancelled",
      attempts,
    };
  }
}
