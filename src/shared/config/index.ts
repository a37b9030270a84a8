import "dotenv/config";
import { z } from "zod";

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36";

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

export const envSchema = z.object({
  HASHTAGS: z.string().optional(),
  HASHTAGS_FILE: z.string().optional(),
  OUTPUT_DIR: z.string().min(1).default("data"),
  BASE_URL: z.string().url().default("https://www.instagram.com"),
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  CONCURRENCY: positiveInt(3),
  POST_SAMPLE_SIZE: positiveInt(12),
  RELATED_DEPTH: positiveInt(30),
  PROXIES: z.string().optional(),
  PROXY_STRATEGY: z.enum(["round-robin", "random"]).default("round-robin"),
  RATE_LIMIT_MAX_REQUESTS: positiveInt(20),
  RATE_LIMIT_INTERVAL_MS: positiveInt(60_000),
  RATE_LIMIT_MIN_DELAY_MS: nonNegativeInt(1000),
  RATE_LIMIT_MAX_DELAY_MS: positiveInt(60_000),
  RATE_LIMIT_BACKOFF_FACTOR: z.coerce.number().min(1).default(2),
  MAX_FETCH_ATTEMPTS: positiveInt(3),
  RETRY_BASE_DELAY_MS: nonNegativeInt(1000),
  MAX_PAGES: positiveInt(5),
  DECODE_ATTEMPTS: positiveInt(2),
  REQUEST_TIMEOUT_MS: positiveInt(10_000),
  RUN_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

export type Env = z.infer<typeof envSchema>;

export type ProxyStrategy = Env["PROXY_STRATEGY"];

export interface RateLimiterConfig {
  maxRequests: number;
  intervalMs: number;
  minDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
  decayFactor: number;
  decayAfterSuccesses: number;
}

export interface FetcherConfig {
  baseUrl: string;
  userAgent: string;
  maxAttempts: number;
  baseRetryDelayMs: number;
  maxRetryDelayMs: number;
  requestTimeoutMs: number;
}

export interface CollectorConfig {
  maxPages: number;
  decodeAttempts: number;
}

export interface ClassifierConfig {
  frequentThreshold: number;
  averageThreshold: number;
  minSharedStem: number;
  maxEditDistanceRatio: number;
}

export interface RecordConfig {
  baseUrl: string;
  activityWindowDays: number;
}

export interface ScraperConfig {
  concurrency: number;
  postSampleSize: number;
  relatedDepth: number;
  proxies: string[];
  proxyStrategy: ProxyStrategy;
  runTimeoutMs?: number;
  outputDir: string;
  rateLimiter: RateLimiterConfig;
  fetcher: FetcherConfig;
  collector: CollectorConfig;
  classifier: ClassifierConfig;
  record: RecordConfig;
}

export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(/[,\s]+/)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function buildScraperConfig(source: Env): ScraperConfig {
  const baseUrl = source.BASE_URL.replace(/\/+$/, "");

  return {
    concurrency: source.CONCURRENCY,
    postSampleSize: source.POST_SAMPLE_SIZE,
    relatedDepth: source.RELATED_DEPTH,
    proxies: splitList(source.PROXIES),
    proxyStrategy: source.PROXY_STRATEGY,
    runTimeoutMs: source.RUN_TIMEOUT_MS,
    outputDir: source.OUTPUT_DIR,
    rateLimiter: {
      maxRequests: source.RATE_LIMIT_MAX_REQUESTS,
      intervalMs: source.RATE_LIMIT_INTERVAL_MS,
      minDelayMs: source.RATE_LIMIT_MIN_DELAY_MS,
      maxDelayMs: Math.max(
        source.RATE_LIMIT_MAX_DELAY_MS,
        source.RATE_LIMIT_MIN_DELAY_MS
      ),
      backoffFactor: source.RATE_LIMIT_BACKOFF_FACTOR,
      decayFactor: 0.5,
      decayAfterSuccesses: 5,
    },
    fetcher: {
      baseUrl,
      userAgent: source.USER_AGENT,
      maxAttempts: source.MAX_FETCH_ATTEMPTS,
      baseRetryDelayMs: source.RETRY_BASE_DELAY_MS,
      maxRetryDelayMs: source.RATE_LIMIT_MAX_DELAY_MS,
      requestTimeoutMs: source.REQUEST_TIMEOUT_MS,
    },
    collector: {
      maxPages: source.MAX_PAGES,
      decodeAttempts: source.DECODE_ATTEMPTS,
    },
    classifier: {
      frequentThreshold: 10_000_000,
      averageThreshold: 1_000_000,
      minSharedStem: 4,
      maxEditDistanceRatio: 0.25,
    },
    record: {
      baseUrl,
      // Rough lifetime assumed when only a total count is known
      activityWindowDays: 5 * 365,
    },
  };
}

export const env = envSchema.parse(process.env);

export const SCRAPER_CONFIG: ScraperConfig = buildScraperConfig(env);
