import type {
  RateLimiter,
  RequestOutcome,
} from "../../domain/repositories/RateLimiter.js";
import type { RateLimiterConfig } from "../../shared/config/index.js";
import { cancelledError } from "../../domain/errors/ScrapeError.js";
import { systemClock, type Clock } from "../../shared/utils/clock.js";
import { logger } from "../../shared/utils/logger.js";

/**
 * Sliding-window limiter with an adaptive gap between grants. Every caller
 * goes through one promise chain, so the window and delay state are only
 * touched by one acquire at a time.
 */
export class AdaptiveRateLimiterImpl implements RateLimiter {
  private delayMs: number;
  private successStreak = 0;
  private lastGrantAt: number | null = null;
  private grants: number[] = [];
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly config: RateLimiterConfig,
    private readonly clock: Clock = systemClock
  ) {
    this.delayMs = config.minDelayMs;
  }

  acquire(signal?: AbortSignal): Promise<void> {
    const turn = this.queue.then(() => this.waitForSlot(signal));
    // The next caller waits for this turn to settle, not to succeed;
    // the rejection itself is delivered through `turn`.
    this.queue = turn.then(
      () => undefined,
      () => undefined
    );
    return turn;
  }

  reportOutcome(outcome: RequestOutcome): void {
    switch (outcome) {
      case "throttled":
      case "blocked": {
        const previous = this.delayMs;
        this.successStreak = 0;
        this.delayMs = Math.min(
          this.config.maxDelayMs,
          Math.max(this.delayMs, 1) * this.config.backoffFactor
        );
        logger.debug(
          { outcome, previousDelayMs: previous, delayMs: this.delayMs },
          "Backing off"
        );
        break;
      }
      case "success":
        this.successStreak++;
        if (this.successStreak >= this.config.decayAfterSuccesses) {
          this.successStreak = 0;
          this.delayMs = Math.max(
            this.config.minDelayMs,
            Math.floor(this.delayMs * this.config.decayFactor)
          );
        }
        break;
      case "error":
        this.successStreak = 0;
        break;
    }
  }

  currentDelayMs(): number {
    return this.delayMs;
  }

  reset(): void {
    this.delayMs = this.config.minDelayMs;
    this.successStreak = 0;
    this.lastGrantAt = null;
    this.grants = [];
  }

  private async waitForSlot(signal?: AbortSignal): Promise<void> {
    for (;;) {
      if (signal?.aborted) throw cancelledError();

      const now = this.clock.now();
      this.grants = this.grants.filter(
        (at) => now - at < this.config.intervalMs
      );

      const gapWait =
        this.lastGrantAt === null
          ? 0
          : this.lastGrantAt + this.delayMs - now;
      const windowWait =
        this.grants.length >= this.config.maxRequests
          ? this.grants[0] + this.config.intervalMs - now
          : 0;
      const wait = Math.max(gapWait, windowWait);

      if (wait <= 0) {
        this.lastGrantAt = now;
        this.grants.push(now);
        return;
      }

      await this.clock.sleep(wait, signal);
    }
  }
}
