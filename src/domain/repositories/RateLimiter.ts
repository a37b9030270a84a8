export type RequestOutcome = "success" | "throttled" | "blocked" | "error";

/**
 * Process-wide request pacing shared by every fetch of a run.
 */
export interface RateLimiter {
  /** Resolves once one more outbound request may be issued. */
  acquire(signal?: AbortSignal): Promise<void>;
  reportOutcome(outcome: RequestOutcome): void;
  currentDelayMs(): number;
  reset(): void;
}
