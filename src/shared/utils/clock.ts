import { cancelledError } from "../../domain/errors/ScrapeError.js";

export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Resolves after `ms`, or rejects with a Cancelled ScrapeError as soon as
 * the signal aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(cancelledError());
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(cancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: delay,
};

/**
 * Combines an optional caller signal and an optional deadline into one
 * signal. `dispose` clears the deadline timer.
 */
export function linkSignals(
  parent: AbortSignal | undefined,
  timeoutMs?: number
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const abort = () => controller.abort();

  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener("abort", abort, { once: true });
  }

  const timer =
    timeoutMs !== undefined ? setTimeout(abort, timeoutMs) : undefined;

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener("abort", abort);
    },
  };
}
