export type ScrapeErrorKind =
  | "NotFound"
  | "RateLimited"
  | "Blocked"
  | "Transient"
  | "DecodeError"
  | "Cancelled"
  | "Rejected"
  | "Unexpected";

const RETRYABLE_KINDS: ReadonlySet<ScrapeErrorKind> = new Set([
  "RateLimited",
  "Blocked",
  "Transient",
]);

export function isRetryableKind(kind: ScrapeErrorKind): boolean {
  return RETRYABLE_KINDS.has(kind);
}

export class ScrapeError extends Error {
  readonly kind: ScrapeErrorKind;
  readonly retryable: boolean;

  constructor(kind: ScrapeErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ScrapeError";
    this.kind = kind;
    this.retryable = isRetryableKind(kind);
  }
}

export function isScrapeError(error: unknown): error is ScrapeError {
  return error instanceof ScrapeError;
}

export function cancelledError(reason = "Run was cancelled"): ScrapeError {
  return new ScrapeError("Cancelled", reason);
}

/**
 * Wraps anything thrown by collaborators so callers only ever handle
 * ScrapeError values.
 */
export function toScrapeError(error: unknown): ScrapeError {
  if (isScrapeError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new ScrapeError("Unexpected", message, { cause: error });
}
