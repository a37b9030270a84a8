import type { ScrapeErrorKind } from "../errors/ScrapeError.js";

export interface FetchTarget {
  hashtag: string;
  /** Pagination cursor; absent for the landing page */
  cursor?: string;
}

export interface FetchSuccess {
  ok: true;
  payload: string;
  status: number;
  attempts: number;
}

export interface FetchFailure {
  ok: false;
  kind: ScrapeErrorKind;
  retryable: boolean;
  reason: string;
  status?: number;
  attempts: number;
}

export type FetchAttempt = FetchSuccess | FetchFailure;

export interface PaginationCursor {
  token: string;
  /** Pagination fetches made so far for this job */
  page: number;
}
