import type { ScrapeErrorKind } from "../errors/ScrapeError.js";
import type { HashtagRecord } from "../entities/HashtagRecord.js";

export type JobOutcome =
  | { status: "success"; record: HashtagRecord }
  | { status: "partial_success"; record: HashtagRecord; warnings: string[] }
  | {
      status: "failure";
      reason: ScrapeErrorKind;
      message: string;
      partial?: HashtagRecord;
    };

export type JobStatus = JobOutcome["status"];

/**
 * `hashtag` is the normalized job name, or the raw input for a name that
 * was rejected before any job existed.
 */
export interface JobResult {
  hashtag: string;
  outcome: JobOutcome;
}
