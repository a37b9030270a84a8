// Main entrypoint - exports for use in scripts and other packages
export {
  HashtagScrapeWorkflow,
  summarize,
  type RunSummary,
} from "./presentation/workflows/HashtagScrapeWorkflow.js";

// Domain exports
export { createHashtagJob, planHashtagJobs } from "./domain/entities/HashtagJob.js";
export type { HashtagJob, HashtagJobOptions, PlannedJob } from "./domain/entities/HashtagJob.js";
export type { HashtagRecord, RelatedHashtagEntry } from "./domain/entities/HashtagRecord.js";
export type { Post } from "./domain/entities/Post.js";
export { ScrapeError, isScrapeError } from "./domain/errors/ScrapeError.js";
export type { ScrapeErrorKind } from "./domain/errors/ScrapeError.js";
export type { JobOutcome, JobResult, JobStatus } from "./domain/value-objects/JobOutcome.js";
export { MediaType } from "./domain/value-objects/MediaType.js";
export { normalizeHashtag } from "./domain/value-objects/HashtagName.js";
export { RelationClassifier } from "./domain/services/RelationClassifier.js";
