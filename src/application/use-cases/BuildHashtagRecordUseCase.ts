import type { HashtagJob } from "../../domain/entities/HashtagJob.js";
import type { JobOutcome } from "../../domain/value-objects/JobOutcome.js";
import type { CollectPostsUseCase, CollectionResult } from "./CollectPostsUseCase.js";
import type { RelationClassification } from "../../domain/services/RelationClassifier.js";
import { RelationClassifier } from "../../domain/services/RelationClassifier.js";
import { HashtagRecordService } from "../../domain/services/HashtagRecordService.js";
import { toScrapeError } from "../../domain/errors/ScrapeError.js";
import { logger } from "../../shared/utils/logger.js";

/**
 * Drives one hashtag job end to end and turns whatever was gathered into a
 * success, a partial success with warnings, or a failure.
 */
export class BuildHashtagRecordUseCase {
  constructor(
    private readonly collectPostsUseCase: CollectPostsUseCase,
    private readonly relationClassifier: RelationClassifier,
    private readonly recordService: HashtagRecordService
  ) {}

  async execute(job: HashtagJob, signal?: AbortSignal): Promise<JobOutcome> {
    let collection: CollectionResult;
    try {
      collection = await this.collectPostsUseCase.execute(job, signal);
    } catch (caught) {
      const error = toScrapeError(caught);
      logger.warn(
        { hashtag: job.name, kind: error.kind, error: error.message },
        "Hashtag job failed"
      );
      return { status: "failure", reason: error.kind, message: error.message };
    }

    const relations = this.relationClassifier.classify(
      job.name,
      collection.landing.related,
      { depth: job.relatedDepth }
    );
    const record = this.recordService.createRecord(
      job,
      collection.landing,
      collection.posts,
      relations
    );

    if (collection.error?.kind === "Cancelled") {
      return {
        status: "failure",
        reason: "Cancelled",
        message: collection.error.message,
        partial: record,
      };
    }

    const warnings = this.collectWarnings(job, collection, relations);
    if (warnings.length === 0) {
      return { status: "success", record };
    }

    logger.debug({ hashtag: job.name, warnings }, "Hashtag job incomplete");
    return { status: "partial_success", record, warnings };
  }

  private collectWarnings(
    job: HashtagJob,
    collection: CollectionResult,
    relations: RelationClassification
  ): string[] {
    const warnings: string[] = [];

    if (collection.posts.length < job.postSampleSize) {
      warnings.push(
        `Sample smaller than requested: collected ${collection.posts.length} of ${job.postSampleSize} posts`
      );
    }
    if (collection.stopReason === "page_limit" && collection.posts.length < job.postSampleSize) {
      warnings.push(`Page limit reached after ${collection.pagesFetched} pages`);
    }
    if (collection.stopReason === "cursor_repeated") {
      warnings.push("Pagination stopped: the source repeated a cursor");
    }
    if (collection.error) {
      warnings.push(
        `Post collection stopped early (${collection.error.kind}): ${collection.error.message}`
      );
    }
    if (collection.landing.postsCount === undefined) {
      warnings.push("Total post count unavailable");
    }
    if (collection.landing.related.length === 0) {
      warnings.push("Page revealed no related hashtags");
    }
    if (relations.unrated.length > 0) {
      warnings.push(
        `${relations.unrated.length} related hashtag(s) had no readable magnitude: ${relations.unrated.join(", ")}`
      );
    }

    return warnings;
  }
}
