import { planHashtagJobs, type HashtagJob } from "../../domain/entities/HashtagJob.js";
import type {
  JobOutcome,
  JobResult,
  JobStatus,
} from "../../domain/value-objects/JobOutcome.js";
import { CollectPostsUseCase } from "../../application/use-cases/CollectPostsUseCase.js";
import { BuildHashtagRecordUseCase } from "../../application/use-cases/BuildHashtagRecordUseCase.js";
import { RelationClassifier } from "../../domain/services/RelationClassifier.js";
import { HashtagRecordService } from "../../domain/services/HashtagRecordService.js";
import { cancelledError, toScrapeError } from "../../domain/errors/ScrapeError.js";
import { container } from "../../infrastructure/di/container.js";
import { SCRAPER_CONFIG, type ScraperConfig } from "../../shared/config/index.js";
import { linkSignals } from "../../shared/utils/clock.js";
import { runPool } from "../../shared/utils/workerPool.js";
import { logger } from "../../shared/utils/logger.js";

export type RunSummary = Record<JobStatus, number>;

export function summarize(results: JobResult[]): RunSummary {
  const summary: RunSummary = { success: 0, partial_success: 0, failure: 0 };
  for (const { outcome } of results) {
    summary[outcome.status]++;
  }
  return summary;
}

export class HashtagScrapeWorkflow {
  constructor(private readonly config: ScraperConfig = SCRAPER_CONFIG) {}

  /**
   * Runs every job and returns one result per job, in input order. Job
   * failures never reject the run.
   */
  async run(
    jobs: HashtagJob[],
    concurrency: number = this.config.concurrency,
    signal?: AbortSignal
  ): Promise<JobResult[]> {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(
        `Concurrency must be a positive integer, got ${concurrency}`
      );
    }

    const run = linkSignals(signal, this.config.runTimeoutMs);
    const useCase = this.createUseCase();

    logger.info(
      { jobs: jobs.length, concurrency: Math.min(concurrency, jobs.length) },
      "Starting hashtag scrape"
    );

    try {
      const results = await runPool(jobs, concurrency, async (job) => ({
        hashtag: job.name,
        outcome: await this.executeJob(useCase, job, run.signal),
      }));

      logger.info(summarize(results), "Hashtag scrape completed");
      return results;
    } finally {
      run.dispose();
    }
  }

  /**
   * Runs raw input names. Names that fail validation get a `Rejected`
   * failure in their input position instead of a job.
   */
  async runInputs(
    inputs: string[],
    concurrency: number = this.config.concurrency,
    signal?: AbortSignal
  ): Promise<JobResult[]> {
    const planned = planHashtagJobs(inputs, {
      postSampleSize: this.config.postSampleSize,
      relatedDepth: this.config.relatedDepth,
    });
    const jobs = planned.flatMap((entry) => (entry.kind === "job" ? [entry.job] : []));
    const results = await this.run(jobs, concurrency, signal);

    let next = 0;
    return planned.map((entry): JobResult => {
      if (entry.kind === "job") return results[next++];
      logger.warn({ hashtag: entry.input, error: entry.message }, "Rejected hashtag input");
      return {
        hashtag: entry.input,
        outcome: { status: "failure", reason: "Rejected", message: entry.message },
      };
    });
  }

  private async executeJob(
    useCase: BuildHashtagRecordUseCase,
    job: HashtagJob,
    signal: AbortSignal
  ): Promise<JobOutcome> {
    if (signal.aborted) {
      const error = cancelledError();
      return { status: "failure", reason: error.kind, message: error.message };
    }

    logger.debug({ hashtag: job.name }, "Starting hashtag job");
    try {
      const outcome = await useCase.execute(job, signal);
      logger.info({ hashtag: job.name, status: outcome.status }, "Hashtag job finished");
      return outcome;
    } catch (caught) {
      const error = toScrapeError(caught);
      logger.error(
        { hashtag: job.name, kind: error.kind, error: error.message },
        "Hashtag job crashed"
      );
      return { status: "failure", reason: error.kind, message: error.message };
    }
  }

  /**
   * Fresh limiter and fetcher per run so pacing state never carries over.
   */
  private createUseCase(): BuildHashtagRecordUseCase {
    const rateLimiter = container.createRateLimiter();
    const collectPostsUseCase = new CollectPostsUseCase(
      container.createPageFetcher(rateLimiter),
      container.getPageDecoder(),
      this.config.collector
    );

    return new BuildHashtagRecordUseCase(
      collectPostsUseCase,
      new RelationClassifier(this.config.classifier),
      new HashtagRecordService(this.config.record)
    );
  }

  async cleanup(): Promise<void> {
    await container.cleanup();
  }
}
