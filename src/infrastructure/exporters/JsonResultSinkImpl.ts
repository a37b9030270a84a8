import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { format } from "date-fns";
import type { ResultSink } from "../../domain/repositories/ResultSink.js";
import type { HashtagRecord } from "../../domain/entities/HashtagRecord.js";
import type { ScrapeErrorKind } from "../../domain/errors/ScrapeError.js";
import type {
  JobResult,
  JobStatus,
} from "../../domain/value-objects/JobOutcome.js";
import { logger } from "../../shared/utils/logger.js";

export interface ExportedResult {
  hashtag: string;
  status: JobStatus;
  record?: HashtagRecord;
  warnings?: string[];
  reason?: ScrapeErrorKind;
  message?: string;
}

export function toExportedResult({ hashtag, outcome }: JobResult): ExportedResult {
  switch (outcome.status) {
    case "success":
      return { hashtag, status: outcome.status, record: outcome.record };
    case "partial_success":
      return {
        hashtag,
        status: outcome.status,
        record: outcome.record,
        warnings: outcome.warnings,
      };
    case "failure":
      return {
        hashtag,
        status: outcome.status,
        record: outcome.partial,
        reason: outcome.reason,
        message: outcome.message,
      };
  }
}

export class JsonResultSinkImpl implements ResultSink {
  constructor(
    private readonly outputDir: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async write(results: JobResult[]): Promise<string> {
    await mkdir(this.outputDir, { recursive: true });

    const filename = `hashtags-${format(this.now(), "yyyyMMdd-HHmmss")}.json`;
    const outputPath = join(this.outputDir, filename);
    const exported = results.map(toExportedResult);

    await writeFile(outputPath, JSON.stringify(exported, null, 2), "utf-8");
    logger.info({ outputPath, count: exported.length }, "Wrote JSON output");

    return outputPath;
  }
}
