import type { JobResult } from "../value-objects/JobOutcome.js";

export interface ResultSink {
  /** Persist one run's results and return where they went. */
  write(results: JobResult[]): Promise<string>;
}
