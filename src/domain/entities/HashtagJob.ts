import { z, ZodError } from "zod";
import { hashtagNameSchema } from "../value-objects/HashtagName.js";

export interface HashtagJob {
  readonly name: string;
  readonly postSampleSize: number;
  readonly relatedDepth: number;
}

export interface HashtagJobOptions {
  postSampleSize: number;
  relatedDepth: number;
}

const hashtagJobSchema = z.object({
  name: hashtagNameSchema,
  postSampleSize: z.number().int().positive(),
  relatedDepth: z.number().int().positive(),
});

/**
 * Validate and freeze one unit of work. Throws a ZodError for names that
 * normalize to nothing and for non-positive sizes.
 */
export function createHashtagJob(
  rawName: string,
  options: HashtagJobOptions
): HashtagJob {
  return Object.freeze(hashtagJobSchema.parse({ name: rawName, ...options }));
}

export type PlannedJob =
  | { kind: "job"; input: string; job: HashtagJob }
  | { kind: "rejected"; input: string; message: string };

/**
 * Turn raw input names into jobs, keeping an entry for every name that
 * fails validation. Input order is kept; later duplicates are dropped.
 */
export function planHashtagJobs(
  rawNames: string[],
  options: HashtagJobOptions
): PlannedJob[] {
  const planned: PlannedJob[] = [];
  const seenJobs = new Set<string>();
  const seenRejected = new Set<string>();

  for (const input of rawNames) {
    try {
      const job = createHashtagJob(input, options);
      if (seenJobs.has(job.name)) continue;
      seenJobs.add(job.name);
      planned.push({ kind: "job", input, job });
    } catch (error) {
      if (!(error instanceof ZodError)) throw error;
      if (seenRejected.has(input)) continue;
      seenRejected.add(input);
      planned.push({
        kind: "rejected",
        input,
        message: `Invalid hashtag "${input}": ${error.issues[0]?.message ?? "invalid"}`,
      });
    }
  }

  return planned;
}
