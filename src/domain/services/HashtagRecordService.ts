import type { HashtagJob } from "../entities/HashtagJob.js";
import type { HashtagRecord } from "../entities/HashtagRecord.js";
import type { Post } from "../entities/Post.js";
import type { DecodedTagPage } from "../value-objects/DecodedTagPage.js";
import type { RelationClassification } from "./RelationClassifier.js";
import type { RecordConfig } from "../../shared/config/index.js";
import { toHashtagUrl } from "../value-objects/HashtagName.js";
import { humanizeCount } from "../../shared/utils/magnitude.js";

export class HashtagRecordService {
  constructor(private readonly config: RecordConfig) {}

  estimatePostsPerDay(postsCount: number): number {
    if (postsCount <= 0) return 0;
    return Math.round((postsCount / this.config.activityWindowDays) * 100) / 100;
  }

  createRecord(
    job: HashtagJob,
    landing: DecodedTagPage,
    posts: Post[],
    relations: RelationClassification
  ): HashtagRecord {
    const postsCount = landing.postsCount ?? null;

    return Object.freeze({
      name: landing.displayName ?? job.name,
      postsCount,
      posts: postsCount === null ? null : humanizeCount(postsCount),
      url: toHashtagUrl(this.config.baseUrl, job.name),
      postsPerDay:
        postsCount === null ? null : this.estimatePostsPerDay(postsCount),
      related: relations.related,
      ...relations.literal,
      ...relations.semantic,
      topPosts: posts,
    });
  }
}
