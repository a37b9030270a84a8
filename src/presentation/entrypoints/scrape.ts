import { HashtagScrapeWorkflow } from "../workflows/HashtagScrapeWorkflow.js";
import { container } from "../../infrastructure/di/container.js";
import { env, SCRAPER_CONFIG, splitList } from "../../shared/config/index.js";
import { loadHashtagList } from "../../shared/utils/hashtagList.js";
import { logger } from "../../shared/utils/logger.js";

async function readHashtags(): Promise<string[]> {
  const names = splitList(env.HASHTAGS);
  if (env.HASHTAGS_FILE) {
    names.push(...(await loadHashtagList(env.HASHTAGS_FILE)));
  }
  return names;
}

async function main() {
  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    logger.warn({ signal }, "Cancellation requested, finishing in-flight work");
    controller.abort();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  const workflow = new HashtagScrapeWorkflow();

  try {
    const hashtags = await readHashtags();
    if (hashtags.length === 0) {
      logger.error("No hashtags given: set HASHTAGS or HASHTAGS_FILE");
      process.exit(1);
    }

    logger.info({ hashtags }, "Running hashtag scrape");
    const results = await workflow.runInputs(
      hashtags,
      SCRAPER_CONFIG.concurrency,
      controller.signal
    );
    const outputPath = await container.getResultSink().write(results);
    logger.info({ outputPath }, "Results saved");
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    const errorStack = error instanceof Error ? error.stack : undefined;
    logger.error({ error: errorMessage, stack: errorStack }, "Hashtag scrape failed");
    process.exit(1);
  } finally {
    await workflow.cleanup();
  }

  process.exit(0);
}

void main();
