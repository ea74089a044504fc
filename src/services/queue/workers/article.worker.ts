/**
 * Article generation worker for BullMQ.
 *
 * Runs each queued condition through the same per-condition runner the CLI
 * uses, so checkpoints, skip-if-valid and atomic writes behave identically.
 */

import { Worker, type Job } from "bullmq";
import { getBullMQConnection } from "../connection";
import { ARTICLE_QUEUE_NAME, type ArticleJobData, type ArticleJobResult } from "../types";
import {
  runCondition,
  type ConditionDeps,
  type RunConditionOptions,
} from "../../pipeline/runCondition";
import type { Condition } from "../../../types/article";
import logger from "../../../utils/logger";

export type ArticleJob = Pick<Job<ArticleJobData, ArticleJobResult>, "id" | "data">;

export type ConditionRunner = (
  condition: Condition,
  options: RunConditionOptions,
) => Promise<ArticleJobResult>;

/**
 * Process one article job. A failed condition fails the job so it shows up
 * in BullMQ's failed set; skipped and stopped outcomes complete normally.
 */
export async function processArticleJob(
  job: ArticleJob,
  run: ConditionRunner,
): Promise<ArticleJobResult> {
  const { condition, force } = job.data;
  logger.info({ jobId: job.id, conditionId: condition.id, force }, "article_job_started");

  const outcome = await run(condition, { force });

  if (outcome.status === "failed") {
    throw new Error(
      `${outcome.conditionId} failed at ${outcome.stage} (${outcome.kind}): ${outcome.cause}`,
    );
  }

  logger.info(
    { jobId: job.id, conditionId: condition.id, status: outcome.status },
    "article_job_completed",
  );
  return outcome;
}

export function startArticleWorker(
  deps: ConditionDeps,
  redisUrl: string,
  concurrency: number,
): Worker<ArticleJobData, ArticleJobResult> {
  const worker = new Worker<ArticleJobData, ArticleJobResult>(
    ARTICLE_QUEUE_NAME,
    (job) => processArticleJob(job, (condition, options) => runCondition(condition, deps, options)),
    {
      connection: getBullMQConnection(redisUrl),
      concurrency,
      // A single condition can take tens of minutes of model time
      lockDuration: 1800000,
      lockRenewTime: 300000,
    },
  );

  worker.on("failed", (job, error) => {
    logger.error({ jobId: job?.id, error: error.message }, "article_worker_job_failed");
  });

  worker.on("stalled", (jobId) => {
    logger.warn({ jobId }, "article_worker_job_stalled");
  });

  logger.info({ concurrency }, "article_worker_started");

  return worker;
}
