/**
 * BullMQ queue for article generation, used when USE_JOB_QUEUE=true.
 */

import { Queue } from "bullmq";
import logger from "../../utils/logger";
import type { Catalog } from "../catalog";
import { getBullMQConnection } from "./connection";
import { ARTICLE_QUEUE_NAME, type ArticleJobData, type ArticleJobResult } from "./types";

let articleQueueInstance: Queue<ArticleJobData, ArticleJobResult> | null = null;

/**
 * Get or create the article queue.
 *
 * Jobs run once: model and search calls already retry inside the resilient
 * client, and a failed condition resumes from its checkpoint when enqueued
 * again.
 */
export function getArticleQueue(redisUrl: string): Queue<ArticleJobData, ArticleJobResult> {
  if (!articleQueueInstance) {
    articleQueueInstance = new Queue<ArticleJobData, ArticleJobResult>(ARTICLE_QUEUE_NAME, {
      connection: getBullMQConnection(redisUrl),
      defaultJobOptions: {
        attempts: 1,
        removeOnComplete: {
          age: 86400, // Keep for 24 hours
          count: 1000,
        },
        removeOnFail: {
          age: 604800, // Keep failed jobs for 7 days
        },
      },
    });

    logger.info({ queue: ARTICLE_QUEUE_NAME }, "article_queue_initialized");
  }

  return articleQueueInstance;
}

export interface ArticleJobSink {
  getJobState(jobId: string): Promise<string>;
  remove(jobId: string): Promise<number>;
  addBulk(
    jobs: Array<{ name: string; data: ArticleJobData; opts: { jobId: string } }>,
  ): Promise<unknown[]>;
}

export interface EnqueueResult {
  enqueued: number;
  /** Conditions whose job is still waiting or running, left as they are. */
  alreadyQueued: string[];
}

// Kept jobs in these states would block a new job with the same id
const FINISHED_STATES = new Set(["completed", "failed"]);

export function articleJobId(conditionId: string): string {
  return `article-${conditionId}`;
}

/**
 * One job per condition, keyed by condition id. Finished jobs kept for
 * inspection are removed first so a condition can be enqueued again.
 */
export async function enqueueConditions(
  queue: ArticleJobSink,
  conditions: Catalog,
  force: boolean,
): Promise<EnqueueResult> {
  const alreadyQueued: string[] = [];
  const jobs: Array<{ name: string; data: ArticleJobData; opts: { jobId: string } }> = [];

  for (const condition of conditions) {
    const jobId = articleJobId(condition.id);
    const state = await queue.getJobState(jobId);
    if (FINISHED_STATES.has(state)) {
      await queue.remove(jobId);
      logger.info({ jobId, state }, "finished_job_replaced");
    } else if (state !== "unknown") {
      alreadyQueued.push(condition.id);
      continue;
    }
    jobs.push({
      name: "generate-article",
      data: { condition: { ...condition, tags: [...condition.tags] }, force },
      opts: { jobId },
    });
  }

  const added = jobs.length > 0 ? await queue.addBulk(jobs) : [];
  if (alreadyQueued.length > 0) {
    logger.warn({ queue: ARTICLE_QUEUE_NAME, conditions: alreadyQueued }, "conditions_already_queued");
  }
  logger.info({ queue: ARTICLE_QUEUE_NAME, jobs: added.length, force }, "conditions_enqueued");
  return { enqueued: added.length, alreadyQueued };
}

export async function closeQueues(): Promise<void> {
  if (articleQueueInstance) {
    await articleQueueInstance.close();
    articleQueueInstance = null;
  }
  logger.info("queues_closed");
}
