/**
 * BullMQ worker entry point for queue mode.
 * Start with: npm run worker
 *
 * Multiple worker processes can share the article-generation queue.
 */

import "dotenv/config";

import { loadConfig } from "./config";
import { createPipeline } from "./services/pipeline";
import type { ConditionDeps } from "./services/pipeline/runCondition";
import { closeConnections } from "./services/queue/connection";
import { startArticleWorker } from "./services/queue/workers/article.worker";
import logger from "./utils/logger";

async function main() {
  const config = loadConfig();
  const { options } = await createPipeline(config);

  let stopping = false;
  const deps: ConditionDeps = { ...options, shouldStop: () => stopping };
  const worker = startArticleWorker(deps, config.queue.redisUrl, config.concurrency.conditions);

  logger.info(
    {
      concurrency: config.concurrency.conditions,
      output: config.paths.output,
    },
    "workers_started",
  );

  // Graceful shutdown: active jobs stop after their current stage
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, "shutdown_signal_received");

    await worker.close();
    await closeConnections();

    logger.info("workers_shut_down");
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ error }, "worker_shutdown_failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  process.on("unhandledRejection", (reason) => {
    logger.error({ reason }, "unhandled_rejection_in_worker");
  });
}

main().catch((error: unknown) => {
  logger.error({ error }, "worker_startup_failed");
  process.exit(1);
});
