#!/usr/bin/env tsx
import "dotenv/config";

import { loadConfig } from "./config";
import { CliUsageError, HELP_TEXT, parseCliArgs, selectConditions } from "./cli";
import { loadCatalog } from "./services/catalog";
import {
  createPipeline,
  failedConditionIds,
  formatReportSummary,
  loadReport,
} from "./services/pipeline";
import { closeConnections } from "./services/queue/connection";
import { closeQueues, enqueueConditions, getArticleQueue } from "./services/queue/queues";
import logger from "./utils/logger";
import { errorMessage } from "./utils/errors";

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(HELP_TEXT);
    return 0;
  }

  const config = loadConfig(process.env, {
    catalog: args.catalog,
    relevance: args.relevance,
    output: args.output,
  });

  const catalog = await loadCatalog(config.paths.catalog);

  let ids = args.conditions;
  if (args.retryFailed) {
    const previous = failedConditionIds(await loadReport(args.retryFailed));
    ids = ids ? ids.filter((id) => previous.includes(id)) : previous;
    if (ids.length === 0) {
      console.log(`No failed conditions in ${args.retryFailed}`);
      return 0;
    }
  }

  const conditions = selectConditions(catalog, { ids, limit: args.limit });

  if (config.queue.enabled) {
    const queue = getArticleQueue(config.queue.redisUrl);
    const { enqueued, alreadyQueued } = await enqueueConditions(queue, conditions, args.force);
    console.log(`Enqueued ${enqueued} conditions on the article-generation queue`);
    if (alreadyQueued.length > 0) {
      console.log(`Already waiting or running: ${alreadyQueued.join(", ")}`);
    }
    await closeQueues();
    await closeConnections();
    return 0;
  }

  const { controller } = await createPipeline(config);

  let signals = 0;
  const onSignal = (signal: NodeJS.Signals) => {
    signals++;
    if (signals > 1) {
      logger.warn({ signal }, "forced_exit");
      process.exit(130);
    }
    logger.warn({ signal }, "shutdown_signal_received");
    controller.requestStop();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  const report = await controller.run(conditions, { force: args.force });
  console.log(formatReportSummary(report));

  return report.counts.failed > 0 ? 1 : 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof CliUsageError) {
      console.error(`${error.message}\n${HELP_TEXT}`);
    } else {
      logger.error({ error: errorMessage(error) }, "run_failed");
    }
    process.exitCode = 1;
  });
