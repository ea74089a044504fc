import pLimit from "p-limit";
import logger from "../../utils/logger";
import type { Catalog } from "../catalog";
import { buildReport, type ConditionOutcome, type RunReport } from "./report";
import { runCondition, type ConditionDeps } from "./runCondition";

export interface ControllerOptions extends Omit<ConditionDeps, "shouldStop"> {
  /** Conditions in flight at once. */
  conditionConcurrency: number;
}

export interface RunOptions {
  force?: boolean;
}

/**
 * Runs a batch of conditions through the stage sequence under a condition
 * pool. Model and search calls are bounded separately by the service pools
 * inside the resilient client.
 */
export class PipelineController {
  private stopRequested = false;

  constructor(private readonly options: ControllerOptions) {}

  get stopping(): boolean {
    return this.stopRequested;
  }

  /**
   * Stop taking new work. Conditions in flight finish the stage they are in,
   * checkpoint it and report as stopped.
   */
  requestStop(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    logger.warn({}, "stop_requested");
  }

  async run(conditions: Catalog, { force = false }: RunOptions = {}): Promise<RunReport> {
    const now = this.options.now ?? (() => new Date());
    const startedAt = now();
    const limit = pLimit(this.options.conditionConcurrency);
    const deps: ConditionDeps = { ...this.options, shouldStop: () => this.stopRequested };

    logger.info(
      { conditions: conditions.length, force, concurrency: this.options.conditionConcurrency },
      "run_started",
    );

    const outcomes = await Promise.all(
      conditions.map((condition) =>
        limit(async (): Promise<ConditionOutcome> => {
          if (this.stopRequested) {
            return { status: "stopped", conditionId: condition.id, stage: "START" };
          }
          return runCondition(condition, deps, { force });
        }),
      ),
    );

    const report = buildReport(outcomes, startedAt, now());
    const path = await this.options.store.writeReport(report);

    logger.info({ ...report.counts, durationMs: report.durationMs, path }, "run_completed");
    return report;
  }
}
