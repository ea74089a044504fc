import { readFile } from "fs/promises";
import { z } from "zod";
import { CallStatsSchema, StageSchema } from "../../types/article";

const StageOrStartSchema = z.union([StageSchema, z.literal("START")]);

export const ConditionOutcomeSchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("succeeded"),
    conditionId: z.string(),
    path: z.string(),
    references: z.number().int().nonnegative(),
    stats: CallStatsSchema,
    warnings: z.array(z.string()),
  }),
  z.object({
    status: z.literal("failed"),
    conditionId: z.string(),
    stage: StageOrStartSchema,
    kind: z.string(),
    cause: z.string(),
    stats: CallStatsSchema,
  }),
  z.object({
    status: z.literal("skipped"),
    conditionId: z.string(),
    reason: z.string(),
  }),
  z.object({
    status: z.literal("stopped"),
    conditionId: z.string(),
    stage: StageOrStartSchema,
  }),
]);

export type ConditionOutcome = z.infer<typeof ConditionOutcomeSchema>;

export const FailureSchema = z.object({
  conditionId: z.string(),
  stage: StageOrStartSchema,
  kind: z.string(),
  cause: z.string(),
});

export type Failure = z.infer<typeof FailureSchema>;

export const RunReportSchema = z.object({
  startedAt: z.string(),
  finishedAt: z.string(),
  durationMs: z.number().nonnegative(),
  counts: z.object({
    succeeded: z.number().int().nonnegative(),
    failed: z.number().int().nonnegative(),
    skipped: z.number().int().nonnegative(),
    stopped: z.number().int().nonnegative(),
  }),
  outcomes: z.array(ConditionOutcomeSchema),
  failures: z.array(FailureSchema),
});

export type RunReport = z.infer<typeof RunReportSchema>;

export function buildReport(
  outcomes: ConditionOutcome[],
  startedAt: Date,
  finishedAt: Date,
): RunReport {
  const counts = { succeeded: 0, failed: 0, skipped: 0, stopped: 0 };
  const failures: Failure[] = [];

  for (const outcome of outcomes) {
    counts[outcome.status]++;
    if (outcome.status === "failed") {
      failures.push({
        conditionId: outcome.conditionId,
        stage: outcome.stage,
        kind: outcome.kind,
        cause: outcome.cause,
      });
    }
  }

  return {
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs: finishedAt.getTime() - startedAt.getTime(),
    counts,
    outcomes,
    failures,
  };
}

/** Conditions worth another run: failed ones, plus those a stop request cut short. */
export function failedConditionIds(report: RunReport): string[] {
  return report.outcomes
    .filter((outcome) => outcome.status === "failed" || outcome.status === "stopped")
    .map((outcome) => outcome.conditionId);
}

export async function loadReport(path: string): Promise<RunReport> {
  return RunReportSchema.parse(JSON.parse(await readFile(path, "utf-8")));
}

export function formatReportSummary(report: RunReport): string {
  const { counts } = report;
  const lines = [
    `succeeded: ${counts.succeeded}  failed: ${counts.failed}  skipped: ${counts.skipped}  stopped: ${counts.stopped}`,
  ];
  for (const failure of report.failures) {
    lines.push(`  ${failure.conditionId} [${failure.stage}] ${failure.kind}: ${failure.cause}`);
  }
  return lines.join("\n");
}
