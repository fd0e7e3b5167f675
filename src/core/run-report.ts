import { z } from "zod";

// =============================================================================
// STAGE OUTCOMES
// =============================================================================

export const StageSuccessSchema = z
  .object({
    status: z.literal("success"),
    metadata: z.record(z.unknown()).optional(),
  })
  .strict();

export const StageFailureSchema = z
  .object({
    status: z.literal("failure"),
    classification: z.string().min(1),
    message: z.string(),
  })
  .strict();

export const StageSkippedSchema = z
  .object({
    status: z.literal("skipped"),
    reason: z.string(),
  })
  .strict();

export const StageOutcomeSchema = z.discriminatedUnion("status", [
  StageSuccessSchema,
  StageFailureSchema,
  StageSkippedSchema,
]);

export type StageSuccess = z.infer<typeof StageSuccessSchema>;
export type StageFailure = z.infer<typeof StageFailureSchema>;
export type StageSkipped = z.infer<typeof StageSkippedSchema>;
export type StageOutcome = z.infer<typeof StageOutcomeSchema>;
export type StageOutcomeStatus = StageOutcome["status"];

export function success(metadata?: Record<string, unknown>): StageSuccess {
  return metadata ? { status: "success", metadata } : { status: "success" };
}

export function failure(message: string, classification = "error"): StageFailure {
  return { status: "failure", classification, message };
}

export function skipped(reason: string): StageSkipped {
  return { status: "skipped", reason };
}

// =============================================================================
// USAGE
// =============================================================================

/** External calls a stage made, keyed by service ("gemini", "twitter_write", ...). */
export const UsageCountsSchema = z.record(z.number().int().nonnegative());

export type UsageCounts = z.infer<typeof UsageCountsSchema>;

/** Sums per-stage counters; keys come back sorted. */
export function sumUsage(entries: ReadonlyArray<{ usage?: UsageCounts }>): UsageCounts {
  const totals = new Map<string, number>();
  for (const entry of entries) {
    for (const [service, count] of Object.entries(entry.usage ?? {})) {
      totals.set(service, (totals.get(service) ?? 0) + count);
    }
  }
  return Object.fromEntries([...totals.entries()].sort(([a], [b]) => a.localeCompare(b)));
}

export function totalUsage(usage: UsageCounts): number {
  return Object.values(usage).reduce((sum, count) => sum + count, 0);
}

// =============================================================================
// RUN REPORT
// =============================================================================

export const RunVerdictSchema = z.enum([
  "completed",
  "aborted_safety",
  "aborted_timeout",
  "aborted_snapshot",
]);

export type RunVerdict = z.infer<typeof RunVerdictSchema>;

export const RunReportEntrySchema = z
  .object({
    stage: z.string(),
    position: z.number().int().nonnegative(),
    outcome: StageOutcomeSchema,
    started_at: z.string(),
    duration_ms: z.number().nonnegative(),
    usage: UsageCountsSchema.optional(),
  })
  .strict();

export type RunReportEntry = z.infer<typeof RunReportEntrySchema>;

export const RUN_REPORT_SCHEMA_VERSION = 1;

export const RunReportSchema = z
  .object({
    schema_version: z.literal(RUN_REPORT_SCHEMA_VERSION),
    run_id: z.string(),
    started_at: z.string(),
    finished_at: z.string(),
    duration_ms: z.number().nonnegative(),
    verdict: RunVerdictSchema,
    snapshot: z
      .object({
        id: z.string(),
        path: z.string(),
        file_count: z.number().int().nonnegative(),
      })
      .strict()
      .nullable(),
    limits: z
      .object({
        max_consecutive_failures: z.number().int().positive(),
        max_runtime_seconds: z.number().positive(),
      })
      .strict(),
    entries: z.array(RunReportEntrySchema),
    usage: UsageCountsSchema.optional(),
    error: z.string().optional(),
  })
  .strict();

export type RunReport = z.infer<typeof RunReportSchema>;

export type StageStatusCounts = Record<StageOutcomeStatus, number>;

export function countOutcomes(report: Pick<RunReport, "entries">): StageStatusCounts {
  const counts: StageStatusCounts = { success: 0, failure: 0, skipped: 0 };
  for (const entry of report.entries) {
    counts[entry.outcome.status] += 1;
  }
  return counts;
}

export function describeOutcome(outcome: StageOutcome): string {
  switch (outcome.status) {
    case "success":
      return "success";
    case "failure":
      return `failure [${outcome.classification}] ${outcome.message}`;
    case "skipped":
      return `skipped (${outcome.reason})`;
  }
}
