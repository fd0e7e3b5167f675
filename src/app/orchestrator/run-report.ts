/**
 * RunReportBuilder accumulates stage entries for one run and seals the report.
 * Purpose: keep the report append-only and finalized exactly once.
 * Usage: builder.append(entry); const report = builder.finalize({ verdict, finishedAt }).
 */

import {
  RUN_REPORT_SCHEMA_VERSION,
  skipped,
  sumUsage,
  type RunReport,
  type RunReportEntry,
  type RunVerdict,
} from "../../core/run-report.js";
import type { SnapshotHandle } from "../../core/snapshots.js";

import type { SafetyLimits } from "./safety-guard.js";
import type { Stage } from "./stage.js";

export class RunReportBuilder {
  private readonly entries: RunReportEntry[] = [];
  private snapshot: RunReport["snapshot"] = null;
  private finalized: RunReport | null = null;

  constructor(
    private readonly input: { runId: string; startedAt: Date; limits: SafetyLimits },
  ) {}

  get entryCount(): number {
    return this.entries.length;
  }

  get isFinalized(): boolean {
    return this.finalized !== null;
  }

  setSnapshot(handle: SnapshotHandle): void {
    this.assertOpen();
    this.snapshot = { id: handle.id, path: handle.dir, file_count: handle.fileCount };
  }

  append(entry: RunReportEntry): void {
    this.assertOpen();
    this.entries.push(entry);
  }

  /** Records every stage that will not run because the run was aborted. */
  skipRemaining(stages: readonly Stage[], reason: string, at: Date): void {
    for (const stage of stages) {
      this.append({
        stage: stage.name,
        position: stage.position,
        outcome: skipped(reason),
        started_at: at.toISOString(),
        duration_ms: 0,
      });
    }
  }

  finalize(input: { verdict: RunVerdict; finishedAt: Date; error?: string }): RunReport {
    this.assertOpen();

    const report: RunReport = {
      schema_version: RUN_REPORT_SCHEMA_VERSION,
      run_id: this.input.runId,
      started_at: this.input.startedAt.toISOString(),
      finished_at: input.finishedAt.toISOString(),
      duration_ms: Math.max(0, input.finishedAt.getTime() - this.input.startedAt.getTime()),
      verdict: input.verdict,
      snapshot: this.snapshot,
      limits: {
        max_consecutive_failures: this.input.limits.maxConsecutiveFailures,
        max_runtime_seconds: this.input.limits.maxRuntimeSeconds,
      },
      entries: [...this.entries],
      usage: sumUsage(this.entries),
    };
    if (input.error !== undefined) {
      report.error = input.error;
    }

    this.finalized = freezeReport(report);
    return this.finalized;
  }

  private assertOpen(): void {
    if (this.finalized) {
      throw new Error(`Run report for ${this.input.runId} is already finalized`);
    }
  }
}

/**
 * Freezes the structures the report owns. Stage metadata stays as the stage
 * returned it: typed arrays and Buffers cannot be frozen.
 */
function freezeReport(report: RunReport): RunReport {
  for (const entry of report.entries) {
    if (entry.usage) Object.freeze(entry.usage);
    Object.freeze(entry.outcome);
    Object.freeze(entry);
  }
  Object.freeze(report.entries);
  Object.freeze(report.limits);
  if (report.snapshot) Object.freeze(report.snapshot);
  if (report.usage) Object.freeze(report.usage);
  return Object.freeze(report);
}
