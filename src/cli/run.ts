import type { AppContext } from "../app/context.js";
import { buildOrchestrator } from "../app/orchestrator/build-orchestrator.js";
import { formatDuration } from "../app/orchestrator/helpers/time.js";
import type { Clock, ReportSink } from "../app/orchestrator/ports.js";
import {
  countOutcomes,
  describeOutcome,
  totalUsage,
  type RunReport,
  type RunVerdict,
} from "../core/run-report.js";

import { EXIT_CODES, normalizeCommandError } from "./command-errors.js";

export type RunCommandOptions = {
  runId?: string;
  maxRuntimeSeconds?: number;
  maxFailures?: number;
  clock?: Clock;
  sinks?: ReportSink[];
};

export type RunCommandResult = {
  report: RunReport;
  exitCode: number;
};

export async function runCommand(
  appContext: AppContext,
  opts: RunCommandOptions = {},
): Promise<RunCommandResult> {
  try {
    const orchestrator = buildOrchestrator(appContext, { clock: opts.clock, sinks: opts.sinks });
    const { report } = await orchestrator.run({
      runId: opts.runId,
      limits: {
        maxRuntimeSeconds: opts.maxRuntimeSeconds,
        maxConsecutiveFailures: opts.maxFailures,
      },
    });

    printRunSummary(report, appContext.reports.pathFor(report.run_id));
    return { report, exitCode: exitCodeForVerdict(report.verdict) };
  } catch (error) {
    throw normalizeCommandError(error, { title: RUN_COMMAND_FAILURE_TITLE });
  }
}

export function exitCodeForVerdict(verdict: RunVerdict): number {
  switch (verdict) {
    case "completed":
      return EXIT_CODES.completed;
    case "aborted_safety":
      return EXIT_CODES.abortedSafety;
    case "aborted_timeout":
      return EXIT_CODES.abortedTimeout;
    case "aborted_snapshot":
      return EXIT_CODES.abortedSnapshot;
  }
}

// =============================================================================
// OUTPUT
// =============================================================================

export function formatRunSummary(report: RunReport, reportFile: string): string[] {
  const lines: string[] = [];
  lines.push(
    `Run ${report.run_id} finished: ${report.verdict} in ${formatDuration(report.duration_ms)}`,
  );

  lines.push(
    report.snapshot
      ? `Snapshot: ${report.snapshot.id} (${report.snapshot.file_count} files)`
      : "Snapshot: none",
  );
  if (report.error) {
    lines.push(`Error: ${report.error}`);
  }

  for (const entry of report.entries) {
    lines.push(
      `- [${entry.position}] ${entry.stage}: ${describeOutcome(entry.outcome)} (${formatDuration(entry.duration_ms)})`,
    );
  }

  const counts = countOutcomes(report);
  lines.push(
    `Stages: ${counts.success} success, ${counts.failure} failure, ${counts.skipped} skipped`,
  );
  const usage = Object.entries(report.usage ?? {});
  if (usage.length > 0) {
    const calls = usage.map(([service, count]) => `${service} ${count}`).join(", ");
    lines.push(`Usage: ${calls} (${totalUsage(report.usage ?? {})} calls)`);
  }
  lines.push(`Report: ${reportFile}`);

  if (report.verdict !== "completed") {
    lines.push("Run `trendloop recover` for restore commands.");
  }

  return lines;
}

function printRunSummary(report: RunReport, reportFile: string): void {
  for (const line of formatRunSummary(report, reportFile)) {
    console.log(line);
  }
}

const RUN_COMMAND_FAILURE_TITLE = "Run command failed.";
