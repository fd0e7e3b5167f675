import { InvalidArgumentError } from "commander";

import type { AppContext } from "../app/context.js";
import { formatDuration } from "../app/orchestrator/helpers/time.js";
import { summarizeReport, type ReportSummaryRow } from "../core/report-store.js";

import { normalizeCommandError } from "./command-errors.js";
import { formatTimestamp, renderTable } from "./table.js";

export async function runsListCommand(
  appContext: AppContext,
  opts: { limit?: number; json?: boolean } = {},
): Promise<void> {
  try {
    const reports = await appContext.reports.list({ limit: opts.limit });
    const rows = reports.map(summarizeReport);

    if (opts.json) {
      console.log(JSON.stringify(rows, null, 2));
      return;
    }

    if (rows.length === 0) {
      console.log("No runs recorded yet.");
      return;
    }

    for (const line of formatRunList(rows)) {
      console.log(line);
    }
  } catch (error) {
    throw normalizeCommandError(error, { title: RUNS_COMMAND_FAILURE_TITLE });
  }
}

export function formatRunList(rows: ReportSummaryRow[]): string[] {
  return renderTable(rows, [
    { header: "Run", value: (row) => row.runId },
    { header: "Verdict", value: (row) => row.verdict },
    { header: "Started", value: (row) => formatTimestamp(row.startedAt) },
    { header: "Duration", value: (row) => formatDuration(row.durationMs) },
    { header: "Stages", value: (row) => String(row.stageCount) },
  ]);
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

const RUNS_COMMAND_FAILURE_TITLE = "Runs command failed.";
