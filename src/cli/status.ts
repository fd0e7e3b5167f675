import type { AppContext } from "../app/context.js";

import { normalizeCommandError } from "./command-errors.js";
import { formatRunSummary } from "./run.js";

export async function statusCommand(
  appContext: AppContext,
  opts: { runId?: string; json?: boolean } = {},
): Promise<void> {
  try {
    const report = opts.runId
      ? await appContext.reports.load(opts.runId)
      : await appContext.reports.latest();

    if (!report) {
      printRunNotFound(opts.runId);
      return;
    }

    if (opts.json) {
      console.log(JSON.stringify(report, null, 2));
      return;
    }

    console.log(`Started: ${report.started_at}`);
    console.log(`Finished: ${report.finished_at}`);
    for (const line of formatRunSummary(report, appContext.reports.pathFor(report.run_id))) {
      console.log(line);
    }
  } catch (error) {
    throw normalizeCommandError(error, { title: STATUS_COMMAND_FAILURE_TITLE });
  }
}

function printRunNotFound(requestedRunId?: string): void {
  console.log(requestedRunId ? `Run ${requestedRunId} not found.` : "No runs recorded yet.");
  console.log("Start a run with: trendloop run");
  process.exitCode = 1;
}

const STATUS_COMMAND_FAILURE_TITLE = "Status command failed.";
