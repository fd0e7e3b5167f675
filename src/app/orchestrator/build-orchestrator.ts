/**
 * Default wiring for the Orchestrator: JSONL run logs, the home run lock,
 * snapshots of output_dir, the report store sink, and run-id reuse checks
 * against stored reports and log directories.
 * Usage: const orchestrator = buildOrchestrator(appContext, { sinks: [extraSink] }).
 */

import fse from "fs-extra";

import { JsonlLogger } from "../../core/logger.js";
import { orchestratorLogPath, runLogsDir } from "../../core/paths.js";
import type { AppContext } from "../context.js";

import { Orchestrator } from "./orchestrator.js";
import type { Clock, ReportSink } from "./ports.js";
import { createReportStoreSink } from "./report-sinks.js";

export type BuildOrchestratorOptions = {
  clock?: Clock;
  sinks?: ReportSink[];
};

export function buildOrchestrator(
  app: AppContext,
  options: BuildOrchestratorOptions = {},
): Orchestrator {
  return new Orchestrator({
    registry: app.registry,
    snapshots: app.snapshots,
    outputDir: app.config.output_dir,
    limits: {
      maxConsecutiveFailures: app.config.safety.max_consecutive_failures,
      maxRuntimeSeconds: app.config.safety.max_runtime_seconds,
    },
    lock: app.lock,
    history: {
      hasRun: async (runId) =>
        (await app.reports.has(runId)) || (await fse.pathExists(runLogsDir(app.paths, runId))),
    },
    sinks: [createReportStoreSink(app.reports), ...(options.sinks ?? [])],
    clock: options.clock,
    createLogger: (runId) => new JsonlLogger(orchestratorLogPath(app.paths, runId), runId),
    initialContext: app.config.initial_context,
  });
}
