/**
 * Stage contract: a named unit of pipeline work.
 * Purpose: give the orchestrator one uniform shape for in-process and command stages.
 * Assumptions: a stage reports its own failures as an outcome; a thrown error is
 * recorded by the orchestrator as a failure classified "exception".
 * Usage: registry.register(defineStage({ name: "keyword_scout", produces: [...], execute }))
 */

import type { JsonObject } from "../../core/logger.js";
import type { StageOutcome } from "../../core/run-report.js";

import type { StageContext } from "./run-context.js";

// =============================================================================
// TYPES
// =============================================================================

export type StageRunInfo = {
  runId: string;
  stage: string;
  position: number;
  /** Fires when the run budget is exhausted; stages should stop promptly. */
  signal: AbortSignal;
  deadline: Date;
  /** Appends an event for this stage to the run log. */
  log(type: string, payload?: JsonObject): void;
  /** Counts external calls (API requests, posts) toward the run's usage report. */
  recordUsage(service: string, count?: number): void;
};

export interface Stage {
  readonly name: string;
  readonly position: number;
  readonly description?: string;
  /** Context keys that must exist before the stage is invoked. */
  readonly requires: readonly string[];
  /** Context keys the stage must have written when it reports success. */
  readonly produces: readonly string[];
  execute(context: StageContext, info: StageRunInfo): Promise<StageOutcome>;
}

export type StageDefinition = {
  name: string;
  position?: number;
  description?: string;
  requires?: readonly string[];
  produces?: readonly string[];
  execute(context: StageContext, info: StageRunInfo): Promise<StageOutcome>;
};

export function defineStage(definition: StageDefinition): StageDefinition {
  return definition;
}
