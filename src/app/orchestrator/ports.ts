/**
 * Orchestrator ports define the boundary between the run state machine and adapters.
 * Purpose: make dependencies explicit and replaceable for testing.
 * Assumptions: ports stay small and map to stable runtime capabilities.
 * Usage: pass implementations to `new Orchestrator({ ... })`; defaults live in build-orchestrator.ts.
 */

import type { RunEventLogger } from "../../core/logger.js";
import type { RunReport } from "../../core/run-report.js";
import type { RunLockHandle } from "../../core/run-lock.js";
import type { SnapshotHandle } from "../../core/snapshots.js";

// =============================================================================
// PORTS
// =============================================================================

export interface Clock {
  now(): Date;
  isoNow(): string;
}

export interface SnapshotPort {
  createSnapshot(sourceTree: string): Promise<SnapshotHandle>;
}

export interface RunLockPort {
  acquire(runId: string): Promise<Pick<RunLockHandle, "reclaimed" | "release">>;
}

/** Answers whether an earlier run already used this id. */
export interface RunHistoryPort {
  hasRun(runId: string): Promise<boolean>;
}

/** Receives the finalized report after every run, success or abort. */
export interface ReportSink {
  readonly name: string;
  deliver(report: RunReport): Promise<void>;
}

export type RunLoggerFactory = (runId: string) => RunEventLogger;

// =============================================================================
// DEFAULTS
// =============================================================================

export const systemClock: Clock = {
  now: () => new Date(),
  isoNow: () => new Date().toISOString(),
};
