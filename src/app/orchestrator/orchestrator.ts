/**
 * Orchestrator drives one pipeline run through an explicit state machine:
 * Idle -> SnapshotTaken -> Running(i) -> Completed | AbortedSafety | AbortedTimeout,
 * or Idle -> AbortedSnapshot when the pre-run snapshot fails.
 * Purpose: invoke stages in order, apply the safety limits, always emit a report.
 * Assumptions: one run at a time per instance (and per home, through the run lock).
 * Usage: const { report } = await new Orchestrator(options).run({ runId }).
 */

import { ConcurrentRunError, RunIdError, SnapshotError, StageContractError } from "../../core/errors.js";
import { formatErrorMessage } from "../../core/error-format.js";
import { logRunEvent, MemoryLogger, type JsonObject, type RunEventLogger } from "../../core/logger.js";
import {
  failure,
  skipped,
  StageOutcomeSchema,
  type RunReport,
  type RunReportEntry,
  type RunVerdict,
  type StageOutcome,
  type UsageCounts,
} from "../../core/run-report.js";
import { assertValidRunId } from "../../core/paths.js";
import type { SnapshotHandle } from "../../core/snapshots.js";
import { compactTimestamp, NAME_PATTERN } from "../../core/utils.js";

import { abortWhenExhausted } from "./helpers/abort-timer.js";
import type {
  Clock,
  ReportSink,
  RunHistoryPort,
  RunLockPort,
  RunLoggerFactory,
  SnapshotPort,
} from "./ports.js";
import { systemClock } from "./ports.js";
import { RunContext } from "./run-context.js";
import { RunReportBuilder } from "./run-report.js";
import { SafetyGuard, validateLimits, type SafetyLimits } from "./safety-guard.js";
import type { Stage } from "./stage.js";
import type { StageRegistry } from "./stage-registry.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunPhase =
  | { kind: "idle" }
  | { kind: "snapshot_taken"; snapshotId: string }
  | { kind: "running"; stageIndex: number }
  | { kind: "completed" }
  | { kind: "aborted_safety" }
  | { kind: "aborted_timeout" }
  | { kind: "aborted_snapshot" };

export type RunPhaseKind = RunPhase["kind"];

export const SKIP_REASON_SAFETY_ABORT = "safety_abort";
export const SKIP_REASON_TIMEOUT = "timeout";
export const SKIP_REASON_INTERNAL_ERROR = "internal_error";

export type OrchestratorOptions = {
  registry: StageRegistry;
  snapshots: SnapshotPort;
  /** Published content tree that the snapshot protects. */
  outputDir: string;
  limits: SafetyLimits;
  lock?: RunLockPort;
  /** Rejects run ids that already have a report or a log. */
  history?: RunHistoryPort;
  sinks?: ReportSink[];
  clock?: Clock;
  createLogger?: RunLoggerFactory;
  initialContext?: Record<string, unknown>;
};

export type RunRequest = {
  runId?: string;
  limits?: Partial<SafetyLimits>;
};

export type RunResult = {
  report: RunReport;
  /** Final context values; the context itself is discarded with the run. */
  context: Record<string, unknown>;
  phases: RunPhaseKind[];
};

type StageLoopState = {
  runId: string;
  limits: SafetyLimits;
  guard: SafetyGuard;
  builder: RunReportBuilder;
  context: RunContext;
  logger: RunEventLogger;
  enter: (next: RunPhase) => void;
};

const ALLOWED_TRANSITIONS: Record<RunPhaseKind, readonly RunPhaseKind[]> = {
  idle: ["snapshot_taken", "aborted_snapshot"],
  snapshot_taken: ["running", "completed", "aborted_safety"],
  running: ["running", "completed", "aborted_safety", "aborted_timeout"],
  completed: ["idle"],
  aborted_safety: ["idle"],
  aborted_timeout: ["idle"],
  aborted_snapshot: ["idle"],
};

// =============================================================================
// ORCHESTRATOR
// =============================================================================

export class Orchestrator {
  private readonly clock: Clock;
  private readonly sinks: ReportSink[];
  private readonly createLogger: RunLoggerFactory;
  private phase: RunPhase = { kind: "idle" };
  private activeRunId: string | null = null;

  constructor(private readonly options: OrchestratorOptions) {
    validateLimits(options.limits);
    this.clock = options.clock ?? systemClock;
    this.sinks = options.sinks ?? [];
    this.createLogger = options.createLogger ?? ((runId) => new MemoryLogger(runId));
  }

  get isRunning(): boolean {
    return this.activeRunId !== null;
  }

  /**
   * Startup failures reject before the snapshot and produce no report: a
   * ConcurrentRunError, a RunIdError for a malformed or reused id, and I/O
   * errors from acquiring the lock or opening the run log. Every run that
   * gets past startup resolves with a finalized report.
   */
  async run(request: RunRequest = {}): Promise<RunResult> {
    if (this.activeRunId !== null) {
      throw new ConcurrentRunError(`Run ${this.activeRunId} is already active in this process.`, {
        runId: this.activeRunId,
      });
    }

    const limits: SafetyLimits = { ...this.options.limits, ...definedLimits(request.limits) };
    validateLimits(limits);

    const startedAt = this.clock.now();
    const runId = request.runId ?? compactTimestamp(startedAt);
    assertValidRunId(runId);
    this.activeRunId = runId;

    try {
      const lockHandle = this.options.lock ? await this.options.lock.acquire(runId) : null;

      try {
        if (await this.options.history?.hasRun(runId)) {
          throw new RunIdError(
            `Run id ${runId} is already used by an earlier run; its report and log are kept.`,
            runId,
          );
        }

        const logger = this.createLogger(runId);
        try {
          if (lockHandle?.reclaimed) {
            logRunEvent(logger, "run.lock.reclaimed", { payload: toJsonObject(lockHandle.reclaimed) });
          }
          return await this.execute(runId, startedAt, limits, logger);
        } finally {
          logger.close();
        }
      } finally {
        await lockHandle?.release();
      }
    } finally {
      this.phase = { kind: "idle" };
      this.activeRunId = null;
    }
  }

  // ---------------------------------------------------------------------------
  // RUN LIFECYCLE
  // ---------------------------------------------------------------------------

  private async execute(
    runId: string,
    startedAt: Date,
    limits: SafetyLimits,
    logger: RunEventLogger,
  ): Promise<RunResult> {
    const phases: RunPhaseKind[] = ["idle"];
    const enter = (next: RunPhase): void => {
      this.transition(next);
      phases.push(next.kind);
    };

    const registry = this.options.registry;
    registry.freeze();
    const stages = registry.orderedStages();

    const guard = new SafetyGuard(limits, this.clock);
    const builder = new RunReportBuilder({ runId, startedAt, limits });
    const context = new RunContext(this.options.initialContext ?? {});

    logRunEvent(logger, "run.start", {
      payload: {
        stage_count: stages.length,
        max_consecutive_failures: limits.maxConsecutiveFailures,
        max_runtime_seconds: limits.maxRuntimeSeconds,
        output_dir: this.options.outputDir,
      },
    });

    let snapshot: SnapshotHandle;
    try {
      snapshot = await this.options.snapshots.createSnapshot(this.options.outputDir);
    } catch (err) {
      const error = err instanceof SnapshotError ? err : new SnapshotError(formatErrorMessage(err), err);
      logRunEvent(logger, "snapshot.failed", { payload: { message: error.message } });
      enter({ kind: "aborted_snapshot" });
      const report = builder.finalize({
        verdict: "aborted_snapshot",
        finishedAt: this.clock.now(),
        error: error.message,
      });
      return this.finish(report, context, phases, logger);
    }

    builder.setSnapshot(snapshot);
    logRunEvent(logger, "snapshot.created", {
      payload: {
        snapshot_id: snapshot.id,
        path: snapshot.dir,
        file_count: snapshot.fileCount,
        total_bytes: snapshot.totalBytes,
      },
    });
    enter({ kind: "snapshot_taken", snapshotId: snapshot.id });

    let verdict: RunVerdict;
    let error: string | undefined;
    try {
      verdict = await this.runStages(stages, { runId, limits, guard, builder, context, logger, enter });
    } catch (err) {
      // The report still has to go out; stages that never got an entry are skipped.
      error = `Run stopped by an internal error: ${formatErrorMessage(err)}`;
      logRunEvent(logger, "run.error", { payload: { message: error } });
      builder.skipRemaining(stages.slice(builder.entryCount), SKIP_REASON_INTERNAL_ERROR, this.clock.now());
      verdict = "aborted_safety";
    }

    enter({ kind: verdict });
    const report = builder.finalize({ verdict, finishedAt: this.clock.now(), error });
    return this.finish(report, context, phases, logger);
  }

  private async runStages(stages: readonly Stage[], run: StageLoopState): Promise<RunVerdict> {
    const { runId, limits, guard, builder, context, logger, enter } = run;

    for (let index = 0; index < stages.length; index += 1) {
      const stage = stages[index];
      enter({ kind: "running", stageIndex: index });

      if (guard.checkDeadline() === "abort_timeout") {
        logRunEvent(logger, "timeout.abort", {
          stage: stage.name,
          payload: { elapsed_ms: guard.elapsedMs(), max_runtime_seconds: limits.maxRuntimeSeconds },
        });
        builder.skipRemaining(stages.slice(index), SKIP_REASON_TIMEOUT, this.clock.now());
        return "aborted_timeout";
      }

      const entry = await this.invokeStage(stage, runId, context, guard, logger);
      builder.append(entry);

      if (guard.recordOutcome(entry.outcome) === "abort_consecutive_failures") {
        logRunEvent(logger, "safety.abort", {
          stage: stage.name,
          payload: {
            consecutive_failures: guard.state().consecutiveFailureCount,
            max_consecutive_failures: limits.maxConsecutiveFailures,
          },
        });
        builder.skipRemaining(stages.slice(index + 1), SKIP_REASON_SAFETY_ABORT, this.clock.now());
        return "aborted_safety";
      }
    }

    return "completed";
  }

  private async invokeStage(
    stage: Stage,
    runId: string,
    context: RunContext,
    guard: SafetyGuard,
    logger: RunEventLogger,
  ): Promise<RunReportEntry> {
    const startedAt = this.clock.now();
    logRunEvent(logger, "stage.start", {
      stage: stage.name,
      payload: { position: stage.position },
    });

    const missing = stage.requires.filter((key) => !context.has(key));
    if (missing.length > 0) {
      const outcome = skipped(`missing inputs: ${missing.join(", ")}`);
      logRunEvent(logger, "stage.skip", { stage: stage.name, payload: { reason: outcome.reason } });
      return buildEntry(stage, outcome, startedAt, 0);
    }

    const controller = new AbortController();
    const cancelTimer = abortWhenExhausted(controller, () => guard.remainingMs());
    const usage = new Map<string, number>();

    let outcome: StageOutcome;
    try {
      const raw = await stage.execute(context.forStage(stage.name), {
        runId,
        stage: stage.name,
        position: stage.position,
        signal: controller.signal,
        deadline: guard.deadline(),
        log: (type, payload) =>
          logRunEvent(logger, type, payload ? { stage: stage.name, payload } : { stage: stage.name }),
        recordUsage: (service, count = 1) => {
          if (!NAME_PATTERN.test(service) || !Number.isInteger(count) || count < 1) {
            throw new StageContractError(
              `Stage '${stage.name}' reported invalid usage: ${service} x ${count}`,
              stage.name,
            );
          }
          usage.set(service, (usage.get(service) ?? 0) + count);
          logRunEvent(logger, "stage.usage", { stage: stage.name, payload: { service, count } });
        },
      });
      outcome = checkOutcome(stage, raw, context);
    } catch (err) {
      outcome =
        err instanceof StageContractError
          ? failure(err.message, "contract")
          : failure(formatErrorMessage(err), "exception");
    } finally {
      cancelTimer();
    }

    const durationMs = Math.max(0, this.clock.now().getTime() - startedAt.getTime());

    if (controller.signal.aborted) {
      logRunEvent(logger, "stage.overrun", {
        stage: stage.name,
        payload: { duration_ms: durationMs, elapsed_ms: guard.elapsedMs() },
      });
    }

    if (outcome.status === "skipped") {
      logRunEvent(logger, "stage.skip", { stage: stage.name, payload: { reason: outcome.reason } });
    }
    logRunEvent(logger, "stage.complete", {
      stage: stage.name,
      payload: { ...outcomePayload(outcome), duration_ms: durationMs },
    });

    return buildEntry(stage, outcome, startedAt, durationMs, Object.fromEntries(usage));
  }

  private async finish(
    report: RunReport,
    context: RunContext,
    phases: RunPhaseKind[],
    logger: RunEventLogger,
  ): Promise<RunResult> {
    logRunEvent(logger, "run.complete", {
      payload: {
        verdict: report.verdict,
        duration_ms: report.duration_ms,
        entries: report.entries.length,
        usage: report.usage ?? {},
      },
    });

    for (const sink of this.sinks) {
      try {
        await sink.deliver(report);
        logRunEvent(logger, "report.delivered", { payload: { sink: sink.name } });
      } catch (err) {
        logRunEvent(logger, "report.sink_error", {
          payload: { sink: sink.name, message: formatErrorMessage(err) },
        });
      }
    }

    return { report, context: context.toJSON(), phases };
  }

  private transition(next: RunPhase): void {
    const allowed = ALLOWED_TRANSITIONS[this.phase.kind];
    if (!allowed.includes(next.kind)) {
      throw new Error(`Illegal run transition ${this.phase.kind} -> ${next.kind}`);
    }
    this.phase = next;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function checkOutcome(stage: Stage, raw: unknown, context: RunContext): StageOutcome {
  const parsed = StageOutcomeSchema.safeParse(raw);
  if (!parsed.success) {
    return failure(`Stage '${stage.name}' returned an invalid outcome`, "contract");
  }

  const outcome = parsed.data;
  if (outcome.status !== "success") {
    return outcome;
  }

  const missing = stage.produces.filter((key) => !context.has(key));
  if (missing.length > 0) {
    return failure(
      `Stage '${stage.name}' reported success without producing: ${missing.join(", ")}`,
      "contract",
    );
  }
  return outcome;
}

function buildEntry(
  stage: Stage,
  outcome: StageOutcome,
  startedAt: Date,
  durationMs: number,
  usage: UsageCounts = {},
): RunReportEntry {
  const entry: RunReportEntry = {
    stage: stage.name,
    position: stage.position,
    outcome,
    started_at: startedAt.toISOString(),
    duration_ms: durationMs,
  };
  if (Object.keys(usage).length > 0) {
    entry.usage = usage;
  }
  return entry;
}

function outcomePayload(outcome: StageOutcome): JsonObject {
  switch (outcome.status) {
    case "success":
      return { status: "success" };
    case "failure":
      return { status: "failure", classification: outcome.classification, message: outcome.message };
    case "skipped":
      return { status: "skipped", reason: outcome.reason };
  }
}

function definedLimits(limits: Partial<SafetyLimits> | undefined): Partial<SafetyLimits> {
  const result: Partial<SafetyLimits> = {};
  if (limits?.maxConsecutiveFailures !== undefined) {
    result.maxConsecutiveFailures = limits.maxConsecutiveFailures;
  }
  if (limits?.maxRuntimeSeconds !== undefined) {
    result.maxRuntimeSeconds = limits.maxRuntimeSeconds;
  }
  return result;
}

function toJsonObject(holder: { pid: number; run_id: string; hostname: string; acquired_at: string }): JsonObject {
  return {
    pid: holder.pid,
    run_id: holder.run_id,
    hostname: holder.hostname,
    acquired_at: holder.acquired_at,
  };
}
