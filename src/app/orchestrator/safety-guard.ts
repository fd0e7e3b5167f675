/**
 * SafetyGuard enforces the run's two hard limits.
 * Purpose: count consecutive stage failures and watch the wall-clock budget.
 * Assumptions: the guard lives for exactly one run; time comes from the injected clock.
 * Usage: const guard = new SafetyGuard(limits, clock); guard.recordOutcome(outcome); guard.checkDeadline().
 */

import { ConfigurationError } from "../../core/errors.js";
import type { StageOutcome } from "../../core/run-report.js";

import type { Clock } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type SafetyLimits = {
  maxConsecutiveFailures: number;
  maxRuntimeSeconds: number;
};

export type FailureDecision = "continue" | "abort_consecutive_failures";
export type DeadlineDecision = "continue" | "abort_timeout";

export type SafetyState = Readonly<{
  consecutiveFailureCount: number;
  runStartTime: Date;
  maxConsecutiveFailures: number;
  maxRuntimeSeconds: number;
}>;

// =============================================================================
// GUARD
// =============================================================================

export class SafetyGuard {
  private consecutiveFailureCount = 0;
  private readonly runStartTime: Date;

  constructor(
    private readonly limits: SafetyLimits,
    private readonly clock: Clock,
  ) {
    validateLimits(limits);
    this.runStartTime = clock.now();
  }

  /** Success resets the streak, failure extends it, skipped leaves it alone. */
  recordOutcome(outcome: StageOutcome): FailureDecision {
    switch (outcome.status) {
      case "success":
        this.consecutiveFailureCount = 0;
        break;
      case "failure":
        this.consecutiveFailureCount += 1;
        break;
      case "skipped":
        break;
    }

    return this.consecutiveFailureCount >= this.limits.maxConsecutiveFailures
      ? "abort_consecutive_failures"
      : "continue";
  }

  checkDeadline(): DeadlineDecision {
    return this.elapsedMs() > this.budgetMs() ? "abort_timeout" : "continue";
  }

  elapsedMs(): number {
    return this.clock.now().getTime() - this.runStartTime.getTime();
  }

  remainingMs(): number {
    return Math.max(0, this.budgetMs() - this.elapsedMs());
  }

  deadline(): Date {
    return new Date(this.runStartTime.getTime() + this.budgetMs());
  }

  state(): SafetyState {
    return Object.freeze({
      consecutiveFailureCount: this.consecutiveFailureCount,
      runStartTime: new Date(this.runStartTime.getTime()),
      maxConsecutiveFailures: this.limits.maxConsecutiveFailures,
      maxRuntimeSeconds: this.limits.maxRuntimeSeconds,
    });
  }

  private budgetMs(): number {
    return this.limits.maxRuntimeSeconds * 1000;
  }
}

export function validateLimits(limits: SafetyLimits): void {
  if (!Number.isInteger(limits.maxConsecutiveFailures) || limits.maxConsecutiveFailures < 1) {
    throw new ConfigurationError(
      `max_consecutive_failures must be a positive integer (got ${limits.maxConsecutiveFailures})`,
    );
  }
  if (!Number.isFinite(limits.maxRuntimeSeconds) || limits.maxRuntimeSeconds <= 0) {
    throw new ConfigurationError(
      `max_runtime_seconds must be a positive number (got ${limits.maxRuntimeSeconds})`,
    );
  }
}
