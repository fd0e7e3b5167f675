export class TrendloopError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "TrendloopError";
  }
}

export class ConfigurationError extends TrendloopError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigurationError";
  }
}

export class SnapshotError extends TrendloopError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "SnapshotError";
  }
}

export class QuarantineError extends TrendloopError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "QuarantineError";
  }
}

export class ConcurrentRunError extends TrendloopError {
  constructor(
    message: string,
    public readonly holder?: { runId?: string; pid?: number; lockPath?: string },
  ) {
    super(message);
    this.name = "ConcurrentRunError";
  }
}

/** A run id that cannot name files under <home>, or one an earlier run already used. */
export class RunIdError extends TrendloopError {
  constructor(
    message: string,
    public readonly runId: string,
  ) {
    super(message);
    this.name = "RunIdError";
  }
}

/** Raised inside the orchestrator when a stage breaks the RunContext contract. */
export class StageContractError extends TrendloopError {
  constructor(
    message: string,
    public readonly stage: string,
  ) {
    super(message);
    this.name = "StageContractError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  snapshot: "SNAPSHOT_ERROR",
  quarantine: "QUARANTINE_ERROR",
  concurrentRun: "CONCURRENT_RUN",
  runId: "RUN_ID_ERROR",
  report: "REPORT_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
  exitCode?: number;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;
  readonly exitCode?: number;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
    this.exitCode = input.exitCode;
  }
}
