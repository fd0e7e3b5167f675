/*
Purpose: map errors thrown by command handlers into UserFacingError for renderCliError.
Usage: catch (error) { throw normalizeCommandError(error, { title: "Run command failed." }) }
*/

import { formatErrorMessage } from "../core/error-format.js";
import {
  ConcurrentRunError,
  ConfigurationError,
  QuarantineError,
  RunIdError,
  SnapshotError,
  type UserFacingErrorCode,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../core/errors.js";
import { getErrorCode } from "../core/utils.js";

// =============================================================================
// EXIT CODES
// =============================================================================

export const EXIT_CODES = {
  completed: 0,
  usage: 1,
  abortedSafety: 2,
  abortedTimeout: 3,
  abortedSnapshot: 4,
  concurrentRun: 5,
} as const;

const EXIT_CODE_MEANINGS: Record<number, string> = {
  [EXIT_CODES.usage]: "usage or configuration error",
  [EXIT_CODES.abortedSafety]: "run verdict aborted_safety",
  [EXIT_CODES.abortedTimeout]: "run verdict aborted_timeout",
  [EXIT_CODES.abortedSnapshot]: "run verdict aborted_snapshot",
  [EXIT_CODES.concurrentRun]: "another run holds the lock",
};

export function describeExitCode(code: number): string | undefined {
  return EXIT_CODE_MEANINGS[code];
}

// =============================================================================
// NORMALIZATION
// =============================================================================

const CONCURRENT_RUN_HINT =
  "Wait for the active run to finish. If no run is active, the lock holder is on another host; remove <home>/run.lock by hand.";
const PERMISSIONS_HINT = "Check file permissions under the trendloop home directory and try again.";
const CONFIG_HINT = "Fix trendloop.yaml (or the file passed with --config) and retry.";
const RUN_ID_HINT = "Pass a new --run-id, or leave it out to name the run after its start time.";

export type CommandErrorContext = {
  title: string;
  hint?: (error: unknown) => string | undefined;
};

export function normalizeCommandError(
  error: unknown,
  context: CommandErrorContext,
): UserFacingError {
  const hint = context.hint?.(error) ?? resolveDefaultHint(error);

  if (error instanceof UserFacingError) {
    return new UserFacingError({
      code: error.code,
      title: context.title,
      message: error.message,
      hint: error.hint ?? hint,
      next: error.next,
      cause: error.cause ?? error,
      exitCode: error.exitCode,
    });
  }

  return new UserFacingError({
    code: resolveCommandErrorCode(error),
    title: context.title,
    message: formatErrorMessage(error),
    hint,
    cause: error,
    exitCode: resolveCommandExitCode(error),
  });
}

function resolveCommandExitCode(error: unknown): number | undefined {
  if (error instanceof ConcurrentRunError) return EXIT_CODES.concurrentRun;
  if (error instanceof RunIdError) return EXIT_CODES.usage;
  return undefined;
}

export function resolveCommandErrorCode(error: unknown): UserFacingErrorCode {
  if (error instanceof UserFacingError) {
    return error.code;
  }
  if (error instanceof ConfigurationError) {
    return USER_FACING_ERROR_CODES.config;
  }
  if (error instanceof SnapshotError) {
    return USER_FACING_ERROR_CODES.snapshot;
  }
  if (error instanceof QuarantineError) {
    return USER_FACING_ERROR_CODES.quarantine;
  }
  if (error instanceof ConcurrentRunError) {
    return USER_FACING_ERROR_CODES.concurrentRun;
  }
  if (error instanceof RunIdError) {
    return USER_FACING_ERROR_CODES.runId;
  }

  return USER_FACING_ERROR_CODES.unknown;
}

function resolveDefaultHint(error: unknown): string | undefined {
  if (error instanceof ConcurrentRunError) {
    return CONCURRENT_RUN_HINT;
  }
  if (error instanceof ConfigurationError) {
    return CONFIG_HINT;
  }
  if (error instanceof RunIdError) {
    return RUN_ID_HINT;
  }

  const code = getErrorCode(error);
  if (code === "EACCES" || code === "EPERM") {
    return PERMISSIONS_HINT;
  }

  return undefined;
}
