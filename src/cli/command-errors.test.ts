import { describe, expect, it } from "vitest";

import {
  ConcurrentRunError,
  ConfigurationError,
  RunIdError,
  SnapshotError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../core/errors.js";
import { resolveExitCode } from "../index.js";

import { describeExitCode, EXIT_CODES, normalizeCommandError } from "./command-errors.js";

describe("normalizeCommandError", () => {
  it("gives a concurrent run its own exit code and hint", () => {
    const error = normalizeCommandError(
      new ConcurrentRunError("Run daily-1 (pid 42 on host-a) is already active since 2024-03-01T12:00:00.000Z."),
      { title: "Run command failed." },
    );

    expect(error).toMatchObject({
      code: USER_FACING_ERROR_CODES.concurrentRun,
      title: "Run command failed.",
      message: "Run daily-1 (pid 42 on host-a) is already active since 2024-03-01T12:00:00.000Z.",
      exitCode: EXIT_CODES.concurrentRun,
    });
    expect(error.hint).toMatch(/^Wait for the active run to finish\./);
  });

  it("treats a rejected run id as a usage error", () => {
    const error = normalizeCommandError(new RunIdError("Run id 'a/b' is not valid.", "a/b"), {
      title: "Run command failed.",
    });

    expect(error).toMatchObject({
      code: "RUN_ID_ERROR",
      exitCode: EXIT_CODES.usage,
      hint: "Pass a new --run-id, or leave it out to name the run after its start time.",
    });
  });

  it("maps domain errors to codes", () => {
    expect(normalizeCommandError(new SnapshotError("disk full"), { title: "t" }).code).toBe(
      "SNAPSHOT_ERROR",
    );
    expect(normalizeCommandError(new ConfigurationError("bad"), { title: "t" }).hint).toBe(
      "Fix trendloop.yaml (or the file passed with --config) and retry.",
    );
    expect(normalizeCommandError(new Error("boom"), { title: "t" }).code).toBe("UNKNOWN_ERROR");
  });

  it("adds a permissions hint for EACCES", () => {
    const denied = Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });

    expect(normalizeCommandError(denied, { title: "t" }).hint).toBe(
      "Check file permissions under the trendloop home directory and try again.",
    );
  });

  it("keeps the details of an existing user-facing error under the new title", () => {
    const original = new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Pipeline config missing.",
      message: "Pipeline config not found at /srv/trendloop.yaml.",
      hint: "Create trendloop.yaml.",
    });

    const error = normalizeCommandError(original, { title: "Status command failed." });

    expect(error).toMatchObject({
      code: "CONFIG_ERROR",
      title: "Status command failed.",
      message: "Pipeline config not found at /srv/trendloop.yaml.",
      hint: "Create trendloop.yaml.",
      cause: original,
    });
  });
});

describe("describeExitCode", () => {
  it("names every non-zero exit code", () => {
    expect(describeExitCode(EXIT_CODES.abortedTimeout)).toBe("run verdict aborted_timeout");
    expect(describeExitCode(EXIT_CODES.concurrentRun)).toBe("another run holds the lock");
    expect(describeExitCode(EXIT_CODES.completed)).toBeUndefined();
    expect(describeExitCode(99)).toBeUndefined();
  });
});

describe("resolveExitCode", () => {
  it("uses a numeric exitCode and falls back to 1", () => {
    expect(resolveExitCode({ exitCode: 5 })).toBe(5);
    expect(resolveExitCode(new UserFacingError({ code: "UNKNOWN_ERROR", title: "t", message: "m" }))).toBe(1);
    expect(resolveExitCode(new Error("boom"))).toBe(1);
    expect(resolveExitCode("boom")).toBe(1);
  });
});
