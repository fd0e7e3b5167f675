/*
Purpose: print a failed trendloop command on stderr: what failed, the lock
holder or run id behind it, the exit code the process ends with, and what to do next.
Assumptions: command handlers throw UserFacingError (see command-errors.ts) with the
domain error as cause; anything else is shown by its message.
Usage: console.error(renderCliError(err, { debug: debugRequested(argv) ?? false }));
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
} from "../core/error-format.js";
import { ConcurrentRunError, RunIdError, UserFacingError } from "../core/errors.js";

import { describeExitCode } from "./command-errors.js";

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const format = createAnsiFormatter(
    resolveColorEnabled({ stream: options.stream ?? process.stderr, useColor: options.useColor }),
  );
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });

  const rendered = lines.map((line) => renderLine(line, format));
  // Run details go right after the message, ahead of hint, next and debug lines.
  const detailsAt = lines.findIndex((line) => line.kind !== "title" && line.kind !== "message");
  rendered.splice(detailsAt === -1 ? rendered.length : detailsAt, 0, ...runDetails(error, format));

  return rendered.join("\n");
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  switch (line.kind) {
    case "title":
      return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
    case "message":
      return line.text;
    case "hint":
      return `${format("Hint:", ["yellow"])} ${line.text}`;
    case "next":
      return `${format("Next:", ["cyan"])} ${line.text}`;
    case "stack":
      return `${format("Stack:", ["dim"])}\n${format(indent(line.text), ["dim"])}`;
    default:
      return `${format(`${capitalize(line.kind)}:`, ["dim"])} ${format(line.text, ["dim"])}`;
  }
}

/** Detail lines for the run behind a failed command: lock holder, run id, exit code. */
function runDetails(error: unknown, format: AnsiFormatter): string[] {
  const cause = error instanceof UserFacingError ? error.cause : error;
  const label = (name: string): string => format(`${name}:`, ["dim"]);
  const lines: string[] = [];

  if (cause instanceof ConcurrentRunError && cause.holder) {
    const { runId, pid, lockPath } = cause.holder;
    const holder = [runId ? `run ${runId}` : "", pid !== undefined ? `pid ${pid}` : ""]
      .filter(Boolean)
      .join(", ");
    lines.push(`${label("Lock holder")} ${holder || "unknown"}`);
    if (lockPath) lines.push(`${label("Lock file")} ${lockPath}`);
  }
  if (cause instanceof RunIdError) {
    lines.push(`${label("Run id")} ${cause.runId}`);
  }
  if (error instanceof UserFacingError && error.exitCode !== undefined) {
    const meaning = describeExitCode(error.exitCode);
    lines.push(`${label("Exit code")} ${meaning ? `${error.exitCode} (${meaning})` : error.exitCode}`);
  }

  return lines;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function indent(text: string): string {
  return text
    .split("\n")
    .map((line) => `  ${line}`)
    .join("\n");
}

/** Last --debug / --no-debug before `--` wins; undefined when neither is given. */
export function debugRequested(argv: readonly string[]): boolean | undefined {
  let requested: boolean | undefined;
  for (const arg of argv) {
    if (arg === "--") break;
    if (arg === "--debug") requested = true;
    if (arg === "--no-debug") requested = false;
  }
  return requested;
}
