/**
 * Command stages run an external program as one pipeline stage.
 * Purpose: let trendloop.yaml wire keyword scouts, writers and publishers in any language.
 * Assumptions: the child reads its inputs from TRENDLOOP_* env vars and reports
 * context writes as JSON lines on stdout; any other stdout line is logged.
 * Usage directives count even when the command fails: the calls were made.
 * Usage: registry.register(createCommandStage(stageConfig, { outputDir }))
 */

import { execa, execaCommand } from "execa";
import { z } from "zod";

import type { StageConfig } from "../../../core/config.js";
import { failure, skipped, success, type StageOutcome } from "../../../core/run-report.js";
import { limitText, NAME_PATTERN } from "../../../core/utils.js";
import type { StageContext } from "../run-context.js";
import type { StageDefinition, StageRunInfo } from "../stage.js";

// =============================================================================
// TYPES
// =============================================================================

const ContextSetDirectiveSchema = z.object({
  type: z.literal("context.set"),
  key: z.string().min(1),
  value: z.unknown(),
});

const StageSkipDirectiveSchema = z.object({
  type: z.literal("stage.skip"),
  reason: z.string().min(1),
});

const StageMetadataDirectiveSchema = z.object({
  type: z.literal("stage.metadata"),
  data: z.record(z.unknown()),
});

const StageUsageDirectiveSchema = z.object({
  type: z.literal("stage.usage"),
  service: z.string().regex(NAME_PATTERN),
  count: z.number().int().positive().default(1),
});

const DirectiveSchema = z.discriminatedUnion("type", [
  ContextSetDirectiveSchema,
  StageSkipDirectiveSchema,
  StageMetadataDirectiveSchema,
  StageUsageDirectiveSchema,
]);

export type StageDirective = z.infer<typeof DirectiveSchema>;

export type CommandStageOptions = {
  outputDir: string;
};

export const STDERR_TAIL_CHARS = 2000;

export const STAGE_ENV = {
  runId: "TRENDLOOP_RUN_ID",
  stage: "TRENDLOOP_STAGE",
  context: "TRENDLOOP_CONTEXT",
  outputDir: "TRENDLOOP_OUTPUT_DIR",
} as const;

// =============================================================================
// PUBLIC API
// =============================================================================

export function createCommandStage(
  config: StageConfig,
  options: CommandStageOptions,
): StageDefinition {
  return {
    name: config.name,
    position: config.position,
    description: config.description ?? describeCommand(config),
    requires: config.requires,
    produces: config.produces,
    execute: (context, info) => runCommandStage(config, options, context, info),
  };
}

export function describeCommand(config: Pick<StageConfig, "command" | "args">): string {
  return config.args ? [config.command, ...config.args].join(" ") : config.command;
}

/** Parses one stdout line; null means the line is plain output. */
export function parseDirective(line: string): StageDirective | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith("{")) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return null;
  }

  const result = DirectiveSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function runCommandStage(
  config: StageConfig,
  options: CommandStageOptions,
  context: StageContext,
  info: StageRunInfo,
): Promise<StageOutcome> {
  const execOptions = {
    cwd: config.cwd,
    env: {
      ...config.env,
      [STAGE_ENV.runId]: info.runId,
      [STAGE_ENV.stage]: info.stage,
      [STAGE_ENV.context]: JSON.stringify(context.toJSON()),
      [STAGE_ENV.outputDir]: options.outputDir,
    },
    reject: false,
    timeout: config.timeout_seconds ? config.timeout_seconds * 1000 : undefined,
    cancelSignal: info.signal,
  };

  info.log("stage.command", { command: describeCommand(config) });

  const result = config.args
    ? await execa(config.command, config.args, execOptions)
    : await execaCommand(config.command, { ...execOptions, shell: true });

  const directives: StageDirective[] = [];
  for (const line of result.stdout.split(/\r?\n/)) {
    if (!line.trim()) continue;
    const directive = parseDirective(line);
    if (directive?.type === "stage.usage") {
      info.recordUsage(directive.service, directive.count);
    } else if (directive) {
      directives.push(directive);
    } else {
      info.log("stage.output", { line: limitText(line, STDERR_TAIL_CHARS) });
    }
  }

  if (result.isCanceled) {
    return failure("Cancelled: run budget exhausted", "cancelled");
  }
  if (result.timedOut) {
    return failure(`Timed out after ${config.timeout_seconds ?? 0}s`, "timeout");
  }

  if (result.exitCode === undefined) {
    // Never started (missing executable, bad cwd) or killed by a signal.
    return failure(result.shortMessage || "Command failed without an exit code", "spawn");
  }
  if (result.exitCode !== 0) {
    const stderr = result.stderr.trim();
    const message = stderr
      ? `Exit code ${result.exitCode}: ${limitText(stderr, STDERR_TAIL_CHARS)}`
      : `Exit code ${result.exitCode}`;
    return failure(message, "exit_code");
  }

  return applyDirectives(directives, context);
}

function applyDirectives(directives: StageDirective[], context: StageContext): StageOutcome {
  let skipReason: string | null = null;
  let metadata: Record<string, unknown> | undefined;

  for (const directive of directives) {
    switch (directive.type) {
      case "context.set":
        context.set(directive.key, directive.value);
        break;
      case "stage.skip":
        skipReason = directive.reason;
        break;
      case "stage.metadata":
        metadata = { ...metadata, ...directive.data };
        break;
      case "stage.usage":
        break;
    }
  }

  return skipReason !== null ? skipped(skipReason) : success(metadata);
}
