import { z } from "zod";

import { NAME_PATTERN } from "./utils.js";

export const DEFAULT_MAX_CONSECUTIVE_FAILURES = 3;
export const DEFAULT_MAX_RUNTIME_SECONDS = 600;
export const DEFAULT_SNAPSHOT_RETENTION_DAYS = 30;

const SafetySchema = z
  .object({
    max_consecutive_failures: z
      .number()
      .int()
      .positive()
      .default(DEFAULT_MAX_CONSECUTIVE_FAILURES),
    max_runtime_seconds: z.number().int().positive().default(DEFAULT_MAX_RUNTIME_SECONDS),
  })
  .strict();

const SnapshotsSchema = z
  .object({
    retention_days: z.number().int().positive().default(DEFAULT_SNAPSHOT_RETENTION_DAYS),
    // Glob patterns (relative to output_dir) left out of every snapshot.
    exclude: z.array(z.string().min(1)).default([]),
  })
  .strict();

export const StageConfigSchema = z
  .object({
    name: z
      .string()
      .min(1)
      .regex(NAME_PATTERN, "Stage names may contain letters, digits, '.', '_' and '-'"),
    description: z.string().optional(),
    position: z.number().int().nonnegative().optional(),
    command: z.string().min(1),
    // When set, `command` is the executable and runs without a shell.
    args: z.array(z.string()).optional(),
    cwd: z.string().optional(),
    env: z.record(z.string()).default({}),
    timeout_seconds: z.number().int().positive().optional(),
    requires: z.array(z.string().min(1)).default([]),
    produces: z.array(z.string().min(1)).default([]),
  })
  .strict();

export const ProjectConfigSchema = z
  .object({
    output_dir: z.string().min(1).default("docs"),
    home: z.string().min(1).optional(),
    env_file: z.string().min(1).default(".env"),
    safety: SafetySchema.default({}),
    snapshots: SnapshotsSchema.default({}),
    initial_context: z.record(z.unknown()).default({}),
    stages: z.array(StageConfigSchema).default([]),
  })
  .strict();

export type SafetyConfig = z.infer<typeof SafetySchema>;
export type SnapshotsConfig = z.infer<typeof SnapshotsSchema>;
export type StageConfig = z.infer<typeof StageConfigSchema>;
export type RawProjectConfig = z.infer<typeof ProjectConfigSchema>;

/** Config after loading: every path is absolute. */
export type ProjectConfig = Omit<RawProjectConfig, "home"> & {
  home: string;
  config_dir: string;
};
