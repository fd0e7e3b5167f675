import fs from "node:fs";
import path from "node:path";

import dotenv from "dotenv";
import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { ProjectConfigSchema, type ProjectConfig } from "./config.js";
import { ConfigurationError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { resolveHome } from "./paths.js";

export const DEFAULT_CONFIG_FILENAME = "trendloop.yaml";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
  env: NodeJS.ProcessEnv;
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = ctx.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigurationError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// ENV FILE
// =============================================================================

function resolveEnvFileName(doc: unknown): string {
  if (doc && typeof doc === "object" && "env_file" in doc && typeof doc.env_file === "string") {
    return doc.env_file;
  }
  return ".env";
}

// Variables already present in the environment win over the env file.
function loadEnvFile(envFilePath: string, env: NodeJS.ProcessEnv): void {
  if (!fs.existsSync(envFilePath)) return;

  let parsed: Record<string, string>;
  try {
    parsed = dotenv.parse(fs.readFileSync(envFilePath));
  } catch (err) {
    throw new ConfigurationError(`Failed to load env file at ${envFilePath}`, err);
  }

  for (const [key, value] of Object.entries(parsed)) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = `Create ${DEFAULT_CONFIG_FILENAME} in the working directory or pass --config <path>.`;
const INVALID_CONFIG_HINT = "Fix the config file and rerun.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!(error instanceof yaml.YAMLException)) {
    return null;
  }

  const mark: unknown = error.mark;
  if (!mark || typeof mark !== "object" || !("line" in mark) || !("column" in mark)) {
    return null;
  }

  const { line, column } = mark;
  if (typeof line !== "number" || typeof column !== "number") {
    return null;
  }

  return { line: line + 1, column: column + 1 };
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "invalid_enum_value") {
        const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
        return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Pipeline config missing.",
    message: `Pipeline config not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
  });
}

function createInvalidConfigError(configPath: string, cause: ConfigurationError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Pipeline config invalid.",
    message: cause.message,
    hint: INVALID_CONFIG_HINT,
    cause,
  });
}

function throwNormalizedConfigError(error: unknown, configPath: string): never {
  if (error instanceof UserFacingError) {
    throw error;
  }

  if (error instanceof ConfigurationError) {
    throw createInvalidConfigError(configPath, error);
  }

  throw error;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export type LoadProjectConfigOptions = {
  env?: NodeJS.ProcessEnv;
};

export function loadProjectConfig(
  configPath: string,
  opts: LoadProjectConfigOptions = {},
): ProjectConfig {
  const env = opts.env ?? process.env;
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw createMissingConfigError(absolutePath);
  }

  try {
    let raw: string;
    try {
      raw = fs.readFileSync(absolutePath, "utf8");
    } catch (err) {
      throw new ConfigurationError(`Failed to read pipeline config at ${absolutePath}`, err);
    }

    let doc: unknown;
    try {
      doc = yaml.load(raw) ?? {};
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      const location = resolveYamlErrorLocation(err);
      const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
      throw new ConfigurationError(
        `Failed to parse YAML config at ${absolutePath}${locationDetail}: ${detail}`,
        err,
      );
    }

    const configDir = path.dirname(absolutePath);
    loadEnvFile(path.resolve(configDir, resolveEnvFileName(doc)), env);

    const expanded = expandEnv(doc, { file: absolutePath, trail: [], env });

    const parsed = ProjectConfigSchema.safeParse(expanded);
    if (!parsed.success) {
      const details = formatIssues(parsed.error.issues);
      throw new ConfigurationError(
        `Invalid pipeline config at ${absolutePath}:\n${details}`,
        parsed.error,
      );
    }

    const cfg = parsed.data;
    const outputDir = path.resolve(configDir, cfg.output_dir);
    const home = resolveHome({ home: cfg.home, baseDir: configDir, env });
    assertDisjoint(outputDir, home);

    // Relative paths resolve against the config directory for portability.
    return {
      ...cfg,
      output_dir: outputDir,
      home,
      env_file: path.resolve(configDir, cfg.env_file),
      config_dir: configDir,
      stages: cfg.stages.map((stage) => ({
        ...stage,
        cwd: path.resolve(configDir, stage.cwd ?? "."),
      })),
    };
  } catch (err) {
    throwNormalizedConfigError(err, absolutePath);
  }
}

// Snapshots and quarantine live under home; they must never sit inside the tree they protect.
function assertDisjoint(outputDir: string, home: string): void {
  if (isWithin(outputDir, home) || isWithin(home, outputDir)) {
    throw new ConfigurationError(
      `output_dir (${outputDir}) and home (${home}) must not contain one another`,
    );
  }
}

function isWithin(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

export function resolveConfigPath(input: { explicitPath?: string; cwd?: string }): string {
  if (input.explicitPath) {
    return path.resolve(input.cwd ?? process.cwd(), input.explicitPath);
  }
  return path.join(input.cwd ?? process.cwd(), DEFAULT_CONFIG_FILENAME);
}
