import path from "node:path";

import { RunIdError } from "./errors.js";
import { NAME_PATTERN } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  /** Root for snapshots, quarantine, logs, reports and the run lock. */
  home: string;
};

export type ResolveHomeOptions = {
  home?: string;
  baseDir?: string;
  env?: NodeJS.ProcessEnv;
};

export const DEFAULT_HOME_DIRNAME = ".trendloop";

// =============================================================================
// CONTEXT
// =============================================================================

export function resolveHome(opts: ResolveHomeOptions = {}): string {
  const env = opts.env ?? process.env;
  const baseDir = opts.baseDir ?? process.cwd();

  if (env.TRENDLOOP_HOME) {
    return path.resolve(baseDir, env.TRENDLOOP_HOME);
  }

  if (opts.home) {
    return path.resolve(baseDir, opts.home);
  }

  return path.join(path.resolve(baseDir), DEFAULT_HOME_DIRNAME);
}

/** Run ids become file and directory names under <home>. */
export function assertValidRunId(runId: string): void {
  if (!NAME_PATTERN.test(runId)) {
    throw new RunIdError(
      `Run id '${runId}' must start with a letter or digit and contain only letters, digits, '.', '_' and '-'.`,
      runId,
    );
  }
}

// =============================================================================
// PATH HELPERS
// =============================================================================

export function snapshotsDir(paths: PathsContext): string {
  return path.join(paths.home, "snapshots");
}

export function snapshotDir(paths: PathsContext, snapshotId: string): string {
  return path.join(snapshotsDir(paths), snapshotId);
}

export function snapshotTreeDir(paths: PathsContext, snapshotId: string): string {
  return path.join(snapshotDir(paths, snapshotId), "tree");
}

export function snapshotManifestPath(paths: PathsContext, snapshotId: string): string {
  return path.join(snapshotDir(paths, snapshotId), "snapshot.json");
}

export function quarantineDir(paths: PathsContext): string {
  return path.join(paths.home, "quarantine");
}

export function quarantineIndexPath(paths: PathsContext): string {
  return path.join(quarantineDir(paths), "index.jsonl");
}

export function reportsDir(paths: PathsContext): string {
  return path.join(paths.home, "reports");
}

export function reportPath(paths: PathsContext, runId: string): string {
  return path.join(reportsDir(paths), `run-${runId}.json`);
}

export function runLogsDir(paths: PathsContext, runId: string): string {
  return path.join(paths.home, "logs", `run-${runId}`);
}

export function orchestratorLogPath(paths: PathsContext, runId: string): string {
  return path.join(runLogsDir(paths, runId), "orchestrator.jsonl");
}

export function runLockPath(paths: PathsContext): string {
  return path.join(paths.home, "run.lock");
}
