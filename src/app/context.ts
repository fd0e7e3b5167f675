/**
 * AppContext wires a loaded pipeline config to the services built on it.
 * Purpose: make the home directory and every derived service explicit for CLI consumers.
 * Assumptions: config has already been validated by the loader.
 * Usage: const ctx = createAppContext({ configPath, config }).
 */

import path from "node:path";

import type { ProjectConfig } from "../core/config.js";
import { runLockPath, type PathsContext } from "../core/paths.js";
import { Quarantine } from "../core/quarantine.js";
import { ReportStore } from "../core/report-store.js";
import { RunLock } from "../core/run-lock.js";
import { SnapshotManager } from "../core/snapshots.js";

import { StageRegistry } from "./orchestrator/stage-registry.js";
import { createCommandStage } from "./orchestrator/stages/command-stage.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppContext = {
  configPath: string;
  config: ProjectConfig;
  paths: PathsContext;
  quarantine: Quarantine;
  snapshots: SnapshotManager;
  reports: ReportStore;
  lock: RunLock;
  registry: StageRegistry;
};

export type CreateAppContextInput = {
  configPath: string;
  config: ProjectConfig;
  now?: () => Date;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createAppContext(input: CreateAppContextInput): AppContext {
  const { config } = input;
  // config.home is already resolved (TRENDLOOP_HOME included) by the loader.
  const paths: PathsContext = { home: config.home };
  const quarantine = new Quarantine(paths, { now: input.now });

  return {
    configPath: path.resolve(input.configPath),
    config,
    paths,
    quarantine,
    snapshots: new SnapshotManager({
      paths,
      quarantine,
      exclude: config.snapshots.exclude,
      now: input.now,
    }),
    reports: new ReportStore(paths),
    lock: new RunLock(runLockPath(paths), { now: input.now }),
    registry: buildStageRegistry(config),
  };
}

export function buildStageRegistry(config: ProjectConfig): StageRegistry {
  const registry = new StageRegistry();
  for (const stage of config.stages) {
    registry.register(createCommandStage(stage, { outputDir: config.output_dir }));
  }

  registry.validateDependencies(Object.keys(config.initial_context));
  return registry;
}
