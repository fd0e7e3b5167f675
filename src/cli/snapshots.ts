import { stdin as input, stdout as output } from "node:process";
import { createInterface } from "node:readline/promises";

import type { AppContext } from "../app/context.js";
import { buildRetentionPlan, executeRetentionPlan, type RetentionPlan } from "../core/retention.js";
import type { SnapshotHandle } from "../core/snapshots.js";
import { defaultRunId } from "../core/utils.js";

import { normalizeCommandError } from "./command-errors.js";
import { formatTimestamp, renderTable } from "./table.js";

// =============================================================================
// LIST
// =============================================================================

export async function snapshotsListCommand(appContext: AppContext): Promise<void> {
  try {
    const snapshots = await appContext.snapshots.list();
    if (snapshots.length === 0) {
      console.log("No snapshots yet. One is taken at the start of every run.");
      return;
    }

    for (const line of formatSnapshotList(snapshots)) {
      console.log(line);
    }
  } catch (error) {
    throw normalizeCommandError(error, { title: SNAPSHOTS_COMMAND_FAILURE_TITLE });
  }
}

export function formatSnapshotList(snapshots: SnapshotHandle[]): string[] {
  return renderTable(snapshots, [
    { header: "Snapshot", value: (snapshot) => snapshot.id },
    { header: "Created", value: (snapshot) => formatTimestamp(snapshot.createdAt) },
    { header: "Files", value: (snapshot) => String(snapshot.fileCount) },
    { header: "Bytes", value: (snapshot) => String(snapshot.totalBytes) },
  ]);
}

// =============================================================================
// RESTORE
// =============================================================================

export type SnapshotRestoreOptions = {
  force?: boolean;
};

export async function snapshotsRestoreCommand(
  appContext: AppContext,
  snapshotId: string,
  opts: SnapshotRestoreOptions = {},
): Promise<void> {
  try {
    const snapshot = await appContext.snapshots.get(snapshotId);
    const target = appContext.config.output_dir;

    console.log(`Restoring snapshot ${snapshot.id} (${snapshot.fileCount} files) into ${target}.`);
    console.log(`The current contents of ${target} move to ${appContext.quarantine.directory}.`);

    const confirmed = opts.force ? true : await confirmRestore(snapshot.id);
    if (!confirmed) {
      console.log("Restore cancelled.");
      return;
    }

    // Holding the run lock keeps a scheduled run from writing mid-restore.
    const lock = await appContext.lock.acquire(`restore-${defaultRunId()}`);
    try {
      const result = await appContext.snapshots.restore(snapshot, target);
      if (result.quarantined) {
        console.log(`Previous contents quarantined at ${result.quarantined.quarantined_path}`);
      }
      console.log(`Restored ${result.restoredFiles} files from snapshot ${result.snapshotId}.`);
    } finally {
      await lock.release();
    }
  } catch (error) {
    throw normalizeCommandError(error, { title: SNAPSHOTS_COMMAND_FAILURE_TITLE });
  }
}

async function confirmRestore(snapshotId: string): Promise<boolean> {
  if (!input.isTTY || !output.isTTY) {
    console.log("Non-interactive session detected. Re-run with --force to skip confirmation.");
    return false;
  }

  const rl = createInterface({ input, output });
  const answer = await rl.question(`Restore snapshot ${snapshotId}? (y/N) `);
  rl.close();

  return /^y(es)?$/i.test(answer.trim());
}

// =============================================================================
// PRUNE
// =============================================================================

export type SnapshotPruneOptions = {
  dryRun?: boolean;
  retentionDays?: number;
  now?: Date;
};

export async function snapshotsPruneCommand(
  appContext: AppContext,
  opts: SnapshotPruneOptions = {},
): Promise<RetentionPlan> {
  try {
    const plan = await buildRetentionPlan(appContext.snapshots, {
      retentionDays: opts.retentionDays ?? appContext.config.snapshots.retention_days,
      now: opts.now,
    });

    if (plan.expired.length === 0) {
      console.log(
        `Nothing to prune: ${plan.keep.length} snapshot(s) within ${plan.retentionDays} days or newest.`,
      );
      return plan;
    }

    await executeRetentionPlan(plan, appContext.quarantine, {
      dryRun: opts.dryRun ?? false,
      log: (msg) => console.log(msg),
    });

    if (opts.dryRun) {
      console.log("Dry run only. No snapshots were moved.");
    }
    return plan;
  } catch (error) {
    throw normalizeCommandError(error, { title: SNAPSHOTS_COMMAND_FAILURE_TITLE });
  }
}

const SNAPSHOTS_COMMAND_FAILURE_TITLE = "Snapshots command failed.";
