import type { Quarantine, QuarantineEntry } from "./quarantine.js";
import type { SnapshotHandle, SnapshotManager } from "./snapshots.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export type RetentionPlan = {
  retentionDays: number;
  cutoff: string;
  keep: SnapshotHandle[];
  expired: SnapshotHandle[];
};

export type BuildRetentionPlanOptions = {
  retentionDays: number;
  now?: Date;
};

export type ExecuteRetentionOptions = {
  dryRun?: boolean;
  log?: (message: string) => void;
};

/**
 * Snapshots older than the retention window expire, except the newest one,
 * which is always kept so at least one recovery point survives.
 */
export async function buildRetentionPlan(
  manager: Pick<SnapshotManager, "list">,
  opts: BuildRetentionPlanOptions,
): Promise<RetentionPlan> {
  if (!Number.isInteger(opts.retentionDays) || opts.retentionDays <= 0) {
    throw new Error(`Retention days must be a positive integer, received ${opts.retentionDays}`);
  }

  const now = opts.now ?? new Date();
  const cutoffMs = now.getTime() - opts.retentionDays * DAY_MS;
  const snapshots = await manager.list();

  const keep: SnapshotHandle[] = [];
  const expired: SnapshotHandle[] = [];

  snapshots.forEach((snapshot, index) => {
    const createdMs = Date.parse(snapshot.createdAt);
    const isNewest = index === 0;
    if (!isNewest && Number.isFinite(createdMs) && createdMs < cutoffMs) {
      expired.push(snapshot);
    } else {
      keep.push(snapshot);
    }
  });

  return {
    retentionDays: opts.retentionDays,
    cutoff: new Date(cutoffMs).toISOString(),
    keep,
    expired,
  };
}

export async function executeRetentionPlan(
  plan: RetentionPlan,
  quarantine: Quarantine,
  opts: ExecuteRetentionOptions = {},
): Promise<QuarantineEntry[]> {
  const log = opts.log ?? (() => undefined);
  const moved: QuarantineEntry[] = [];

  for (const snapshot of plan.expired) {
    if (opts.dryRun) {
      log(`[dry-run] Would quarantine snapshot ${snapshot.id} (${snapshot.createdAt})`);
      continue;
    }

    const entry = await quarantine.move(snapshot.dir, {
      reason: `snapshot retention (${plan.retentionDays} days)`,
    });
    if (entry) {
      moved.push(entry);
      log(`Quarantined snapshot ${snapshot.id} -> ${entry.quarantined_path}`);
    }
  }

  return moved;
}
