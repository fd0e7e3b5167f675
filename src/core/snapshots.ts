/**
 * SnapshotManager copies the published output tree before every run.
 * Purpose: give each run a recovery point and restore it on demand.
 * Assumptions: snapshots live under <home>/snapshots/<id>; the manifest is written
 * last, so a directory without snapshot.json is an incomplete copy and is ignored.
 * Usage: const handle = await manager.createSnapshot(outputDir); await manager.restore(handle).
 */

import fs from "node:fs/promises";
import path from "node:path";

import fg from "fast-glob";
import fse from "fs-extra";
import { z } from "zod";

import { formatErrorMessage } from "./error-format.js";
import { SnapshotError } from "./errors.js";
import type { PathsContext } from "./paths.js";
import { snapshotDir, snapshotManifestPath, snapshotTreeDir, snapshotsDir } from "./paths.js";
import type { Quarantine, QuarantineEntry } from "./quarantine.js";
import { compactTimestamp, getErrorCode, readJsonFile, writeJsonFile } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

const SNAPSHOT_SCHEMA_VERSION = 1;

const SnapshotManifestSchema = z
  .object({
    schema_version: z.literal(SNAPSHOT_SCHEMA_VERSION),
    id: z.string(),
    created_at: z.string(),
    source_path: z.string(),
    source_missing: z.boolean(),
    file_count: z.number().int().nonnegative(),
    total_bytes: z.number().int().nonnegative(),
    directories: z.array(z.string()),
    files: z.array(z.object({ path: z.string(), size: z.number().int().nonnegative() }).strict()),
  })
  .strict();

export type SnapshotManifest = z.infer<typeof SnapshotManifestSchema>;

export type SnapshotHandle = {
  readonly id: string;
  readonly createdAt: string;
  readonly sourcePath: string;
  readonly dir: string;
  readonly treeDir: string;
  readonly fileCount: number;
  readonly totalBytes: number;
};

export type RestoreResult = {
  snapshotId: string;
  targetPath: string;
  restoredFiles: number;
  quarantined: QuarantineEntry | null;
};

export type SnapshotManagerOptions = {
  paths: PathsContext;
  quarantine: Quarantine;
  exclude?: string[];
  now?: () => Date;
};

// =============================================================================
// SNAPSHOT MANAGER
// =============================================================================

export class SnapshotManager {
  private readonly paths: PathsContext;
  private readonly quarantine: Quarantine;
  private readonly exclude: string[];
  private readonly now: () => Date;

  constructor(options: SnapshotManagerOptions) {
    this.paths = options.paths;
    this.quarantine = options.quarantine;
    this.exclude = options.exclude ?? [];
    this.now = options.now ?? (() => new Date());
  }

  async createSnapshot(sourceTree: string): Promise<SnapshotHandle> {
    const sourcePath = path.resolve(sourceTree);
    const createdAt = this.now();
    const id = await this.allocateId(createdAt);
    const treeDir = snapshotTreeDir(this.paths, id);

    try {
      const sourceMissing = !(await fse.pathExists(sourcePath));
      await fse.ensureDir(treeDir);

      const { directories, files } = sourceMissing
        ? { directories: [], files: [] }
        : await this.copyTree(sourcePath, treeDir);

      const manifest: SnapshotManifest = {
        schema_version: SNAPSHOT_SCHEMA_VERSION,
        id,
        created_at: createdAt.toISOString(),
        source_path: sourcePath,
        source_missing: sourceMissing,
        file_count: files.length,
        total_bytes: files.reduce((sum, file) => sum + file.size, 0),
        directories,
        files,
      };
      await writeJsonFile(snapshotManifestPath(this.paths, id), manifest);

      return toHandle(this.paths, manifest);
    } catch (err) {
      throw new SnapshotError(describeCreateFailure(sourcePath, id, err), err);
    }
  }

  async restore(handle: SnapshotHandle, targetTree?: string): Promise<RestoreResult> {
    const manifest = await this.loadManifest(handle.id);
    await this.assertComplete(manifest);

    const targetPath = path.resolve(targetTree ?? manifest.source_path);
    const quarantined = await this.quarantine.move(targetPath, {
      reason: `restore snapshot ${manifest.id}`,
    });

    try {
      await fse.ensureDir(targetPath);
      await fse.copy(snapshotTreeDir(this.paths, manifest.id), targetPath, {
        overwrite: true,
        errorOnExist: false,
        preserveTimestamps: true,
      });
    } catch (err) {
      throw new SnapshotError(
        `Failed to restore snapshot ${manifest.id} into ${targetPath}: ${describeFsError(err)}`,
        err,
      );
    }

    return {
      snapshotId: manifest.id,
      targetPath,
      restoredFiles: manifest.file_count,
      quarantined,
    };
  }

  async list(): Promise<SnapshotHandle[]> {
    const root = snapshotsDir(this.paths);
    if (!(await fse.pathExists(root))) {
      return [];
    }

    const entries = await fs.readdir(root, { withFileTypes: true });
    const handles: SnapshotHandle[] = [];

    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const manifestPath = snapshotManifestPath(this.paths, entry.name);
      if (!(await fse.pathExists(manifestPath))) continue;

      let manifest: SnapshotManifest;
      try {
        manifest = await this.loadManifest(entry.name);
      } catch (err) {
        console.warn(`Warning: skipping snapshot ${entry.name}: ${formatErrorMessage(err)}`);
        continue;
      }
      handles.push(toHandle(this.paths, manifest));
    }

    return handles.sort((a, b) => b.createdAt.localeCompare(a.createdAt) || b.id.localeCompare(a.id));
  }

  async get(snapshotId: string): Promise<SnapshotHandle> {
    const manifest = await this.loadManifest(snapshotId);
    return toHandle(this.paths, manifest);
  }

  async latest(): Promise<SnapshotHandle | null> {
    const handles = await this.list();
    return handles[0] ?? null;
  }

  private async allocateId(createdAt: Date): Promise<string> {
    const base = compactTimestamp(createdAt);
    let candidate = base;
    let suffix = 1;
    while (await fse.pathExists(snapshotDir(this.paths, candidate))) {
      candidate = `${base}-${suffix}`;
      suffix += 1;
    }
    return candidate;
  }

  private async copyTree(
    sourcePath: string,
    treeDir: string,
  ): Promise<{ directories: string[]; files: SnapshotManifest["files"] }> {
    const stat = await fse.stat(sourcePath);
    if (!stat.isDirectory()) {
      throw new SnapshotError(`Output tree ${sourcePath} is not a directory`);
    }

    const entries = await fg("**/*", {
      cwd: sourcePath,
      dot: true,
      onlyFiles: false,
      markDirectories: true,
      followSymbolicLinks: false,
      ignore: this.exclude,
    });
    entries.sort();

    const directories: string[] = [];
    const files: SnapshotManifest["files"] = [];

    for (const entry of entries) {
      if (entry.endsWith("/")) {
        const relativeDir = entry.slice(0, -1);
        await fse.ensureDir(path.join(treeDir, relativeDir));
        directories.push(relativeDir);
        continue;
      }

      const from = path.join(sourcePath, entry);
      const to = path.join(treeDir, entry);
      await fse.copy(from, to, { errorOnExist: true, overwrite: false, preserveTimestamps: true });
      const copied = await fse.lstat(to);
      files.push({ path: entry, size: copied.size });
    }

    return { directories, files };
  }

  private async loadManifest(snapshotId: string): Promise<SnapshotManifest> {
    const manifestPath = snapshotManifestPath(this.paths, snapshotId);
    if (!(await fse.pathExists(manifestPath))) {
      throw new SnapshotError(
        `Snapshot ${snapshotId} is stale or missing: no manifest at ${manifestPath}`,
      );
    }

    let raw: unknown;
    try {
      raw = await readJsonFile(manifestPath);
    } catch (err) {
      throw new SnapshotError(`Snapshot manifest ${manifestPath} is unreadable`, err);
    }

    const parsed = SnapshotManifestSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SnapshotError(`Snapshot manifest ${manifestPath} is invalid`, parsed.error);
    }
    return parsed.data;
  }

  private async assertComplete(manifest: SnapshotManifest): Promise<void> {
    const treeDir = snapshotTreeDir(this.paths, manifest.id);
    const missing: string[] = [];

    if (!(await fse.pathExists(treeDir))) {
      missing.push("tree/");
    } else {
      for (const file of manifest.files) {
        if (!(await fse.pathExists(path.join(treeDir, file.path)))) {
          missing.push(file.path);
        }
      }
    }

    if (missing.length > 0) {
      const preview = missing.slice(0, 5).join(", ");
      const more = missing.length > 5 ? ` (+${missing.length - 5} more)` : "";
      throw new SnapshotError(
        `Snapshot ${manifest.id} is stale: ${missing.length} entr${missing.length === 1 ? "y" : "ies"} missing: ${preview}${more}`,
      );
    }
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function toHandle(paths: PathsContext, manifest: SnapshotManifest): SnapshotHandle {
  return Object.freeze({
    id: manifest.id,
    createdAt: manifest.created_at,
    sourcePath: manifest.source_path,
    dir: snapshotDir(paths, manifest.id),
    treeDir: snapshotTreeDir(paths, manifest.id),
    fileCount: manifest.file_count,
    totalBytes: manifest.total_bytes,
  });
}

function describeCreateFailure(sourcePath: string, id: string, err: unknown): string {
  if (err instanceof SnapshotError) {
    return err.message;
  }
  return `Failed to snapshot ${sourcePath} as ${id}: ${describeFsError(err)}`;
}

function describeFsError(err: unknown): string {
  const code = getErrorCode(err);
  const detail = err instanceof Error ? err.message : String(err);

  if (code === "ENOSPC") return `disk full (${detail})`;
  if (code === "EACCES" || code === "EPERM") return `permission denied (${detail})`;
  return detail;
}
