// Exclusive run lock: one pipeline run per home directory at a time.
// The lock file is created with O_EXCL ("wx"); a second caller fails fast.

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { z } from "zod";

import { ConcurrentRunError } from "./errors.js";
import { ensureDir, getErrorCode } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

const RunLockHolderSchema = z
  .object({
    pid: z.number().int(),
    run_id: z.string(),
    hostname: z.string(),
    acquired_at: z.string(),
  })
  .strict();

export type RunLockHolder = z.infer<typeof RunLockHolderSchema>;

export type RunLockHandle = {
  lockPath: string;
  holder: RunLockHolder;
  /** Holder of a stale lock that was reclaimed to take this one. */
  reclaimed: RunLockHolder | null;
  release: () => Promise<void>;
};

export type RunLockOptions = {
  isProcessAlive?: (pid: number) => boolean;
  hostname?: string;
  pid?: number;
  now?: () => Date;
};

// =============================================================================
// RUN LOCK
// =============================================================================

export class RunLock {
  private readonly isProcessAlive: (pid: number) => boolean;
  private readonly hostname: string;
  private readonly pid: number;
  private readonly now: () => Date;

  constructor(
    public readonly lockPath: string,
    opts: RunLockOptions = {},
  ) {
    this.isProcessAlive = opts.isProcessAlive ?? isProcessAlive;
    this.hostname = opts.hostname ?? os.hostname();
    this.pid = opts.pid ?? process.pid;
    this.now = opts.now ?? (() => new Date());
  }

  async acquire(runId: string): Promise<RunLockHandle> {
    await ensureDir(path.dirname(this.lockPath));

    const holder: RunLockHolder = {
      pid: this.pid,
      run_id: runId,
      hostname: this.hostname,
      acquired_at: this.now().toISOString(),
    };

    const first = await this.tryCreate(holder);
    if (first) {
      return this.buildHandle(first, holder, null);
    }

    const existing = await this.readHolder();
    if (!existing || !this.isStale(existing)) {
      throw this.buildConflictError(existing);
    }

    await safeUnlink(this.lockPath);
    const second = await this.tryCreate(holder);
    if (!second) {
      throw this.buildConflictError(await this.readHolder());
    }

    return this.buildHandle(second, holder, existing);
  }

  async readHolder(): Promise<RunLockHolder | null> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.lockPath, "utf8");
    } catch (error) {
      if (getErrorCode(error) === "ENOENT") return null;
      throw error;
    }

    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(raw);
    } catch {
      return null;
    }

    const parsed = RunLockHolderSchema.safeParse(parsedJson);
    return parsed.success ? parsed.data : null;
  }

  private isStale(holder: RunLockHolder): boolean {
    // Liveness can only be checked for processes on this host.
    if (holder.hostname !== this.hostname) return false;
    return !this.isProcessAlive(holder.pid);
  }

  private async tryCreate(holder: RunLockHolder): Promise<fs.promises.FileHandle | null> {
    let handle: fs.promises.FileHandle;
    try {
      handle = await fs.promises.open(this.lockPath, "wx");
    } catch (error) {
      if (getErrorCode(error) === "EEXIST") {
        return null;
      }
      throw error;
    }

    try {
      await handle.writeFile(JSON.stringify(holder) + "\n", "utf8");
    } catch (error) {
      await handle.close();
      await safeUnlink(this.lockPath);
      throw error;
    }

    return handle;
  }

  private buildHandle(
    fileHandle: fs.promises.FileHandle,
    holder: RunLockHolder,
    reclaimed: RunLockHolder | null,
  ): RunLockHandle {
    let released = false;
    return {
      lockPath: this.lockPath,
      holder,
      reclaimed,
      release: async () => {
        if (released) return;
        released = true;
        await fileHandle.close();
        await safeUnlink(this.lockPath);
      },
    };
  }

  private buildConflictError(holder: RunLockHolder | null): ConcurrentRunError {
    if (!holder) {
      return new ConcurrentRunError(
        `Another run holds the lock at ${this.lockPath} (holder unknown).`,
        { lockPath: this.lockPath },
      );
    }

    return new ConcurrentRunError(
      `Run ${holder.run_id} (pid ${holder.pid} on ${holder.hostname}) is already active since ${holder.acquired_at}.`,
      { runId: holder.run_id, pid: holder.pid, lockPath: this.lockPath },
    );
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else.
    return getErrorCode(error) === "EPERM";
  }
}

async function safeUnlink(filePath: string): Promise<void> {
  try {
    await fs.promises.unlink(filePath);
  } catch (error) {
    if (getErrorCode(error) !== "ENOENT") {
      throw error;
    }
  }
}
