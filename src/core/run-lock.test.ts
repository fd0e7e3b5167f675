import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConcurrentRunError } from "./errors.js";
import { RunLock, type RunLockOptions } from "./run-lock.js";

const ACQUIRED_AT = new Date("2024-03-01T12:00:00.000Z");

let tmpDir: string;
let lockPath: string;

function createLock(opts: RunLockOptions = {}): RunLock {
  return new RunLock(lockPath, {
    hostname: "host-a",
    pid: 111,
    isProcessAlive: () => true,
    now: () => ACQUIRED_AT,
    ...opts,
  });
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "run-lock-"));
  lockPath = path.join(tmpDir, "home", "run.lock");
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("RunLock", () => {
  it("writes the holder into the lock file", async () => {
    const handle = await createLock().acquire("run-1");

    expect(handle.reclaimed).toBeNull();
    expect(JSON.parse(fs.readFileSync(lockPath, "utf8"))).toEqual({
      pid: 111,
      run_id: "run-1",
      hostname: "host-a",
      acquired_at: "2024-03-01T12:00:00.000Z",
    });

    await handle.release();
  });

  it("rejects a second run while the lock is held", async () => {
    const handle = await createLock().acquire("run-1");
    const other = createLock({ pid: 222 });

    const attempt = other.acquire("run-2");

    await expect(attempt).rejects.toBeInstanceOf(ConcurrentRunError);
    await expect(other.acquire("run-2")).rejects.toThrow(
      "Run run-1 (pid 111 on host-a) is already active since 2024-03-01T12:00:00.000Z.",
    );

    await handle.release();
  });

  it("releases idempotently and allows the next run", async () => {
    const lock = createLock();
    const handle = await lock.acquire("run-1");

    await handle.release();
    await handle.release();

    expect(fs.existsSync(lockPath)).toBe(false);
    const next = await lock.acquire("run-2");
    expect(next.holder.run_id).toBe("run-2");
    await next.release();
  });

  it("reclaims a lock left by a dead process on the same host", async () => {
    await createLock().acquire("crashed-run");
    const lock = createLock({ pid: 222, isProcessAlive: (pid) => pid !== 111 });

    const handle = await lock.acquire("run-2");

    expect(handle.reclaimed).toEqual({
      pid: 111,
      run_id: "crashed-run",
      hostname: "host-a",
      acquired_at: "2024-03-01T12:00:00.000Z",
    });
    expect(await lock.readHolder()).toEqual(handle.holder);
    await handle.release();
  });

  it("never reclaims a lock held on another host", async () => {
    await createLock({ hostname: "host-b" }).acquire("remote-run");
    const lock = createLock({ isProcessAlive: () => false });

    await expect(lock.acquire("run-2")).rejects.toThrow(
      "Run remote-run (pid 111 on host-b) is already active since 2024-03-01T12:00:00.000Z.",
    );
  });

  it("treats an unreadable lock file as held by an unknown holder", async () => {
    fs.mkdirSync(path.dirname(lockPath), { recursive: true });
    fs.writeFileSync(lockPath, "garbage");

    await expect(createLock().acquire("run-1")).rejects.toThrow(
      `Another run holds the lock at ${lockPath} (holder unknown).`,
    );
  });
});
