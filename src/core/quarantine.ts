// Quarantine area: every removal in the pipeline is a move into <home>/quarantine.
// Nothing here deletes files; restoring is a plain move back out.

import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import { QuarantineError } from "./errors.js";
import type { PathsContext } from "./paths.js";
import { quarantineDir, quarantineIndexPath } from "./paths.js";
import { compactTimestamp, ensureDir } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

const QuarantineEntrySchema = z
  .object({
    moved_at: z.string(),
    original_path: z.string(),
    quarantined_path: z.string(),
    reason: z.string().optional(),
  })
  .strict();

export type QuarantineEntry = z.infer<typeof QuarantineEntrySchema>;

export type QuarantineOptions = {
  now?: () => Date;
};

// =============================================================================
// QUARANTINE
// =============================================================================

export class Quarantine {
  private readonly root: string;
  private readonly indexPath: string;
  private readonly now: () => Date;

  constructor(paths: PathsContext, opts: QuarantineOptions = {}) {
    this.root = quarantineDir(paths);
    this.indexPath = quarantineIndexPath(paths);
    this.now = opts.now ?? (() => new Date());
  }

  get directory(): string {
    return this.root;
  }

  /**
   * Moves a file or directory into quarantine.
   * Returns null when the target does not exist.
   */
  async move(targetPath: string, opts: { reason?: string } = {}): Promise<QuarantineEntry | null> {
    const absoluteTarget = path.resolve(targetPath);
    if (!(await fse.pathExists(absoluteTarget))) {
      return null;
    }

    assertOutsideQuarantine(absoluteTarget, this.root);

    const movedAt = this.now();
    await ensureDir(this.root);
    const destination = await this.resolveDestination(
      `${compactTimestamp(movedAt, { millis: false })}_${path.basename(absoluteTarget)}`,
    );

    try {
      await fse.move(absoluteTarget, destination, { overwrite: false });
    } catch (err) {
      throw new QuarantineError(`Failed to move ${absoluteTarget} into quarantine`, err);
    }

    const entry: QuarantineEntry = {
      moved_at: movedAt.toISOString(),
      original_path: absoluteTarget,
      quarantined_path: destination,
    };
    if (opts.reason) {
      entry.reason = opts.reason;
    }

    await fse.appendFile(this.indexPath, `${JSON.stringify(entry)}\n`, "utf8");
    return entry;
  }

  async list(): Promise<QuarantineEntry[]> {
    if (!(await fse.pathExists(this.indexPath))) {
      return [];
    }

    const raw = await fse.readFile(this.indexPath, "utf8");
    const entries: QuarantineEntry[] = [];

    for (const [index, line] of raw.split("\n").entries()) {
      if (!line.trim()) continue;

      const parsed = QuarantineEntrySchema.safeParse(parseJsonLine(line));
      if (!parsed.success) {
        console.warn(`Warning: skipping malformed quarantine index line ${index + 1} in ${this.indexPath}`);
        continue;
      }
      entries.push(parsed.data);
    }

    return entries;
  }

  private async resolveDestination(baseName: string): Promise<string> {
    let candidate = path.join(this.root, baseName);
    let suffix = 1;
    while (await fse.pathExists(candidate)) {
      candidate = path.join(this.root, `${baseName}-${suffix}`);
      suffix += 1;
    }
    return candidate;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function assertOutsideQuarantine(targetPath: string, root: string): void {
  const relativeToRoot = path.relative(root, targetPath);
  const insideRoot = !relativeToRoot.startsWith("..") && !path.isAbsolute(relativeToRoot);

  const relativeToTarget = path.relative(targetPath, root);
  const containsRoot = !relativeToTarget.startsWith("..") && !path.isAbsolute(relativeToTarget);

  if (insideRoot || containsRoot) {
    throw new QuarantineError(`Refusing to quarantine ${targetPath}: it overlaps ${root}`);
  }
}

function parseJsonLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return null;
  }
}
