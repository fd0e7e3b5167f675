import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { QuarantineError } from "./errors.js";
import { quarantineDir, quarantineIndexPath } from "./paths.js";
import { Quarantine } from "./quarantine.js";

const FIXED_NOW = new Date("2024-03-01T12:00:00.000Z");

let tmpDir: string;
let home: string;
let site: string;

function createQuarantine(): Quarantine {
  return new Quarantine({ home }, { now: () => FIXED_NOW });
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "quarantine-"));
  home = path.join(tmpDir, "home");
  site = path.join(tmpDir, "site");
  fs.mkdirSync(site, { recursive: true });
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("Quarantine", () => {
  it("moves a file into quarantine and records it in the index", async () => {
    const target = path.join(site, "post.md");
    fs.writeFileSync(target, "# Draft\n");
    const quarantine = createQuarantine();

    const entry = await quarantine.move(target, { reason: "superseded draft" });

    const expectedPath = path.join(quarantineDir({ home }), "20240301-120000_post.md");
    expect(entry).toEqual({
      moved_at: "2024-03-01T12:00:00.000Z",
      original_path: target,
      quarantined_path: expectedPath,
      reason: "superseded draft",
    });
    expect(fs.existsSync(target)).toBe(false);
    expect(fs.readFileSync(expectedPath, "utf8")).toBe("# Draft\n");
    expect(await quarantine.list()).toEqual([entry]);
  });

  it("moves whole directories", async () => {
    const target = path.join(site, "posts");
    fs.mkdirSync(path.join(target, "2024"), { recursive: true });
    fs.writeFileSync(path.join(target, "2024", "a.md"), "a");

    const entry = await createQuarantine().move(target);

    expect(entry?.reason).toBeUndefined();
    expect(entry?.quarantined_path).toBe(path.join(quarantineDir({ home }), "20240301-120000_posts"));
    expect(fs.readFileSync(path.join(quarantineDir({ home }), "20240301-120000_posts", "2024", "a.md"), "utf8")).toBe("a");
  });

  it("suffixes the destination when the same name was quarantined in the same second", async () => {
    const quarantine = createQuarantine();
    const target = path.join(site, "index.html");

    fs.writeFileSync(target, "v1");
    const first = await quarantine.move(target);
    fs.writeFileSync(target, "v2");
    const second = await quarantine.move(target);

    const root = quarantineDir({ home });
    expect(first?.quarantined_path).toBe(path.join(root, "20240301-120000_index.html"));
    expect(second?.quarantined_path).toBe(path.join(root, "20240301-120000_index.html-1"));
    expect(fs.readFileSync(path.join(root, "20240301-120000_index.html-1"), "utf8")).toBe("v2");
    expect(await quarantine.list()).toHaveLength(2);
  });

  it("returns null for a missing target and writes nothing", async () => {
    const quarantine = createQuarantine();

    const entry = await quarantine.move(path.join(site, "missing.md"));

    expect(entry).toBeNull();
    expect(fs.existsSync(quarantineIndexPath({ home }))).toBe(false);
    expect(await quarantine.list()).toEqual([]);
  });

  it("refuses to quarantine the quarantine area or anything containing it", async () => {
    const quarantine = createQuarantine();
    fs.mkdirSync(quarantineDir({ home }), { recursive: true });

    await expect(quarantine.move(home)).rejects.toBeInstanceOf(QuarantineError);
    await expect(quarantine.move(quarantineDir({ home }))).rejects.toThrow(
      `Refusing to quarantine ${quarantineDir({ home })}: it overlaps ${quarantineDir({ home })}`,
    );
  });

  it("skips malformed index lines with a warning", async () => {
    const quarantine = createQuarantine();
    const target = path.join(site, "post.md");
    fs.writeFileSync(target, "x");
    const entry = await quarantine.move(target);
    fs.appendFileSync(quarantineIndexPath({ home }), "not json\n");
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const entries = await quarantine.list();

    expect(entries).toEqual([entry]);
    expect(warn).toHaveBeenCalledWith(
      `Warning: skipping malformed quarantine index line 2 in ${quarantineIndexPath({ home })}`,
    );
  });
});
