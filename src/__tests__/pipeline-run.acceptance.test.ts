import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { orchestratorLogPath, quarantineDir } from "../core/paths.js";
import { ReportStore } from "../core/report-store.js";
import { RunLock } from "../core/run-lock.js";
import { main } from "../index.js";

// =============================================================================
// HELPERS
// =============================================================================

type StageSpec = {
  name: string;
  script: string;
  requires?: string[];
  produces?: string[];
};

let tmpDir: string;
let configPath: string;
let siteDir: string;
let homeDir: string;

function writePipeline(stages: StageSpec[], safety: Record<string, number> = {}): void {
  const config = {
    output_dir: "site",
    home: "state",
    safety,
    stages: stages.map((stage) => ({
      name: stage.name,
      command: process.execPath,
      args: ["-e", stage.script],
      requires: stage.requires ?? [],
      produces: stage.produces ?? [],
    })),
  };
  // JSON is valid YAML.
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2), "utf8");
}

function cli(...args: string[]): Promise<void> {
  return main(["node", "trendloop", "--config", configPath, ...args]);
}

function readEventTypes(runId: string): string[] {
  const raw = fs.readFileSync(orchestratorLogPath({ home: homeDir }, runId), "utf8");
  return raw
    .split("\n")
    .filter((line) => line.trim())
    .map((line) => {
      const parsed: unknown = JSON.parse(line);
      return parsed && typeof parsed === "object" && "type" in parsed ? String(parsed.type) : "";
    });
}

const emit = (value: Record<string, unknown>): string =>
  `console.log(${JSON.stringify(JSON.stringify(value))});`;

const SCOUT = emit({ type: "context.set", key: "keyword", value: "solar kits" });

const WRITER = [
  'const fs = require("fs");',
  'const path = require("path");',
  "const ctx = JSON.parse(process.env.TRENDLOOP_CONTEXT);",
  'const file = path.join(process.env.TRENDLOOP_OUTPUT_DIR, "post.md");',
  'fs.writeFileSync(file, "# " + ctx.keyword + "\\n");',
  'console.log(JSON.stringify({ type: "context.set", key: "article_path", value: file }));',
].join("\n");

const PUBLISHER = emit({ type: "stage.metadata", data: { published: true } });

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "trendloop-acceptance-"));
  configPath = path.join(tmpDir, "trendloop.yaml");
  siteDir = path.join(tmpDir, "site");
  homeDir = path.join(tmpDir, "state");
  fs.mkdirSync(siteDir, { recursive: true });
  fs.writeFileSync(path.join(siteDir, "index.html"), "<h1>home</h1>");
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  process.exitCode = undefined;
});

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

// =============================================================================
// TESTS
// =============================================================================

describe("acceptance: trendloop run", () => {
  it("runs the pipeline, records the report and restores the pre-run snapshot", async () => {
    writePipeline([
      { name: "scout", script: SCOUT, produces: ["keyword"] },
      { name: "writer", script: WRITER, requires: ["keyword"], produces: ["article_path"] },
      { name: "publisher", script: PUBLISHER, requires: ["article_path"] },
    ]);

    await cli("run", "--run-id", "daily-1");

    expect(process.exitCode).toBe(0);
    expect(fs.readFileSync(path.join(siteDir, "post.md"), "utf8")).toBe("# solar kits\n");

    const report = await new ReportStore({ home: homeDir }).load("daily-1");
    expect(report?.verdict).toBe("completed");
    expect(report?.entries.map((entry) => [entry.position, entry.stage, entry.outcome])).toEqual([
      [1, "scout", { status: "success" }],
      [2, "writer", { status: "success" }],
      [3, "publisher", { status: "success", metadata: { published: true } }],
    ]);
    expect(report?.snapshot?.file_count).toBe(1);

    const events = readEventTypes("daily-1");
    expect(events[0]).toBe("run.start");
    expect(events).toContain("snapshot.created");
    expect(events.slice(-2)).toEqual(["run.complete", "report.delivered"]);

    const snapshotId = report?.snapshot?.id ?? "";
    await cli("snapshots", "restore", snapshotId, "--force");

    expect(process.exitCode).toBe(0);
    expect(fs.existsSync(path.join(siteDir, "post.md"))).toBe(false);
    expect(fs.readFileSync(path.join(siteDir, "index.html"), "utf8")).toBe("<h1>home</h1>");
    const quarantined = fs.readdirSync(quarantineDir({ home: homeDir }));
    expect(quarantined.filter((name) => name.endsWith("_site"))).toHaveLength(1);
  });

  it("stops after the configured number of consecutive failures", async () => {
    const marker = path.join(tmpDir, "publisher-ran");
    writePipeline(
      [
        { name: "scout", script: "process.exit(1);" },
        { name: "writer", script: 'process.stderr.write("model refused\\n"); process.exit(2);' },
        {
          name: "publisher",
          script: `require("fs").writeFileSync(${JSON.stringify(marker)}, "x");`,
        },
      ],
      { max_consecutive_failures: 2 },
    );

    await cli("run", "--run-id", "daily-2");

    expect(process.exitCode).toBe(2);
    expect(fs.existsSync(marker)).toBe(false);
    const report = await new ReportStore({ home: homeDir }).load("daily-2");
    expect(report?.verdict).toBe("aborted_safety");
    expect(report?.entries.map((entry) => entry.outcome)).toEqual([
      { status: "failure", classification: "exit_code", message: "Exit code 1" },
      { status: "failure", classification: "exit_code", message: "Exit code 2: model refused" },
      { status: "skipped", reason: "safety_abort" },
    ]);
  });

  it("cancels a stage that outlives the run budget and skips the rest", async () => {
    writePipeline(
      [
        { name: "writer", script: "setTimeout(() => {}, 10000);" },
        { name: "publisher", script: PUBLISHER },
      ],
      { max_runtime_seconds: 1 },
    );

    await cli("run", "--run-id", "daily-3");

    expect(process.exitCode).toBe(3);
    const report = await new ReportStore({ home: homeDir }).load("daily-3");
    expect(report?.verdict).toBe("aborted_timeout");
    expect(report?.entries.map((entry) => entry.outcome)).toEqual([
      { status: "failure", classification: "cancelled", message: "Cancelled: run budget exhausted" },
      { status: "skipped", reason: "timeout" },
    ]);
    expect(readEventTypes("daily-3")).toContain("stage.overrun");
  });

  it("refuses to start while another run holds the lock", async () => {
    writePipeline([{ name: "scout", script: SCOUT, produces: ["keyword"] }]);
    const held = await new RunLock(path.join(homeDir, "run.lock")).acquire("scheduled");
    const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);

    try {
      await cli("run", "--run-id", "daily-4");
    } finally {
      await held.release();
    }

    expect(process.exitCode).toBe(5);
    expect(String(errors.mock.calls[0]?.[0])).toContain("Run command failed.");
    expect(await new ReportStore({ home: homeDir }).load("daily-4")).toBeNull();
  });

  it("reports a missing config with exit code 1", async () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);

    await cli("stages");

    expect(process.exitCode).toBe(1);
    expect(String(errors.mock.calls[0]?.[0])).toContain(`Pipeline config not found at ${configPath}.`);
  });
});
