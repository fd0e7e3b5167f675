import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "./error-format.js";
import type { PathsContext } from "./paths.js";
import { reportPath, reportsDir } from "./paths.js";
import { RunReportSchema, type RunReport } from "./run-report.js";
import { readJsonFile, writeJsonFile } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type ReportSummaryRow = {
  runId: string;
  verdict: RunReport["verdict"];
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  stageCount: number;
};

// =============================================================================
// REPORT STORE
// =============================================================================

export class ReportStore {
  constructor(private readonly paths: PathsContext) {}

  pathFor(runId: string): string {
    return reportPath(this.paths, runId);
  }

  async save(report: RunReport): Promise<string> {
    const target = this.pathFor(report.run_id);
    await writeJsonFile(target, report);
    return target;
  }

  async has(runId: string): Promise<boolean> {
    return fse.pathExists(this.pathFor(runId));
  }

  async load(runId: string): Promise<RunReport | null> {
    const target = this.pathFor(runId);
    if (!(await fse.pathExists(target))) {
      return null;
    }

    const parsed = RunReportSchema.safeParse(await readJsonFile(target));
    if (!parsed.success) {
      throw new Error(`Run report at ${target} is invalid: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async list(opts: { limit?: number } = {}): Promise<RunReport[]> {
    const runIds = await this.listRunIds();
    const reports: RunReport[] = [];

    for (const runId of runIds) {
      const report = await this.tryLoad(runId);
      if (report) reports.push(report);
    }

    reports.sort((a, b) => b.started_at.localeCompare(a.started_at));
    return opts.limit !== undefined ? reports.slice(0, opts.limit) : reports;
  }

  async latest(): Promise<RunReport | null> {
    const [latest] = await this.list({ limit: 1 });
    return latest ?? null;
  }

  /** A corrupt report is skipped so one bad file does not hide the rest of the history. */
  private async tryLoad(runId: string): Promise<RunReport | null> {
    try {
      return await this.load(runId);
    } catch (err) {
      console.warn(`Warning: skipping unreadable run report ${this.pathFor(runId)}: ${formatErrorMessage(err)}`);
      return null;
    }
  }

  private async listRunIds(): Promise<string[]> {
    const dir = reportsDir(this.paths);
    if (!(await fse.pathExists(dir))) return [];

    const files = await fs.readdir(dir);
    return files
      .filter((file) => file.startsWith("run-") && file.endsWith(".json"))
      .map((file) => path.basename(file, ".json").slice("run-".length));
  }
}

export function summarizeReport(report: RunReport): ReportSummaryRow {
  return {
    runId: report.run_id,
    verdict: report.verdict,
    startedAt: report.started_at,
    finishedAt: report.finished_at,
    durationMs: report.duration_ms,
    stageCount: report.entries.length,
  };
}
