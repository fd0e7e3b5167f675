/**
 * Run event log.
 * Purpose: record what one run did, one JSON object per line, in
 * <home>/logs/run-<id>/orchestrator.jsonl.
 * Assumptions: every event belongs to exactly one run; stage events also name the stage.
 * A write that fails is reported on the console and never stops the run.
 * Usage: logRunEvent(logger, "stage.start", { stage: "writer", payload: { position: 2 } }).
 */

import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "./error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export type RunEvent = {
  ts: string;
  type: string;
  run_id: string;
  stage?: string;
  payload?: JsonObject;
};

export type RunEventFields = {
  stage?: string;
  payload?: JsonObject;
  at?: Date;
};

export interface RunEventLogger {
  readonly runId: string;
  write(event: RunEvent): void;
  close(): void;
}

// =============================================================================
// EVENTS
// =============================================================================

export function buildRunEvent(runId: string, type: string, fields: RunEventFields = {}): RunEvent {
  const event: RunEvent = {
    ts: (fields.at ?? new Date()).toISOString(),
    type,
    run_id: runId,
  };
  if (fields.stage) {
    event.stage = fields.stage;
  }
  if (fields.payload && Object.keys(fields.payload).length > 0) {
    event.payload = fields.payload;
  }
  return event;
}

export function logRunEvent(logger: RunEventLogger, type: string, fields: RunEventFields = {}): void {
  logger.write(buildRunEvent(logger.runId, type, fields));
}

// =============================================================================
// LOGGERS
// =============================================================================

/** Appends and fsyncs each event so the log survives a crash mid-run. */
export class JsonlLogger implements RunEventLogger {
  private readonly fd: number;
  private closed = false;

  constructor(
    public readonly filePath: string,
    public readonly runId: string,
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fd = fs.openSync(filePath, "a");
  }

  write(event: RunEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fd, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fd);
    } catch (err) {
      console.warn(`Warning: could not write ${event.type} to ${this.filePath}: ${formatErrorMessage(err)}`);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      fs.closeSync(this.fd);
    } catch (err) {
      console.warn(`Warning: could not close ${this.filePath}: ${formatErrorMessage(err)}`);
    }
  }
}

/** Keeps events in memory; the default when no log file is configured. */
export class MemoryLogger implements RunEventLogger {
  readonly events: RunEvent[] = [];

  constructor(public readonly runId: string) {}

  write(event: RunEvent): void {
    this.events.push(event);
  }

  close(): void {}
}
