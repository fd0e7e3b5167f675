import { Command } from "commander";

import type { AppContext } from "../app/context.js";

import { loadConfigForCli } from "./config.js";
import { quarantineListCommand } from "./quarantine.js";
import { recoverCommand } from "./recover.js";
import { runCommand } from "./run.js";
import { parsePositiveInt, runsListCommand } from "./runs.js";
import { snapshotsListCommand, snapshotsPruneCommand, snapshotsRestoreCommand } from "./snapshots.js";
import { stagesCommand } from "./stages.js";
import { statusCommand } from "./status.js";

type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

export function buildCli(): Command {
  const program = new Command();

  const resolveContext = (): AppContext => {
    const globals = program.opts<GlobalOptions>();
    return loadConfigForCli({ explicitConfigPath: globals.config });
  };

  program
    .name("trendloop")
    .description("Snapshot-protected, fail-safe runner for content pipeline stages")
    .version("0.1.0")
    .option("--config <path>", "Pipeline config path (defaults to ./trendloop.yaml)")
    .option("--debug", "Show error details and stack traces")
    .option("--no-debug", "Hide error details");

  program
    .command("run")
    .description("Snapshot the output tree, then run every stage in order")
    .option("--run-id <id>", "Run ID (default: timestamp)")
    .option("--max-runtime <seconds>", "Override safety.max_runtime_seconds", parsePositiveInt)
    .option("--max-failures <n>", "Override safety.max_consecutive_failures", parsePositiveInt)
    .action(async (_opts, command: Command) => {
      const opts = command.opts<{ runId?: string; maxRuntime?: number; maxFailures?: number }>();
      const { exitCode } = await runCommand(resolveContext(), {
        runId: opts.runId,
        maxRuntimeSeconds: opts.maxRuntime,
        maxFailures: opts.maxFailures,
      });
      process.exitCode = exitCode;
    });

  program
    .command("stages")
    .description("List configured stages in invocation order")
    .action(() => {
      stagesCommand(resolveContext());
    });

  program
    .command("status")
    .description("Show the report of a run (latest by default)")
    .option("--run-id <id>", "Run ID (default: latest)")
    .option("--json", "Emit the raw report as JSON", false)
    .action(async (_opts, command: Command) => {
      const opts = command.opts<{ runId?: string; json?: boolean }>();
      await statusCommand(resolveContext(), { runId: opts.runId, json: opts.json });
    });

  program
    .command("runs")
    .description("List recorded runs, newest first")
    .option("--limit <n>", "Maximum number of runs", parsePositiveInt)
    .option("--json", "Emit JSON output", false)
    .action(async (_opts, command: Command) => {
      const opts = command.opts<{ limit?: number; json?: boolean }>();
      await runsListCommand(resolveContext(), { limit: opts.limit, json: opts.json });
    });

  const snapshots = program.command("snapshots").description("Inspect, restore and prune snapshots");

  snapshots
    .command("list")
    .description("List snapshots, newest first")
    .action(async () => {
      await snapshotsListCommand(resolveContext());
    });

  snapshots
    .command("restore <id>")
    .description("Restore a snapshot into output_dir (current contents go to quarantine)")
    .option("--force", "Do not prompt before restoring", false)
    .action(async (id: string, _opts, command: Command) => {
      const opts = command.opts<{ force?: boolean }>();
      await snapshotsRestoreCommand(resolveContext(), id, { force: opts.force });
    });

  snapshots
    .command("prune")
    .description("Move snapshots older than the retention window into quarantine")
    .option("--dry-run", "Show what would be moved", false)
    .option("--retention-days <n>", "Override snapshots.retention_days", parsePositiveInt)
    .action(async (_opts, command: Command) => {
      const opts = command.opts<{ dryRun?: boolean; retentionDays?: number }>();
      await snapshotsPruneCommand(resolveContext(), {
        dryRun: opts.dryRun,
        retentionDays: opts.retentionDays,
      });
    });

  const quarantine = program.command("quarantine").description("Inspect quarantined files");

  quarantine
    .command("list")
    .description("List everything moved into quarantine")
    .option("--json", "Emit JSON output", false)
    .action(async (_opts, command: Command) => {
      const opts = command.opts<{ json?: boolean }>();
      await quarantineListCommand(resolveContext(), { json: opts.json });
    });

  program
    .command("recover")
    .description("Print recovery commands for this project")
    .action(async () => {
      await recoverCommand(resolveContext());
    });

  return program;
}
