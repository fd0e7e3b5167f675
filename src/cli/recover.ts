import type { AppContext } from "../app/context.js";
import { runLockPath } from "../core/paths.js";

/**
 * Prints the commands that undo a bad run, filled in with this project's paths.
 */
export async function recoverCommand(appContext: AppContext): Promise<void> {
  const latest = await appContext.snapshots.latest();
  for (const line of formatRecoveryGuide(appContext, latest?.id ?? null)) {
    console.log(line);
  }
}

export function formatRecoveryGuide(appContext: AppContext, latestSnapshotId: string | null): string[] {
  const outputDir = appContext.config.output_dir;
  const quarantineDir = appContext.quarantine.directory;

  const lines = [
    "Recovery commands",
    "",
    "1. See what was moved aside:",
    "   trendloop quarantine list",
    "",
    "2. Put a quarantined file or directory back:",
    `   mv "${quarantineDir}/<timestamp>_<name>" "${outputDir}/<name>"`,
    "",
    "3. Roll the published tree back to the pre-run snapshot:",
  ];

  if (latestSnapshotId) {
    lines.push(`   trendloop snapshots restore ${latestSnapshotId}`);
  } else {
    lines.push("   (no snapshots yet)");
  }

  lines.push(
    "",
    "4. If the published tree is under git, discard uncommitted changes:",
    `   git -C "${outputDir}" checkout -- .`,
    "",
    `A run that died without releasing ${runLockPath(appContext.paths)} is reclaimed automatically on this host.`,
  );

  return lines;
}
