import type { AppContext } from "../app/context.js";
import type { QuarantineEntry } from "../core/quarantine.js";

import { normalizeCommandError } from "./command-errors.js";
import { formatTimestamp, renderTable } from "./table.js";

export async function quarantineListCommand(
  appContext: AppContext,
  opts: { json?: boolean } = {},
): Promise<void> {
  try {
    const entries = await appContext.quarantine.list();

    if (opts.json) {
      console.log(JSON.stringify(entries, null, 2));
      return;
    }

    if (entries.length === 0) {
      console.log(`Quarantine is empty (${appContext.quarantine.directory}).`);
      return;
    }

    for (const line of formatQuarantineList(entries)) {
      console.log(line);
    }
  } catch (error) {
    throw normalizeCommandError(error, { title: "Quarantine command failed." });
  }
}

export function formatQuarantineList(entries: QuarantineEntry[]): string[] {
  return renderTable(entries, [
    { header: "Moved", value: (entry) => formatTimestamp(entry.moved_at) },
    { header: "Original", value: (entry) => entry.original_path },
    { header: "Quarantined", value: (entry) => entry.quarantined_path },
    { header: "Reason", value: (entry) => entry.reason ?? "" },
  ]);
}
