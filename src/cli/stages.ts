import type { AppContext } from "../app/context.js";
import type { Stage } from "../app/orchestrator/stage.js";

import { renderTable } from "./table.js";

export function stagesCommand(appContext: AppContext): void {
  const stages = appContext.registry.orderedStages();
  if (stages.length === 0) {
    console.log(`No stages configured in ${appContext.configPath}.`);
    return;
  }

  for (const line of formatStageList(stages)) {
    console.log(line);
  }
}

export function formatStageList(stages: Stage[]): string[] {
  return renderTable(stages, [
    { header: "Pos", value: (stage) => String(stage.position) },
    { header: "Stage", value: (stage) => stage.name },
    { header: "Requires", value: (stage) => stage.requires.join(",") || "-" },
    { header: "Produces", value: (stage) => stage.produces.join(",") || "-" },
    { header: "Description", value: (stage) => stage.description ?? "" },
  ]);
}
