import type { ReportStore } from "../../core/report-store.js";

import type { ReportSink } from "./ports.js";

/** Persists every finalized report under <home>/reports for `status` and `runs`. */
export function createReportStoreSink(store: ReportStore): ReportSink {
  return {
    name: "report-store",
    deliver: async (report) => {
      await store.save(report);
    },
  };
}
