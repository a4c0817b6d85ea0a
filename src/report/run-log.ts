import type { Logger } from "../logging/logger.js";
import type { ReportRunSummary } from "./pipeline.js";

export interface ReportRunEntry {
  readonly trigger: string;
  readonly startedAt: number;
  readonly completedAt: number;
  readonly summary?: ReportRunSummary;
  readonly error?: string;
}

export class ReportRunLogger {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "report-run" });
  }

  logRun(entry: ReportRunEntry): void {
    const durationMs = entry.completedAt - entry.startedAt;
    const summary = entry.summary;

    if (!summary) {
      this.logger.error(
        { trigger: entry.trigger, durationMs, error: entry.error },
        "Report run aborted",
      );
      return;
    }

    const fields = {
      trigger: entry.trigger,
      durationMs,
      date: summary.date,
      buckets: summary.rows.length,
      charts: summary.charts.length,
      failures: summary.failures.length,
    };
    if (summary.delivery.ok && summary.failures.length === 0) {
      this.logger.info(fields, "Report run completed");
    } else if (summary.delivery.ok) {
      this.logger.warn(fields, "Report run completed with bucket failures");
    } else {
      this.logger.error(
        { ...fields, error: summary.delivery.error.message },
        "Report run finished without delivery",
      );
    }
  }
}
