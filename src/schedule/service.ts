import { Cron } from "croner";
import type { ScheduleConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { errorMessage } from "../report/errors.js";
import type { ReportRunSummary } from "../report/pipeline.js";
import { ReportRunLogger } from "../report/run-log.js";

export type ReportJob = (today: Date) => Promise<ReportRunSummary>;

/**
 * Runs the daily report in-process on a cron expression. Runs never
 * overlap: a tick that fires while a run is in progress is skipped.
 */
export class ReportScheduler {
  private cron: Cron | null = null;
  private running = false;
  private readonly runLogger: ReportRunLogger;
  private readonly logger: Logger;

  constructor(
    private readonly config: ScheduleConfig,
    private readonly job: ReportJob,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "scheduler" });
    this.runLogger = new ReportRunLogger(logger);
  }

  start(): void {
    this.stop();
    this.cron = new Cron(
      this.config.cron,
      { timezone: this.config.timezone, protect: true },
      () => {
        this.runNow("schedule").catch((err) => {
          this.logger.error({ err }, "Unhandled report run error");
        });
      },
    );
    this.logger.info(
      { cron: this.config.cron, next: this.nextRun()?.toISOString() },
      "Report scheduler started",
    );
  }

  stop(): void {
    if (!this.cron) return;
    this.cron.stop();
    this.cron = null;
    this.logger.info("Report scheduler stopped");
  }

  nextRun(): Date | null {
    return this.cron?.nextRun() ?? null;
  }

  /** Resolves with the summary, or `null` when the run was skipped or aborted. */
  async runNow(trigger: string, today: Date = new Date()): Promise<ReportRunSummary | null> {
    if (this.running) {
      this.logger.warn({ trigger }, "Report run already in progress, skipping");
      return null;
    }

    this.running = true;
    const startedAt = Date.now();
    try {
      const summary = await this.job(today);
      this.runLogger.logRun({ trigger, startedAt, completedAt: Date.now(), summary });
      return summary;
    } catch (err) {
      this.runLogger.logRun({
        trigger,
        startedAt,
        completedAt: Date.now(),
        error: errorMessage(err),
      });
      return null;
    } finally {
      this.running = false;
    }
  }
}
