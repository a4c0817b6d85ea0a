import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { createLogger } from "../../logging/logger.js";
import { createReportContext, runReportFor } from "../../report/context.js";
import { ReportScheduler } from "../../schedule/service.js";

export class ScheduleCommand extends Command {
  static override paths = [["schedule"]];

  static override usage = Command.Usage({
    description: "Run the report daily in the foreground on the configured cron schedule",
    examples: [
      ["Start the scheduler", "bucket-report schedule"],
      ["Run once immediately, then keep the schedule", "bucket-report schedule --run-now"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  runNow = Option.Boolean("--run-now", false, {
    description: "Run a report immediately before waiting for the schedule",
  });

  async execute(): Promise<void> {
    const config = loadConfig(this.config);
    const logger = createLogger(config.logging);
    const ctx = createReportContext(config, logger);
    const scheduler = new ReportScheduler(
      config.schedule,
      (today) => runReportFor(ctx, today),
      logger,
    );

    scheduler.start();
    if (this.runNow) {
      await scheduler.runNow("manual");
    }

    await new Promise<void>((resolve) => {
      const shutdown = (signal: NodeJS.Signals): void => {
        logger.info({ signal }, "Shutting down");
        scheduler.stop();
        resolve();
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });
  }
}
