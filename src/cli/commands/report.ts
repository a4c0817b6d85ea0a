import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { createLogger } from "../../logging/logger.js";
import { createReportContext, runReportFor } from "../../report/context.js";
import { dayToLocalDate } from "../../report/dates.js";
import { errorMessage } from "../../report/errors.js";
import { formatUsage } from "../../notify/message.js";

export class ReportRunCommand extends Command {
  static override paths = [["report", "run"], Command.Default];

  static override usage = Command.Usage({
    description: "Collect bucket stats, update ledgers, render charts and mail the report",
    examples: [
      ["Run today's report", "bucket-report report run"],
      ["Run with a custom config", "bucket-report report run --config ./report.json"],
      ["Record the run under a given day", "bucket-report report run --date 2024-01-01"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  date = Option.String("--date", {
    description: "Day to record the run under (YYYY-MM-DD), defaults to today",
    required: false,
  });

  async execute(): Promise<void> {
    let today: Date;
    try {
      today = this.date ? dayToLocalDate(this.date) : new Date();
    } catch (err) {
      this.context.stdout.write(`${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    const config = loadConfig(this.config);
    const logger = createLogger(config.logging);
    const ctx = createReportContext(config, logger);

    let summary;
    try {
      summary = await runReportFor(ctx, today);
    } catch (err) {
      logger.error({ err }, "Report run aborted");
      this.context.stdout.write(`Report run aborted: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    this.context.stdout.write(`Report for ${summary.date} (window from ${summary.windowStart})\n`);
    for (const row of summary.rows) {
      this.context.stdout.write(
        `  ${row.bucketName}  ${formatUsage(row.usageGb)} GB  ${row.objectCount} objects\n`,
      );
    }
    for (const failure of summary.failures) {
      this.context.stdout.write(
        `  [FAIL] ${failure.bucketName} (${failure.stage}): ${failure.error}\n`,
      );
    }

    if (summary.delivery.ok) {
      this.context.stdout.write(`Sent: ${summary.delivery.messageId}\n`);
    } else {
      this.context.stdout.write(`Not sent: ${summary.delivery.error.message}\n`);
      process.exitCode = 1;
    }
  }
}
