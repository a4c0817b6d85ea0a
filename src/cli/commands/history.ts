import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { getLedgerDir } from "../../config/paths.js";
import { Ledger } from "../../ledger/ledger.js";
import { SeriesReader } from "../../ledger/series.js";
import { createLogger } from "../../logging/logger.js";
import { formatUsage } from "../../notify/message.js";
import { errorMessage } from "../../report/errors.js";

export class HistoryCommand extends Command {
  static override paths = [["history"]];

  static override usage = Command.Usage({
    description: "Print the recorded usage history of a bucket",
    examples: [["Show a bucket's ledger", "bucket-report history photos"]],
  });

  bucket = Option.String({ name: "bucket", required: true });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    const config = loadConfig(this.config);
    const logger = createLogger(config.logging);
    const ledger = new Ledger(getLedgerDir(config), logger);

    let series;
    try {
      series = await new SeriesReader(ledger).read(this.bucket);
    } catch (err) {
      this.context.stdout.write(`Failed to read history: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    if (series.dates.length === 0) {
      this.context.stdout.write(`No history recorded for ${this.bucket}.\n`);
      return;
    }

    this.context.stdout.write(`History of ${this.bucket} (${series.dates.length} entries):\n`);
    series.dates.forEach((date, i) => {
      this.context.stdout.write(
        `  ${date}  ${formatUsage(series.usages[i] ?? 0).padStart(10)} GB  ${series.counts[i] ?? 0} objects\n`,
      );
    });
  }
}
