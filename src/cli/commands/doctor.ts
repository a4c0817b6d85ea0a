import { Command, Option } from "clipanion";
import { accessSync, constants, mkdirSync } from "node:fs";
import { loadConfig } from "../../config/loader.js";
import { getChartDir, getConfigPath, getLedgerDir } from "../../config/paths.js";
import { createLogger } from "../../logging/logger.js";
import { errorMessage } from "../../report/errors.js";
import { StatsSource } from "../../stats/source.js";

export class DoctorCommand extends Command {
  static override paths = [["doctor"]];

  static override usage = Command.Usage({
    description: "Check configuration, directories, the stats command and mail settings",
    examples: [["Run diagnostics", "bucket-report doctor"]],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    this.context.stdout.write("Bucket Report Doctor\n");
    this.context.stdout.write("====================\n\n");

    let allPassed = true;
    const pass = (msg: string): void => {
      this.context.stdout.write(`[PASS] ${msg}\n`);
    };
    const fail = (msg: string): void => {
      this.context.stdout.write(`[FAIL] ${msg}\n`);
      allPassed = false;
    };

    const configPath = this.config ?? getConfigPath();
    let config;
    try {
      config = loadConfig(this.config);
      pass(`Config valid (${configPath})`);
    } catch (err) {
      fail(`Config invalid (${configPath}): ${errorMessage(err)}`);
      process.exitCode = 1;
      return;
    }

    for (const [label, dir] of [
      ["Ledger dir", getLedgerDir(config)],
      ["Chart dir", getChartDir(config)],
    ] as const) {
      try {
        mkdirSync(dir, { recursive: true });
        accessSync(dir, constants.W_OK);
        pass(`${label} writable (${dir})`);
      } catch (err) {
        fail(`${label} not writable (${dir}): ${errorMessage(err)}`);
      }
    }

    const stats = new StatsSource(config.stats, createLogger({ level: "error" }));
    try {
      const buckets = await stats.getBuckets();
      pass(`Stats command returned ${buckets.length} bucket(s)`);
    } catch (err) {
      fail(`Stats command failed: ${errorMessage(err)}`);
    }

    const { mail } = config;
    if (mail.to.length + mail.cc.length === 0) {
      fail("No mail recipients configured (mail.to / mail.cc)");
    } else {
      pass(`Mail recipients: ${mail.to.length} to, ${mail.cc.length} cc via ${mail.host}:${mail.port}`);
    }
    if (!mail.user) {
      this.context.stdout.write("[WARN] mail.user not set, mail will be submitted without authentication\n");
    }

    this.context.stdout.write(
      allPassed ? "\nAll checks passed.\n" : "\nSome checks failed.\n",
    );
    if (!allPassed) process.exitCode = 1;
  }
}
