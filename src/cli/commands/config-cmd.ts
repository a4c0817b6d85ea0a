import { Command, Option } from "clipanion";
import { resolve } from "node:path";
import { loadConfig, readConfigSource } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import { bucketReportConfigSchema } from "../../config/schema.js";
import type { BucketReportConfig } from "../../config/types.js";
import { errorMessage } from "../../report/errors.js";

const REDACTED = "***REDACTED***";

export function redactConfig(config: BucketReportConfig): BucketReportConfig {
  return {
    ...config,
    mail: {
      ...config.mail,
      ...(config.mail.password ? { password: REDACTED } : {}),
    },
  };
}

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration (mail password redacted)",
    examples: [["Show config", "bucket-report config show"]],
  });

  async execute(): Promise<void> {
    let config;
    try {
      config = loadConfig();
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    this.context.stdout.write(JSON.stringify(redactConfig(config), null, 2) + "\n");
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "bucket-report config validate"],
      ["Validate specific file", "bucket-report config validate ./report.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    const configPath = resolve(this.configFile ?? getConfigPath());

    let source;
    try {
      source = readConfigSource(configPath);
    } catch (err) {
      this.reportInvalid(configPath, [errorMessage(err)]);
      return;
    }
    if (source === null) {
      this.context.stdout.write(`Config file not found: ${configPath}\n`);
      process.exitCode = 1;
      return;
    }

    const result = bucketReportConfigSchema.safeParse(source.raw);
    if (!result.success) {
      this.reportInvalid(
        configPath,
        result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
      );
      return;
    }
    this.context.stdout.write(`Config is valid: ${configPath}\n`);
  }

  private reportInvalid(configPath: string, problems: string[]): void {
    this.context.stdout.write(`Config is INVALID: ${configPath}\n`);
    for (const problem of problems) {
      this.context.stdout.write(`  ${problem}\n`);
    }
    process.exitCode = 1;
  }
}
