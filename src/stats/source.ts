import { execFile } from "node:child_process";
import type { StatsConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { CollectionError, errorMessage } from "../report/errors.js";
import {
  bucketStatsListSchema,
  type BucketUsageRecord,
  type CommandRunner,
  type RawBucketStats,
} from "./types.js";

const MAIN_CATEGORY = "rgw.main";
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export const execCommand: CommandRunner = (command, args, timeoutMs) =>
  new Promise<string>((resolve, reject) => {
    execFile(
      command,
      args,
      { timeout: timeoutMs, maxBuffer: MAX_OUTPUT_BYTES, encoding: "utf-8" },
      (error, stdout, stderr) => {
        if (!error) {
          resolve(stdout);
          return;
        }
        if (error.code === "ENOENT") {
          reject(new CollectionError(`Command not found: ${command}`, undefined, { cause: error }));
          return;
        }
        const exitCode = typeof error.code === "number" ? error.code : undefined;
        const detail = stderr.trim() || error.message;
        reject(
          new CollectionError(
            `${command} exited with ${exitCode ?? error.signal ?? "error"}: ${detail}`,
            exitCode,
            { cause: error },
          ),
        );
      },
    );
  });

export class StatsSource {
  private readonly logger: Logger;

  constructor(
    private readonly config: StatsConfig,
    logger: Logger,
    private readonly run: CommandRunner = execCommand,
  ) {
    this.logger = logger.child({ component: "stats" });
  }

  /** Full argument vector, with the cluster options placed before the subcommand. */
  commandArgs(): string[] {
    const args: string[] = [];
    if (this.config.conf) args.push("-c", this.config.conf);
    if (this.config.cluster) args.push("--cluster", this.config.cluster);
    if (this.config.keyring) args.push("-k", this.config.keyring);
    return [...args, ...this.config.args];
  }

  async getBuckets(): Promise<RawBucketStats[]> {
    const args = this.commandArgs();
    this.logger.debug({ command: this.config.command, args }, "Querying bucket stats");

    let stdout: string;
    try {
      stdout = await this.run(this.config.command, args, this.config.timeoutMs);
    } catch (err) {
      if (err instanceof CollectionError) throw err;
      throw new CollectionError(`Failed to run ${this.config.command}: ${errorMessage(err)}`, undefined, {
        cause: err,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(stdout);
    } catch (err) {
      throw new CollectionError(`Malformed JSON from ${this.config.command}: ${errorMessage(err)}`, undefined, {
        cause: err,
      });
    }

    const result = bucketStatsListSchema.safeParse(parsed);
    if (!result.success) {
      throw new CollectionError(
        `Unexpected bucket stats shape from ${this.config.command}: ${result.error.message}`,
      );
    }

    this.logger.info({ buckets: result.data.length }, "Collected bucket stats");
    return result.data;
  }

  /**
   * Usage is reported in KiB and converted with two divisions by 1024, so
   * `usageGb` is in GiB even though it is labelled GB downstream.
   */
  getBucketStats(record: RawBucketStats): BucketUsageRecord {
    const main = record.usage?.[MAIN_CATEGORY];
    if (!main) {
      return { bucketName: record.bucket, usageGb: 0, objectCount: 0 };
    }
    const sizeKb = main.size_kb_utilized ?? main.size_kb ?? 0;
    return {
      bucketName: record.bucket,
      usageGb: sizeKb / 1024 / 1024,
      objectCount: main.num_objects ?? 0,
    };
  }

  async collect(): Promise<BucketUsageRecord[]> {
    const buckets = await this.getBuckets();
    return buckets.map((b) => this.getBucketStats(b));
  }
}
