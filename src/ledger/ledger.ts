import { appendFile, readFile, writeFile } from "node:fs/promises";
import { mkdirSync } from "node:fs";
import type { Logger } from "../logging/logger.js";
import { formatDay } from "../report/dates.js";
import { isErrnoException } from "../utils/errno.js";
import { LedgerOrderError, PersistenceError, errorMessage } from "../report/errors.js";
import { withFileLock, type FileLockOptions } from "../utils/file-lock.js";
import { formatEntry, splitLines } from "./format.js";
import { ledgerPath } from "./paths.js";

export const DEFAULT_MAX_ENTRIES = 30;

export interface LedgerOptions {
  readonly maxEntries?: number;
  /** Reject an append whose date is not after the last line's date. */
  readonly enforceOrder?: boolean;
  readonly lock?: FileLockOptions;
}

/**
 * Per-bucket rolling history, one `YYYY-MM-DD:usage:count` line per run.
 *
 * An append trims the existing lines down to `maxEntries` first and then
 * adds the new one, so a file that already held `maxEntries` lines holds
 * `maxEntries + 1` until the next append trims it again.
 */
export class Ledger {
  private readonly maxEntries: number;
  private readonly enforceOrder: boolean;
  private readonly lock: FileLockOptions;
  private readonly logger: Logger;

  constructor(
    private readonly dir: string,
    logger: Logger,
    options: LedgerOptions = {},
  ) {
    mkdirSync(dir, { recursive: true });
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.enforceOrder = options.enforceOrder ?? false;
    this.lock = options.lock ?? {};
    this.logger = logger.child({ component: "ledger" });
  }

  pathFor(bucketName: string): string {
    return ledgerPath(this.dir, bucketName);
  }

  async append(
    bucketName: string,
    usageGb: number,
    objectCount: number,
    today: Date,
  ): Promise<void> {
    const date = formatDay(today);
    const line = formatEntry({ date, usageGb, objectCount });
    const filePath = this.pathFor(bucketName);

    try {
      await withFileLock(filePath, async () => {
        const existing = await this.readLines(filePath);
        if (existing === null) {
          await writeFile(filePath, line, { flag: "wx" });
          this.logger.debug({ bucket: bucketName, date }, "Created ledger");
          return;
        }

        this.checkOrder(bucketName, existing, date);

        const kept = [...existing];
        while (kept.length > this.maxEntries) {
          kept.shift();
        }
        if (kept.length !== existing.length) {
          this.logger.debug(
            { bucket: bucketName, dropped: existing.length - kept.length },
            "Trimmed ledger",
          );
        }

        await writeFile(filePath, kept.map((l) => `${l}\n`).join(""));
        await appendFile(filePath, line);
      }, this.lock);
    } catch (err) {
      if (err instanceof PersistenceError) throw err;
      throw new PersistenceError(
        `Failed to append to ledger of ${bucketName}: ${errorMessage(err)}`,
        bucketName,
        { cause: err },
      );
    }
  }

  /** Raw lines of a bucket's ledger, or `null` when it has none yet. */
  async lines(bucketName: string): Promise<string[] | null> {
    try {
      return await this.readLines(this.pathFor(bucketName));
    } catch (err) {
      throw new PersistenceError(
        `Failed to read ledger of ${bucketName}: ${errorMessage(err)}`,
        bucketName,
        { cause: err },
      );
    }
  }

  private async readLines(filePath: string): Promise<string[] | null> {
    try {
      return splitLines(await readFile(filePath, "utf-8"));
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return null;
      throw err;
    }
  }

  private checkOrder(bucketName: string, lines: string[], date: string): void {
    if (!this.enforceOrder) return;
    const last = lines[lines.length - 1];
    if (last === undefined) return;
    const lastDate = last.split(":", 1)[0] ?? "";
    // YYYY-MM-DD compares chronologically as a string
    if (date <= lastDate) {
      throw new LedgerOrderError(bucketName, lastDate, date);
    }
  }
}
