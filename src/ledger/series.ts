import { FormatError } from "../report/errors.js";
import type { Ledger } from "./ledger.js";
import { parseEntry } from "./format.js";
import type { LedgerEntry, LedgerSeries } from "./types.js";

/** Re-reads a bucket's ledger as aligned date, usage and count sequences. */
export class SeriesReader {
  constructor(private readonly ledger: Ledger) {}

  async read(bucketName: string): Promise<LedgerSeries> {
    const lines = (await this.ledger.lines(bucketName)) ?? [];
    const dates: string[] = [];
    const usages: number[] = [];
    const counts: number[] = [];

    lines.forEach((line, index) => {
      const entry = parseLine(bucketName, line, index + 1);
      dates.push(entry.date);
      usages.push(entry.usageGb);
      counts.push(entry.objectCount);
    });

    return { dates, usages, counts };
  }
}

function parseLine(bucketName: string, line: string, lineNo: number): LedgerEntry {
  try {
    return parseEntry(line);
  } catch (err) {
    if (err instanceof FormatError) {
      throw new FormatError(`${bucketName} line ${lineNo}: ${err.message}`, { cause: err });
    }
    throw err;
  }
}
