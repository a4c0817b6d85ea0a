import { FormatError } from "../report/errors.js";
import type { LedgerEntry } from "./types.js";

export function formatEntry(entry: LedgerEntry): string {
  return `${entry.date}:${entry.usageGb}:${entry.objectCount}\n`;
}

/** Lines of a ledger file, without terminators. A trailing newline adds no line. */
export function splitLines(content: string): string[] {
  if (content.length === 0) return [];
  const lines = content.split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export function parseEntry(line: string): LedgerEntry {
  const fields = line.split(":");
  if (fields.length !== 3) {
    throw new FormatError(`Malformed ledger line "${line}": expected date:usage:count`);
  }
  const [date = "", rawUsage = "", rawCount = ""] = fields;
  const usage = rawUsage.trim();
  const count = rawCount.trim();

  const usageGb = Number(usage);
  if (usage === "" || !Number.isFinite(usageGb)) {
    throw new FormatError(`Malformed ledger line "${line}": usage "${usage}" is not a number`);
  }
  const objectCount = Number(count);
  if (count === "" || !Number.isInteger(objectCount)) {
    throw new FormatError(`Malformed ledger line "${line}": count "${count}" is not an integer`);
  }
  return { date, usageGb, objectCount };
}
