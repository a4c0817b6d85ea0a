import { FormatError } from "./errors.js";

const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

/** Calendar day in local time as `YYYY-MM-DD`. */
export function formatDay(date: Date): string {
  const y = String(date.getFullYear()).padStart(4, "0");
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

/**
 * Parse a strict `YYYY-MM-DD` string into its UTC midnight timestamp.
 * Rejects any other shape and impossible dates such as `2024-02-30`.
 */
export function parseDay(value: string): number {
  const match = DAY_PATTERN.exec(value);
  if (!match) {
    throw new FormatError(`Invalid date "${value}": expected YYYY-MM-DD`);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const time = Date.UTC(year, month - 1, day);
  const check = new Date(time);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    throw new FormatError(`Invalid date "${value}": no such calendar day`);
  }
  return time;
}

export function addDays(day: string, delta: number): string {
  const shifted = new Date(parseDay(day) + delta * MS_PER_DAY);
  return shifted.toISOString().slice(0, 10);
}

/** Local-time midnight of a `YYYY-MM-DD` day, the inverse of `formatDay`. */
export function dayToLocalDate(day: string): Date {
  const utc = new Date(parseDay(day));
  return new Date(utc.getUTCFullYear(), utc.getUTCMonth(), utc.getUTCDate());
}
