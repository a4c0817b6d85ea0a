import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { Ledger } from "../../src/ledger/ledger.js";
import { bucketFileStem, chartPath } from "../../src/ledger/paths.js";
import { LedgerOrderError, PersistenceError } from "../../src/report/errors.js";
import { withFileLock } from "../../src/utils/file-lock.js";
import { silentLogger } from "../helpers/fixtures.js";

function day(offset: number): Date {
  return new Date(2024, 0, 1 + offset);
}

function seedLines(count: number): string {
  return Array.from({ length: count }, (_, i) => {
    const d = new Date(Date.UTC(2023, 0, 1 + i)).toISOString().slice(0, 10);
    return `${d}:${i}.5:${i}\n`;
  }).join("");
}

function readLines(path: string): string[] {
  return readFileSync(path, "utf-8").split("\n").filter((l) => l.length > 0);
}

describe("Ledger", () => {
  let dir: string;
  let ledger: Ledger;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "bucket-report-ledger-"));
    ledger = new Ledger(dir, silentLogger());
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("creates a ledger holding just the first line", async () => {
    await ledger.append("b1", 12.5, 340, day(0));

    expect(readFileSync(join(dir, "b1"), "utf-8")).toBe("2024-01-01:12.5:340\n");
  });

  it("writes zero usage without a fraction", async () => {
    await ledger.append("empty", 0, 0, day(0));

    expect(readFileSync(join(dir, "empty"), "utf-8")).toBe("2024-01-01:0:0\n");
  });

  it("appends after existing lines", async () => {
    await ledger.append("b1", 1, 10, day(0));
    await ledger.append("b1", 2, 20, day(1));

    expect(readFileSync(join(dir, "b1"), "utf-8")).toBe(
      "2024-01-01:1:10\n2024-01-02:2:20\n",
    );
  });

  it("holds 31 lines after appending to a full ledger of 30", async () => {
    writeFileSync(join(dir, "b1"), seedLines(30));

    await ledger.append("b1", 99, 99, day(0));

    const lines = readLines(join(dir, "b1"));
    expect(lines).toHaveLength(31);
    expect(lines[0]).toBe("2023-01-01:0.5:0");
    expect(lines[30]).toBe("2024-01-01:99:99");
  });

  it("trims the oldest lines down to 30 before appending", async () => {
    writeFileSync(join(dir, "b1"), seedLines(31));

    await ledger.append("b1", 99, 99, day(0));

    const lines = readLines(join(dir, "b1"));
    expect(lines).toHaveLength(31);
    expect(lines[0]).toBe("2023-01-02:1.5:1");
  });

  it("trims an oversized ledger in one append", async () => {
    writeFileSync(join(dir, "b1"), seedLines(40));

    await ledger.append("b1", 99, 99, day(0));

    const lines = readLines(join(dir, "b1"));
    expect(lines).toHaveLength(31);
    expect(lines[0]).toBe("2023-01-11:10.5:10");
  });

  it("never exceeds 31 lines over many daily appends", async () => {
    for (let i = 0; i < 45; i++) {
      await ledger.append("b1", i, i, day(i));
      expect(readLines(join(dir, "b1")).length).toBeLessThanOrEqual(31);
    }
    const lines = readLines(join(dir, "b1"));
    expect(lines).toHaveLength(31);
    expect(lines[30]).toBe("2024-02-14:44:44");
  });

  it("honours a custom entry limit", async () => {
    const small = new Ledger(dir, silentLogger(), { maxEntries: 3 });
    writeFileSync(join(dir, "b1"), seedLines(5));

    await small.append("b1", 7, 7, day(0));

    expect(readLines(join(dir, "b1"))).toEqual([
      "2023-01-03:2.5:2",
      "2023-01-04:3.5:3",
      "2023-01-05:4.5:4",
      "2024-01-01:7:7",
    ]);
  });

  it("releases its lock after appending", async () => {
    await ledger.append("b1", 1, 1, day(0));

    expect(existsSync(join(dir, "b1.lock"))).toBe(false);
  });

  it("maps unsafe bucket names to a file stem", async () => {
    await ledger.append("tenant/b1", 1, 1, day(0));

    expect(ledger.pathFor("tenant/b1")).toBe(join(dir, "tenant%2Fb1"));
    expect(existsSync(join(dir, "tenant%2Fb1"))).toBe(true);
  });

  it("keeps buckets whose names differ only in unsafe characters apart", async () => {
    const ordered = new Ledger(dir, silentLogger(), { enforceOrder: true });

    await ordered.append("a/b", 1, 1, day(0));
    await ordered.append("a_b", 2, 2, day(0));

    expect(readLines(join(dir, "a%2Fb"))).toEqual(["2024-01-01:1:1"]);
    expect(readLines(join(dir, "a_b"))).toEqual(["2024-01-01:2:2"]);
  });

  it("accepts a repeated date when order is not enforced", async () => {
    await ledger.append("b1", 1, 1, day(0));
    await ledger.append("b1", 2, 2, day(0));

    expect(readLines(join(dir, "b1"))).toEqual(["2024-01-01:1:1", "2024-01-01:2:2"]);
  });

  it("returns null lines for a bucket without a ledger", async () => {
    expect(await ledger.lines("nothing")).toBeNull();
  });

  it("wraps I/O failures in a PersistenceError", async () => {
    mkdirSync(join(dir, "b2"));

    const err = await ledger.append("b2", 1, 1, day(0)).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PersistenceError);
    expect(err).toMatchObject({ bucketName: "b2" });
  });

  it("gives up on a busy lock after the configured retries", async () => {
    const impatient = new Ledger(dir, silentLogger(), { lock: { retries: 0 } });
    let release = (): void => {};
    const held = new Promise<void>((r) => {
      release = r;
    });
    let entered = (): void => {};
    const inside = new Promise<void>((r) => {
      entered = r;
    });
    const holder = withFileLock(impatient.pathFor("b1"), async () => {
      entered();
      await held;
    });
    await inside;

    const err = await impatient.append("b1", 1, 1, day(0)).catch((e: unknown) => e);

    release();
    await holder;
    expect(err).toBeInstanceOf(PersistenceError);
    expect(existsSync(join(dir, "b1"))).toBe(false);
  });
});

describe("Ledger with enforced order", () => {
  let dir: string;
  let ledger: Ledger;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "bucket-report-ledger-"));
    ledger = new Ledger(dir, silentLogger(), { enforceOrder: true });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("rejects a second append on the same day", async () => {
    await ledger.append("b1", 1, 1, day(0));

    await expect(ledger.append("b1", 2, 2, day(0))).rejects.toBeInstanceOf(LedgerOrderError);
    expect(readFileSync(join(dir, "b1"), "utf-8")).toBe("2024-01-01:1:1\n");
  });

  it("rejects an earlier date", async () => {
    await ledger.append("b1", 1, 1, day(5));

    await expect(ledger.append("b1", 2, 2, day(4))).rejects.toThrow(
      "Refusing to append 2024-01-05 to ledger of b1: last entry is 2024-01-06",
    );
  });

  it("accepts strictly later dates", async () => {
    await ledger.append("b1", 1, 1, day(0));
    await ledger.append("b1", 2, 2, day(1));

    expect(readLines(join(dir, "b1"))).toHaveLength(2);
  });
});

describe("bucketFileStem", () => {
  it("leaves safe names as they are", () => {
    expect(bucketFileStem("photos-2024_v1.bak")).toBe("photos-2024_v1.bak");
  });

  it("percent-encodes everything outside [A-Za-z0-9._-]", () => {
    expect(bucketFileStem("tenant/b1")).toBe("tenant%2Fb1");
    expect(bucketFileStem("100%")).toBe("100%25");
    expect(bucketFileStem("it's~(x)*!")).toBe("it%27s%7E%28x%29%2A%21");
  });

  it("gives distinct stems to names that used to collide", () => {
    expect(bucketFileStem("a/b")).not.toBe(bucketFileStem("a_b"));
    expect(bucketFileStem("a b")).not.toBe(bucketFileStem("a_b"));
  });

  it("encodes the dot-only names that would address a directory", () => {
    expect(bucketFileStem(".")).toBe("%2E");
    expect(bucketFileStem("..")).toBe("%2E%2E");
    expect(bucketFileStem("...")).toBe("...");
  });

  it("names charts after the stem and the day", () => {
    expect(chartPath("/charts", "tenant/b1", "2024-01-31")).toBe(
      join("/charts", "tenant%2Fb1-2024-01-31.png"),
    );
  });
});
