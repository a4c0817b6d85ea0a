export interface LedgerEntry {
  /** `YYYY-MM-DD` */
  readonly date: string;
  readonly usageGb: number;
  readonly objectCount: number;
}

/** Three aligned sequences, one element per ledger line in file order. */
export interface LedgerSeries {
  readonly dates: string[];
  readonly usages: number[];
  readonly counts: number[];
}
