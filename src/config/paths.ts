import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import type { BucketReportConfig } from "./types.js";

export function getStateDir(): string {
  return process.env["BUCKET_REPORT_STATE_DIR"] ?? join(homedir(), ".bucket-report");
}

export function getConfigPath(): string {
  return process.env["BUCKET_REPORT_CONFIG_PATH"] ?? "bucket-report.config.json";
}

export function getLedgerDir(config: BucketReportConfig): string {
  return config.ledger.dir ?? join(getStateDir(), "ledger");
}

export function getChartDir(config: BucketReportConfig): string {
  return config.report.chartDir ?? join(getStateDir(), "charts");
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
