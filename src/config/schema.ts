import { z } from "zod";
import type { BucketReportConfig } from "./types.js";

const statsSchema = z.object({
  command: z.string().min(1).default("radosgw-admin"),
  args: z.array(z.string()).default(["bucket", "stats", "--format", "json"]),
  cluster: z.string().min(1).optional(),
  conf: z.string().min(1).optional(),
  keyring: z.string().min(1).optional(),
  timeoutMs: z.number().int().min(0).default(0),
});

const ledgerSchema = z.object({
  dir: z.string().min(1).optional(),
  maxEntries: z.number().int().positive().default(30),
  enforceOrder: z.boolean().default(true),
  lockRetries: z.number().int().min(0).default(5),
  // proper-lockfile raises anything lower to 2000
  lockStaleMs: z.number().int().min(2000).default(30_000),
});

const reportSchema = z.object({
  chartDir: z.string().min(1).optional(),
  windowDays: z.number().int().positive().default(30),
  subject: z.string().min(1).default("Bucket usage report"),
  body: z.string().default("Daily bucket usage summary."),
  chartWidth: z.number().int().positive().default(800),
  panelHeight: z.number().int().positive().default(240),
});

const mailSchema = z.object({
  host: z.string().min(1).default("localhost"),
  port: z.number().int().positive().default(587),
  user: z.string().optional(),
  password: z.string().optional(),
  from: z.string().min(1).default("bucket-report@localhost"),
  to: z.array(z.string().min(1)).default([]),
  cc: z.array(z.string().min(1)).default([]),
});

const scheduleSchema = z.object({
  cron: z.string().min(1).default("0 7 * * *"),
  timezone: z.string().min(1).optional(),
});

const exporterSchema = z.object({
  port: z.number().int().positive().default(9280),
  hostname: z.string().default("0.0.0.0"),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const bucketReportConfigSchema = z.object({
  stats: statsSchema.default({}),
  ledger: ledgerSchema.default({}),
  report: reportSchema.default({}),
  mail: mailSchema.default({}),
  schedule: scheduleSchema.default({}),
  exporter: exporterSchema.default({}),
  logging: loggingSchema.default({}),
});

export function parseConfig(raw: unknown): BucketReportConfig {
  return bucketReportConfigSchema.parse(raw);
}
