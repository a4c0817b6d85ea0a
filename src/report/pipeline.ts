import { rm } from "node:fs/promises";
import type { ChartRenderer, RenderedChart } from "../chart/renderer.js";
import type { Ledger } from "../ledger/ledger.js";
import { chartPath } from "../ledger/paths.js";
import type { SeriesReader } from "../ledger/series.js";
import type { Logger } from "../logging/logger.js";
import type { Notifier } from "../notify/notifier.js";
import type { DeliveryResult, ReportRow } from "../notify/types.js";
import type { StatsSource } from "../stats/source.js";
import { addDays, formatDay } from "./dates.js";
import { errorMessage } from "./errors.js";

export interface ReportDeps {
  readonly stats: StatsSource;
  readonly ledger: Ledger;
  readonly series: SeriesReader;
  readonly renderer: ChartRenderer;
  readonly notifier: Notifier;
  readonly logger: Logger;
}

export interface ReportOptions {
  readonly today: Date;
  readonly chartDir: string;
  readonly windowDays: number;
  readonly recipients: string[];
  readonly ccRecipients: string[];
  readonly subject: string;
  readonly body: string;
}

export interface BucketFailure {
  readonly bucketName: string;
  readonly stage: "ledger" | "series" | "chart";
  readonly error: string;
}

export interface ReportRunSummary {
  readonly date: string;
  readonly windowStart: string;
  readonly rows: ReportRow[];
  readonly charts: string[];
  readonly failures: BucketFailure[];
  readonly delivery: DeliveryResult;
}

/**
 * One daily run: collect stats once, then for every bucket append its
 * ledger, re-read the history and render a chart; mail the table with the
 * charts rendered in this run and remove those files afterwards.
 *
 * A collection failure propagates and nothing is sent. A failure in one
 * bucket's ledger or chart drops only that chart; its row is still reported.
 */
export async function runReport(
  deps: ReportDeps,
  options: ReportOptions,
): Promise<ReportRunSummary> {
  const logger = deps.logger.child({ component: "report" });
  const today = formatDay(options.today);
  const windowStart = addDays(today, -options.windowDays);

  const buckets = await deps.stats.getBuckets();
  logger.info({ date: today, buckets: buckets.length }, "Starting report run");

  const rows: ReportRow[] = [];
  const charts: RenderedChart[] = [];
  const failures: BucketFailure[] = [];

  for (const record of buckets) {
    const row = deps.stats.getBucketStats(record);
    rows.push(row);

    let stage: BucketFailure["stage"] = "ledger";
    try {
      await deps.ledger.append(row.bucketName, row.usageGb, row.objectCount, options.today);
      stage = "series";
      const series = await deps.series.read(row.bucketName);
      stage = "chart";
      const chart = await deps.renderer.render(
        row.bucketName,
        series.dates,
        series.usages,
        series.counts,
        windowStart,
        today,
        chartPath(options.chartDir, row.bucketName, today),
      );
      charts.push(chart);
    } catch (err) {
      const error = errorMessage(err);
      failures.push({ bucketName: row.bucketName, stage, error });
      logger.error({ err, bucket: row.bucketName, stage }, "Bucket processing failed");
    }
  }

  const imagePaths = charts.map((c) => c.path);
  let delivery: DeliveryResult;
  try {
    delivery = await deps.notifier.send({
      recipients: options.recipients,
      ccRecipients: options.ccRecipients,
      subject: `${options.subject} ${today}`,
      body: options.body,
      rows,
      imagePaths,
    });
  } finally {
    await removeCharts(imagePaths, logger);
  }

  if (!delivery.ok) {
    logger.warn({ error: delivery.error.message }, "Report not delivered");
  }

  return { date: today, windowStart, rows, charts: imagePaths, failures, delivery };
}

async function removeCharts(paths: string[], logger: Logger): Promise<void> {
  for (const path of paths) {
    try {
      await rm(path, { force: true });
    } catch (err) {
      logger.warn({ err, path }, "Failed to remove chart");
    }
  }
}
