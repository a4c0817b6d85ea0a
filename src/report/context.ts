import { ChartRenderer } from "../chart/renderer.js";
import { ensureDir, getChartDir, getLedgerDir } from "../config/paths.js";
import type { BucketReportConfig } from "../config/types.js";
import { Ledger } from "../ledger/ledger.js";
import { SeriesReader } from "../ledger/series.js";
import type { Logger } from "../logging/logger.js";
import { Notifier } from "../notify/notifier.js";
import { StatsSource } from "../stats/source.js";
import { runReport, type ReportDeps, type ReportRunSummary } from "./pipeline.js";

export interface ReportContext extends ReportDeps {
  readonly config: BucketReportConfig;
  readonly chartDir: string;
}

export function createReportContext(
  config: BucketReportConfig,
  logger: Logger,
): ReportContext {
  const ledger = new Ledger(ensureDir(getLedgerDir(config)), logger, {
    maxEntries: config.ledger.maxEntries,
    enforceOrder: config.ledger.enforceOrder,
    lock: { retries: config.ledger.lockRetries, staleMs: config.ledger.lockStaleMs },
  });

  return {
    config,
    logger,
    chartDir: ensureDir(getChartDir(config)),
    stats: new StatsSource(config.stats, logger),
    ledger,
    series: new SeriesReader(ledger),
    renderer: new ChartRenderer(logger, {
      width: config.report.chartWidth,
      panelHeight: config.report.panelHeight,
    }),
    notifier: new Notifier(config.mail, logger),
  };
}

export function runReportFor(ctx: ReportContext, today: Date = new Date()): Promise<ReportRunSummary> {
  return runReport(ctx, {
    today,
    chartDir: ctx.chartDir,
    windowDays: ctx.config.report.windowDays,
    recipients: ctx.config.mail.to,
    ccRecipients: ctx.config.mail.cc,
    subject: ctx.config.report.subject,
    body: ctx.config.report.body,
  });
}
