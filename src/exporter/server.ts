import { Hono } from "hono";
import { serve } from "@hono/node-server";
import type { Logger } from "../logging/logger.js";
import { errorMessage } from "../report/errors.js";
import type { BucketUsageRecord } from "../stats/types.js";
import { renderMetrics } from "./metrics.js";

export type StatsCollector = () => Promise<BucketUsageRecord[]>;

/** Serves live bucket stats for Prometheus scraping. */
export class MetricsServer {
  readonly app: Hono;
  private server: ReturnType<typeof serve> | null = null;
  private readonly startedAt = Date.now();
  private lastScrape: { at: number; ok: boolean; buckets: number } | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly collect: StatsCollector,
    private readonly port: number,
    private readonly hostname: string,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "exporter" });
    this.app = new Hono();
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.get("/metrics", async (c) => {
      const started = performance.now();
      try {
        const records = await this.collect();
        const duration = (performance.now() - started) / 1000;
        this.lastScrape = { at: Date.now(), ok: true, buckets: records.length };
        c.header("Content-Type", "text/plain; version=0.0.4; charset=utf-8");
        return c.body(renderMetrics(records, duration));
      } catch (err) {
        this.lastScrape = { at: Date.now(), ok: false, buckets: 0 };
        this.logger.error({ err }, "Bucket stats collection failed");
        return c.text(`collection failed: ${errorMessage(err)}\n`, 503);
      }
    });

    this.app.get("/health", (c) => {
      return c.json({
        status: this.lastScrape === null || this.lastScrape.ok ? "ok" : "degraded",
        uptime: Date.now() - this.startedAt,
        lastScrape: this.lastScrape,
      });
    });
  }

  async start(): Promise<void> {
    this.server = serve({
      fetch: this.app.fetch,
      port: this.port,
      hostname: this.hostname,
    });
    this.logger.info({ port: this.port, hostname: this.hostname }, "Metrics exporter listening");
  }

  async stop(): Promise<void> {
    if (this.server) {
      this.server.close();
      this.server = null;
    }
  }
}
