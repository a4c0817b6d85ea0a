import type { BucketUsageRecord } from "../stats/types.js";

function escapeLabel(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

/** Prometheus text exposition of one collection. */
export function renderMetrics(records: BucketUsageRecord[], durationSeconds: number): string {
  const lines = [
    "# HELP bucket_usage_gigabytes Bucket utilized size in GiB",
    "# TYPE bucket_usage_gigabytes gauge",
    ...records.map(
      (r) => `bucket_usage_gigabytes{bucket="${escapeLabel(r.bucketName)}"} ${r.usageGb}`,
    ),
    "# HELP bucket_objects Number of objects in the bucket",
    "# TYPE bucket_objects gauge",
    ...records.map((r) => `bucket_objects{bucket="${escapeLabel(r.bucketName)}"} ${r.objectCount}`),
    "# HELP bucket_stats_scrape_duration_seconds Time spent collecting bucket stats",
    "# TYPE bucket_stats_scrape_duration_seconds gauge",
    `bucket_stats_scrape_duration_seconds ${durationSeconds}`,
  ];
  return lines.join("\n") + "\n";
}
