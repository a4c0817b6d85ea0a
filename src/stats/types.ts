import { z } from "zod";

/** One usage category of a bucket, e.g. `rgw.main`. Sizes are in KiB. */
export const usageCategorySchema = z
  .object({
    size_kb: z.number().optional(),
    size_kb_actual: z.number().optional(),
    size_kb_utilized: z.number().optional(),
    num_objects: z.number().int().optional(),
  })
  .passthrough();

export const bucketStatsSchema = z
  .object({
    bucket: z.string().min(1),
    usage: z.record(z.string(), usageCategorySchema).optional(),
  })
  .passthrough();

export const bucketStatsListSchema = z.array(bucketStatsSchema);

/** A bucket entry as printed by `radosgw-admin bucket stats`. */
export type RawBucketStats = z.infer<typeof bucketStatsSchema>;

export interface BucketUsageRecord {
  readonly bucketName: string;
  readonly usageGb: number;
  readonly objectCount: number;
}

/** Runs a command and resolves with its standard output. */
export type CommandRunner = (
  command: string,
  args: string[],
  timeoutMs: number,
) => Promise<string>;
