import { join } from "node:path";

const RESERVED_URI_CHARS = /[!'()*~]/g;

function percentEncode(char: string): string {
  return `%${char.charCodeAt(0).toString(16).toUpperCase().padStart(2, "0")}`;
}

/**
 * File stem for a bucket. Every character outside `[A-Za-z0-9._-]` is
 * percent-encoded (`tenant/bucket` becomes `tenant%2Fbucket`), so distinct
 * bucket names never share a ledger or chart file.
 */
export function bucketFileStem(bucketName: string): string {
  const stem = encodeURIComponent(bucketName).replace(RESERVED_URI_CHARS, percentEncode);
  return stem === "." || stem === ".." ? stem.replace(/\./g, percentEncode) : stem;
}

export function ledgerPath(ledgerDir: string, bucketName: string): string {
  return join(ledgerDir, bucketFileStem(bucketName));
}

export function chartPath(chartDir: string, bucketName: string, day: string): string {
  return join(chartDir, `${bucketFileStem(bucketName)}-${day}.png`);
}
