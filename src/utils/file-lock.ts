import * as lockfile from "proper-lockfile";

export interface FileLockOptions {
  readonly retries?: number;
  readonly staleMs?: number;
}

/**
 * Run `fn` while holding an advisory `<filePath>.lock` directory lock.
 * The target file itself does not need to exist yet.
 */
export async function withFileLock<T>(
  filePath: string,
  fn: () => T | Promise<T>,
  options: FileLockOptions = {},
): Promise<T> {
  const release = await lockfile.lock(filePath, {
    retries: { retries: options.retries ?? 5, minTimeout: 100 },
    stale: options.staleMs ?? 30_000,
    realpath: false,
  });
  try {
    return await fn();
  } finally {
    await release();
  }
}
