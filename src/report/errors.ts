/** The admin stats command is missing, exited non-zero, or printed unusable output. */
export class CollectionError extends Error {
  constructor(
    message: string,
    public readonly exitCode?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "CollectionError";
  }
}

/** A bucket ledger could not be read or written. */
export class PersistenceError extends Error {
  constructor(
    message: string,
    public readonly bucketName: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

/** An append whose date does not follow the ledger's last entry. */
export class LedgerOrderError extends PersistenceError {
  constructor(
    bucketName: string,
    public readonly lastDate: string,
    public readonly attemptedDate: string,
  ) {
    super(
      `Refusing to append ${attemptedDate} to ledger of ${bucketName}: last entry is ${lastDate}`,
      bucketName,
    );
    this.name = "LedgerOrderError";
  }
}

/** A ledger line or date string does not have the expected structure. */
export class FormatError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "FormatError";
  }
}

export class DeliveryError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DeliveryError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
