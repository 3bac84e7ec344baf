/**
 * Raised when a conditional write cannot take the key's lock in time.
 * Unlike BlobConflictError, the condition was never evaluated.
 */
export class BlobLockTimeoutError extends Error {
  constructor(
    readonly key: string,
    readonly waitedMs: number,
    options?: ErrorOptions,
  ) {
    super(`Timed out after ${waitedMs}ms waiting for lock on ${key}`, options);
    this.name = 'BlobLockTimeoutError';
  }
}
