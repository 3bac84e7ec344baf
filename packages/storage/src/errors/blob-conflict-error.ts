/**
 * Raised when a conditional write loses: the key already exists for a
 * create-only put, or its version changed for a compare-and-swap put.
 */
export class BlobConflictError extends Error {
  constructor(
    readonly key: string,
    message = `Conditional write rejected for ${key}`,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'BlobConflictError';
  }
}
