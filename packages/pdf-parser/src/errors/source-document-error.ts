/**
 * SourceDocumentError
 *
 * A source document is missing, unreadable, or not a supported format.
 * Retrying cannot fix it, so the document is reported and skipped.
 */
export class SourceDocumentError extends Error {
  constructor(
    public readonly ref: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`${ref}: ${message}`, options);
    this.name = 'SourceDocumentError';
  }

  /**
   * Create SourceDocumentError from unknown error with context
   */
  static fromError(ref: string, context: string, error: unknown): SourceDocumentError {
    const detail = error instanceof Error ? error.message : String(error);
    return new SourceDocumentError(ref, `${context}: ${detail}`, {
      cause: error,
    });
  }
}
