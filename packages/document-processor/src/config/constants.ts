/**
 * Configuration constants for DocumentProcessor
 */
export const DOCUMENT_PROCESSOR = {
  /**
   * Pages of one document processed at once
   */
  DEFAULT_PAGE_CONCURRENCY: 16,

  /**
   * Share of fallback pages above which a document is reported as degraded
   */
  DEFAULT_MAX_PAGE_ERROR_RATE: 0.004,
} as const;

/**
 * Values stamped on every output record
 */
export const OUTPUT_RECORD = {
  SOURCE: 'pagemill',
  VERSION: '0.1.0',
} as const;
