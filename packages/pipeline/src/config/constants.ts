/**
 * Configuration constants for WorkerManager
 */
export const WORKER_MANAGER = {
  /**
   * Concurrent worker loops
   */
  DEFAULT_WORKERS: 8,

  /**
   * Lease length before another worker may claim the item
   */
  DEFAULT_VISIBILITY_TIMEOUT_MS: 15 * 60_000,

  /**
   * Claims of a catastrophic batch before it is dropped
   */
  DEFAULT_MAX_BATCH_ATTEMPTS: 3,

  /**
   * Wait before polling again when every remaining item is leased elsewhere
   */
  IDLE_POLL_INTERVAL_MS: 10_000,

  /**
   * Lease renewals per visibility timeout
   */
  RENEWALS_PER_TIMEOUT: 2,
} as const;

/**
 * Configuration constants for PipelineMetrics
 */
export const PIPELINE_METRICS = {
  /**
   * Interval of the periodic progress line
   */
  REPORT_INTERVAL_MS: 10_000,
} as const;

/**
 * Configuration constants for QueuePopulator
 */
export const QUEUE_POPULATOR = {
  /**
   * Target pages per work item
   */
  DEFAULT_PAGES_PER_GROUP: 500,

  /**
   * Documents opened to estimate the average page count
   */
  PAGE_COUNT_SAMPLE_SIZE: 100,

  /**
   * Average page count assumed when no sample could be read
   */
  DEFAULT_AVERAGE_PAGES: 10,

  /**
   * File extensions accepted as documents, lower case
   */
  DOCUMENT_EXTENSIONS: ['.pdf', '.png', '.jpg', '.jpeg'],

  /**
   * Extension of a list file holding one ref per line
   */
  LIST_EXTENSION: '.txt',
} as const;

/**
 * Process exit codes
 */
export const EXIT_CODE = {
  SUCCESS: 0,
  FAILURE: 1,
  CONFIGURATION: 2,
} as const;
