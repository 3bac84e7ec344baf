/**
 * Configuration constants for PageProcessor
 */
export const PAGE_PROCESSOR = {
  /**
   * Inference calls per page before falling back
   */
  DEFAULT_MAX_ATTEMPTS: 8,

  /**
   * Sampling temperature per attempt. Attempts past the end reuse the
   * last entry.
   */
  TEMPERATURE_SCHEDULE: [0.1, 0.1, 0.2, 0.3, 0.5, 0.8, 0.1, 0.8],

  /**
   * First attempt (1-based) sent without the text-layer hint
   */
  NO_ANCHOR_FROM_ATTEMPT: 7,

  /**
   * Character budget of the text-layer hint on the first attempt
   */
  DEFAULT_TARGET_ANCHOR_TEXT_LENGTH: 6000,

  /**
   * Context window of the served model in tokens
   */
  DEFAULT_MODEL_MAX_CONTEXT: 8192,

  /**
   * Generation limit per request in tokens
   */
  DEFAULT_MAX_OUTPUT_TOKENS: 4500,

  /**
   * Longest side of the rendered page image in pixels
   */
  DEFAULT_TARGET_LONGEST_IMAGE_DIM: 1024,
} as const;

/**
 * Configuration constants for PageRenderer
 */
export const PAGE_RENDERER = {
  /**
   * Rasterization density before downscaling to the target size
   */
  DENSITY: 200,

  /**
   * Concurrent render processes when no limit is given
   */
  DEFAULT_MAX_PROCESSES: 4,
} as const;
