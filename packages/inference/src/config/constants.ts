/**
 * Configuration constants for InferenceClient
 */
export const INFERENCE_CLIENT = {
  /**
   * Maximum concurrent requests admitted to the backend
   */
  DEFAULT_MAX_IN_FLIGHT: 64,

  /**
   * Per-request timeout in milliseconds
   */
  DEFAULT_REQUEST_TIMEOUT_MS: 120_000,

  /**
   * Transport retry schedule
   */
  DEFAULT_RETRY: {
    maxAttempts: 5,
    baseDelayMs: 2_000,
    maxDelayMs: 60_000,
    multiplier: 2,
    jitter: 0.25,
  },

  /**
   * Backoff multiplier applied when the backend reports overload
   */
  RESOURCE_EXHAUSTED_BACKOFF_SCALE: 4,

  /**
   * Statuses meaning the backend is overloaded or out of memory
   */
  RESOURCE_EXHAUSTED_STATUSES: [429, 503, 507],

  /**
   * Gateway statuses treated as transport failures
   */
  GATEWAY_STATUSES: [502, 504],

  /**
   * Interval between health probes while waiting for the backend
   */
  HEALTH_CHECK_INTERVAL_MS: 2_000,

  /**
   * Interval between "still waiting" log lines
   */
  HEALTH_CHECK_LOG_INTERVAL_MS: 10_000,

  /**
   * Longest total wait for the backend before giving up
   */
  HEALTH_CHECK_CEILING_MS: 300_000,

  /**
   * Timeout of a single health probe request
   */
  HEALTH_PROBE_TIMEOUT_MS: 10_000,
} as const;

/**
 * Configuration constants for InferenceServer
 */
export const INFERENCE_SERVER = {
  COMMAND: 'vllm',

  /**
   * Restarts allowed after unexpected exits
   */
  MAX_RESTARTS: 5,

  RESTART_DELAY_MS: 5_000,

  /**
   * Longest wait for a freshly started server to pass its readiness probe
   */
  READY_TIMEOUT_MS: 600_000,

  READY_POLL_INTERVAL_MS: 1_000,

  /**
   * Grace period between SIGTERM and SIGKILL on stop
   */
  STOP_TIMEOUT_MS: 10_000,

  /**
   * Output lines that mean the loaded model is corrupted
   */
  FATAL_OUTPUT_PATTERNS: ['Detected errors during sampling'],
} as const;
