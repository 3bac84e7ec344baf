import { delay } from 'es-toolkit';

/**
 * Options for RetryPolicy
 */
export interface RetryPolicyOptions {
  /** Total attempts including the first call (default: 5) */
  maxAttempts?: number;
  /** Delay before the first retry in milliseconds (default: 1000) */
  baseDelayMs?: number;
  /** Upper bound for any single delay in milliseconds (default: 60000) */
  maxDelayMs?: number;
  /** Growth factor between consecutive delays (default: 2) */
  multiplier?: number;
  /** Random spread added on top of each delay, as a fraction (default: 0.25) */
  jitter?: number;
  /** Random source in [0, 1), overridable in tests */
  random?: () => number;
}

/**
 * Information passed to the onRetry hook before sleeping
 */
export interface RetryAttempt {
  /** Attempt number that just failed (1-based) */
  attempt: number;
  /** Milliseconds to wait before the next attempt */
  delayMs: number;
  error: unknown;
}

export interface RetryExecuteOptions {
  /** Return false to rethrow immediately (default: retry everything) */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Multiplier applied to the computed delay for this error (default: 1) */
  delayScale?: (error: unknown) => number;
  onRetry?: (info: RetryAttempt) => void;
  /** Aborting interrupts the backoff sleep */
  signal?: AbortSignal;
}

const DEFAULTS = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 60_000,
  multiplier: 2,
  jitter: 0.25,
} as const;

/**
 * Exponential backoff with jitter and a delay cap.
 *
 * Delays within one `execute` call never decrease: each delay is at least
 * the previous one, and all are capped at `maxDelayMs`.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly multiplier: number;
  readonly jitter: number;
  private readonly random: () => number;

  constructor(options: RetryPolicyOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? DEFAULTS.maxAttempts;
    this.baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
    this.multiplier = options.multiplier ?? DEFAULTS.multiplier;
    this.jitter = options.jitter ?? DEFAULTS.jitter;
    this.random = options.random ?? Math.random;

    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new RangeError('maxAttempts must be a positive integer');
    }
    if (this.multiplier < 1) {
      throw new RangeError('multiplier must be at least 1');
    }
    if (this.jitter < 0 || this.baseDelayMs < 0 || this.maxDelayMs < 0) {
      throw new RangeError('delays and jitter must not be negative');
    }
  }

  /**
   * Raw delay for the given retry index (0 = first retry), before the
   * non-decreasing adjustment applied by `execute`.
   */
  delayFor(retryIndex: number, scale = 1): number {
    const exponential =
      this.baseDelayMs * scale * Math.pow(this.multiplier, retryIndex);
    const jittered = exponential * (1 + this.jitter * this.random());
    return Math.min(this.maxDelayMs, Math.round(jittered));
  }

  /**
   * Call `fn` until it resolves, the error is not retryable, or attempts
   * run out. The last error is rethrown unchanged.
   */
  async execute<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryExecuteOptions = {},
  ): Promise<T> {
    const { shouldRetry = () => true, delayScale, onRetry, signal } = options;
    let previousDelay = 0;

    for (let attempt = 1; ; attempt++) {
      try {
        return await fn(attempt);
      } catch (error) {
        if (attempt >= this.maxAttempts || !shouldRetry(error, attempt)) {
          throw error;
        }
        const scale = delayScale ? delayScale(error) : 1;
        const delayMs = Math.min(
          this.maxDelayMs,
          Math.max(previousDelay, this.delayFor(attempt - 1, scale)),
        );
        previousDelay = delayMs;
        onRetry?.({ attempt, delayMs, error });
        await delay(delayMs, { signal });
      }
    }
  }
}
