import type { LoggerMethods } from '@pagemill/logger';
import type { MetricsSink } from '@pagemill/model';
import type { LanguageModel } from 'ai';

import { createOpenAI } from '@ai-sdk/openai';
import { RetryPolicy, Semaphore } from '@pagemill/shared';
import { APICallError, RetryError, generateText } from 'ai';
import { delay } from 'es-toolkit';
import { z } from 'zod/v4';

import { INFERENCE_CLIENT } from './config/constants';
import {
  BackendUnavailableError,
  InferenceError,
  InferenceRequestError,
  ModelMismatchError,
  NetworkError,
  RequestCancelledError,
  ResourceExhaustedError,
} from './errors/inference-error';

export interface SamplingParams {
  temperature: number;
  maxOutputTokens: number;
}

export interface CompletionRequest {
  prompt: string;
  /** PNG bytes of the rendered page */
  image: Buffer;
  sampling: SamplingParams;
  /** Overrides the client's request timeout */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface CompletionResult {
  text: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  finishReason: string;
}

export interface InferenceClientOptions {
  /** Server root, e.g. http://localhost:30024 (the /v1 suffix is added) */
  baseUrl: string;
  /** Served model id */
  model: string;
  /** Bearer token, when the endpoint requires one */
  apiKey?: string;
  /** Maximum concurrent requests (default: 64) */
  maxInFlight?: number;
  /** Per-request timeout in milliseconds (default: 120000) */
  requestTimeoutMs?: number;
  /** Transport retry schedule */
  retryPolicy?: RetryPolicy;
  /** Longest wait for the backend to become healthy (default: 300000) */
  healthCheckCeilingMs?: number;
  /** Interval between health probes (default: 2000) */
  healthCheckIntervalMs?: number;
  /** HTTP implementation, overridable in tests */
  fetch?: typeof fetch;
  /** Receives a `requestRetries` increment per transport retry */
  metrics?: MetricsSink;
}

const modelListSchema = z.object({
  data: z.array(z.object({ id: z.string() })),
});

/**
 * Client for an OpenAI-compatible chat-completions endpoint serving a
 * vision model.
 *
 * - A semaphore admits at most `maxInFlight` requests at a time; the
 *   runtime's keep-alive agent reuses connections between them.
 * - Transport failures are retried with exponential backoff. Overload
 *   responses back off longer.
 * - After a transport failure the backend is presumed down: the next
 *   attempt first waits for the health probe to pass, bounded by a
 *   ceiling after which BackendUnavailableError is raised. Concurrent
 *   callers share one probe loop.
 */
export class InferenceClient {
  readonly model: string;
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;
  private readonly apiKey?: string;
  private readonly admission: Semaphore;
  private readonly requestTimeoutMs: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly healthCheckCeilingMs: number;
  private readonly healthCheckIntervalMs: number;
  private readonly languageModel: LanguageModel;
  private readonly metrics?: MetricsSink;
  private backendSuspect = false;
  private healthWait: Promise<void> | null = null;
  private closed = false;

  constructor(
    private readonly logger: LoggerMethods,
    options: InferenceClientOptions,
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.model = options.model;
    this.apiKey = options.apiKey;
    this.fetchFn = options.fetch ?? fetch;
    this.metrics = options.metrics;
    this.admission = new Semaphore(
      options.maxInFlight ?? INFERENCE_CLIENT.DEFAULT_MAX_IN_FLIGHT,
    );
    this.requestTimeoutMs =
      options.requestTimeoutMs ?? INFERENCE_CLIENT.DEFAULT_REQUEST_TIMEOUT_MS;
    this.retryPolicy =
      options.retryPolicy ?? new RetryPolicy(INFERENCE_CLIENT.DEFAULT_RETRY);
    this.healthCheckCeilingMs =
      options.healthCheckCeilingMs ?? INFERENCE_CLIENT.HEALTH_CHECK_CEILING_MS;
    this.healthCheckIntervalMs =
      options.healthCheckIntervalMs ??
      INFERENCE_CLIENT.HEALTH_CHECK_INTERVAL_MS;

    const provider = createOpenAI({
      baseURL: `${this.baseUrl}/v1`,
      apiKey: options.apiKey ?? 'unused',
      fetch: options.fetch,
    });
    this.languageModel = provider.chat(options.model);
  }

  /** Requests currently holding an admission permit */
  get inFlight(): number {
    return this.admission.inUse;
  }

  /**
   * Send one prompt with one page image. Resolves with the generated text
   * and usage or rejects with an InferenceError subclass.
   */
  async complete(request: CompletionRequest): Promise<CompletionResult> {
    const { signal } = request;

    return this.retryPolicy.execute(
      async () => {
        if (this.backendSuspect) {
          await this.waitUntilHealthy(signal);
        }
        const release = await this.admission
          .acquire(signal)
          .catch((error: unknown) => {
            throw new RequestCancelledError(undefined, { cause: error });
          });
        try {
          return await this.send(request);
        } finally {
          release();
        }
      },
      {
        shouldRetry: (error) => error instanceof NetworkError,
        delayScale: (error) =>
          error instanceof ResourceExhaustedError
            ? INFERENCE_CLIENT.RESOURCE_EXHAUSTED_BACKOFF_SCALE
            : 1,
        onRetry: ({ attempt, delayMs, error }) => {
          this.backendSuspect = true;
          this.metrics?.increment('requestRetries');
          this.logger.warn(
            `[InferenceClient] Attempt ${attempt} failed (${InferenceError.getErrorMessage(error)}), retrying in ${delayMs}ms`,
          );
        },
        signal,
      },
    ).catch((error: unknown) => {
      if (error instanceof InferenceError) throw error;
      // Backoff sleep interrupted by the caller's signal
      throw new RequestCancelledError(undefined, { cause: error });
    });
  }

  /**
   * Single readiness probe against the model listing endpoint
   */
  async checkHealth(): Promise<boolean> {
    try {
      const response = await this.fetchFn(`${this.baseUrl}/v1/models`, {
        headers: this.headers(),
        signal: AbortSignal.timeout(INFERENCE_CLIENT.HEALTH_PROBE_TIMEOUT_MS),
      });
      return response.ok;
    } catch (error) {
      this.logger.debug(
        `[InferenceClient] Health probe failed: ${InferenceError.getErrorMessage(error)}`,
      );
      return false;
    }
  }

  /**
   * Wait until the health probe passes. Concurrent callers share a single
   * probe loop; the caller's signal only stops that caller's wait.
   */
  waitUntilHealthy(signal?: AbortSignal): Promise<void> {
    if (!this.healthWait) {
      this.healthWait = this.pollHealth().finally(() => {
        this.healthWait = null;
      });
    }
    return raceAbort(this.healthWait, signal);
  }

  /** Model ids the endpoint serves */
  async listModels(): Promise<string[]> {
    let response: Response;
    try {
      response = await this.fetchFn(`${this.baseUrl}/v1/models`, {
        headers: this.headers(),
        signal: AbortSignal.timeout(INFERENCE_CLIENT.HEALTH_PROBE_TIMEOUT_MS),
      });
    } catch (error) {
      throw new NetworkError(
        `Cannot reach ${this.baseUrl}: ${InferenceError.getErrorMessage(error)}`,
        { cause: error },
      );
    }
    if (!response.ok) {
      throw new InferenceRequestError(
        `Model listing failed with HTTP ${response.status}`,
        response.status,
      );
    }

    const parsed = modelListSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new InferenceRequestError('Model listing has unexpected shape');
    }
    return parsed.data.data.map((entry) => entry.id);
  }

  /**
   * Fail with ModelMismatchError unless the endpoint serves `expected`
   */
  async verifyModel(expected: string = this.model): Promise<void> {
    const models = await this.listModels();
    if (!models.includes(expected)) {
      throw new ModelMismatchError(expected, models);
    }
    this.logger.info(`[InferenceClient] Endpoint serves ${expected}`);
  }

  /** Stop any health wait in progress */
  close(): void {
    this.closed = true;
  }

  private async send(request: CompletionRequest): Promise<CompletionResult> {
    const timeoutMs = request.timeoutMs ?? this.requestTimeoutMs;
    const timeout = AbortSignal.timeout(timeoutMs);
    const abortSignal = request.signal
      ? AbortSignal.any([timeout, request.signal])
      : timeout;

    try {
      const result = await generateText({
        model: this.languageModel,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: request.prompt },
              {
                type: 'image',
                image: `data:image/png;base64,${request.image.toString('base64')}`,
              },
            ],
          },
        ],
        temperature: request.sampling.temperature,
        maxOutputTokens: request.sampling.maxOutputTokens,
        maxRetries: 0,
        abortSignal,
      });

      const inputTokens = result.usage.inputTokens ?? 0;
      const outputTokens = result.usage.outputTokens ?? 0;
      return {
        text: result.text,
        inputTokens,
        outputTokens,
        totalTokens: result.usage.totalTokens ?? inputTokens + outputTokens,
        finishReason: result.finishReason,
      };
    } catch (error) {
      if (request.signal?.aborted) {
        throw new RequestCancelledError(undefined, { cause: error });
      }
      if (timeout.aborted) {
        throw new NetworkError(`Request timed out after ${timeoutMs}ms`, {
          cause: error,
        });
      }
      throw classifyError(error);
    }
  }

  private async pollHealth(): Promise<void> {
    const started = Date.now();
    let lastLog = 0;

    this.logger.warn('[InferenceClient] Waiting for backend to become healthy');
    for (;;) {
      if (this.closed) {
        throw new BackendUnavailableError('Inference client closed');
      }
      if (await this.checkHealth()) {
        this.backendSuspect = false;
        this.logger.info('[InferenceClient] Backend is healthy');
        return;
      }

      const elapsed = Date.now() - started;
      if (elapsed >= this.healthCheckCeilingMs) {
        throw new BackendUnavailableError(
          `Backend at ${this.baseUrl} not healthy after ${elapsed}ms`,
        );
      }
      if (elapsed - lastLog >= INFERENCE_CLIENT.HEALTH_CHECK_LOG_INTERVAL_MS) {
        this.logger.info(
          `[InferenceClient] Still waiting for backend (${Math.round(elapsed / 1000)}s)`,
        );
        lastLog = elapsed;
      }
      await delay(this.healthCheckIntervalMs);
    }
  }

  private headers(): Record<string, string> {
    return this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {};
  }
}

/**
 * Map a failure from the AI SDK onto the inference error taxonomy
 */
export function classifyError(error: unknown): InferenceError {
  if (error instanceof InferenceError) return error;

  const cause = RetryError.isInstance(error) ? error.lastError : error;
  const message = InferenceError.getErrorMessage(cause);

  if (APICallError.isInstance(cause)) {
    const status = cause.statusCode;
    if (status === undefined) {
      return new NetworkError(`Transport failure: ${message}`, { cause });
    }
    if (INFERENCE_CLIENT.RESOURCE_EXHAUSTED_STATUSES.some((s) => s === status)) {
      return new ResourceExhaustedError(
        status,
        `Backend overloaded (HTTP ${status}): ${message}`,
        { cause },
      );
    }
    if (INFERENCE_CLIENT.GATEWAY_STATUSES.some((s) => s === status)) {
      return new NetworkError(`Gateway error (HTTP ${status}): ${message}`, {
        cause,
      });
    }
    return new InferenceRequestError(
      `Request failed (HTTP ${status}): ${message}`,
      status,
      { cause },
    );
  }

  if (isConnectionFailure(cause)) {
    return new NetworkError(`Transport failure: ${message}`, { cause });
  }
  return new InferenceRequestError(`Request failed: ${message}`, undefined, {
    cause,
  });
}

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'EPIPE',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

function isConnectionFailure(error: unknown): boolean {
  for (let current = error; current instanceof Error; current = current.cause) {
    if ('code' in current && typeof current.code === 'string') {
      if (CONNECTION_ERROR_CODES.has(current.code)) return true;
    }
    if (current instanceof TypeError && current.message === 'fetch failed') {
      return true;
    }
  }
  return false;
}

function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    return Promise.reject(new RequestCancelledError());
  }
  return new Promise((resolve, reject) => {
    const onAbort = () => reject(new RequestCancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
