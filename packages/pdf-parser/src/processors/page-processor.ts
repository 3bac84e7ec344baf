import type {
  CompletionResult,
  InferenceClient,
  SamplingParams,
} from '@pagemill/inference';
import type { LoggerMethods } from '@pagemill/logger';
import type {
  MetricsSink,
  PageErrorReason,
  PageResult,
  RotationCorrection,
} from '@pagemill/model';

import type { PageResponse } from '../types/page-response-schema';
import type { SourceDocument } from '../types/source-document';

import {
  BackendUnavailableError,
  NetworkError,
  RequestCancelledError,
  ResourceExhaustedError,
} from '@pagemill/inference';

import { PAGE_PROCESSOR } from '../config/constants';
import { buildPagePrompt } from '../prompts/page-prompt';
import { parsePageResponse } from '../types/page-response-schema';
import { PageResponseValidator } from '../validators/page-response-validator';

/**
 * Text given to a page that ends as a fallback.
 *
 * - `text-layer`: the PDF's own text layer for the page
 * - `last-response`: text of the last response that could be decoded
 * - `empty`: nothing
 */
export type FallbackTextMode = 'text-layer' | 'last-response' | 'empty';

/** Minimal backend surface the processor needs */
export type CompletionBackend = Pick<InferenceClient, 'complete'>;

/** One inference attempt for one page. Built fresh for every attempt. */
export interface PageRequest {
  readonly documentRef: string;
  readonly pageNumber: number;
  readonly attempt: number;
  readonly image: Buffer;
  readonly prompt: string;
  readonly sampling: SamplingParams;
}

/** Options for PageProcessor */
export interface PageProcessorOptions {
  /** Inference calls per page before falling back (default: 8) */
  maxAttempts?: number;
  /** Temperature per attempt (default: PAGE_PROCESSOR.TEMPERATURE_SCHEDULE) */
  temperatureSchedule?: readonly number[];
  /** Longest side of the page image in pixels (default: 1024) */
  targetLongestImageDim?: number;
  /** Initial text-layer hint budget in characters (default: 6000) */
  targetAnchorTextLength?: number;
  /** Prompt plus completion tokens the model accepts (default: 8192) */
  modelMaxContext?: number;
  /** Generation limit per request (default: 4500) */
  maxOutputTokens?: number;
  /** Per-request timeout passed to the client (default: client's own) */
  requestTimeoutMs?: number;
  /** Fallback page text (default: 'text-layer') */
  fallbackText?: FallbackTextMode;
  /** Accept responses without text, e.g. for blank pages (default: false) */
  acceptEmptyPages?: boolean;
}

type AttemptOutcome =
  | { state: 'accepted'; response: PageResponse }
  | { state: 'retrying' }
  | { state: 'fallen_back'; reason: PageErrorReason };

/** Running state of one page across attempts */
interface PageProgress {
  readonly label: string;
  attempts: number;
  inputTokens: number;
  outputTokens: number;
  anchorLength: number;
  rotation: RotationCorrection;
  lastText: string | null;
  lastReason: PageErrorReason;
}

function addRotation(
  a: RotationCorrection,
  b: RotationCorrection,
): RotationCorrection {
  switch ((a + b) % 360) {
    case 90:
      return 90;
    case 180:
      return 180;
    case 270:
      return 270;
    default:
      return 0;
  }
}

/**
 * Turns one page of a source document into a PageResult.
 *
 * Each attempt renders the page, builds a prompt (optionally with the
 * PDF text layer as a hint) and calls the backend. The response is
 * decoded and validated; failures retry with the next temperature in the
 * schedule until `maxAttempts` inference calls have been made, after
 * which the page falls back to placeholder text. Accepting or falling
 * back always produces exactly one result per page.
 *
 * Adjustments between attempts:
 * - an undecodable, oversized or rejected request halves the hint
 * - a response reporting a rotated page re-renders with its correction
 * - the last two attempts in the default schedule drop the hint
 * - an unavailable backend or cancellation falls back immediately
 */
export class PageProcessor {
  private readonly maxAttempts: number;
  private readonly temperatures: readonly number[];
  private readonly targetLongestImageDim: number;
  private readonly targetAnchorTextLength: number;
  private readonly modelMaxContext: number;
  private readonly maxOutputTokens: number;
  private readonly fallbackText: FallbackTextMode;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly client: CompletionBackend,
    private readonly metrics: MetricsSink,
    private readonly options: PageProcessorOptions = {},
  ) {
    this.maxAttempts = options.maxAttempts ?? PAGE_PROCESSOR.DEFAULT_MAX_ATTEMPTS;
    this.temperatures =
      options.temperatureSchedule ?? PAGE_PROCESSOR.TEMPERATURE_SCHEDULE;
    this.targetLongestImageDim =
      options.targetLongestImageDim ??
      PAGE_PROCESSOR.DEFAULT_TARGET_LONGEST_IMAGE_DIM;
    this.targetAnchorTextLength =
      options.targetAnchorTextLength ??
      PAGE_PROCESSOR.DEFAULT_TARGET_ANCHOR_TEXT_LENGTH;
    this.modelMaxContext =
      options.modelMaxContext ?? PAGE_PROCESSOR.DEFAULT_MODEL_MAX_CONTEXT;
    this.maxOutputTokens =
      options.maxOutputTokens ?? PAGE_PROCESSOR.DEFAULT_MAX_OUTPUT_TOKENS;
    this.fallbackText = options.fallbackText ?? 'text-layer';

    if (this.maxAttempts < 1 || this.temperatures.length === 0) {
      throw new RangeError(
        'PageProcessor needs at least one attempt and one temperature',
      );
    }
  }

  /**
   * Process a 1-based page. Never rejects for page-level failures; those
   * become fallback results.
   */
  async process(
    document: SourceDocument,
    pageNumber: number,
    signal?: AbortSignal,
  ): Promise<PageResult> {
    const progress: PageProgress = {
      label: `Page ${pageNumber} of ${document.ref}`,
      attempts: 0,
      inputTokens: 0,
      outputTokens: 0,
      anchorLength: this.targetAnchorTextLength,
      rotation: 0,
      lastText: null,
      lastReason: 'validation',
    };

    let result: PageResult | null = null;
    while (result === null) {
      if (signal?.aborted) {
        result = await this.fallBack(document, pageNumber, progress, 'cancelled');
        break;
      }
      if (progress.attempts >= this.maxAttempts) {
        result = await this.fallBack(
          document,
          pageNumber,
          progress,
          progress.lastReason,
        );
        break;
      }

      if (progress.attempts > 0) {
        this.metrics.increment('pageRetries');
      }
      progress.attempts++;

      const outcome = await this.attempt(document, pageNumber, progress, signal);
      if (outcome.state === 'accepted') {
        result = this.accept(pageNumber, progress, outcome.response);
      } else if (outcome.state === 'fallen_back') {
        result = await this.fallBack(
          document,
          pageNumber,
          progress,
          outcome.reason,
        );
      }
    }

    this.metrics.increment('pagesProcessed');
    this.metrics.increment('inputTokens', progress.inputTokens);
    this.metrics.increment('outputTokens', progress.outputTokens);
    return result;
  }

  /**
   * Run one attempt: Pending → Requested → Validating → outcome.
   */
  private async attempt(
    document: SourceDocument,
    pageNumber: number,
    progress: PageProgress,
    signal: AbortSignal | undefined,
  ): Promise<AttemptOutcome> {
    const { label, attempts } = progress;
    const attemptLabel = `${label}: attempt ${attempts}/${this.maxAttempts}`;

    let request: PageRequest;
    try {
      request = await this.buildRequest(document, pageNumber, progress, signal);
    } catch (error) {
      if (signal?.aborted) {
        return { state: 'fallen_back', reason: 'cancelled' };
      }
      progress.lastReason = 'render';
      this.logger.warn(
        `[PageProcessor] ${attemptLabel} could not render: ${error instanceof Error ? error.message : String(error)}`,
      );
      return { state: 'retrying' };
    }

    const startedAt = Date.now();
    let completion: CompletionResult;
    try {
      completion = await this.client.complete({
        prompt: request.prompt,
        image: request.image,
        sampling: request.sampling,
        timeoutMs: this.options.requestTimeoutMs,
        signal,
      });
    } catch (error) {
      const reason = this.reasonFor(error, signal);
      if (reason === 'cancelled' || reason === 'backend_unavailable') {
        return { state: 'fallen_back', reason };
      }
      if (reason === 'request') {
        progress.anchorLength = Math.floor(progress.anchorLength / 2);
      }
      progress.lastReason = reason;
      this.logger.warn(
        `[PageProcessor] ${attemptLabel} failed (${reason}): ${error instanceof Error ? error.message : String(error)}`,
      );
      return { state: 'retrying' };
    } finally {
      this.metrics.recordDuration('inference', Date.now() - startedAt);
    }

    progress.inputTokens += completion.inputTokens;
    progress.outputTokens += completion.outputTokens;

    if (completion.totalTokens > this.modelMaxContext) {
      progress.anchorLength = Math.floor(progress.anchorLength / 2);
      progress.lastReason = 'validation';
      this.logger.debug(
        `[PageProcessor] ${attemptLabel} used ${completion.totalTokens} tokens, over the ${this.modelMaxContext} context; halving the text hint`,
      );
      return { state: 'retrying' };
    }

    const parsed = parsePageResponse(completion.text);
    if (!parsed.success) {
      progress.anchorLength = Math.floor(progress.anchorLength / 2);
      progress.lastReason = 'parse';
      this.logger.debug(
        `[PageProcessor] ${attemptLabel} returned an unreadable response (${parsed.reason}): ${parsed.message}`,
      );
      return { state: 'retrying' };
    }

    const response = parsed.response;
    progress.lastText = response.naturalText ?? '';

    const validation = PageResponseValidator.validate(response, {
      acceptEmptyText: this.options.acceptEmptyPages,
    });
    if (!validation.isValid) {
      progress.lastReason = 'validation';
      this.logger.debug(
        `[PageProcessor] ${attemptLabel} failed validation (${validation.issues.map((issue) => issue.type).join(', ')})`,
      );
      return { state: 'retrying' };
    }

    if (!response.isRotationValid && attempts < this.maxAttempts) {
      progress.rotation = addRotation(
        progress.rotation,
        response.rotationCorrection,
      );
      progress.lastReason = 'validation';
      this.logger.debug(
        `[PageProcessor] ${attemptLabel} reported rotation; re-rendering at ${progress.rotation} degrees`,
      );
      return { state: 'retrying' };
    }

    return { state: 'accepted', response };
  }

  private async buildRequest(
    document: SourceDocument,
    pageNumber: number,
    progress: PageProgress,
    signal: AbortSignal | undefined,
  ): Promise<PageRequest> {
    const startedAt = Date.now();
    try {
      const image = await document.renderPage(pageNumber, {
        targetLongestDim: this.targetLongestImageDim,
        rotation: progress.rotation,
        signal,
      });

      const useAnchor =
        progress.attempts < PAGE_PROCESSOR.NO_ANCHOR_FROM_ATTEMPT &&
        progress.anchorLength > 0;
      const anchorText = useAnchor
        ? await document.extractText(pageNumber, progress.anchorLength)
        : '';

      const index = Math.min(progress.attempts, this.temperatures.length) - 1;
      return {
        documentRef: document.ref,
        pageNumber,
        attempt: progress.attempts,
        image,
        prompt: buildPagePrompt(anchorText),
        sampling: {
          temperature: this.temperatures[index],
          maxOutputTokens: this.maxOutputTokens,
        },
      };
    } finally {
      this.metrics.recordDuration('render', Date.now() - startedAt);
    }
  }

  private accept(
    pageNumber: number,
    progress: PageProgress,
    response: PageResponse,
  ): PageResult {
    if (progress.attempts > 1) {
      this.logger.debug(
        `[PageProcessor] ${progress.label}: accepted on attempt ${progress.attempts}`,
      );
    }
    return {
      pageNumber,
      text: response.naturalText ?? '',
      isValid: true,
      isRotationValid: response.isRotationValid,
      rotationCorrection: response.rotationCorrection,
      primaryLanguage: response.primaryLanguage,
      isTable: response.isTable,
      isDiagram: response.isDiagram,
      inputTokens: progress.inputTokens,
      outputTokens: progress.outputTokens,
      attempts: progress.attempts,
      isFallback: false,
      errorReason: null,
    };
  }

  private async fallBack(
    document: SourceDocument,
    pageNumber: number,
    progress: PageProgress,
    reason: PageErrorReason,
  ): Promise<PageResult> {
    this.logger.warn(
      `[PageProcessor] ${progress.label}: falling back after ${progress.attempts} attempt(s) (${reason})`,
    );
    this.metrics.increment('pagesFallback');

    return {
      pageNumber,
      text: await this.resolveFallbackText(document, pageNumber, progress),
      isValid: false,
      isRotationValid: true,
      rotationCorrection: 0,
      primaryLanguage: null,
      isTable: false,
      isDiagram: false,
      inputTokens: progress.inputTokens,
      outputTokens: progress.outputTokens,
      attempts: progress.attempts,
      isFallback: true,
      errorReason: reason,
    };
  }

  private async resolveFallbackText(
    document: SourceDocument,
    pageNumber: number,
    progress: PageProgress,
  ): Promise<string> {
    switch (this.fallbackText) {
      case 'empty':
        return '';
      case 'last-response':
        return progress.lastText ?? '';
      case 'text-layer':
        try {
          return await document.extractText(pageNumber);
        } catch (error) {
          this.logger.warn(
            `[PageProcessor] ${progress.label}: text layer unavailable for fallback: ${error instanceof Error ? error.message : String(error)}`,
          );
          return '';
        }
    }
  }

  private reasonFor(
    error: unknown,
    signal: AbortSignal | undefined,
  ): PageErrorReason {
    if (signal?.aborted || error instanceof RequestCancelledError) {
      return 'cancelled';
    }
    if (error instanceof BackendUnavailableError) return 'backend_unavailable';
    if (error instanceof ResourceExhaustedError) return 'resource_exhausted';
    if (error instanceof NetworkError) return 'network';
    return 'request';
  }
}
