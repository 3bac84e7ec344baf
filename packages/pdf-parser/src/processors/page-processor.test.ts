import type { CompletionResult } from '@pagemill/inference';
import type { MetricsSink } from '@pagemill/model';

import type { SourceDocument } from '../types/source-document';
import type { CompletionBackend, PageProcessorOptions } from './page-processor';

import {
  BackendUnavailableError,
  InferenceRequestError,
  NetworkError,
  RequestCancelledError,
  ResourceExhaustedError,
} from '@pagemill/inference';
import { type Mock, beforeEach, describe, expect, test, vi } from 'vitest';

import { PAGE_TRANSCRIPTION_PROMPT } from '../prompts/page-prompt';
import { PageProcessor } from './page-processor';

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

const PNG = Buffer.from('png-bytes');
const TEXT_LAYER = 'Survey report text layer';

interface FakeDocument extends SourceDocument {
  renderPage: Mock<SourceDocument['renderPage']>;
  extractText: Mock<SourceDocument['extractText']>;
}

function createDocument(): FakeDocument {
  return {
    ref: 'docs/report.pdf',
    kind: 'pdf',
    pageCount: 3,
    sizeBytes: 1024,
    renderPage: vi.fn<SourceDocument['renderPage']>(async () => PNG),
    extractText: vi.fn<SourceDocument['extractText']>(
      async (_page, maxLength) => TEXT_LAYER.slice(0, maxLength),
    ),
    dispose: vi.fn(async () => {}),
  };
}

interface ResponseFields {
  primary_language?: string | null;
  is_rotation_valid?: boolean;
  rotation_correction?: number;
  is_table?: boolean;
  is_diagram?: boolean;
  natural_text?: string | null;
}

function reply(
  fields: ResponseFields = {},
  totalTokens = 1200,
): CompletionResult {
  return raw(
    JSON.stringify({
      primary_language: 'en',
      is_rotation_valid: true,
      rotation_correction: 0,
      is_table: false,
      is_diagram: false,
      natural_text: 'Recognised page text',
      ...fields,
    }),
    totalTokens,
  );
}

function raw(text: string, totalTokens = 1200): CompletionResult {
  return {
    text,
    inputTokens: 1000,
    outputTokens: 200,
    totalTokens,
    finishReason: 'stop',
  };
}

function countCalls(
  mock: { mock: { calls: unknown[][] } },
  ...args: unknown[]
): number {
  return mock.mock.calls.filter(
    (call) => JSON.stringify(call) === JSON.stringify(args),
  ).length;
}

describe('PageProcessor', () => {
  let document: FakeDocument;
  let complete: Mock<CompletionBackend['complete']>;
  let metrics: {
    increment: Mock<MetricsSink['increment']>;
    recordDuration: Mock<MetricsSink['recordDuration']>;
  };

  beforeEach(() => {
    document = createDocument();
    complete = vi.fn<CompletionBackend['complete']>();
    metrics = { increment: vi.fn(), recordDuration: vi.fn() };
  });

  function createProcessor(options: PageProcessorOptions = {}) {
    return new PageProcessor(mockLogger, { complete }, metrics, options);
  }

  function temperatures(): number[] {
    return complete.mock.calls.map(([request]) => request.sampling.temperature);
  }

  test('accepts a valid first response', async () => {
    complete.mockResolvedValue(reply({ primary_language: 'de', is_table: true }));

    const result = await createProcessor().process(document, 2);

    expect(result).toEqual({
      pageNumber: 2,
      text: 'Recognised page text',
      isValid: true,
      isRotationValid: true,
      rotationCorrection: 0,
      primaryLanguage: 'de',
      isTable: true,
      isDiagram: false,
      inputTokens: 1000,
      outputTokens: 200,
      attempts: 1,
      isFallback: false,
      errorReason: null,
    });
    expect(document.renderPage).toHaveBeenCalledWith(2, {
      targetLongestDim: 1024,
      rotation: 0,
      signal: undefined,
    });
    expect(document.extractText).toHaveBeenCalledWith(2, 6000);
    const [request] = complete.mock.calls[0];
    expect(request.image).toBe(PNG);
    expect(request.sampling).toEqual({ temperature: 0.1, maxOutputTokens: 4500 });
    expect(request.prompt).toContain(TEXT_LAYER);
  });

  test('reports page totals to the metrics sink', async () => {
    complete.mockResolvedValue(reply());

    await createProcessor().process(document, 1);

    expect(metrics.increment.mock.calls).toEqual([
      ['pagesProcessed'],
      ['inputTokens', 1000],
      ['outputTokens', 200],
    ]);
    expect(metrics.recordDuration).toHaveBeenCalledWith('render', expect.any(Number));
    expect(metrics.recordDuration).toHaveBeenCalledWith(
      'inference',
      expect.any(Number),
    );
  });

  test('retries malformed responses and accepts the third attempt', async () => {
    complete
      .mockResolvedValueOnce(raw('{"natural_text": "Recog'))
      .mockResolvedValueOnce(raw('not json at all'))
      .mockResolvedValueOnce(reply());

    const result = await createProcessor().process(document, 2);

    expect(result.isFallback).toBe(false);
    expect(result.attempts).toBe(3);
    expect(result.inputTokens).toBe(3000);
    expect(result.outputTokens).toBe(600);
    expect(temperatures()).toEqual([0.1, 0.1, 0.2]);
    expect(document.extractText.mock.calls).toEqual([
      [2, 6000],
      [2, 3000],
      [2, 1500],
    ]);
    expect(countCalls(metrics.increment, 'pageRetries')).toBe(2);
    expect(countCalls(metrics.increment, 'pagesFallback')).toBe(0);
  });

  test('falls back to the text layer after the attempt budget', async () => {
    complete.mockResolvedValue(reply({ natural_text: '' }));

    const result = await createProcessor().process(document, 1);

    expect(complete).toHaveBeenCalledTimes(8);
    expect(temperatures()).toEqual([0.1, 0.1, 0.2, 0.3, 0.5, 0.8, 0.1, 0.8]);
    expect(result).toEqual({
      pageNumber: 1,
      text: TEXT_LAYER,
      isValid: false,
      isRotationValid: true,
      rotationCorrection: 0,
      primaryLanguage: null,
      isTable: false,
      isDiagram: false,
      inputTokens: 8000,
      outputTokens: 1600,
      attempts: 8,
      isFallback: true,
      errorReason: 'validation',
    });
    expect(countCalls(metrics.increment, 'pagesFallback')).toBe(1);
    expect(countCalls(metrics.increment, 'pageRetries')).toBe(7);
  });

  test('drops the text hint on the last two attempts', async () => {
    complete.mockResolvedValue(reply({ natural_text: null }));

    await createProcessor({ fallbackText: 'empty' }).process(document, 1);

    const prompts = complete.mock.calls.map(([request]) => request.prompt);
    expect(prompts.slice(0, 6).every((p) => p.includes(TEXT_LAYER))).toBe(true);
    expect(prompts.slice(6)).toEqual([
      PAGE_TRANSCRIPTION_PROMPT,
      PAGE_TRANSCRIPTION_PROMPT,
    ]);
  });

  test('reuses the last temperature past the end of the schedule', async () => {
    complete.mockResolvedValue(reply({ natural_text: '' }));

    await createProcessor({
      maxAttempts: 3,
      temperatureSchedule: [0.2, 0.6],
      fallbackText: 'empty',
    }).process(document, 1);

    expect(temperatures()).toEqual([0.2, 0.6, 0.6]);
  });

  test('uses the last decoded response text in last-response mode', async () => {
    complete.mockResolvedValue(
      reply({ natural_text: 'Lorem ipsum dolor sit amet' }),
    );

    const result = await createProcessor({
      maxAttempts: 2,
      fallbackText: 'last-response',
    }).process(document, 1);

    expect(result.isFallback).toBe(true);
    expect(result.text).toBe('Lorem ipsum dolor sit amet');
    expect(result.errorReason).toBe('validation');
  });

  test('gives an empty page in empty mode', async () => {
    complete.mockResolvedValue(raw('garbage'));

    const result = await createProcessor({
      maxAttempts: 2,
      fallbackText: 'empty',
    }).process(document, 1);

    expect(result.text).toBe('');
    expect(result.errorReason).toBe('parse');
  });

  test('falls back at once when the backend is unavailable', async () => {
    complete.mockRejectedValue(
      new BackendUnavailableError('Backend did not recover within 300000ms'),
    );

    const result = await createProcessor().process(document, 1);

    expect(complete).toHaveBeenCalledTimes(1);
    expect(result.isFallback).toBe(true);
    expect(result.errorReason).toBe('backend_unavailable');
    expect(result.attempts).toBe(1);
    expect(result.text).toBe(TEXT_LAYER);
  });

  test('retries after a network error', async () => {
    complete
      .mockRejectedValueOnce(new NetworkError('Transport failure: ECONNRESET'))
      .mockResolvedValueOnce(reply());

    const result = await createProcessor().process(document, 1);

    expect(result.isFallback).toBe(false);
    expect(result.attempts).toBe(2);
    expect(result.inputTokens).toBe(1000);
  });

  test('records the transport reason when every attempt fails', async () => {
    complete.mockRejectedValue(new NetworkError('Transport failure'));

    const result = await createProcessor({ maxAttempts: 3 }).process(document, 1);

    expect(complete).toHaveBeenCalledTimes(3);
    expect(result.errorReason).toBe('network');
    expect(result.inputTokens).toBe(0);
  });

  test('distinguishes an overloaded backend', async () => {
    complete.mockRejectedValue(
      new ResourceExhaustedError(503, 'Backend overloaded (HTTP 503)'),
    );

    const result = await createProcessor({ maxAttempts: 2 }).process(document, 1);

    expect(result.errorReason).toBe('resource_exhausted');
  });

  test('halves the text hint after a rejected request', async () => {
    complete
      .mockRejectedValueOnce(
        new InferenceRequestError('Request failed (HTTP 400): prompt too long', 400),
      )
      .mockResolvedValueOnce(reply());

    const result = await createProcessor().process(document, 1);

    expect(result.attempts).toBe(2);
    expect(document.extractText.mock.calls).toEqual([
      [1, 6000],
      [1, 3000],
    ]);
  });

  test('halves the text hint when the response overflows the context', async () => {
    complete
      .mockResolvedValueOnce(reply({}, 9000))
      .mockResolvedValueOnce(reply());

    const result = await createProcessor().process(document, 1);

    expect(result.attempts).toBe(2);
    expect(result.inputTokens).toBe(2000);
    expect(document.extractText.mock.calls[1]).toEqual([1, 3000]);
  });

  test('re-renders a rotated page with the reported correction', async () => {
    complete
      .mockResolvedValueOnce(
        reply({ is_rotation_valid: false, rotation_correction: 90 }),
      )
      .mockResolvedValueOnce(
        reply({ is_rotation_valid: false, rotation_correction: 180 }),
      )
      .mockResolvedValueOnce(reply());

    const result = await createProcessor().process(document, 1);

    const rotations = document.renderPage.mock.calls.map(
      ([, options]) => options.rotation,
    );
    expect(rotations).toEqual([0, 90, 270]);
    expect(result.attempts).toBe(3);
    expect(result.isRotationValid).toBe(true);
  });

  test('accepts a rotated page on the final attempt', async () => {
    complete.mockResolvedValue(
      reply({ is_rotation_valid: false, rotation_correction: 180 }),
    );

    const result = await createProcessor({ maxAttempts: 1 }).process(document, 1);

    expect(result.isFallback).toBe(false);
    expect(result.isRotationValid).toBe(false);
    expect(result.rotationCorrection).toBe(180);
  });

  test('counts a render failure as an attempt', async () => {
    document.renderPage
      .mockRejectedValueOnce(new Error('magick: no images defined'))
      .mockResolvedValue(PNG);
    complete.mockResolvedValue(reply());

    const result = await createProcessor().process(document, 1);

    expect(result.attempts).toBe(2);
    expect(complete).toHaveBeenCalledTimes(1);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[PageProcessor] Page 1 of docs/report.pdf: attempt 1/8 could not render: magick: no images defined',
    );
  });

  test('falls back with the render reason when the page never renders', async () => {
    document.renderPage.mockRejectedValue(new Error('broken page'));

    const result = await createProcessor({ maxAttempts: 2 }).process(document, 1);

    expect(complete).not.toHaveBeenCalled();
    expect(result.errorReason).toBe('render');
    expect(result.attempts).toBe(2);
  });

  test('cancels without calling the backend when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await createProcessor().process(
      document,
      1,
      controller.signal,
    );

    expect(complete).not.toHaveBeenCalled();
    expect(result.errorReason).toBe('cancelled');
    expect(result.attempts).toBe(0);
    expect(result.isFallback).toBe(true);
  });

  test('turns a cancelled request into a cancelled fallback', async () => {
    complete.mockRejectedValue(new RequestCancelledError());

    const result = await createProcessor().process(document, 1);

    expect(complete).toHaveBeenCalledTimes(1);
    expect(result.errorReason).toBe('cancelled');
  });

  test('accepts pages without text when configured', async () => {
    complete.mockResolvedValue(
      reply({ natural_text: null, primary_language: null }),
    );

    const result = await createProcessor({ acceptEmptyPages: true }).process(
      document,
      3,
    );

    expect(result.isFallback).toBe(false);
    expect(result.text).toBe('');
    expect(result.attempts).toBe(1);
  });

  test('uses an empty fallback when the text layer cannot be read', async () => {
    document.extractText.mockRejectedValue(new Error('pdftotext missing'));

    const result = await createProcessor({ maxAttempts: 1 }).process(
      document,
      1,
    );

    expect(result.text).toBe('');
    expect(result.errorReason).toBe('render');
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[PageProcessor] Page 1 of docs/report.pdf: text layer unavailable for fallback: pdftotext missing',
    );
  });

  test('rejects an empty temperature schedule', () => {
    expect(() => createProcessor({ temperatureSchedule: [] })).toThrow(RangeError);
  });
});
