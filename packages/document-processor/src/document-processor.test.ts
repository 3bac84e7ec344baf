import type { CompletionResult } from '@pagemill/inference';
import type { PageResult } from '@pagemill/model';
import type {
  CompletionBackend,
  DocumentLoader,
  SourceDocument,
} from '@pagemill/pdf-parser';

import type { DocumentProcessorOptions } from './document-processor';

import { BackendUnavailableError } from '@pagemill/inference';
import { PageProcessor, SourceDocumentError } from '@pagemill/pdf-parser';
import { Semaphore } from '@pagemill/shared';
import { type Mock, beforeEach, describe, expect, test, vi } from 'vitest';

import { DocumentProcessor } from './document-processor';

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

function createSource(ref: string, pageCount: number): SourceDocument {
  return {
    ref,
    kind: 'pdf',
    pageCount,
    sizeBytes: 4096,
    renderPage: vi.fn(async (pageNumber: number) =>
      Buffer.from(`page-${pageNumber}`),
    ),
    extractText: vi.fn(async () => ''),
    dispose: vi.fn(async () => {}),
  };
}

function pageResult(pageNumber: number, isFallback = false): PageResult {
  return {
    pageNumber,
    text: `Page ${pageNumber}`,
    isValid: !isFallback,
    isRotationValid: true,
    rotationCorrection: 0,
    primaryLanguage: 'en',
    isTable: false,
    isDiagram: false,
    inputTokens: 100,
    outputTokens: 20,
    attempts: 1,
    isFallback,
    errorReason: isFallback ? 'validation' : null,
  };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('DocumentProcessor', () => {
  let source: SourceDocument;
  let loader: { load: Mock<DocumentLoader['load']> };
  let processPage: Mock<PageProcessor['process']>;
  let metrics: { increment: Mock; recordDuration: Mock };

  beforeEach(() => {
    source = createSource('scans/report.pdf', 3);
    loader = { load: vi.fn<DocumentLoader['load']>(async () => source) };
    processPage = vi.fn<PageProcessor['process']>(async (_source, pageNumber) =>
      pageResult(pageNumber),
    );
    metrics = { increment: vi.fn(), recordDuration: vi.fn() };
  });

  function createProcessor(overrides: Partial<DocumentProcessorOptions> = {}) {
    return new DocumentProcessor({
      logger: mockLogger,
      loader,
      pageProcessor: { process: processPage },
      metrics,
      now: () => new Date('2026-03-01T00:00:00.000Z'),
      ...overrides,
    });
  }

  test('processes every page and assembles them in order', async () => {
    const { document, degraded, fallbackRate } =
      await createProcessor().process('scans/report.pdf');

    expect(loader.load).toHaveBeenCalledWith('scans/report.pdf');
    expect(processPage).toHaveBeenCalledTimes(3);
    expect(document.text).toBe('Page 1\nPage 2\nPage 3');
    expect(document.metadata.totalPages).toBe(3);
    expect(degraded).toBe(false);
    expect(fallbackRate).toBe(0);
    expect(source.dispose).toHaveBeenCalledTimes(1);
    expect(metrics.increment).toHaveBeenCalledWith('bytesProcessed', 4096);
    expect(metrics.recordDuration).toHaveBeenCalledWith(
      'document',
      expect.any(Number),
    );
  });

  test('orders pages by number whatever order they finish in', async () => {
    processPage.mockImplementation(async (_source, pageNumber) => {
      await delay((4 - pageNumber) * 5);
      return pageResult(pageNumber);
    });

    const { document } = await createProcessor().process('scans/report.pdf');

    expect(document.pageSpans.map(([, , n]) => n)).toEqual([1, 2, 3]);
    expect(document.text).toBe('Page 1\nPage 2\nPage 3');
  });

  test('honours an explicit page count', async () => {
    const { document } = await createProcessor().process('scans/report.pdf', 2);

    expect(processPage).toHaveBeenCalledTimes(2);
    expect(document.metadata.totalPages).toBe(2);
  });

  test('passes the cancellation signal to every page', async () => {
    const controller = new AbortController();

    await createProcessor().process('scans/report.pdf', undefined, controller.signal);

    for (const call of processPage.mock.calls) {
      expect(call[2]).toBe(controller.signal);
    }
  });

  test('bounds pages in flight per document', async () => {
    source = createSource('big.pdf', 10);
    let inFlight = 0;
    let peak = 0;
    processPage.mockImplementation(async (_source, pageNumber) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await delay(2);
      inFlight--;
      return pageResult(pageNumber);
    });

    await createProcessor({ pageConcurrency: 3 }).process('big.pdf');

    expect(peak).toBe(3);
  });

  test('shares the global page limit across documents', async () => {
    let inFlight = 0;
    let peak = 0;
    processPage.mockImplementation(async (_source, pageNumber) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await delay(2);
      inFlight--;
      return pageResult(pageNumber);
    });
    loader.load.mockImplementation(async (ref) => createSource(ref, 3));
    const processor = createProcessor({ globalPageLimit: new Semaphore(2) });

    await Promise.all([processor.process('a.pdf'), processor.process('b.pdf')]);

    expect(peak).toBe(2);
  });

  test('marks a document degraded above the page error rate', async () => {
    processPage.mockImplementation(async (_source, pageNumber) =>
      pageResult(pageNumber, pageNumber === 2),
    );

    const result = await createProcessor().process('scans/report.pdf');

    expect(result.degraded).toBe(true);
    expect(result.fallbackRate).toBeCloseTo(1 / 3);
    expect(result.document.metadata.fallbackPageCount).toBe(1);
    expect(metrics.increment).toHaveBeenCalledWith('documentsDegraded');
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[DocumentProcessor] scans/report.pdf: 1/3 pages fell back (33.3%)',
    );
  });

  test('tolerates fallbacks up to the configured rate', async () => {
    processPage.mockImplementation(async (_source, pageNumber) =>
      pageResult(pageNumber, pageNumber === 2),
    );

    const result = await createProcessor({ maxPageErrorRate: 0.5 }).process(
      'scans/report.pdf',
    );

    expect(result.degraded).toBe(false);
    expect(metrics.increment).not.toHaveBeenCalledWith('documentsDegraded');
  });

  test('propagates a source that cannot be opened', async () => {
    loader.load.mockRejectedValue(
      new SourceDocumentError('bad.pdf', 'Unsupported file type'),
    );

    await expect(createProcessor().process('bad.pdf')).rejects.toThrow(
      SourceDocumentError,
    );
    expect(processPage).not.toHaveBeenCalled();
  });

  test('disposes the source when assembly fails', async () => {
    processPage.mockImplementation(async () => pageResult(1));

    await expect(createProcessor().process('scans/report.pdf')).rejects.toThrow(
      RangeError,
    );
    expect(source.dispose).toHaveBeenCalledTimes(1);
  });

  describe('with the page processor', () => {
    let complete: Mock<CompletionBackend['complete']>;

    function completion(text: string): CompletionResult {
      return {
        text,
        inputTokens: 900,
        outputTokens: 100,
        totalTokens: 1000,
        finishReason: 'stop',
      };
    }

    beforeEach(() => {
      complete = vi.fn<CompletionBackend['complete']>();
    });

    function createPipeline() {
      const pageProcessor = new PageProcessor(
        mockLogger,
        { complete },
        metrics,
        { fallbackText: 'empty' },
      );
      return createProcessor({ pageProcessor });
    }

    test('recovers a page whose first two responses are malformed', async () => {
      const callsPerImage = new Map<string, number>();
      complete.mockImplementation(async ({ image }) => {
        const key = image.toString();
        const calls = (callsPerImage.get(key) ?? 0) + 1;
        callsPerImage.set(key, calls);
        if (key === 'page-2' && calls <= 2) {
          return completion('{"natural_text": "trunc');
        }
        return completion(
          JSON.stringify({
            primary_language: 'en',
            is_rotation_valid: true,
            rotation_correction: 0,
            is_table: false,
            is_diagram: false,
            natural_text: `Text of ${key}`,
          }),
        );
      });

      const { document } = await createPipeline().process('scans/report.pdf');

      expect(document.text).toBe('Text of page-1\nText of page-2\nText of page-3');
      expect(document.metadata.fallbackPageCount).toBe(0);
      expect(document.pages.map((p) => p.isFallback)).toEqual([false, false, false]);
      expect(document.pages.map((p) => p.attempts)).toEqual([1, 3, 1]);
      expect(complete).toHaveBeenCalledTimes(5);
    });

    test('still produces a document when the backend is unreachable', async () => {
      complete.mockRejectedValue(
        new BackendUnavailableError('Backend did not recover'),
      );

      const { document, degraded } =
        await createPipeline().process('scans/report.pdf');

      expect(document.metadata.fallbackPageCount).toBe(3);
      expect(document.metadata.totalPages).toBe(3);
      expect(document.pages.map((p) => p.errorReason)).toEqual([
        'backend_unavailable',
        'backend_unavailable',
        'backend_unavailable',
      ]);
      expect(degraded).toBe(true);
    });
  });
});
