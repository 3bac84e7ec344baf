import type { LoggerMethods } from '@pagemill/logger';

import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { PipelineMetrics } from './pipeline-metrics';

function createMockLogger(): LoggerMethods {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

describe('PipelineMetrics', () => {
  let logger: LoggerMethods;
  let time: number;
  let metrics: PipelineMetrics;

  beforeEach(() => {
    logger = createMockLogger();
    time = 1_000;
    metrics = new PipelineMetrics(logger, { now: () => time });
  });

  function recordRun(): void {
    metrics.increment('pagesProcessed', 40);
    metrics.increment('pagesFallback');
    metrics.increment('pageRetries', 6);
    metrics.increment('requestRetries', 4);
    metrics.increment('documentsWritten', 2);
    metrics.increment('inputTokens', 5000);
    metrics.increment('outputTokens', 800);
    time = 21_000;
  }

  test('starts with every counter at zero', () => {
    const snapshot = metrics.snapshot();

    expect(Object.values(snapshot.counters).every((value) => value === 0)).toBe(
      true,
    );
    expect(snapshot.stageDurationsMs).toEqual({
      render: 0,
      inference: 0,
      document: 0,
      write: 0,
    });
    expect(snapshot.pagesPerSecond).toBe(0);
    expect(snapshot.fallbackRate).toBe(0);
    expect(snapshot.retryRate).toBe(0);
  });

  test('derives rates from counters and elapsed time', () => {
    recordRun();
    metrics.recordDuration('inference', 1200);
    metrics.recordDuration('inference', 300);

    const snapshot = metrics.snapshot();

    expect(snapshot.counters.pagesProcessed).toBe(40);
    expect(snapshot.stageDurationsMs.inference).toBe(1500);
    expect(snapshot.elapsedMs).toBe(20_000);
    expect(snapshot.pagesPerSecond).toBe(2);
    expect(snapshot.fallbackRate).toBe(0.025);
    expect(snapshot.retryRate).toBe(0.15);
  });

  test('snapshots are copies', () => {
    const snapshot = metrics.snapshot();
    metrics.increment('batchesCompleted');

    expect(snapshot.counters.batchesCompleted).toBe(0);
    expect(metrics.snapshot().counters.batchesCompleted).toBe(1);
  });

  test('formats a progress line', () => {
    recordRun();

    expect(metrics.format()).toBe(
      'pages 40 (2.00/s) | fallback 2.50% | retries 6 | documents 2 written, 0 failed | tokens 5000 in, 800 out',
    );
  });

  test('logs the run summary', () => {
    recordRun();
    metrics.increment('batchesCompleted', 3);
    metrics.increment('batchesDropped');
    metrics.recordDuration('render', 4_500);

    metrics.logSummary();

    expect(logger.info).toHaveBeenCalledWith('[PipelineMetrics] Run summary:');
    expect(logger.info).toHaveBeenCalledWith(
      '  Documents: 2 written, 0 failed, 0 degraded',
    );
    expect(logger.info).toHaveBeenCalledWith(
      '  Pages: 40 processed, 1 fell back (2.50%), 6 retries',
    );
    expect(logger.info).toHaveBeenCalledWith(
      '  Requests: 4 retried after transport errors',
    );
    expect(logger.info).toHaveBeenCalledWith(
      '  Batches: 3 completed, 0 released, 1 dropped',
    );
    expect(logger.info).toHaveBeenCalledWith(
      '  Stage time: render 4.5s, inference 0.0s, document 0.0s, write 0.0s',
    );
    expect(logger.info).toHaveBeenCalledWith('  Elapsed: 20.0s, 2.00 pages/s');
  });

  describe('startReporter', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    test('logs queue size and progress every interval until stopped', async () => {
      recordRun();
      const queueSize = vi.fn(async () => 3);

      const stop = metrics.startReporter(queueSize, 10_000);
      await vi.advanceTimersByTimeAsync(10_000);

      expect(logger.info).toHaveBeenCalledWith(
        '[PipelineMetrics] 3 work items left | pages 40 (2.00/s) | fallback 2.50% | retries 6 | documents 2 written, 0 failed | tokens 5000 in, 800 out',
      );

      stop();
      await vi.advanceTimersByTimeAsync(30_000);
      expect(queueSize).toHaveBeenCalledTimes(1);
    });

    test('warns when the queue size cannot be read', async () => {
      const stop = metrics.startReporter(async () => {
        throw new Error('store offline');
      }, 10_000);
      await vi.advanceTimersByTimeAsync(10_000);
      stop();

      expect(logger.warn).toHaveBeenCalledWith(
        '[PipelineMetrics] Cannot read queue size: store offline',
      );
    });
  });
});
