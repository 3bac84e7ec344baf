import type { LoggerMethods } from '@pagemill/logger';
import type {
  MetricsCounter,
  MetricsSink,
  MetricsSnapshot,
  PipelineStage,
} from '@pagemill/model';

import { PIPELINE_METRICS } from '../config/constants';

function emptyCounters(): Record<MetricsCounter, number> {
  return {
    pagesProcessed: 0,
    pagesFallback: 0,
    pageRetries: 0,
    requestRetries: 0,
    inputTokens: 0,
    outputTokens: 0,
    bytesProcessed: 0,
    documentsWritten: 0,
    documentsFailed: 0,
    documentsDegraded: 0,
    batchesCompleted: 0,
    batchesReleased: 0,
    batchesDropped: 0,
  };
}

const STAGES: readonly PipelineStage[] = [
  'render',
  'inference',
  'document',
  'write',
];

function formatPercent(rate: number): string {
  return `${(rate * 100).toFixed(2)}%`;
}

export interface PipelineMetricsOptions {
  /** Millisecond clock (default: Date.now) */
  now?: () => number;
}

/**
 * PipelineMetrics
 *
 * Process-wide counters and per-stage timings. Components write through
 * the MetricsSink interface; the orchestrator reads snapshots for the
 * periodic progress line and the final summary.
 *
 * @example
 * ```typescript
 * const metrics = new PipelineMetrics(logger);
 * const stop = metrics.startReporter(() => queue.size());
 * // ... run workers ...
 * stop();
 * metrics.logSummary();
 * ```
 */
export class PipelineMetrics implements MetricsSink {
  private readonly now: () => number;
  private readonly startedAt: number;
  private readonly counters: Record<MetricsCounter, number>;
  private readonly stageDurations: Record<PipelineStage, number>;

  constructor(
    private readonly logger: LoggerMethods,
    options: PipelineMetricsOptions = {},
  ) {
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
    this.counters = emptyCounters();
    this.stageDurations = { render: 0, inference: 0, document: 0, write: 0 };
  }

  increment(counter: MetricsCounter, by = 1): void {
    this.counters[counter] += by;
  }

  recordDuration(stage: PipelineStage, durationMs: number): void {
    this.stageDurations[stage] += durationMs;
  }

  snapshot(): MetricsSnapshot {
    const elapsedMs = this.now() - this.startedAt;
    const { pagesProcessed, pagesFallback, pageRetries } = this.counters;

    return {
      counters: { ...this.counters },
      stageDurationsMs: { ...this.stageDurations },
      elapsedMs,
      pagesPerSecond: elapsedMs > 0 ? pagesProcessed / (elapsedMs / 1000) : 0,
      fallbackRate: pagesProcessed > 0 ? pagesFallback / pagesProcessed : 0,
      retryRate: pagesProcessed > 0 ? pageRetries / pagesProcessed : 0,
    };
  }

  /**
   * One-line progress summary
   */
  format(snapshot: MetricsSnapshot = this.snapshot()): string {
    const { counters } = snapshot;
    return [
      `pages ${counters.pagesProcessed} (${snapshot.pagesPerSecond.toFixed(2)}/s)`,
      `fallback ${formatPercent(snapshot.fallbackRate)}`,
      `retries ${counters.pageRetries}`,
      `documents ${counters.documentsWritten} written, ${counters.documentsFailed} failed`,
      `tokens ${counters.inputTokens} in, ${counters.outputTokens} out`,
    ].join(' | ');
  }

  /**
   * Log queue size and progress on an interval until the returned
   * function is called. The timer never keeps the process alive.
   */
  startReporter(
    queueSize: () => Promise<number>,
    intervalMs: number = PIPELINE_METRICS.REPORT_INTERVAL_MS,
  ): () => void {
    const timer = setInterval(() => {
      void queueSize().then(
        (remaining) => {
          this.logger.info(
            `[PipelineMetrics] ${remaining} work items left | ${this.format()}`,
          );
        },
        (error: unknown) => {
          this.logger.warn(
            `[PipelineMetrics] Cannot read queue size: ${error instanceof Error ? error.message : String(error)}`,
          );
        },
      );
    }, intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }

  /**
   * Log the end-of-run summary
   */
  logSummary(): void {
    const snapshot = this.snapshot();
    const { counters, stageDurationsMs } = snapshot;

    this.logger.info('[PipelineMetrics] Run summary:');
    this.logger.info(
      `  Documents: ${counters.documentsWritten} written, ${counters.documentsFailed} failed, ${counters.documentsDegraded} degraded`,
    );
    this.logger.info(
      `  Pages: ${counters.pagesProcessed} processed, ${counters.pagesFallback} fell back (${formatPercent(snapshot.fallbackRate)}), ${counters.pageRetries} retries`,
    );
    this.logger.info(
      `  Requests: ${counters.requestRetries} retried after transport errors`,
    );
    this.logger.info(
      `  Batches: ${counters.batchesCompleted} completed, ${counters.batchesReleased} released, ${counters.batchesDropped} dropped`,
    );
    this.logger.info(
      `  Tokens: ${counters.inputTokens} input, ${counters.outputTokens} output`,
    );
    this.logger.info(
      `  Stage time: ${STAGES.map((stage) => `${stage} ${(stageDurationsMs[stage] / 1000).toFixed(1)}s`).join(', ')}`,
    );
    this.logger.info(
      `  Elapsed: ${(snapshot.elapsedMs / 1000).toFixed(1)}s, ${snapshot.pagesPerSecond.toFixed(2)} pages/s`,
    );
  }
}
