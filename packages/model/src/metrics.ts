export type MetricsCounter =
  | 'pagesProcessed'
  | 'pagesFallback'
  | 'pageRetries'
  | 'requestRetries'
  | 'inputTokens'
  | 'outputTokens'
  | 'bytesProcessed'
  | 'documentsWritten'
  | 'documentsFailed'
  | 'documentsDegraded'
  | 'batchesCompleted'
  | 'batchesReleased'
  | 'batchesDropped';

export type PipelineStage = 'render' | 'inference' | 'document' | 'write';

/**
 * Write side of the metrics store, passed to every component that
 * reports progress.
 */
export interface MetricsSink {
  increment(counter: MetricsCounter, by?: number): void;
  recordDuration(stage: PipelineStage, durationMs: number): void;
}

export interface MetricsSnapshot {
  counters: Record<MetricsCounter, number>;
  /** Summed wall-clock time per stage across all tasks */
  stageDurationsMs: Record<PipelineStage, number>;
  elapsedMs: number;
  pagesPerSecond: number;
  /** pagesFallback / pagesProcessed */
  fallbackRate: number;
  /** pageRetries / pagesProcessed */
  retryRate: number;
}
