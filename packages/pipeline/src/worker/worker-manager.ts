import type { DocumentProcessor } from '@pagemill/document-processor';
import type { LoggerMethods } from '@pagemill/logger';
import type {
  LeasedWorkItem,
  MetricsSink,
  OcrDocument,
  PageErrorReason,
} from '@pagemill/model';
import type { WorkQueue } from '@pagemill/work-queue';

import type { OutputWriter } from '../output/output-writer';

import { SourceDocumentError } from '@pagemill/pdf-parser';
import { ConcurrentPool } from '@pagemill/shared';
import { LeaseLostError } from '@pagemill/work-queue';
import { delay } from 'es-toolkit';
import { randomUUID } from 'node:crypto';
import { hostname } from 'node:os';

import { WORKER_MANAGER } from '../config/constants';

/** Page failures that point at the backend rather than the page */
const TRANSPORT_REASONS: ReadonlySet<PageErrorReason> = new Set([
  'network',
  'resource_exhausted',
  'backend_unavailable',
]);

export type BatchOutcome = 'completed' | 'released' | 'dropped' | 'lost';

export interface WorkerRunSummary {
  completed: number;
  released: number;
  dropped: number;
  lost: number;
}

export interface WorkerManagerOptions {
  logger: LoggerMethods;
  queue: Pick<WorkQueue, 'lease' | 'renew' | 'complete' | 'release' | 'size'>;
  documentProcessor: Pick<DocumentProcessor, 'process'>;
  writer: Pick<OutputWriter, 'writeBatch'>;
  metrics: MetricsSink;

  /** Concurrent worker loops (default: 8) */
  workers?: number;

  /** Lease length, renewed at half this interval (default: 15 minutes) */
  visibilityTimeoutMs?: number;

  /** Claims of a catastrophic batch before it is dropped (default: 3) */
  maxBatchAttempts?: number;

  /** Wait between polls while other workers hold the remaining items (default: 10s) */
  idlePollIntervalMs?: number;

  /** Prefix of every worker's lease owner id (default: host, pid and a random suffix) */
  ownerPrefix?: string;
}

export interface WorkerRunSignals {
  /** Stop leasing; batches in progress run to completion */
  stop?: AbortSignal;
  /** Cancel batches in progress; their pages resolve as fallbacks */
  cancel?: AbortSignal;
}

/**
 * True when every page of every document fell back for a transport reason
 */
export function isCatastrophic(documents: readonly OcrDocument[]): boolean {
  return (
    documents.length > 0 &&
    documents.every(
      (document) =>
        document.pages.length > 0 &&
        document.pages.every(
          (page) =>
            page.isFallback &&
            page.errorReason !== null &&
            TRANSPORT_REASONS.has(page.errorReason),
        ),
    )
  );
}

/**
 * WorkerManager
 *
 * Runs a pool of worker loops against the work queue. Each loop leases
 * a batch, processes its documents concurrently, writes the results and
 * then completes or releases the lease.
 *
 * Batch outcomes:
 * - completed: results written, item marked done
 * - released: shutdown or an unexpected failure; another worker retries it
 * - dropped: every page failed for transport reasons on the last allowed
 *   attempt; results are written and the item is marked done
 * - lost: the lease was taken over while processing; nothing is written
 *
 * Loops exit when the queue is drained or the stop signal fires.
 */
export class WorkerManager {
  private readonly logger: LoggerMethods;
  private readonly workers: number;
  private readonly visibilityTimeoutMs: number;
  private readonly maxBatchAttempts: number;
  private readonly idlePollIntervalMs: number;
  private readonly ownerPrefix: string;

  constructor(private readonly options: WorkerManagerOptions) {
    this.logger = options.logger;
    this.workers = options.workers ?? WORKER_MANAGER.DEFAULT_WORKERS;
    this.visibilityTimeoutMs =
      options.visibilityTimeoutMs ?? WORKER_MANAGER.DEFAULT_VISIBILITY_TIMEOUT_MS;
    this.maxBatchAttempts =
      options.maxBatchAttempts ?? WORKER_MANAGER.DEFAULT_MAX_BATCH_ATTEMPTS;
    this.idlePollIntervalMs =
      options.idlePollIntervalMs ?? WORKER_MANAGER.IDLE_POLL_INTERVAL_MS;
    this.ownerPrefix =
      options.ownerPrefix ??
      `${hostname()}-${process.pid}-${randomUUID().slice(0, 8)}`;
  }

  async run(signals: WorkerRunSignals = {}): Promise<WorkerRunSummary> {
    const stop = signals.stop ?? new AbortController().signal;
    const cancel = signals.cancel ?? new AbortController().signal;
    const summary: WorkerRunSummary = {
      completed: 0,
      released: 0,
      dropped: 0,
      lost: 0,
    };

    this.logger.info(`[WorkerManager] Starting ${this.workers} workers`);

    await Promise.all(
      Array.from({ length: this.workers }, (_, index) =>
        this.workerLoop(`${this.ownerPrefix}-w${index}`, stop, cancel, summary),
      ),
    );

    this.logger.info(
      `[WorkerManager] Workers finished: ${summary.completed} completed, ${summary.released} released, ${summary.dropped} dropped, ${summary.lost} lost`,
    );
    return summary;
  }

  private async workerLoop(
    ownerId: string,
    stop: AbortSignal,
    cancel: AbortSignal,
    summary: WorkerRunSummary,
  ): Promise<void> {
    const { queue } = this.options;

    while (!stop.aborted) {
      let leased: LeasedWorkItem | null;
      let remaining = 0;
      try {
        leased = await queue.lease(ownerId, this.visibilityTimeoutMs);
        if (!leased) remaining = await queue.size();
      } catch (error) {
        this.logger.warn(
          `[WorkerManager] ${ownerId}: cannot reach the queue: ${errorMessage(error)}`,
        );
        await this.idle(stop);
        continue;
      }

      if (!leased) {
        if (remaining === 0) {
          this.logger.info(`[WorkerManager] ${ownerId}: queue drained`);
          return;
        }
        this.logger.debug(
          `[WorkerManager] ${ownerId}: ${remaining} items left, all leased elsewhere`,
        );
        await this.idle(stop);
        continue;
      }

      const outcome = await this.processBatch(leased, ownerId, cancel);
      summary[outcome]++;
    }
  }

  /**
   * Process one leased batch and settle its lease
   */
  async processBatch(
    leased: LeasedWorkItem,
    ownerId: string,
    cancel: AbortSignal = new AbortController().signal,
  ): Promise<BatchOutcome> {
    const { queue, metrics } = this.options;
    const { item, lease } = leased;
    const batch = new AbortController();
    const signal = AbortSignal.any([cancel, batch.signal]);
    let leaseLost = false;
    let renewing = false;

    this.logger.info(
      `[WorkerManager] ${ownerId}: leased ${item.id} (${item.refs.length} documents, attempt ${lease.attempt})`,
    );

    const renewal = setInterval(() => {
      if (renewing || leaseLost) return;
      renewing = true;
      void queue
        .renew(item.id, ownerId, this.visibilityTimeoutMs)
        .then(
          () => {
            this.logger.debug(`[WorkerManager] Renewed lease on ${item.id}`);
          },
          (error: unknown) => {
            if (error instanceof LeaseLostError) {
              leaseLost = true;
              batch.abort(error);
              this.logger.warn(`[WorkerManager] ${error.message}; abandoning batch`);
            } else {
              this.logger.warn(
                `[WorkerManager] Renewing ${item.id} failed: ${errorMessage(error)}`,
              );
            }
          },
        )
        .finally(() => {
          renewing = false;
        });
    }, this.visibilityTimeoutMs / WORKER_MANAGER.RENEWALS_PER_TIMEOUT);

    try {
      const documents = await this.processDocuments(item.refs, signal, batch);

      if (leaseLost) {
        return 'lost';
      }

      await this.write(item.id, documents);

      if (cancel.aborted) {
        await this.release(item.id, ownerId);
        return 'released';
      }

      if (isCatastrophic(documents)) {
        if (lease.attempt < this.maxBatchAttempts) {
          this.logger.warn(
            `[WorkerManager] ${item.id}: every page failed to reach the backend (attempt ${lease.attempt}/${this.maxBatchAttempts}), releasing for retry`,
          );
          await this.release(item.id, ownerId);
          return 'released';
        }
        this.logger.error(
          `[WorkerManager] ${item.id}: every page failed to reach the backend after ${lease.attempt} attempts, dropping batch`,
        );
        await queue.complete(item.id, ownerId);
        metrics.increment('batchesDropped');
        return 'dropped';
      }

      await queue.complete(item.id, ownerId);
      metrics.increment('batchesCompleted');
      this.logger.info(`[WorkerManager] ${ownerId}: completed ${item.id}`);
      return 'completed';
    } catch (error) {
      if (leaseLost) {
        return 'lost';
      }
      this.logger.error(
        `[WorkerManager] ${item.id} failed: ${errorMessage(error)}`,
      );
      if (!cancel.aborted && lease.attempt >= this.maxBatchAttempts) {
        await this.drop(item.id, ownerId, lease.attempt);
        return 'dropped';
      }
      await this.release(item.id, ownerId);
      return 'released';
    } finally {
      clearInterval(renewal);
    }
  }

  private async processDocuments(
    refs: readonly string[],
    signal: AbortSignal,
    batch: AbortController,
  ): Promise<OcrDocument[]> {
    const { documentProcessor, metrics } = this.options;

    const results = await ConcurrentPool.run(
      refs,
      refs.length,
      async (ref): Promise<OcrDocument | null> => {
        try {
          const { document } = await documentProcessor.process(
            ref,
            undefined,
            signal,
          );
          return document;
        } catch (error) {
          if (error instanceof SourceDocumentError) {
            metrics.increment('documentsFailed');
            this.logger.warn(`[WorkerManager] Skipping ${error.message}`);
            return null;
          }
          batch.abort(error);
          throw error;
        }
      },
    );

    return results.filter((document): document is OcrDocument => document !== null);
  }

  private async write(
    workItemId: string,
    documents: readonly OcrDocument[],
  ): Promise<void> {
    const { writer, metrics } = this.options;
    const startedAt = Date.now();
    const written = await writer.writeBatch(workItemId, documents);
    metrics.recordDuration('write', Date.now() - startedAt);
    metrics.increment('documentsWritten', written);
  }

  private async release(workItemId: string, ownerId: string): Promise<void> {
    try {
      await this.options.queue.release(workItemId, ownerId);
    } catch (error) {
      // The lease expires on its own
      this.logger.warn(
        `[WorkerManager] Releasing ${workItemId} failed: ${errorMessage(error)}`,
      );
    }
    this.options.metrics.increment('batchesReleased');
  }

  private async drop(
    workItemId: string,
    ownerId: string,
    attempts: number,
  ): Promise<void> {
    this.logger.error(
      `[WorkerManager] ${workItemId}: failed ${attempts} attempts, dropping batch`,
    );
    try {
      await this.options.queue.complete(workItemId, ownerId);
    } catch (error) {
      // Expired leases come back with a higher attempt and are dropped again
      this.logger.warn(
        `[WorkerManager] Completing dropped ${workItemId} failed: ${errorMessage(error)}`,
      );
    }
    this.options.metrics.increment('batchesDropped');
  }

  private async idle(stop: AbortSignal): Promise<void> {
    await delay(this.idlePollIntervalMs, { signal: stop }).catch(
      (error: unknown) => {
        if (!stop.aborted) throw error;
      },
    );
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
