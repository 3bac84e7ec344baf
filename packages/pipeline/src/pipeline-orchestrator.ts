import type {
  InferenceClientOptions,
  InferenceServerError,
  InferenceServerOptions,
} from '@pagemill/inference';
import type { LoggerMethods } from '@pagemill/logger';
import type { DocumentLoader } from '@pagemill/pdf-parser';
import type { BlobStore } from '@pagemill/storage';

import type { PipelineConfig } from './config/pipeline-config';
import type { WorkerRunSummary } from './worker/worker-manager';

import { S3Client } from '@aws-sdk/client-s3';
import { DocumentProcessor } from '@pagemill/document-processor';
import {
  InferenceClient,
  InferenceServer,
  ModelMismatchError,
} from '@pagemill/inference';
import { PageProcessor, PdfDocumentLoader } from '@pagemill/pdf-parser';
import { Semaphore } from '@pagemill/shared';
import { createBlobStore } from '@pagemill/storage';
import { WorkQueue } from '@pagemill/work-queue';

import { EXIT_CODE } from './config/constants';
import { ConfigurationError } from './errors/configuration-error';
import { PipelineMetrics } from './metrics/pipeline-metrics';
import { OutputWriter } from './output/output-writer';
import { QueuePopulator } from './queue/queue-populator';
import { collectWorkspaceStats, formatWorkspaceStats } from './stats';
import { WorkerManager } from './worker/worker-manager';

export type ExitCode = (typeof EXIT_CODE)[keyof typeof EXIT_CODE];

/** What the pipeline needs from the inference client */
export type InferenceBackend = Pick<
  InferenceClient,
  'complete' | 'checkHealth' | 'verifyModel' | 'close'
>;

/** What the pipeline needs from a self-managed server */
export type ManagedServer = Pick<InferenceServer, 'start' | 'stop'>;

/**
 * Collaborators the orchestrator builds by default
 */
export interface PipelineDependencies {
  /** Workspace store (default: from `config.workspace`) */
  store?: BlobStore;
  /** Source document loader (default: PdfDocumentLoader) */
  loader?: DocumentLoader;
  createClient?: (
    logger: LoggerMethods,
    options: InferenceClientOptions,
  ) => InferenceBackend;
  createServer?: (
    logger: LoggerMethods,
    options: InferenceServerOptions,
  ) => ManagedServer;
  /** Client for `s3://` locations (default: from `s3Region`/`s3Endpoint`) */
  s3Client?: S3Client;
  /** Turn SIGINT and SIGTERM into shutdown requests (default: true) */
  installSignalHandlers?: boolean;
}

const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

/**
 * PipelineOrchestrator
 *
 * Process lifecycle of one pipeline run:
 *
 * 1. Open the workspace and, in stats mode, report and stop
 * 2. Enqueue documents from the configured selectors
 * 3. Start the backend or verify the external endpoint serves the model
 * 4. Run the workers until the queue drains or shutdown is requested
 * 5. Stop the backend and log the run summary
 *
 * Shutdown happens in two stages. The first request stops new leases
 * and lets batches in progress finish; when the grace period ends, or
 * on a second request, outstanding pages are cancelled, resolve as
 * fallbacks and their batches are released.
 *
 * Exit codes: 0 when the queue was fully processed, 1 when a batch was
 * dropped or the run failed or stopped early, 2 for configuration errors
 * including an unreachable endpoint or wrong model at startup.
 */
export class PipelineOrchestrator {
  private readonly stopController = new AbortController();
  private readonly cancelController = new AbortController();
  private graceTimer: NodeJS.Timeout | null = null;
  private fatalError: InferenceServerError | null = null;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly config: PipelineConfig,
    private readonly dependencies: PipelineDependencies = {},
  ) {}

  /**
   * Stop leasing new work. A second request cancels work in progress.
   */
  requestShutdown(reason: string): void {
    if (this.stopController.signal.aborted) {
      this.logger.warn(
        `[PipelineOrchestrator] ${reason} again; cancelling work in progress`,
      );
      this.cancelNow();
      return;
    }

    this.logger.warn(
      `[PipelineOrchestrator] ${reason}; finishing current batches (grace period ${this.config.shutdownGracePeriodMs}ms)`,
    );
    this.stopController.abort();
    this.graceTimer = setTimeout(() => {
      this.logger.warn(
        '[PipelineOrchestrator] Grace period over; cancelling work in progress',
      );
      this.cancelNow();
    }, this.config.shutdownGracePeriodMs);
    this.graceTimer.unref();
  }

  async run(): Promise<ExitCode> {
    const removeSignalHandlers = this.installSignalHandlers();
    try {
      return await this.execute();
    } catch (error) {
      if (
        error instanceof ConfigurationError ||
        error instanceof ModelMismatchError
      ) {
        this.logger.error(`[PipelineOrchestrator] ${error.message}`);
        return EXIT_CODE.CONFIGURATION;
      }
      this.logger.error('[PipelineOrchestrator] Pipeline failed:', error);
      return EXIT_CODE.FAILURE;
    } finally {
      removeSignalHandlers();
      if (this.graceTimer) clearTimeout(this.graceTimer);
    }
  }

  private async execute(): Promise<ExitCode> {
    const { config, logger } = this;
    const s3Client = this.dependencies.s3Client ?? this.createS3Client();
    const store =
      this.dependencies.store ??
      createBlobStore(config.workspace, { s3Client });
    const queue = new WorkQueue(store, logger);
    const writer = new OutputWriter(store, logger, {
      markdown: config.markdown,
    });

    logger.info(`[PipelineOrchestrator] Workspace: ${store.location}`);

    if (config.stats) {
      const stats = await collectWorkspaceStats(queue, writer);
      formatWorkspaceStats(stats).forEach((line) => logger.info(line));
      return EXIT_CODE.SUCCESS;
    }

    const loader =
      this.dependencies.loader ??
      new PdfDocumentLoader(logger, {
        maxRenderProcesses: config.maxRenderProcesses,
        s3Client,
      });

    if (config.sources.length > 0) {
      await new QueuePopulator(logger, queue, {
        loader,
        pagesPerGroup: config.pagesPerGroup,
        s3Client,
      }).populate(config.sources);
    }

    const metrics = new PipelineMetrics(logger);
    const baseUrl = config.endpoint ?? `http://localhost:${config.port}`;
    const client = (this.dependencies.createClient ?? createHttpClient)(
      logger,
      {
        baseUrl,
        model: config.model,
        apiKey: config.apiKey,
        maxInFlight: config.maxInFlightRequests,
        requestTimeoutMs: config.requestTimeoutMs,
        metrics,
      },
    );

    let server: ManagedServer | null = null;
    try {
      server = await this.connectBackend(client, baseUrl);

      const pageProcessor = new PageProcessor(logger, client, metrics, {
        maxAttempts: config.maxPageAttempts,
        targetLongestImageDim: config.targetLongestImageDim,
        targetAnchorTextLength: config.targetAnchorTextLength,
        modelMaxContext: config.modelMaxContext,
        maxOutputTokens: config.maxOutputTokens,
        requestTimeoutMs: config.requestTimeoutMs,
        fallbackText: config.fallbackText,
        acceptEmptyPages: config.acceptEmptyPages,
      });
      const documentProcessor = new DocumentProcessor({
        logger,
        loader,
        pageProcessor,
        metrics,
        pageConcurrency: config.pageConcurrency,
        // Keep every inference slot busy while render processes prepare the next pages
        globalPageLimit: new Semaphore(
          config.maxInFlightRequests + config.maxRenderProcesses,
        ),
        maxPageErrorRate: config.maxPageErrorRate,
      });
      const workerManager = new WorkerManager({
        logger,
        queue,
        documentProcessor,
        writer,
        metrics,
        workers: config.workers,
        visibilityTimeoutMs: config.visibilityTimeoutMs,
        maxBatchAttempts: config.maxBatchAttempts,
      });

      const stopReporter = metrics.startReporter(() => queue.size());
      let summary: WorkerRunSummary;
      try {
        summary = await workerManager.run({
          stop: this.stopController.signal,
          cancel: this.cancelController.signal,
        });
      } finally {
        stopReporter();
        metrics.logSummary();
      }

      return await this.exitCodeFor(summary, queue);
    } finally {
      client.close();
      if (server) await server.stop();
    }
  }

  /**
   * Bring up or verify the backend. Resolves to the managed server, if any.
   */
  private async connectBackend(
    client: InferenceBackend,
    baseUrl: string,
  ): Promise<ManagedServer | null> {
    const { config, logger } = this;

    if (config.startServer && config.modelPath) {
      const server = (this.dependencies.createServer ?? createProcessServer)(
        logger,
        {
          modelPath: config.modelPath,
          servedModelName: config.model,
          port: config.port,
          maxModelLength: config.modelMaxContext,
          healthCheck: () => client.checkHealth(),
          onFatal: (error) => {
            this.fatalError = error;
            logger.error(`[PipelineOrchestrator] ${error.message}`);
            this.stopController.abort();
            this.cancelNow();
          },
        },
      );
      await server.start();
      await client.verifyModel();
      return server;
    }

    if (!(await client.checkHealth())) {
      throw new ConfigurationError(`Inference endpoint ${baseUrl} is unreachable`);
    }
    await client.verifyModel();
    return null;
  }

  private async exitCodeFor(
    summary: WorkerRunSummary,
    queue: Pick<WorkQueue, 'size'>,
  ): Promise<ExitCode> {
    if (this.fatalError) {
      return EXIT_CODE.FAILURE;
    }
    if (summary.dropped > 0) {
      this.logger.error(
        `[PipelineOrchestrator] ${summary.dropped} batches were dropped after ${this.config.maxBatchAttempts} attempts`,
      );
      return EXIT_CODE.FAILURE;
    }
    const remaining = await queue.size();
    if (remaining > 0) {
      this.logger.warn(
        `[PipelineOrchestrator] Stopped with ${remaining} work items unfinished`,
      );
      return EXIT_CODE.FAILURE;
    }
    this.logger.info('[PipelineOrchestrator] All work items processed');
    return EXIT_CODE.SUCCESS;
  }

  private cancelNow(): void {
    if (this.graceTimer) {
      clearTimeout(this.graceTimer);
      this.graceTimer = null;
    }
    this.cancelController.abort();
  }

  private installSignalHandlers(): () => void {
    if (this.dependencies.installSignalHandlers === false) {
      return () => {};
    }
    const handler = (signal: NodeJS.Signals): void => {
      this.requestShutdown(`Received ${signal}`);
    };
    SHUTDOWN_SIGNALS.forEach((signal) => process.on(signal, handler));
    return () => {
      SHUTDOWN_SIGNALS.forEach((signal) => process.off(signal, handler));
    };
  }

  private createS3Client(): S3Client | undefined {
    const { s3Region, s3Endpoint } = this.config;
    if (!s3Region && !s3Endpoint) return undefined;
    return new S3Client({
      region: s3Region,
      endpoint: s3Endpoint,
      forcePathStyle: s3Endpoint !== undefined,
    });
  }
}

function createHttpClient(
  logger: LoggerMethods,
  options: InferenceClientOptions,
): InferenceBackend {
  return new InferenceClient(logger, options);
}

function createProcessServer(
  logger: LoggerMethods,
  options: InferenceServerOptions,
): ManagedServer {
  return new InferenceServer(logger, options);
}
