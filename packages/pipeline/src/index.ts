/**
 * @pagemill/pipeline
 *
 * Worker pool, queue population, output and process lifecycle of the
 * pagemill OCR pipeline.
 *
 * @packageDocumentation
 */

export {
  CLI_USAGE,
  parseCliOptions,
  type CliOptions,
} from './config/cli-options';
export {
  EXIT_CODE,
  PIPELINE_METRICS,
  QUEUE_POPULATOR,
  WORKER_MANAGER,
} from './config/constants';
export {
  PIPELINE_CONFIG_KEYS,
  loadPipelineConfig,
  pipelineConfigSchema,
  type LoadPipelineConfigOptions,
  type PipelineConfig,
  type PipelineConfigKey,
} from './config/pipeline-config';
export { ConfigurationError } from './errors/configuration-error';
export {
  PipelineMetrics,
  type PipelineMetricsOptions,
} from './metrics/pipeline-metrics';
export {
  OutputWriter,
  markdownKey,
  resultsKey,
  type OutputTotals,
  type OutputWriterOptions,
} from './output/output-writer';
export {
  PipelineOrchestrator,
  type ExitCode,
  type InferenceBackend,
  type ManagedServer,
  type PipelineDependencies,
} from './pipeline-orchestrator';
export {
  QueuePopulator,
  type PopulateResult,
  type QueuePopulatorOptions,
} from './queue/queue-populator';
export {
  collectWorkspaceStats,
  formatWorkspaceStats,
  type WorkspaceStats,
} from './stats';
export {
  WorkerManager,
  isCatastrophic,
  type BatchOutcome,
  type WorkerManagerOptions,
  type WorkerRunSignals,
  type WorkerRunSummary,
} from './worker/worker-manager';
