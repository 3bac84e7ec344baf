export type {
  MetricsCounter,
  MetricsSink,
  MetricsSnapshot,
  PipelineStage,
} from './metrics';
export type {
  AttributeSpan,
  OcrDocument,
  OcrDocumentAttributes,
  OcrDocumentMetadata,
  PageSpan,
} from './ocr-document';
export type {
  OutputRecord,
  OutputRecordAttributes,
  OutputRecordMetadata,
} from './output-record';
export type {
  PageErrorReason,
  PageResult,
  RotationCorrection,
} from './page-result';
export type {
  Lease,
  LeasedWorkItem,
  QueueStats,
  WorkItem,
} from './work-item';
