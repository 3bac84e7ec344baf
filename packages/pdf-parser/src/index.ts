export { PAGE_PROCESSOR, PAGE_RENDERER } from './config/constants';
export { SourceDocumentError } from './errors/source-document-error';
export {
  PdfDocumentLoader,
  detectSourceKind,
  type PdfDocumentLoaderOptions,
} from './loaders/pdf-document-loader';
export {
  PageProcessor,
  type CompletionBackend,
  type FallbackTextMode,
  type PageProcessorOptions,
  type PageRequest,
} from './processors/page-processor';
export {
  PageRenderer,
  type PageRendererOptions,
  type RenderPageOptions,
  type SourceKind,
} from './processors/page-renderer';
export { PdfTextExtractor } from './processors/pdf-text-extractor';
export { PAGE_TRANSCRIPTION_PROMPT, buildPagePrompt } from './prompts/page-prompt';
export {
  parsePageResponse,
  pageResponseSchema,
  type PageResponse,
  type PageResponseParseFailure,
  type PageResponseParseResult,
} from './types/page-response-schema';
export type { DocumentLoader, SourceDocument } from './types/source-document';
export {
  PageResponseValidator,
  type PageQualityIssue,
  type PageQualityIssueType,
  type PageValidationOptions,
  type PageValidationResult,
} from './validators/page-response-validator';
