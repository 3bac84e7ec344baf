/**
 * @pagemill/document-processor
 *
 * Turns a source document into an ordered OcrDocument and its output
 * record.
 *
 * @packageDocumentation
 */

export { DOCUMENT_PROCESSOR, OUTPUT_RECORD } from './config/constants';
export { DocumentAssembler, type AssembleOptions } from './document-assembler';
export {
  DocumentProcessor,
  type DocumentProcessResult,
  type DocumentProcessorOptions,
} from './document-processor';
export { toOutputRecord, type OutputRecordOptions } from './output-record';
