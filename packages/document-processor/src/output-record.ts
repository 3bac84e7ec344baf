import type { OcrDocument, OutputRecord } from '@pagemill/model';

import { OUTPUT_RECORD } from './config/constants';

export interface OutputRecordOptions {
  /** Clock for the `added` date (default: current time) */
  now?: () => Date;
}

/**
 * Convert an assembled document into its JSON-lines output record.
 */
export function toOutputRecord(
  document: OcrDocument,
  options: OutputRecordOptions = {},
): OutputRecord {
  const now = options.now ?? (() => new Date());
  const { metadata, attributes } = document;

  return {
    id: document.id,
    text: document.text,
    source: OUTPUT_RECORD.SOURCE,
    added: now().toISOString().slice(0, 10),
    created: metadata.createdAt,
    metadata: {
      'Source-File': document.sourceRef,
      'pagemill-version': OUTPUT_RECORD.VERSION,
      'pdf-total-pages': metadata.totalPages,
      'total-input-tokens': metadata.totalInputTokens,
      'total-output-tokens': metadata.totalOutputTokens,
      'total-fallback-pages': metadata.fallbackPageCount,
      'created-at': metadata.createdAt,
    },
    attributes: {
      pdf_page_numbers: document.pageSpans,
      primary_language: attributes.primaryLanguage,
      is_rotation_valid: attributes.isRotationValid,
      rotation_correction: attributes.rotationCorrection,
      is_table: attributes.isTable,
      is_diagram: attributes.isDiagram,
      is_fallback_page: attributes.isFallbackPage,
    },
  };
}
