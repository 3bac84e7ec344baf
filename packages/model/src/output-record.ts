import type { AttributeSpan, PageSpan } from './ocr-document';
import type { RotationCorrection } from './page-result';

/**
 * One JSON line of pipeline output
 */
export interface OutputRecord {
  id: string;
  text: string;
  source: string;
  /** Date the record was written (YYYY-MM-DD) */
  added: string;
  /** ISO timestamp of document assembly */
  created: string;
  metadata: OutputRecordMetadata;
  attributes: OutputRecordAttributes;
}

export interface OutputRecordMetadata {
  'Source-File': string;
  'pagemill-version': string;
  'pdf-total-pages': number;
  'total-input-tokens': number;
  'total-output-tokens': number;
  'total-fallback-pages': number;
  'created-at': string;
}

export interface OutputRecordAttributes {
  pdf_page_numbers: PageSpan[];
  primary_language: AttributeSpan<string | null>[];
  is_rotation_valid: AttributeSpan<boolean>[];
  rotation_correction: AttributeSpan<RotationCorrection>[];
  is_table: AttributeSpan<boolean>[];
  is_diagram: AttributeSpan<boolean>[];
  is_fallback_page: AttributeSpan<boolean>[];
}
