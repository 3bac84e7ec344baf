import type { PageResult, RotationCorrection } from './page-result';

/** `[start, end, value]` over the document text, end exclusive */
export type AttributeSpan<T> = [start: number, end: number, value: T];

/** Character range produced by one source page */
export type PageSpan = AttributeSpan<number>;

export interface OcrDocumentMetadata {
  totalPages: number;
  fallbackPageCount: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  /** ISO timestamp of assembly */
  createdAt: string;
}

/**
 * Per-page flags re-indexed to the character spans of their pages
 */
export interface OcrDocumentAttributes {
  primaryLanguage: AttributeSpan<string | null>[];
  isRotationValid: AttributeSpan<boolean>[];
  rotationCorrection: AttributeSpan<RotationCorrection>[];
  isTable: AttributeSpan<boolean>[];
  isDiagram: AttributeSpan<boolean>[];
  isFallbackPage: AttributeSpan<boolean>[];
}

/**
 * A source document after every page has resolved.
 *
 * `id` is the SHA-1 of `text`, so identical content yields identical ids.
 * `pageSpans` are sorted by page number and cover `text` without gaps.
 */
export interface OcrDocument {
  id: string;
  sourceRef: string;
  text: string;
  pageSpans: PageSpan[];
  metadata: OcrDocumentMetadata;
  attributes: OcrDocumentAttributes;
  /** Page results in ascending page order */
  pages: PageResult[];
}
