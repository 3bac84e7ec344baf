import type {
  AttributeSpan,
  OcrDocument,
  PageResult,
  PageSpan,
} from '@pagemill/model';

import { createHash } from 'node:crypto';

export interface AssembleOptions {
  /** Clock for the creation timestamp (default: current time) */
  now?: () => Date;
}

/**
 * Stitches page results into one document.
 *
 * Pages are concatenated in ascending page order with a newline after
 * every page but the last. Each page owns the character range of its
 * text plus that newline, so `pageSpans` cover the whole text without
 * gaps or overlaps. Per-page flags are re-indexed onto the same ranges.
 */
export class DocumentAssembler {
  /**
   * @param pageCount - Pages the source has; results must be exactly 1..pageCount
   * @throws {RangeError} when a page is missing, repeated or out of range
   */
  static assemble(
    sourceRef: string,
    pages: readonly PageResult[],
    pageCount: number,
    options: AssembleOptions = {},
  ): OcrDocument {
    const ordered = [...pages].sort((a, b) => a.pageNumber - b.pageNumber);
    this.assertComplete(sourceRef, ordered, pageCount);

    let text = '';
    const pageSpans: PageSpan[] = [];
    const spans: Array<[number, number]> = [];

    ordered.forEach((page, index) => {
      const start = text.length;
      text += page.text;
      if (index < ordered.length - 1) {
        text += '\n';
      }
      pageSpans.push([start, text.length, page.pageNumber]);
      spans.push([start, text.length]);
    });

    const spanOf = <T>(value: (page: PageResult) => T): AttributeSpan<T>[] =>
      ordered.map((page, index): AttributeSpan<T> => [
        spans[index][0],
        spans[index][1],
        value(page),
      ]);

    const now = options.now ?? (() => new Date());

    return {
      id: createHash('sha1').update(text).digest('hex'),
      sourceRef,
      text,
      pageSpans,
      metadata: {
        totalPages: ordered.length,
        fallbackPageCount: ordered.filter((page) => page.isFallback).length,
        totalInputTokens: ordered.reduce((sum, page) => sum + page.inputTokens, 0),
        totalOutputTokens: ordered.reduce(
          (sum, page) => sum + page.outputTokens,
          0,
        ),
        createdAt: now().toISOString(),
      },
      attributes: {
        primaryLanguage: spanOf((page) => page.primaryLanguage),
        isRotationValid: spanOf((page) => page.isRotationValid),
        rotationCorrection: spanOf((page) => page.rotationCorrection),
        isTable: spanOf((page) => page.isTable),
        isDiagram: spanOf((page) => page.isDiagram),
        isFallbackPage: spanOf((page) => page.isFallback),
      },
      pages: ordered,
    };
  }

  private static assertComplete(
    sourceRef: string,
    ordered: readonly PageResult[],
    pageCount: number,
  ): void {
    if (ordered.length !== pageCount) {
      throw new RangeError(
        `${sourceRef}: expected ${pageCount} page results, got ${ordered.length}`,
      );
    }
    ordered.forEach((page, index) => {
      if (page.pageNumber !== index + 1) {
        throw new RangeError(
          `${sourceRef}: page results must number 1..${pageCount}, found ${page.pageNumber} at position ${index + 1}`,
        );
      }
    });
  }
}
