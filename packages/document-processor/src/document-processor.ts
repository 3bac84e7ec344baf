import type { LoggerMethods } from '@pagemill/logger';
import type { MetricsSink, OcrDocument } from '@pagemill/model';
import type { DocumentLoader, PageProcessor } from '@pagemill/pdf-parser';
import type { Semaphore } from '@pagemill/shared';

import { ConcurrentPool } from '@pagemill/shared';

import { DOCUMENT_PROCESSOR } from './config/constants';
import { DocumentAssembler } from './document-assembler';

/**
 * DocumentProcessor Options
 */
export interface DocumentProcessorOptions {
  logger: LoggerMethods;

  /** Opens document refs for rendering */
  loader: DocumentLoader;

  /** Resolves each page to a result */
  pageProcessor: Pick<PageProcessor, 'process'>;

  metrics: MetricsSink;

  /**
   * Pages of one document processed at once (default: 16)
   */
  pageConcurrency?: number;

  /**
   * Bound on pages in flight across every document in the process.
   * Each page holds one permit while it is processed.
   */
  globalPageLimit?: Semaphore;

  /**
   * Fallback share above which a document counts as degraded
   * (default: 0.004)
   */
  maxPageErrorRate?: number;

  /** Clock for document timestamps (default: current time) */
  now?: () => Date;
}

export interface DocumentProcessResult {
  document: OcrDocument;
  /** fallbackPageCount / totalPages */
  fallbackRate: number;
  /** True when fallbackRate exceeds maxPageErrorRate */
  degraded: boolean;
}

/**
 * DocumentProcessor
 *
 * Runs every page of one source document through the page processor
 * and assembles the results into an OcrDocument.
 *
 * Pages complete in any order; assembly restores page order. A document
 * is returned even when pages fell back, so one bad page never costs the
 * whole document. Only a source that cannot be opened fails the call
 * (with SourceDocumentError from the loader).
 *
 * @example
 * ```typescript
 * const processor = new DocumentProcessor({
 *   logger,
 *   loader: new PdfDocumentLoader(logger),
 *   pageProcessor: new PageProcessor(logger, client, metrics),
 *   metrics,
 * });
 *
 * const { document, degraded } = await processor.process('scans/report.pdf');
 * ```
 */
export class DocumentProcessor {
  private readonly logger: LoggerMethods;
  private readonly pageConcurrency: number;
  private readonly maxPageErrorRate: number;

  constructor(private readonly options: DocumentProcessorOptions) {
    this.logger = options.logger;
    this.pageConcurrency =
      options.pageConcurrency ?? DOCUMENT_PROCESSOR.DEFAULT_PAGE_CONCURRENCY;
    this.maxPageErrorRate =
      options.maxPageErrorRate ?? DOCUMENT_PROCESSOR.DEFAULT_MAX_PAGE_ERROR_RATE;
  }

  /**
   * Process one document.
   *
   * @param pageCount - Pages to process (default: the count the loader reports)
   * @param signal - Cancels outstanding pages; they resolve as fallbacks
   */
  async process(
    ref: string,
    pageCount?: number,
    signal?: AbortSignal,
  ): Promise<DocumentProcessResult> {
    const { loader, pageProcessor, metrics } = this.options;
    const startedAt = Date.now();

    const source = await loader.load(ref);
    try {
      const count = pageCount ?? source.pageCount;
      const pageNumbers = Array.from({ length: count }, (_, i) => i + 1);

      this.logger.debug(
        `[DocumentProcessor] Processing ${count} pages of ${ref}`,
      );

      const pages = await ConcurrentPool.run(
        pageNumbers,
        this.pageConcurrency,
        (pageNumber) => pageProcessor.process(source, pageNumber, signal),
        { semaphore: this.options.globalPageLimit },
      );

      metrics.increment('bytesProcessed', source.sizeBytes);

      const document = DocumentAssembler.assemble(ref, pages, count, {
        now: this.options.now,
      });
      const { fallbackPageCount, totalPages } = document.metadata;
      const fallbackRate = totalPages === 0 ? 0 : fallbackPageCount / totalPages;
      const degraded = fallbackRate > this.maxPageErrorRate;

      if (degraded) {
        metrics.increment('documentsDegraded');
        this.logger.warn(
          `[DocumentProcessor] ${ref}: ${fallbackPageCount}/${totalPages} pages fell back (${(fallbackRate * 100).toFixed(1)}%)`,
        );
      } else {
        this.logger.info(
          `[DocumentProcessor] Processed ${ref} (${totalPages} pages)`,
        );
      }

      return { document, fallbackRate, degraded };
    } finally {
      await source.dispose();
      metrics.recordDuration('document', Date.now() - startedAt);
    }
  }
}
