import type { LoggerMethods } from '@pagemill/logger';

import { Semaphore, spawnAsync } from '@pagemill/shared';

import { PAGE_RENDERER } from '../config/constants';

/**
 * Reads the embedded text layer of PDF pages using the Poppler tools.
 *
 * Text extraction failures are logged as warnings and produce empty
 * strings; a page without a usable text layer is still OCR'd from its
 * image.
 *
 * ## System Requirements
 * - Poppler utils (`pdfinfo`, `pdftotext`)
 */
export class PdfTextExtractor {
  private readonly semaphore: Semaphore;

  constructor(
    private readonly logger: LoggerMethods,
    semaphore?: Semaphore,
  ) {
    this.semaphore =
      semaphore ?? new Semaphore(PAGE_RENDERER.DEFAULT_MAX_PROCESSES);
  }

  /**
   * Get total page count of a PDF using pdfinfo.
   * Returns 0 on failure.
   */
  async getPageCount(pdfPath: string): Promise<number> {
    const result = await this.semaphore.use(() =>
      spawnAsync('pdfinfo', [pdfPath]),
    );
    if (result.code !== 0) {
      this.logger.warn(
        `[PdfTextExtractor] pdfinfo failed: ${result.stderr.trim() || 'Unknown error'}`,
      );
      return 0;
    }
    const match = result.stdout.match(/^Pages:\s+(\d+)/m);
    return match ? parseInt(match[1], 10) : 0;
  }

  /**
   * Extract the text layer of a 1-based page, with trailing whitespace
   * and form feeds stripped, cut to at most `maxLength` characters.
   * Returns empty string on failure (logged as warning).
   */
  async extractPageText(
    pdfPath: string,
    page: number,
    maxLength = Number.POSITIVE_INFINITY,
  ): Promise<string> {
    if (maxLength <= 0) {
      return '';
    }

    const result = await this.semaphore.use(() =>
      spawnAsync('pdftotext', [
        '-f',
        page.toString(),
        '-l',
        page.toString(),
        '-layout',
        pdfPath,
        '-',
      ]),
    );

    if (result.code !== 0) {
      this.logger.warn(
        `[PdfTextExtractor] pdftotext failed for page ${page}: ${result.stderr.trim() || 'Unknown error'}`,
      );
      return '';
    }

    const text = result.stdout
      .replace(/\f/g, '')
      .replace(/[ \t]+$/gm, '')
      .trim();
    return text.length > maxLength ? text.slice(0, maxLength) : text;
  }
}
