import type { LoggerMethods } from '@pagemill/logger';
import type { RotationCorrection } from '@pagemill/model';

import { Semaphore, spawnAsync } from '@pagemill/shared';

import { PAGE_RENDERER } from '../config/constants';

/** Source file type understood by the renderer */
export type SourceKind = 'pdf' | 'image';

export interface RenderPageOptions {
  /** Longest side of the output image in pixels */
  targetLongestDim: number;
  /** Clockwise rotation applied after scaling (default: 0) */
  rotation?: RotationCorrection;
  /** Abort while waiting for a render slot */
  signal?: AbortSignal;
}

/** Options for page rendering */
export interface PageRendererOptions {
  /**
   * Shared bound on render subprocesses. Pass the same semaphore to the
   * text extractor so both count against one limit.
   * (default: a new semaphore of PAGE_RENDERER.DEFAULT_MAX_PROCESSES)
   */
  semaphore?: Semaphore;

  /** Rasterization density for PDF input (default: 200) */
  density?: number;
}

/**
 * Renders one page of a PDF, or a single image, to PNG bytes using
 * ImageMagick.
 *
 * ## System Requirements
 * - ImageMagick 7 (`magick`)
 * - Ghostscript for PDF input
 */
export class PageRenderer {
  private readonly semaphore: Semaphore;
  private readonly density: number;

  constructor(
    private readonly logger: LoggerMethods,
    options: PageRendererOptions = {},
  ) {
    this.semaphore =
      options.semaphore ?? new Semaphore(PAGE_RENDERER.DEFAULT_MAX_PROCESSES);
    this.density = options.density ?? PAGE_RENDERER.DENSITY;
  }

  /**
   * Render a 1-based page. Image sources only have page 1.
   */
  async renderPage(
    filePath: string,
    kind: SourceKind,
    pageNumber: number,
    options: RenderPageOptions,
  ): Promise<Buffer> {
    const args = this.buildArgs(filePath, kind, pageNumber, options);

    const result = await this.semaphore.use(
      () => spawnAsync('magick', args),
      options.signal,
    );

    if (result.code !== 0) {
      throw new Error(
        `[PageRenderer] Failed to render page ${pageNumber} of ${filePath}: ${result.stderr.trim() || 'Unknown error'}`,
      );
    }
    if (result.stdoutBuffer.length === 0) {
      throw new Error(
        `[PageRenderer] Renderer produced no output for page ${pageNumber} of ${filePath}`,
      );
    }

    this.logger.debug(
      `[PageRenderer] Rendered page ${pageNumber} of ${filePath} (${result.stdoutBuffer.length} bytes)`,
    );
    return result.stdoutBuffer;
  }

  buildArgs(
    filePath: string,
    kind: SourceKind,
    pageNumber: number,
    options: RenderPageOptions,
  ): string[] {
    const dim = options.targetLongestDim;
    const rotation = options.rotation ?? 0;

    const input =
      kind === 'pdf'
        ? ['-density', this.density.toString(), `${filePath}[${pageNumber - 1}]`]
        : [filePath];

    return [
      ...input,
      '-background',
      'white',
      '-alpha',
      'remove',
      '-alpha',
      'off',
      '-resize',
      `${dim}x${dim}`,
      ...(rotation === 0 ? [] : ['-rotate', rotation.toString()]),
      'png:-',
    ];
  }
}
