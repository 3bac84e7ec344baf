import type { RenderPageOptions, SourceKind } from '../processors/page-renderer';

/**
 * A source document opened for OCR. Holds local resources until
 * disposed.
 */
export interface SourceDocument {
  readonly ref: string;
  readonly kind: SourceKind;
  readonly pageCount: number;
  readonly sizeBytes: number;

  /** Render a 1-based page to PNG bytes */
  renderPage(pageNumber: number, options: RenderPageOptions): Promise<Buffer>;

  /**
   * Text layer of a 1-based page, at most `maxLength` characters.
   * Empty for images and pages without text.
   */
  extractText(pageNumber: number, maxLength?: number): Promise<string>;

  dispose(): Promise<void>;
}

/** Opens document refs (local paths or `s3://` URLs) */
export interface DocumentLoader {
  load(ref: string): Promise<SourceDocument>;
}
