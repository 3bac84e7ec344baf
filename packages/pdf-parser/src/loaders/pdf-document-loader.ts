import type { LoggerMethods } from '@pagemill/logger';
import type { BlobObject } from '@pagemill/storage';
import type { FileHandle } from 'node:fs/promises';

import type {
  RenderPageOptions,
  SourceKind,
} from '../processors/page-renderer';
import type { DocumentLoader, SourceDocument } from '../types/source-document';

import { S3Client, S3ServiceException } from '@aws-sdk/client-s3';
import { Semaphore } from '@pagemill/shared';
import { S3BlobStore, isS3Url, parseS3Url } from '@pagemill/storage';
import { mkdtemp, open, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { PAGE_RENDERER } from '../config/constants';
import { SourceDocumentError } from '../errors/source-document-error';
import { PageRenderer } from '../processors/page-renderer';
import { PdfTextExtractor } from '../processors/pdf-text-extractor';

/** Bytes needed to recognise every supported format */
const HEADER_LENGTH = 8;

/** Client errors that a later attempt may not repeat */
const TRANSIENT_CLIENT_STATUSES: ReadonlySet<number> = new Set([408, 429]);

/** Whether S3 refused the object itself (access denied, bad key, ...) */
function isPermanentS3Error(error: unknown): error is S3ServiceException {
  if (!(error instanceof S3ServiceException)) return false;
  const status = error.$metadata.httpStatusCode;
  return (
    status !== undefined &&
    status >= 400 &&
    status < 500 &&
    !TRANSIENT_CLIENT_STATUSES.has(status)
  );
}

/**
 * Identify the file type from its leading bytes. Returns null for
 * anything other than PDF, PNG or JPEG.
 */
export function detectSourceKind(header: Uint8Array): SourceKind | null {
  const bytes = Buffer.from(header);
  if (bytes.subarray(0, 5).toString('latin1') === '%PDF-') {
    return 'pdf';
  }
  if (
    bytes.subarray(0, 8).equals(
      Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
    )
  ) {
    return 'image';
  }
  if (bytes.subarray(0, 3).equals(Buffer.from([0xff, 0xd8, 0xff]))) {
    return 'image';
  }
  return null;
}

export interface PdfDocumentLoaderOptions {
  /** Concurrent render and text subprocesses (default: 4) */
  maxRenderProcesses?: number;

  /** Client for `s3://` refs (default: a client from the environment) */
  s3Client?: S3Client;

  /** Parent directory for downloaded sources (default: os.tmpdir()) */
  tempDir?: string;

  /** Override the page renderer */
  renderer?: PageRenderer;

  /** Override the text extractor */
  textExtractor?: PdfTextExtractor;
}

/**
 * Opens local and S3 documents for page rendering.
 *
 * Local files are used in place. S3 objects are downloaded to a
 * private temp directory that is removed on dispose. Rendering and text
 * extraction for all documents share one subprocess limit.
 */
export class PdfDocumentLoader implements DocumentLoader {
  private readonly renderer: PageRenderer;
  private readonly textExtractor: PdfTextExtractor;
  private s3Client: S3Client | undefined;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly options: PdfDocumentLoaderOptions = {},
  ) {
    const semaphore = new Semaphore(
      options.maxRenderProcesses ?? PAGE_RENDERER.DEFAULT_MAX_PROCESSES,
    );
    this.renderer = options.renderer ?? new PageRenderer(logger, { semaphore });
    this.textExtractor =
      options.textExtractor ?? new PdfTextExtractor(logger, semaphore);
    this.s3Client = options.s3Client;
  }

  async load(ref: string): Promise<SourceDocument> {
    const source = isS3Url(ref)
      ? await this.download(ref)
      : await this.inspectLocal(ref);

    try {
      const kind = detectSourceKind(source.header);
      if (kind === null) {
        throw new SourceDocumentError(ref, 'Unsupported file type');
      }

      const pageCount =
        kind === 'pdf'
          ? await this.textExtractor.getPageCount(source.path)
          : 1;
      if (pageCount === 0) {
        throw new SourceDocumentError(
          ref,
          'Cannot read page count; the file may be corrupt or encrypted',
        );
      }

      this.logger.debug(
        `[PdfDocumentLoader] Opened ${ref} (${kind}, ${pageCount} pages, ${source.sizeBytes} bytes)`,
      );

      return new LocalSourceDocument(
        ref,
        kind,
        pageCount,
        source.sizeBytes,
        source.path,
        source.tempDir,
        this.renderer,
        this.textExtractor,
      );
    } catch (error) {
      if (source.tempDir) {
        await rm(source.tempDir, { recursive: true, force: true });
      }
      throw error;
    }
  }

  private async inspectLocal(ref: string): Promise<OpenedSource> {
    let handle: FileHandle;
    try {
      handle = await open(ref, 'r');
    } catch (error) {
      throw SourceDocumentError.fromError(ref, 'Cannot open file', error);
    }

    try {
      const { size } = await handle.stat();
      const header = Buffer.alloc(Math.min(HEADER_LENGTH, size));
      await handle.read(header, 0, header.length, 0);
      return { path: ref, header, sizeBytes: size };
    } finally {
      await handle.close();
    }
  }

  private async download(ref: string): Promise<OpenedSource> {
    const { bucket, key } = parseS3Url(ref);
    this.s3Client ??= new S3Client({});
    const store = new S3BlobStore(this.s3Client, bucket);

    let object: BlobObject | null;
    try {
      object = await store.get(key);
    } catch (error) {
      if (isPermanentS3Error(error)) {
        throw SourceDocumentError.fromError(ref, 'Cannot read object', error);
      }
      throw error;
    }
    if (object === null) {
      throw new SourceDocumentError(ref, 'Object not found');
    }

    const tempDir = await mkdtemp(
      join(this.options.tempDir ?? tmpdir(), 'pagemill-'),
    );
    const path = join(tempDir, 'source');
    try {
      await writeFile(path, object.body);
    } catch (error) {
      await rm(tempDir, { recursive: true, force: true });
      throw error;
    }

    return {
      path,
      header: object.body.subarray(0, HEADER_LENGTH),
      sizeBytes: object.body.length,
      tempDir,
    };
  }
}

interface OpenedSource {
  path: string;
  header: Uint8Array;
  sizeBytes: number;
  /** Set when the source was copied and must be removed */
  tempDir?: string;
}

class LocalSourceDocument implements SourceDocument {
  private disposed = false;

  constructor(
    readonly ref: string,
    readonly kind: SourceKind,
    readonly pageCount: number,
    readonly sizeBytes: number,
    private readonly path: string,
    private readonly tempDir: string | undefined,
    private readonly renderer: PageRenderer,
    private readonly textExtractor: PdfTextExtractor,
  ) {}

  async renderPage(
    pageNumber: number,
    options: RenderPageOptions,
  ): Promise<Buffer> {
    this.assertPage(pageNumber);
    return this.renderer.renderPage(this.path, this.kind, pageNumber, options);
  }

  async extractText(pageNumber: number, maxLength?: number): Promise<string> {
    this.assertPage(pageNumber);
    if (this.kind !== 'pdf') {
      return '';
    }
    return this.textExtractor.extractPageText(this.path, pageNumber, maxLength);
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    if (this.tempDir) {
      await rm(this.tempDir, { recursive: true, force: true });
    }
  }

  private assertPage(pageNumber: number): void {
    if (
      !Number.isInteger(pageNumber) ||
      pageNumber < 1 ||
      pageNumber > this.pageCount
    ) {
      throw new RangeError(
        `Page ${pageNumber} is outside 1..${this.pageCount} of ${this.ref}`,
      );
    }
  }
}
