import type { LoggerMethods } from '@pagemill/logger';
import type { DocumentLoader } from '@pagemill/pdf-parser';
import type { BlobStore } from '@pagemill/storage';
import type { WorkQueue } from '@pagemill/work-queue';
import type { FileHandle } from 'node:fs/promises';

import { S3Client } from '@aws-sdk/client-s3';
import { detectSourceKind } from '@pagemill/pdf-parser';
import { S3BlobStore, isS3Url, parseS3Url } from '@pagemill/storage';
import { shuffle, uniq } from 'es-toolkit';
import { open, readFile, readdir, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';

import { QUEUE_POPULATOR } from '../config/constants';
import { ConfigurationError } from '../errors/configuration-error';

const HEADER_LENGTH = 8;

function isDocumentPath(path: string): boolean {
  return QUEUE_POPULATOR.DOCUMENT_EXTENSIONS.some(
    (extension) => extension === extname(path).toLowerCase(),
  );
}

/**
 * `*.pdf` → /^[^/]*\.pdf$/
 */
function globToRegExp(pattern: string): RegExp {
  const source = pattern
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('[^/]*');
  return new RegExp(`^${source}$`);
}

async function readHeader(path: string): Promise<Buffer> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${path}`, [], { cause: error });
  }
  try {
    const header = Buffer.alloc(HEADER_LENGTH);
    const { bytesRead } = await handle.read(header, 0, HEADER_LENGTH, 0);
    return header.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

export interface QueuePopulatorOptions {
  /** Opens sampled documents to count their pages */
  loader: DocumentLoader;

  /** Target pages per work item (default: 500) */
  pagesPerGroup?: number;

  /** Documents opened for the page-count estimate (default: 100) */
  sampleSize?: number;

  /** Client for `s3://` selectors (default: a client from the environment) */
  s3Client?: S3Client;

  /** Store used to list an S3 bucket (default: S3BlobStore over the bucket root) */
  openBucket?: (bucket: string) => Pick<BlobStore, 'list'>;
}

export interface PopulateResult {
  /** Refs the selectors expanded to */
  documents: number;
  /** New work items created */
  workItems: number;
  averagePages: number;
  itemsPerGroup: number;
}

/**
 * QueuePopulator
 *
 * Expands source selectors into document refs and groups them into work
 * items sized to roughly `pagesPerGroup` pages each.
 *
 * Selectors:
 * - a local `.pdf`, `.png`, `.jpg` or `.jpeg` file (checked by content)
 * - a local directory, searched recursively
 * - a `.txt` file listing one ref per line
 * - `s3://bucket/prefix` or `s3://bucket/prefix/*.pdf`
 */
export class QueuePopulator {
  private readonly pagesPerGroup: number;
  private readonly sampleSize: number;
  private s3Client: S3Client | undefined;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly queue: Pick<WorkQueue, 'populate'>,
    private readonly options: QueuePopulatorOptions,
  ) {
    this.pagesPerGroup =
      options.pagesPerGroup ?? QUEUE_POPULATOR.DEFAULT_PAGES_PER_GROUP;
    this.sampleSize =
      options.sampleSize ?? QUEUE_POPULATOR.PAGE_COUNT_SAMPLE_SIZE;
    this.s3Client = options.s3Client;
  }

  async populate(selectors: readonly string[]): Promise<PopulateResult> {
    const refs = await this.expandSelectors(selectors);
    if (refs.length === 0) {
      this.logger.warn('[QueuePopulator] Selectors matched no documents');
      return { documents: 0, workItems: 0, averagePages: 0, itemsPerGroup: 0 };
    }

    const averagePages = await this.estimateAveragePages(refs);
    const itemsPerGroup = Math.max(
      1,
      Math.floor(this.pagesPerGroup / averagePages),
    );
    this.logger.info(
      `[QueuePopulator] ${refs.length} documents, ~${averagePages.toFixed(1)} pages each, ${itemsPerGroup} per work item`,
    );

    const workItems = await this.queue.populate(refs, itemsPerGroup);
    return { documents: refs.length, workItems, averagePages, itemsPerGroup };
  }

  /**
   * Resolve selectors to unique document refs in selector order
   *
   * @throws ConfigurationError for a missing path or unsupported file type
   */
  async expandSelectors(selectors: readonly string[]): Promise<string[]> {
    const refs: string[] = [];
    for (const selector of selectors) {
      const expanded = isS3Url(selector)
        ? await this.expandS3(selector)
        : await this.expandLocal(selector);
      this.logger.debug(
        `[QueuePopulator] ${selector} matched ${expanded.length} documents`,
      );
      refs.push(...expanded);
    }
    return uniq(refs);
  }

  /**
   * Mean page count over a random sample of refs. Documents that cannot
   * be opened are left out; with none readable the default is used.
   */
  async estimateAveragePages(refs: readonly string[]): Promise<number> {
    const sample = shuffle([...refs]).slice(0, this.sampleSize);
    let pages = 0;
    let counted = 0;

    for (const ref of sample) {
      try {
        const document = await this.options.loader.load(ref);
        try {
          pages += document.pageCount;
          counted++;
        } finally {
          await document.dispose();
        }
      } catch (error) {
        this.logger.warn(
          `[QueuePopulator] Skipping ${ref} in page estimate: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    if (counted === 0 || pages === 0) {
      return QUEUE_POPULATOR.DEFAULT_AVERAGE_PAGES;
    }
    return pages / counted;
  }

  private async expandS3(selector: string): Promise<string[]> {
    const { bucket, key } = parseS3Url(selector);
    const store = this.openBucket(bucket);

    const slash = key.lastIndexOf('/');
    const lastSegment = key.slice(slash + 1);

    if (lastSegment.includes('*')) {
      const directory = key.slice(0, slash + 1);
      if (directory.includes('*')) {
        throw new ConfigurationError(
          `Only the last path segment may contain "*": ${selector}`,
        );
      }
      const pattern = globToRegExp(lastSegment);
      const keys = await store.list(directory);
      return keys
        .filter((candidate) => pattern.test(candidate.slice(directory.length)))
        .map((candidate) => `s3://${bucket}/${candidate}`);
    }

    if (isDocumentPath(key)) {
      return [selector];
    }

    const prefix = key === '' || key.endsWith('/') ? key : `${key}/`;
    const keys = await store.list(prefix);
    return keys
      .filter(isDocumentPath)
      .map((candidate) => `s3://${bucket}/${candidate}`);
  }

  private async expandLocal(selector: string): Promise<string[]> {
    let isDirectory: boolean;
    try {
      isDirectory = (await stat(selector)).isDirectory();
    } catch (error) {
      throw new ConfigurationError(`No such selector: ${selector}`, [], {
        cause: error,
      });
    }

    if (isDirectory) {
      return this.walkDirectory(selector);
    }

    const extension = extname(selector).toLowerCase();
    if (extension === QUEUE_POPULATOR.LIST_EXTENSION) {
      const content = await readFile(selector, 'utf8');
      return content
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0);
    }

    if (!isDocumentPath(selector)) {
      throw new ConfigurationError(
        `Unsupported selector ${selector}: expected .pdf, .png, .jpg, .jpeg, .txt, a directory or s3:// prefix`,
      );
    }
    if (detectSourceKind(await readHeader(selector)) === null) {
      throw new ConfigurationError(
        `${selector} is not a PDF, PNG or JPEG file`,
      );
    }
    return [selector];
  }

  private async walkDirectory(directory: string): Promise<string[]> {
    const refs: string[] = [];
    const entries = await readdir(directory, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      const path = join(directory, entry.name);
      if (entry.isDirectory()) {
        refs.push(...(await this.walkDirectory(path)));
      } else if (entry.isFile() && isDocumentPath(path)) {
        if (detectSourceKind(await readHeader(path)) === null) {
          this.logger.warn(
            `[QueuePopulator] Skipping ${path}: not a PDF, PNG or JPEG file`,
          );
          continue;
        }
        refs.push(path);
      }
    }
    return refs;
  }

  private openBucket(bucket: string): Pick<BlobStore, 'list'> {
    if (this.options.openBucket) {
      return this.options.openBucket(bucket);
    }
    this.s3Client ??= new S3Client({});
    return new S3BlobStore(this.s3Client, bucket);
  }
}
