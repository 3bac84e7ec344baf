import type { BlobObject, BlobStore, PutOptions } from '../types';

import { BlobConflictError } from '../errors/blob-conflict-error';
import { computeEtag, toBuffer } from '../utils/etag';

/**
 * In-process BlobStore with the same conditional-write semantics as the
 * durable stores. Used by tests and single-process dry runs.
 */
export class MemoryBlobStore implements BlobStore {
  readonly location = 'memory://';
  private readonly blobs = new Map<string, BlobObject>();

  async get(key: string): Promise<BlobObject | null> {
    const blob = this.blobs.get(key);
    return blob ? { body: Buffer.from(blob.body), etag: blob.etag } : null;
  }

  async put(
    key: string,
    body: Buffer | string,
    options: PutOptions = {},
  ): Promise<string> {
    const current = this.blobs.get(key);
    if (options.ifNoneMatch && current) {
      throw new BlobConflictError(key);
    }
    if (options.ifMatch !== undefined && current?.etag !== options.ifMatch) {
      throw new BlobConflictError(key);
    }

    const copy = Buffer.from(toBuffer(body));
    const etag = computeEtag(copy);
    this.blobs.set(key, { body: copy, etag });
    return etag;
  }

  async list(prefix: string): Promise<string[]> {
    return [...this.blobs.keys()].filter((key) => key.startsWith(prefix)).sort();
  }

  async delete(key: string): Promise<void> {
    this.blobs.delete(key);
  }
}
