import type { BlobStore } from './types';

import { S3Client } from '@aws-sdk/client-s3';

import { LocalBlobStore } from './stores/local-blob-store';
import { S3BlobStore } from './stores/s3-blob-store';
import { isS3Url, parseS3Url } from './utils/s3-url';

export interface CreateBlobStoreOptions {
  /** Client for `s3://` locations (default: a client from the environment) */
  s3Client?: S3Client;
}

/**
 * Open the store for a workspace location: `s3://bucket/prefix` or a
 * local directory.
 */
export function createBlobStore(
  location: string,
  options: CreateBlobStoreOptions = {},
): BlobStore {
  if (isS3Url(location)) {
    const { bucket, key } = parseS3Url(location);
    return new S3BlobStore(options.s3Client ?? new S3Client({}), bucket, key);
  }
  return new LocalBlobStore(location);
}
