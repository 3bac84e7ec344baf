export { createBlobStore, type CreateBlobStoreOptions } from './create-blob-store';
export { BlobConflictError } from './errors/blob-conflict-error';
export { BlobLockTimeoutError } from './errors/blob-lock-timeout-error';
export {
  LocalBlobStore,
  type LocalBlobStoreOptions,
} from './stores/local-blob-store';
export { MemoryBlobStore } from './stores/memory-blob-store';
export { S3BlobStore } from './stores/s3-blob-store';
export type { BlobObject, BlobStore, PutOptions } from './types';
export { isS3Url, parseS3Url, type S3Location } from './utils/s3-url';
