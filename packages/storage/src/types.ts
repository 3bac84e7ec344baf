export interface BlobObject {
  body: Buffer;
  /** Opaque version tag, passed back as `ifMatch` */
  etag: string;
}

/**
 * Conditions for a put. At most one may be set.
 */
export interface PutOptions {
  /** Create only when the key does not exist */
  ifNoneMatch?: '*';
  /** Replace only when the stored version still has this etag */
  ifMatch?: string;
}

/**
 * Key/value blob storage addressed by `/`-separated keys.
 *
 * Conditional puts are atomic: of several concurrent conditional writers
 * observing the same version, at most one succeeds and the rest receive
 * BlobConflictError.
 */
export interface BlobStore {
  /** Human-readable location for logs */
  readonly location: string;
  get(key: string): Promise<BlobObject | null>;
  /** Resolves to the etag of the written version */
  put(key: string, body: Buffer | string, options?: PutOptions): Promise<string>;
  /** Keys starting with `prefix`, sorted */
  list(prefix: string): Promise<string[]>;
  /** Deleting a missing key is not an error */
  delete(key: string): Promise<void>;
}
