export interface S3Location {
  bucket: string;
  /** Key or key prefix without a leading slash; may be empty */
  key: string;
}

export function isS3Url(value: string): boolean {
  return value.startsWith('s3://');
}

/**
 * Split `s3://bucket/some/key` into bucket and key.
 */
export function parseS3Url(url: string): S3Location {
  const match = /^s3:\/\/([^/]+)\/?(.*)$/.exec(url);
  if (!match) {
    throw new Error(`Not an S3 URL: ${url}`);
  }
  return { bucket: match[1], key: match[2] };
}
