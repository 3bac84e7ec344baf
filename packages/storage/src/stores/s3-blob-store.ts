import type { S3Client } from '@aws-sdk/client-s3';

import type { BlobObject, BlobStore, PutOptions } from '../types';

import {
  DeleteObjectCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  NoSuchKey,
  PutObjectCommand,
  S3ServiceException,
} from '@aws-sdk/client-s3';

import { BlobConflictError } from '../errors/blob-conflict-error';
import { toBuffer } from '../utils/etag';

function statusOf(error: unknown): number | undefined {
  return error instanceof S3ServiceException
    ? error.$metadata.httpStatusCode
    : undefined;
}

/**
 * BlobStore over an S3 bucket prefix. Conditional writes map to
 * `If-None-Match: *` and `If-Match: <etag>` on PutObject.
 */
export class S3BlobStore implements BlobStore {
  readonly location: string;
  private readonly prefix: string;

  constructor(
    private readonly client: S3Client,
    private readonly bucket: string,
    prefix = '',
  ) {
    this.prefix = prefix === '' || prefix.endsWith('/') ? prefix : `${prefix}/`;
    this.location = `s3://${bucket}/${this.prefix}`;
  }

  async get(key: string): Promise<BlobObject | null> {
    try {
      const output = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: this.prefix + key }),
      );
      if (!output.Body) {
        return { body: Buffer.alloc(0), etag: output.ETag ?? '' };
      }
      const bytes = await output.Body.transformToByteArray();
      return { body: Buffer.from(bytes), etag: output.ETag ?? '' };
    } catch (error) {
      if (error instanceof NoSuchKey || statusOf(error) === 404) {
        return null;
      }
      throw error;
    }
  }

  async put(
    key: string,
    body: Buffer | string,
    options: PutOptions = {},
  ): Promise<string> {
    try {
      const output = await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: this.prefix + key,
          Body: toBuffer(body),
          IfNoneMatch: options.ifNoneMatch,
          IfMatch: options.ifMatch,
        }),
      );
      return output.ETag ?? '';
    } catch (error) {
      const status = statusOf(error);
      if (status === 412 || status === 409) {
        throw new BlobConflictError(key, undefined, { cause: error });
      }
      throw error;
    }
  }

  async list(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;

    do {
      const output = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: this.prefix + prefix,
          ContinuationToken: continuationToken,
        }),
      );
      for (const object of output.Contents ?? []) {
        if (object.Key) {
          keys.push(object.Key.slice(this.prefix.length));
        }
      }
      continuationToken = output.IsTruncated
        ? output.NextContinuationToken
        : undefined;
    } while (continuationToken);

    return keys.sort();
  }

  async delete(key: string): Promise<void> {
    await this.client.send(
      new DeleteObjectCommand({ Bucket: this.bucket, Key: this.prefix + key }),
    );
  }
}
