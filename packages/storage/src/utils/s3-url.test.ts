import { describe, expect, test } from 'vitest';

import { isS3Url, parseS3Url } from './s3-url';

describe('parseS3Url', () => {
  test('splits bucket and key', () => {
    expect(parseS3Url('s3://papers/2024/a.pdf')).toEqual({
      bucket: 'papers',
      key: '2024/a.pdf',
    });
  });

  test('accepts a bare bucket with or without trailing slash', () => {
    expect(parseS3Url('s3://papers')).toEqual({ bucket: 'papers', key: '' });
    expect(parseS3Url('s3://papers/')).toEqual({ bucket: 'papers', key: '' });
  });

  test('rejects other schemes', () => {
    expect(() => parseS3Url('/local/file.pdf')).toThrow(
      'Not an S3 URL: /local/file.pdf',
    );
  });
});

describe('isS3Url', () => {
  test('matches the s3 scheme only', () => {
    expect(isS3Url('s3://bucket/key')).toBe(true);
    expect(isS3Url('./docs/a.pdf')).toBe(false);
  });
});
