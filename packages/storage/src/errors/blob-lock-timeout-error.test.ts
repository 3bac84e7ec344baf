import { describe, expect, test } from 'vitest';

import { BlobConflictError } from './blob-conflict-error';
import { BlobLockTimeoutError } from './blob-lock-timeout-error';

describe('BlobLockTimeoutError', () => {
  test('names the key and the time waited', () => {
    const error = new BlobLockTimeoutError('queue/done/abc.json', 50);

    expect(error.name).toBe('BlobLockTimeoutError');
    expect(error.key).toBe('queue/done/abc.json');
    expect(error.message).toBe(
      'Timed out after 50ms waiting for lock on queue/done/abc.json',
    );
    expect(error).not.toBeInstanceOf(BlobConflictError);
  });
});
