import type { BlobStore } from '../types';

import { mkdtemp, rm, utimes } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import { BlobConflictError } from '../errors/blob-conflict-error';
import { BlobLockTimeoutError } from '../errors/blob-lock-timeout-error';
import { LocalBlobStore } from './local-blob-store';
import { MemoryBlobStore } from './memory-blob-store';

interface StoreFixture {
  name: string;
  create: () => Promise<{ store: BlobStore; cleanup: () => Promise<void> }>;
}

const fixtures: StoreFixture[] = [
  {
    name: 'MemoryBlobStore',
    create: async () => ({
      store: new MemoryBlobStore(),
      cleanup: async () => {},
    }),
  },
  {
    name: 'LocalBlobStore',
    create: async () => {
      const root = await mkdtemp(join(tmpdir(), 'pagemill-store-'));
      return {
        store: new LocalBlobStore(root),
        cleanup: () => rm(root, { recursive: true, force: true }),
      };
    },
  },
];

describe.each(fixtures)('$name', ({ create }) => {
  let store: BlobStore;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ store, cleanup } = await create());
  });

  afterEach(async () => {
    await cleanup();
  });

  test('returns null for a missing key', async () => {
    expect(await store.get('results/missing.jsonl')).toBeNull();
  });

  test('round-trips bytes and reports a stable etag', async () => {
    const etag = await store.put('queue/items/a.json', '{"id":"a"}');
    const blob = await store.get('queue/items/a.json');

    expect(blob?.body.toString('utf8')).toBe('{"id":"a"}');
    expect(blob?.etag).toBe(etag);
  });

  test('create-only put fails when the key exists', async () => {
    await store.put('queue/leases/a.json', 'first', { ifNoneMatch: '*' });

    await expect(
      store.put('queue/leases/a.json', 'second', { ifNoneMatch: '*' }),
    ).rejects.toBeInstanceOf(BlobConflictError);
    expect((await store.get('queue/leases/a.json'))?.body.toString()).toBe(
      'first',
    );
  });

  test('compare-and-swap put succeeds only against the observed etag', async () => {
    const first = await store.put('queue/leases/b.json', 'v1');
    const second = await store.put('queue/leases/b.json', 'v2', {
      ifMatch: first,
    });

    await expect(
      store.put('queue/leases/b.json', 'v3', { ifMatch: first }),
    ).rejects.toBeInstanceOf(BlobConflictError);
    expect(second).not.toBe(first);
    expect((await store.get('queue/leases/b.json'))?.body.toString()).toBe('v2');
  });

  test('compare-and-swap put fails when the key is missing', async () => {
    await expect(
      store.put('queue/leases/c.json', 'v1', { ifMatch: 'abc' }),
    ).rejects.toBeInstanceOf(BlobConflictError);
  });

  test('only one of many concurrent create-only puts wins', async () => {
    const outcomes = await Promise.allSettled(
      Array.from({ length: 8 }, (_, i) =>
        store.put('queue/leases/race.json', `owner-${i}`, { ifNoneMatch: '*' }),
      ),
    );

    const fulfilled = outcomes.filter((o) => o.status === 'fulfilled');
    const rejected = outcomes.filter((o) => o.status === 'rejected');
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(7);
  });

  test('lists keys under a prefix in sorted order', async () => {
    await store.put('queue/items/b.json', 'b');
    await store.put('queue/items/a.json', 'a');
    await store.put('queue/done/a.json', '');
    await store.put('results/output_a.jsonl', '');

    expect(await store.list('queue/items/')).toEqual([
      'queue/items/a.json',
      'queue/items/b.json',
    ]);
    expect(await store.list('queue/')).toEqual([
      'queue/done/a.json',
      'queue/items/a.json',
      'queue/items/b.json',
    ]);
    expect(await store.list('missing/')).toEqual([]);
  });

  test('delete removes the key and tolerates missing keys', async () => {
    await store.put('results/x.jsonl', 'x');

    await store.delete('results/x.jsonl');
    await store.delete('results/x.jsonl');

    expect(await store.get('results/x.jsonl')).toBeNull();
  });
});

describe('LocalBlobStore', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'pagemill-local-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  test('rejects keys that escape the root', async () => {
    const store = new LocalBlobStore(root);

    await expect(store.get('../outside.json')).rejects.toThrow(
      'Invalid blob key: ../outside.json',
    );
  });

  test('removes a stale lock left by a crashed writer', async () => {
    const store = new LocalBlobStore(root, { staleLockMs: 0 });
    await store.put('queue/leases/a.json', 'v1');
    await store.put('queue/leases/a.json.lock', '');

    const etag = await store.put('queue/leases/a.json', 'v2', {
      ifNoneMatch: undefined,
      ifMatch: (await store.get('queue/leases/a.json'))?.etag,
    });

    expect((await store.get('queue/leases/a.json'))?.etag).toBe(etag);
  });

  test('times out on a held lock instead of reporting a conflict', async () => {
    const store = new LocalBlobStore(root, { lockTimeoutMs: 50 });
    await store.put('queue/done/a.json.lock', '');

    await expect(
      store.put('queue/done/a.json', 'done', { ifNoneMatch: '*' }),
    ).rejects.toBeInstanceOf(BlobLockTimeoutError);
    expect(await store.get('queue/done/a.json')).toBeNull();
  });

  test('lets one writer win when many find the same stale lock', async () => {
    const store = new LocalBlobStore(root, { staleLockMs: 1_000 });
    await store.put('queue/leases/a.json.lock', '');
    const longAgo = new Date(Date.now() - 60_000);
    await utimes(join(root, 'queue/leases/a.json.lock'), longAgo, longAgo);

    const results = await Promise.allSettled(
      Array.from({ length: 8 }, (_, index) =>
        store.put('queue/leases/a.json', `owner-${index}`, { ifNoneMatch: '*' }),
      ),
    );

    const won = results.filter((result) => result.status === 'fulfilled');
    const lost = results.filter((result) => result.status === 'rejected');
    expect(won).toHaveLength(1);
    expect(lost).toHaveLength(7);
    for (const result of lost) {
      expect(result.reason).toBeInstanceOf(BlobConflictError);
    }
  });

  test('does not list lock files', async () => {
    const store = new LocalBlobStore(root);
    await store.put('queue/leases/a.json', 'v1');
    await store.put('queue/leases/a.json.lock', '');

    expect(await store.list('queue/leases/')).toEqual(['queue/leases/a.json']);
  });
});
