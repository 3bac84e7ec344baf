import type { Dirent } from 'node:fs';

import type { BlobObject, BlobStore, PutOptions } from '../types';

import { randomUUID } from 'node:crypto';
import { mkdir, open, readFile, readdir, rename, rm, stat } from 'node:fs/promises';
import { dirname, join, relative, sep } from 'node:path';

import { delay } from 'es-toolkit';

import { BlobConflictError } from '../errors/blob-conflict-error';
import { BlobLockTimeoutError } from '../errors/blob-lock-timeout-error';
import { computeEtag, toBuffer } from '../utils/etag';

const LOCK_SUFFIX = '.lock';
const REAP_SUFFIX = '.reap';
const TEMP_SUFFIX = '.tmp';

export interface LocalBlobStoreOptions {
  /** Age after which an abandoned lock file is removed (default: 10000) */
  staleLockMs?: number;
  /** Longest wait for a held lock before giving up (default: 5000) */
  lockTimeoutMs?: number;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * BlobStore over a local directory.
 *
 * Writes go through a temporary file and a rename, so readers never see a
 * partial blob. Conditional writes hold a per-key lock file created with
 * exclusive-create, which makes them atomic across processes sharing the
 * directory.
 */
export class LocalBlobStore implements BlobStore {
  readonly location: string;
  private readonly staleLockMs: number;
  private readonly lockTimeoutMs: number;

  constructor(
    private readonly root: string,
    options: LocalBlobStoreOptions = {},
  ) {
    this.location = root;
    this.staleLockMs = options.staleLockMs ?? 10_000;
    this.lockTimeoutMs = options.lockTimeoutMs ?? 5_000;
  }

  async get(key: string): Promise<BlobObject | null> {
    try {
      const body = await readFile(this.pathFor(key));
      return { body, etag: computeEtag(body) };
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
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
    const path = this.pathFor(key);
    const bytes = toBuffer(body);
    await mkdir(dirname(path), { recursive: true });

    if (!options.ifNoneMatch && options.ifMatch === undefined) {
      await this.writeAtomic(path, bytes);
      return computeEtag(bytes);
    }

    const unlock = await this.lock(path, key);
    try {
      const current = await this.get(key);
      if (options.ifNoneMatch && current) {
        throw new BlobConflictError(key);
      }
      if (options.ifMatch !== undefined && current?.etag !== options.ifMatch) {
        throw new BlobConflictError(key);
      }
      await this.writeAtomic(path, bytes);
      return computeEtag(bytes);
    } finally {
      await unlock();
    }
  }

  async list(prefix: string): Promise<string[]> {
    const slash = prefix.lastIndexOf('/');
    const start = join(this.root, slash === -1 ? '' : prefix.slice(0, slash));
    const files = await this.walk(start);
    return files
      .map((file) => relative(this.root, file).split(sep).join('/'))
      .filter((key) => key.startsWith(prefix))
      .sort();
  }

  async delete(key: string): Promise<void> {
    await rm(this.pathFor(key), { force: true });
  }

  private pathFor(key: string): string {
    const segments = key.split('/');
    if (segments.some((segment) => segment === '..' || segment === '')) {
      throw new RangeError(`Invalid blob key: ${key}`);
    }
    return join(this.root, ...segments);
  }

  private async writeAtomic(path: string, bytes: Buffer): Promise<void> {
    const temp = `${path}.${randomUUID()}${TEMP_SUFFIX}`;
    const handle = await open(temp, 'w');
    try {
      await handle.writeFile(bytes);
    } finally {
      await handle.close();
    }
    await rename(temp, path);
  }

  private async lock(path: string, key: string): Promise<() => Promise<void>> {
    const lockPath = `${path}${LOCK_SUFFIX}`;
    const deadline = Date.now() + this.lockTimeoutMs;

    for (;;) {
      try {
        const handle = await open(lockPath, 'wx');
        await handle.close();
        return () => rm(lockPath, { force: true });
      } catch (error) {
        if (!isErrnoException(error) || error.code !== 'EEXIST') {
          throw error;
        }
      }

      if (await this.isStale(lockPath)) {
        await this.reapStaleLock(lockPath);
        continue;
      }
      if (Date.now() > deadline) {
        throw new BlobLockTimeoutError(key, this.lockTimeoutMs);
      }
      await delay(5 + Math.random() * 20);
    }
  }

  /**
   * Remove a stale lock while holding its reap lock, re-checking staleness
   * there so a contender never removes a lock that was just retaken.
   */
  private async reapStaleLock(lockPath: string): Promise<void> {
    const reapPath = `${lockPath}${REAP_SUFFIX}`;
    try {
      const handle = await open(reapPath, 'wx');
      await handle.close();
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'EEXIST') {
        throw error;
      }
      if (await this.isStale(reapPath)) {
        await rm(reapPath, { force: true });
      } else {
        await delay(5 + Math.random() * 20);
      }
      return;
    }

    try {
      if (await this.isStale(lockPath)) {
        await rm(lockPath, { force: true });
      }
    } finally {
      await rm(reapPath, { force: true });
    }
  }

  private async isStale(lockPath: string): Promise<boolean> {
    try {
      const info = await stat(lockPath);
      return Date.now() - info.mtimeMs > this.staleLockMs;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  private async walk(directory: string): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const files: string[] = [];
    for (const entry of entries) {
      const full = join(directory, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.walk(full)));
      } else if (
        entry.isFile() &&
        !entry.name.endsWith(LOCK_SUFFIX) &&
        !entry.name.endsWith(REAP_SUFFIX) &&
        !entry.name.endsWith(TEMP_SUFFIX)
      ) {
        files.push(full);
      }
    }
    return files;
  }
}
