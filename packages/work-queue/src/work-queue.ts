import type { LoggerMethods } from '@pagemill/logger';
import type {
  Lease,
  LeasedWorkItem,
  QueueStats,
  WorkItem,
} from '@pagemill/model';
import type { BlobStore, PutOptions } from '@pagemill/storage';

import { BlobConflictError } from '@pagemill/storage';
import { chunk, shuffle, uniq } from 'es-toolkit';
import { createHash } from 'node:crypto';

import {
  WORK_QUEUE,
  doneKey,
  idFromKey,
  itemKey,
  leaseKey,
} from './config/constants';
import { LeaseLostError } from './errors/lease-lost-error';
import { leaseSchema, workItemSchema } from './schemas';

/**
 * Wall-clock source for lease times. Leases are compared by every worker
 * sharing the queue, so this must be a clock all machines agree on.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = { now: () => Date.now() };

export interface WorkQueueOptions {
  /** Time source for lease expiry (default: Date.now) */
  clock?: Clock;
}

interface StoredLease {
  lease: Lease | null;
  etag: string;
}

/**
 * Work item id for a set of document refs: SHA-1 over the sorted refs,
 * so the same group always maps to the same item.
 */
export function computeWorkItemId(refs: readonly string[]): string {
  const hash = createHash('sha1');
  for (const ref of [...refs].sort()) {
    hash.update(ref);
    hash.update('\n');
  }
  return hash.digest('hex');
}

/**
 * Durable lease-based queue of document batches.
 *
 * All coordination goes through conditional writes on the backing store:
 * a lease is claimed by creating its blob (no previous lease) or by
 * replacing an expired one against the etag that was read. Whichever
 * writer loses the race sees BlobConflictError and moves on, so at most
 * one valid lease exists per item. A worker that crashes simply lets its
 * lease expire.
 */
export class WorkQueue {
  private readonly clock: Clock;

  constructor(
    private readonly store: BlobStore,
    private readonly logger: LoggerMethods,
    options: WorkQueueOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Group refs into work items of `itemsPerGroup` documents, skipping refs
   * that are already queued. Re-running with the same refs adds nothing.
   *
   * @returns Number of new work items
   */
  async populate(refs: readonly string[], itemsPerGroup: number): Promise<number> {
    const queued = new Set<string>();
    for (const item of await this.readAllItems()) {
      item.refs.forEach((ref) => queued.add(ref));
    }

    const fresh = uniq(refs).filter((ref) => !queued.has(ref));
    if (fresh.length === 0) {
      this.logger.info('[WorkQueue] No new documents to queue');
      return 0;
    }

    let created = 0;
    for (const group of chunk(fresh, Math.max(1, itemsPerGroup))) {
      const item: WorkItem = {
        id: computeWorkItemId(group),
        refs: group,
        createdAt: new Date(this.clock.now()).toISOString(),
      };
      try {
        await this.store.put(itemKey(item.id), JSON.stringify(item), {
          ifNoneMatch: '*',
        });
        created++;
      } catch (error) {
        if (!(error instanceof BlobConflictError)) throw error;
        this.logger.debug(`[WorkQueue] Work item ${item.id} already exists`);
      }
    }

    this.logger.info(
      `[WorkQueue] Queued ${fresh.length} documents in ${created} work items`,
    );
    return created;
  }

  /**
   * Claim one available item: never leased, lease expired, or released.
   * Resolves to null when nothing is available right now.
   */
  async lease(
    ownerId: string,
    visibilityTimeoutMs: number,
  ): Promise<LeasedWorkItem | null> {
    const done = await this.listIds(WORK_QUEUE.DONE_PREFIX);
    const candidates = shuffle(
      [...(await this.listIds(WORK_QUEUE.ITEMS_PREFIX))].filter(
        (id) => !done.has(id),
      ),
    );

    for (const id of candidates) {
      const claimed = await this.tryClaim(id, ownerId, visibilityTimeoutMs);
      if (!claimed) continue;

      // Another worker may have finished the item between listing and claiming
      if (await this.store.get(doneKey(id))) {
        this.logger.debug(`[WorkQueue] ${id} completed while claiming`);
        continue;
      }

      const item = await this.readItem(id);
      if (!item) {
        this.logger.warn(`[WorkQueue] Work item ${id} is unreadable, skipping`);
        continue;
      }

      this.logger.debug(
        `[WorkQueue] ${ownerId} leased ${id} (attempt ${claimed.attempt})`,
      );
      return { item, lease: claimed };
    }

    return null;
  }

  /**
   * Extend a held lease. Throws LeaseLostError when the owner no longer
   * holds a valid lease.
   */
  async renew(
    workItemId: string,
    ownerId: string,
    visibilityTimeoutMs: number,
  ): Promise<Lease> {
    const stored = await this.readLease(workItemId);
    const now = this.clock.now();

    if (!stored?.lease || stored.lease.ownerId !== ownerId) {
      throw new LeaseLostError(workItemId, ownerId, 'not the lease holder');
    }
    if (stored.lease.expiresAt <= now) {
      throw new LeaseLostError(workItemId, ownerId, 'lease expired');
    }

    const renewed: Lease = {
      ...stored.lease,
      expiresAt: now + visibilityTimeoutMs,
    };
    try {
      await this.store.put(leaseKey(workItemId), JSON.stringify(renewed), {
        ifMatch: stored.etag,
      });
    } catch (error) {
      if (error instanceof BlobConflictError) {
        throw new LeaseLostError(workItemId, ownerId, 'lease changed', {
          cause: error,
        });
      }
      throw error;
    }
    return renewed;
  }

  /**
   * Mark an item done for good. Completing a done item is a no-op.
   */
  async complete(workItemId: string, ownerId: string): Promise<void> {
    const marker = {
      workItemId,
      ownerId,
      completedAt: this.clock.now(),
    };
    try {
      await this.store.put(doneKey(workItemId), JSON.stringify(marker), {
        ifNoneMatch: '*',
      });
    } catch (error) {
      if (!(error instanceof BlobConflictError)) throw error;
      this.logger.debug(`[WorkQueue] ${workItemId} was already complete`);
      return;
    }

    const stored = await this.readLease(workItemId);
    if (stored?.lease?.ownerId === ownerId) {
      await this.store.delete(leaseKey(workItemId));
    } else {
      this.logger.warn(
        `[WorkQueue] ${ownerId} completed ${workItemId} without holding its lease`,
      );
    }
  }

  /**
   * Return a held item to the queue before its lease expires. The lease
   * blob is rewritten as already expired so its attempt count survives.
   *
   * @returns false when the owner did not hold the lease
   */
  async release(workItemId: string, ownerId: string): Promise<boolean> {
    const stored = await this.readLease(workItemId);
    if (!stored?.lease || stored.lease.ownerId !== ownerId) {
      this.logger.debug(
        `[WorkQueue] ${ownerId} cannot release ${workItemId}: not the holder`,
      );
      return false;
    }

    const released: Lease = { ...stored.lease, expiresAt: 0 };
    try {
      await this.store.put(leaseKey(workItemId), JSON.stringify(released), {
        ifMatch: stored.etag,
      });
      return true;
    } catch (error) {
      if (!(error instanceof BlobConflictError)) throw error;
      this.logger.debug(`[WorkQueue] Release of ${workItemId} lost a race`);
      return false;
    }
  }

  /** Number of items not yet done */
  async size(): Promise<number> {
    const done = await this.listIds(WORK_QUEUE.DONE_PREFIX);
    const items = await this.listIds(WORK_QUEUE.ITEMS_PREFIX);
    return [...items].filter((id) => !done.has(id)).length;
  }

  async stats(): Promise<QueueStats> {
    const items = await this.listIds(WORK_QUEUE.ITEMS_PREFIX);
    const done = await this.listIds(WORK_QUEUE.DONE_PREFIX);
    const now = this.clock.now();

    let leased = 0;
    for (const id of items) {
      if (done.has(id)) continue;
      const stored = await this.readLease(id);
      if (stored?.lease && stored.lease.expiresAt > now) leased++;
    }

    const doneCount = [...items].filter((id) => done.has(id)).length;
    return {
      total: items.size,
      done: doneCount,
      leased,
      available: items.size - doneCount - leased,
    };
  }

  /** Every work item in the queue, done or not */
  async readAllItems(): Promise<WorkItem[]> {
    const items: WorkItem[] = [];
    for (const id of await this.listIds(WORK_QUEUE.ITEMS_PREFIX)) {
      const item = await this.readItem(id);
      if (item) items.push(item);
    }
    return items;
  }

  private async tryClaim(
    id: string,
    ownerId: string,
    visibilityTimeoutMs: number,
  ): Promise<Lease | null> {
    const stored = await this.readLease(id);
    const now = this.clock.now();

    let attempt = 1;
    let condition: PutOptions = { ifNoneMatch: '*' };
    if (stored) {
      if (stored.lease && stored.lease.expiresAt > now) {
        return null;
      }
      attempt = (stored.lease?.attempt ?? 0) + 1;
      condition = { ifMatch: stored.etag };
    }

    const lease: Lease = {
      workItemId: id,
      ownerId,
      acquiredAt: now,
      expiresAt: now + visibilityTimeoutMs,
      attempt,
    };
    try {
      await this.store.put(leaseKey(id), JSON.stringify(lease), condition);
      return lease;
    } catch (error) {
      if (error instanceof BlobConflictError) return null;
      throw error;
    }
  }

  private async readLease(id: string): Promise<StoredLease | null> {
    const blob = await this.store.get(leaseKey(id));
    if (!blob) return null;

    const parsed = leaseSchema.safeParse(parseJson(blob.body));
    if (!parsed.success) {
      this.logger.warn(
        `[WorkQueue] Lease blob for ${id} is malformed, treating as expired`,
      );
      return { lease: null, etag: blob.etag };
    }
    return { lease: parsed.data, etag: blob.etag };
  }

  private async readItem(id: string): Promise<WorkItem | null> {
    const blob = await this.store.get(itemKey(id));
    if (!blob) return null;
    const parsed = workItemSchema.safeParse(parseJson(blob.body));
    return parsed.success ? parsed.data : null;
  }

  private async listIds(prefix: string): Promise<Set<string>> {
    const keys = await this.store.list(prefix);
    return new Set(
      keys
        .filter((key) => key.endsWith(WORK_QUEUE.KEY_SUFFIX))
        .map((key) => idFromKey(key, prefix)),
    );
  }
}

function parseJson(body: Buffer): unknown {
  try {
    return JSON.parse(body.toString('utf8'));
  } catch {
    return undefined;
  }
}
