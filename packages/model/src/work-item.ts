/**
 * A durable batch of document references
 */
export interface WorkItem {
  /** SHA-1 of the sorted refs */
  id: string;
  refs: string[];
  /** ISO timestamp of queue population */
  createdAt: string;
}

/**
 * Time-bounded exclusive claim on a work item. Times are epoch
 * milliseconds; a lease whose `expiresAt` has passed is not authoritative.
 */
export interface Lease {
  workItemId: string;
  ownerId: string;
  acquiredAt: number;
  expiresAt: number;
  /** How many times the item has been claimed, including this claim */
  attempt: number;
}

export interface LeasedWorkItem {
  item: WorkItem;
  lease: Lease;
}

export interface QueueStats {
  total: number;
  done: number;
  leased: number;
  available: number;
}
