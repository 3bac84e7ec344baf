/**
 * Blob layout of the work queue inside a workspace
 */
export const WORK_QUEUE = {
  ITEMS_PREFIX: 'queue/items/',
  LEASES_PREFIX: 'queue/leases/',
  DONE_PREFIX: 'queue/done/',
  KEY_SUFFIX: '.json',
} as const;

export const itemKey = (id: string) =>
  `${WORK_QUEUE.ITEMS_PREFIX}${id}${WORK_QUEUE.KEY_SUFFIX}`;

export const leaseKey = (id: string) =>
  `${WORK_QUEUE.LEASES_PREFIX}${id}${WORK_QUEUE.KEY_SUFFIX}`;

export const doneKey = (id: string) =>
  `${WORK_QUEUE.DONE_PREFIX}${id}${WORK_QUEUE.KEY_SUFFIX}`;

/** Work item id from a key under one of the queue prefixes */
export function idFromKey(key: string, prefix: string): string {
  return key.slice(prefix.length, key.length - WORK_QUEUE.KEY_SUFFIX.length);
}
