/**
 * LeaseLostError
 *
 * Raised when a worker tries to renew a lease it no longer holds: the lease
 * expired, was reclaimed by another worker, or was never held.
 */
export class LeaseLostError extends Error {
  constructor(
    readonly workItemId: string,
    readonly ownerId: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Lease on ${workItemId} lost by ${ownerId}: ${reason}`, options);
    this.name = 'LeaseLostError';
  }
}
