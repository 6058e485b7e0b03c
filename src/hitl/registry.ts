import type { Logger } from 'pino';
import { DuplicateRequestError } from './errors.js';
import { summarize, type PendingRequest, type PendingSummary } from './types.js';
import { getLogger } from '../utils/logger.js';

/**
 * Outstanding requests bucketed by owner, in insertion order.
 *
 * Every method runs to completion without awaiting, so each one is atomic
 * with respect to resolvers, timers and listers on the event loop. Empty
 * buckets are dropped so memory tracks what is outstanding right now.
 */
export class PendingRegistry<P = unknown> {
  private buckets = new Map<string, Map<string, PendingRequest<P>>>();
  private ownerById = new Map<string, string>();
  private readonly log: Logger;

  constructor() {
    this.log = getLogger('hitl:registry');
  }

  get size(): number {
    return this.ownerById.size;
  }

  insert(request: PendingRequest<P>): void {
    if (this.ownerById.has(request.id)) {
      throw new DuplicateRequestError(request.id);
    }

    let bucket = this.buckets.get(request.owner);
    if (!bucket) {
      bucket = new Map();
      this.buckets.set(request.owner, bucket);
    }
    bucket.set(request.id, request);
    this.ownerById.set(request.id, request.owner);
    this.log.debug({ requestId: request.id, owner: request.owner }, 'Pending request inserted');
  }

  /** Idempotent. Returns whether an entry was removed. */
  remove(owner: string, id: string): boolean {
    if (this.ownerById.get(id) !== owner) return false;

    const bucket = this.buckets.get(owner);
    if (!bucket?.delete(id)) return false;

    this.ownerById.delete(id);
    if (bucket.size === 0) {
      this.buckets.delete(owner);
    }
    this.log.debug({ requestId: id, owner }, 'Pending request removed');
    return true;
  }

  /**
   * Snapshot of the owner's unsettled requests, oldest first. A request
   * whose handle has settled is hidden even before its waiter removes it.
   */
  list(owner: string): readonly PendingSummary<P>[] {
    const bucket = this.buckets.get(owner);
    if (!bucket) return Object.freeze([]);

    const summaries: PendingSummary<P>[] = [];
    for (const request of bucket.values()) {
      if (!request.handle.settled) summaries.push(summarize(request));
    }
    return Object.freeze(summaries);
  }

  find(id: string): { owner: string; request: PendingRequest<P> } | undefined {
    const owner = this.ownerById.get(id);
    if (owner === undefined) return undefined;
    const request = this.buckets.get(owner)?.get(id);
    return request ? { owner, request } : undefined;
  }

  hasOwner(owner: string): boolean {
    return this.buckets.has(owner);
  }

  owners(): string[] {
    return [...this.buckets.keys()];
  }

  /** Every outstanding request across owners, settled or not. */
  requests(): PendingRequest<P>[] {
    const all: PendingRequest<P>[] = [];
    for (const bucket of this.buckets.values()) {
      all.push(...bucket.values());
    }
    return all;
  }
}
