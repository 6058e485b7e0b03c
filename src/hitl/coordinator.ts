import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { HitlDriver, RequestUpdate } from './drivers/interface.js';
import {
  CoordinatorClosedError,
  DecisionCancelledError,
  InternalHitlError,
  RequestNotFoundError,
} from './errors.js';
import { PendingRegistry } from './registry.js';
import {
  summarize,
  type Decision,
  type DecisionRequest,
  type DecisionResult,
  type PendingRequest,
  type PendingSummary,
  type Resolution,
  type ResolveOptions,
} from './types.js';
import { WaitHandle } from './wait-handle.js';
import { assertTimeout, MAX_TIMER_MS } from '../utils/duration.js';
import { getLogger } from '../utils/logger.js';

export const TIMEOUT_ACTOR = 'system (timeout)';
export const SHUTDOWN_ACTOR = 'system (shutdown)';

export interface CoordinatorOptions<P> {
  registry?: PendingRegistry<P>;
  drivers?: Record<string, HitlDriver>;
  /** Decision applied on timeout unless the request names its own. */
  defaultOutcome?: Decision;
  /** Upper bound in milliseconds for a request's timeout. */
  maxTimeout?: number;
  generateId?: () => string;
}

/**
 * Pairs waiters that need a decision with the resolvers that supply one.
 *
 * `requestDecision` registers the request and suspends the caller; `resolve`
 * looks the request up and signals its wait handle. Only the waiter removes
 * its own entry, in a `finally`, so a resolver and a firing timeout never
 * both tear down the same request.
 */
export class Coordinator<P = unknown> {
  private readonly registry: PendingRegistry<P>;
  private readonly drivers: Map<string, HitlDriver>;
  private readonly defaultOutcome: Decision;
  private readonly maxTimeout: number;
  private readonly generateId: () => string;
  private readonly inflight = new Set<Promise<unknown>>();
  private readonly log: Logger;
  private closed = false;

  constructor(opts: CoordinatorOptions<P> = {}) {
    this.registry = opts.registry ?? new PendingRegistry<P>();
    this.drivers = new Map(Object.entries(opts.drivers ?? {}));
    this.defaultOutcome = opts.defaultOutcome ?? 'rejected';
    this.maxTimeout = Math.min(opts.maxTimeout ?? MAX_TIMER_MS, MAX_TIMER_MS);
    this.generateId = opts.generateId ?? randomUUID;
    this.log = getLogger('hitl:coordinator');
  }

  get pendingCount(): number {
    return this.registry.size;
  }

  async start(): Promise<void> {
    for (const [name, driver] of this.drivers) {
      driver.onDecision((requestId, response) => {
        this.resolve(requestId, response.decision, { decidedBy: response.decidedBy });
      });
      await driver.start();
      this.log.info({ name }, `HITL driver started: ${name}`);
    }
  }

  /**
   * Registers a request for `owner` and suspends until it is resolved, times
   * out (yielding the default outcome) or the signal aborts (throws
   * {@link DecisionCancelledError}). The request is gone from the registry by
   * the time this settles, whichever way it settles.
   */
  requestDecision(req: DecisionRequest<P>): Promise<DecisionResult> {
    if (this.closed) {
      return Promise.reject(new CoordinatorClosedError());
    }

    const handshake = this.handshake(req);
    this.inflight.add(handshake);
    const done = () => {
      this.inflight.delete(handshake);
    };
    void handshake.then(done, done);
    return handshake;
  }

  private async handshake(req: DecisionRequest<P>): Promise<DecisionResult> {
    if (typeof req.owner !== 'string' || req.owner.length === 0) {
      throw new TypeError('Decision request owner must be a non-empty string');
    }
    assertTimeout(req.timeout, this.maxTimeout);

    const request: PendingRequest<P> = {
      id: this.generateId(),
      owner: req.owner,
      payload: req.payload,
      createdAt: new Date(),
      handle: new WaitHandle<Resolution>(),
    };

    try {
      this.registry.insert(request);
    } catch (err) {
      this.log.error({ requestId: request.id, owner: request.owner, err }, 'Failed to register HITL request');
      throw new InternalHitlError(`Failed to register decision request ${request.id}`, { cause: err });
    }

    const startedAt = Date.now();
    let update: RequestUpdate | null = null;

    try {
      const waiting = request.handle.wait(req.timeout, req.signal);
      this.log.info(
        { requestId: request.id, owner: request.owner, timeout: req.timeout },
        'HITL decision requested',
      );
      this.announce(request);

      const outcome = await waiting;
      const elapsed = Date.now() - startedAt;

      if (outcome.kind === 'cancelled') {
        this.log.info({ requestId: request.id, elapsed }, 'HITL request cancelled');
        update = { outcome: 'cancelled', elapsed };
        throw new DecisionCancelledError(request.id, outcome.reason);
      }

      let result: DecisionResult;
      if (outcome.kind === 'timeout') {
        const decision = req.defaultOutcome ?? this.defaultOutcome;
        this.log.info({ requestId: request.id, elapsed, decision }, 'HITL request timed out');
        result = { requestId: request.id, decision, decidedBy: TIMEOUT_ACTOR, outcome: 'timeout', elapsed };
      } else {
        const { decision, decidedBy, shutdown } = outcome.value;
        result = {
          requestId: request.id,
          decision,
          decidedBy,
          outcome: shutdown ? 'shutdown' : 'decided',
          elapsed,
        };
      }

      update = {
        decision: result.decision,
        decidedBy: result.decidedBy,
        outcome: result.outcome,
        elapsed,
      };
      return result;
    } finally {
      // Unexpected errors land here with the handle still open; close it so
      // late resolvers are told they lost.
      request.handle.cancel();
      this.registry.remove(request.owner, request.id);
      this.publish(request.id, update ?? { outcome: 'cancelled', elapsed: Date.now() - startedAt });
    }
  }

  /**
   * Delivers a decision. Returns `false` only when no such request is
   * outstanding (or it belongs to another owner); a decision that lost the
   * race against the timeout still returns `true`.
   */
  resolve(id: string, decision: Decision, opts: ResolveOptions = {}): boolean {
    const found = this.registry.find(id);
    if (!found) {
      this.log.warn({ requestId: id }, 'Decision received for unknown request');
      return false;
    }

    if (opts.owner !== undefined && opts.owner !== found.owner) {
      this.log.warn({ requestId: id, owner: opts.owner }, 'Decision received from a different owner');
      return false;
    }

    const decidedBy = opts.decidedBy ?? opts.owner ?? 'unknown';
    const accepted = found.request.handle.resolve({ decision, decidedBy });
    if (accepted) {
      this.log.info({ requestId: id, decision, decidedBy }, 'HITL decision received');
    } else {
      this.log.debug({ requestId: id, decision, decidedBy }, 'HITL decision arrived too late');
    }
    return true;
  }

  getPending(id: string, owner?: string): PendingSummary<P> {
    const found = this.registry.find(id);
    if (!found || found.request.handle.settled || (owner !== undefined && owner !== found.owner)) {
      throw new RequestNotFoundError(id);
    }
    return summarize(found.request);
  }

  listPending(owner: string): readonly PendingSummary<P>[] {
    return this.registry.list(owner);
  }

  /** Rejects every outstanding request. Returns how many were still open. */
  rejectAllPending(): number {
    let rejected = 0;
    for (const request of this.registry.requests()) {
      if (request.handle.resolve({ decision: 'rejected', decidedBy: SHUTDOWN_ACTOR, shutdown: true })) {
        rejected++;
      }
    }
    if (rejected > 0) {
      this.log.info({ rejected }, 'Rejected pending HITL requests');
    }
    return rejected;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.rejectAllPending();
    await Promise.allSettled([...this.inflight]);

    for (const [name, driver] of this.drivers) {
      try {
        await driver.close();
      } catch (err) {
        this.log.warn({ name, err }, 'Failed to close HITL driver');
      }
    }
    this.drivers.clear();
    this.log.info('HITL coordinator closed');
  }

  private announce(request: PendingRequest<P>): void {
    const summary = summarize(request);
    for (const [name, driver] of this.drivers) {
      this.notify(name, request.id, 'Failed to send HITL request', () => driver.sendRequest(summary));
    }
  }

  private publish(requestId: string, update: RequestUpdate): void {
    for (const [name, driver] of this.drivers) {
      this.notify(name, requestId, 'Failed to update HITL request', () => driver.updateRequest(requestId, update));
    }
  }

  /** Drivers may throw before handing back a promise; both failures only get logged. */
  private notify(name: string, requestId: string, message: string, call: () => Promise<void>): void {
    const fail = (err: unknown) => {
      this.log.warn({ name, requestId, err }, message);
    };
    try {
      call().catch(fail);
    } catch (err) {
      fail(err);
    }
  }
}
