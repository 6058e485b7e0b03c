import { InternalHitlError } from './errors.js';
import { assertTimeout } from '../utils/duration.js';

export type WaitOutcome<T> =
  | { kind: 'resolved'; value: T }
  | { kind: 'timeout' }
  | { kind: 'cancelled'; reason: unknown };

/**
 * Single-settlement rendezvous between one waiter and whichever of
 * {resolver, timer, abort signal} gets there first.
 *
 * Settlement is synchronous, so two callers can never both win: the first
 * `settle` flips `outcome` before the next task is scheduled.
 */
export class WaitHandle<T> {
  private outcome: WaitOutcome<T> | null = null;
  private waiting = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private detach: (() => void) | null = null;
  private readonly done: Promise<WaitOutcome<T>>;
  private deliver: (outcome: WaitOutcome<T>) => void = () => {};

  constructor() {
    this.done = new Promise<WaitOutcome<T>>((resolve) => {
      this.deliver = resolve;
    });
  }

  get settled(): boolean {
    return this.outcome !== null;
  }

  /**
   * Suspends until the handle settles or `timeoutMs` elapses. Only one
   * waiter may consume a handle.
   */
  wait(timeoutMs: number, signal?: AbortSignal): Promise<WaitOutcome<T>> {
    if (this.waiting) {
      throw new InternalHitlError('Wait handle already has a waiter');
    }
    assertTimeout(timeoutMs);
    this.waiting = true;

    if (this.outcome) return this.done;

    if (signal?.aborted) {
      this.settle({ kind: 'cancelled', reason: signal.reason });
      return this.done;
    }

    this.timer = setTimeout(() => {
      this.settle({ kind: 'timeout' });
    }, timeoutMs);

    if (signal) {
      const onAbort = () => {
        this.settle({ kind: 'cancelled', reason: signal.reason });
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.detach = () => signal.removeEventListener('abort', onAbort);
    }

    return this.done;
  }

  /** Returns `false` when the handle had already settled. */
  resolve(value: T): boolean {
    return this.settle({ kind: 'resolved', value });
  }

  cancel(reason?: unknown): boolean {
    return this.settle({ kind: 'cancelled', reason });
  }

  private settle(outcome: WaitOutcome<T>): boolean {
    if (this.outcome) return false;
    this.outcome = outcome;

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.detach?.();
    this.detach = null;

    this.deliver(outcome);
    return true;
  }
}
