import type { WaitHandle } from './wait-handle.js';

export type Decision = 'approved' | 'rejected';

/** How a handshake ended when it produced a decision. */
export type DecisionOutcome = 'decided' | 'timeout' | 'shutdown';

export interface HitlResponse {
  decision: Decision;
  decidedBy: string;
}

/** Value delivered through a request's wait handle. */
export interface Resolution extends HitlResponse {
  shutdown?: boolean;
}

export interface PendingRequest<P = unknown> {
  readonly id: string;
  readonly owner: string;
  readonly payload: P;
  readonly createdAt: Date;
  readonly handle: WaitHandle<Resolution>;
}

export interface PendingSummary<P = unknown> {
  readonly id: string;
  readonly owner: string;
  readonly payload: P;
  readonly createdAt: Date;
}

export interface DecisionResult {
  requestId: string;
  decision: Decision;
  decidedBy: string;
  outcome: DecisionOutcome;
  /** Milliseconds between registration and settlement. */
  elapsed: number;
}

export interface DecisionRequest<P = unknown> {
  owner: string;
  payload: P;
  /** Milliseconds. Every handshake is bounded. */
  timeout: number;
  /** Applied when the timeout fires. Falls back to the coordinator's default. */
  defaultOutcome?: Decision;
  signal?: AbortSignal;
}

export interface ResolveOptions {
  decidedBy?: string;
  /** When set, ids belonging to another owner are treated as unknown. */
  owner?: string;
}

export function summarize<P>(request: PendingRequest<P>): PendingSummary<P> {
  return Object.freeze({
    id: request.id,
    owner: request.owner,
    payload: request.payload,
    createdAt: new Date(request.createdAt.getTime()),
  });
}
