export type HitlErrorCode = 'NOT_FOUND' | 'DUPLICATE_ID' | 'INTERNAL' | 'CANCELLED' | 'CLOSED';

export class HitlError extends Error {
  constructor(
    readonly code: HitlErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'HitlError';
  }
}

export class RequestNotFoundError extends HitlError {
  constructor(readonly requestId: string) {
    super('NOT_FOUND', `No pending request with id ${requestId}`);
    this.name = 'RequestNotFoundError';
  }
}

export class DuplicateRequestError extends HitlError {
  constructor(readonly requestId: string) {
    super('DUPLICATE_ID', `Request id ${requestId} is already registered`);
    this.name = 'DuplicateRequestError';
  }
}

export class InternalHitlError extends HitlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INTERNAL', message, options);
    this.name = 'InternalHitlError';
  }
}

/** Thrown to the waiter when its signal aborts before a decision arrives. */
export class DecisionCancelledError extends HitlError {
  constructor(readonly requestId: string, reason?: unknown) {
    super('CANCELLED', `Decision request ${requestId} was cancelled`, { cause: reason });
    this.name = 'DecisionCancelledError';
  }
}

export class CoordinatorClosedError extends HitlError {
  constructor() {
    super('CLOSED', 'Coordinator is closed');
    this.name = 'CoordinatorClosedError';
  }
}
