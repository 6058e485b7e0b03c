import type { DecisionOutcome, HitlResponse, PendingSummary } from '../types.js';

export type RequestUpdate =
  | (HitlResponse & { outcome: DecisionOutcome; elapsed: number })
  | { outcome: 'cancelled'; elapsed: number };

/**
 * A presentation surface (chat bot, web page, terminal prompt) that shows
 * pending requests to a human and reports their decisions back.
 */
export interface HitlDriver {
  sendRequest(request: PendingSummary): Promise<void>;
  updateRequest(requestId: string, update: RequestUpdate): Promise<void>;
  onDecision(callback: (requestId: string, response: HitlResponse) => void): void;
  start(): Promise<void>;
  close(): Promise<void>;
}
