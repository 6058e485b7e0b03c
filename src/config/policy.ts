import type { Config } from './schema.js';
import type { Decision } from '../hitl/types.js';
import { parseDuration } from '../utils/duration.js';

export interface DecisionPolicy {
  /** Milliseconds. */
  timeout: number;
  defaultOutcome: Decision;
}

/**
 * Timeout and fallback decision for requests filed under `key` (typically a
 * tool name), falling back to the configured defaults.
 */
export function getDecisionPolicy(config: Config, key?: string): DecisionPolicy {
  const override = key !== undefined && Object.hasOwn(config.hitl.policies, key)
    ? config.hitl.policies[key]
    : undefined;

  return {
    timeout: parseDuration(override?.timeout ?? config.hitl.defaultTimeout),
    defaultOutcome: override?.defaultOutcome ?? config.hitl.defaultOutcome,
  };
}

export function getMaxTimeout(config: Config): number {
  return parseDuration(config.hitl.maxTimeout);
}
