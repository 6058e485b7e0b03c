import type { Config } from './config/schema.js';
import { getMaxTimeout } from './config/policy.js';
import { Coordinator, type CoordinatorOptions } from './hitl/coordinator.js';
import { configureLogger } from './utils/logger.js';

export { Coordinator, TIMEOUT_ACTOR, SHUTDOWN_ACTOR, type CoordinatorOptions } from './hitl/coordinator.js';
export { PendingRegistry } from './hitl/registry.js';
export { WaitHandle, type WaitOutcome } from './hitl/wait-handle.js';
export * from './hitl/errors.js';
export type * from './hitl/types.js';
export type { HitlDriver, RequestUpdate } from './hitl/drivers/interface.js';
export { ConfigSchema, type Config } from './config/schema.js';
export { loadConfig, validateConfig, describeConfigError, substituteEnvVars } from './config/loader.js';
export { getDecisionPolicy, getMaxTimeout, type DecisionPolicy } from './config/policy.js';
export { parseDuration } from './utils/duration.js';
export { configureLogger, getLogger } from './utils/logger.js';

/**
 * Builds a coordinator from validated config, applying its logging settings
 * first so every component logger picks them up.
 */
export function createCoordinator<P = unknown>(
  config: Config,
  opts: Omit<CoordinatorOptions<P>, 'defaultOutcome' | 'maxTimeout'> = {},
): Coordinator<P> {
  configureLogger(config.logging);
  return new Coordinator<P>({
    ...opts,
    defaultOutcome: config.hitl.defaultOutcome,
    maxTimeout: getMaxTimeout(config),
  });
}
