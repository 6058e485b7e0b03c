import { z } from 'zod';
import { DURATION_PATTERN, MAX_TIMER_MS, tryParseDuration } from '../utils/duration.js';

// Approval timeouts only need whole-second accuracy
export const MIN_CONFIGURED_TIMEOUT_MS = 1000;

const DurationSchema = z.string().regex(DURATION_PATTERN, 'Invalid duration format (e.g. "3m", "30s", "1h")');

const TimeoutSchema = DurationSchema.refine(
  (value) => {
    const ms = tryParseDuration(value);
    // malformed values are reported by the regex
    return ms === null || (ms >= MIN_CONFIGURED_TIMEOUT_MS && ms <= MAX_TIMER_MS);
  },
  { message: `Timeout must be between ${MIN_CONFIGURED_TIMEOUT_MS}ms and ${MAX_TIMER_MS}ms` },
);

const DecisionSchema = z.enum(['approved', 'rejected']);

const DecisionPolicySchema = z.object({
  timeout: TimeoutSchema.optional(),
  defaultOutcome: DecisionSchema.optional(),
});

const HitlConfigSchema = z.object({
  defaultTimeout: TimeoutSchema.default('30s'),
  defaultOutcome: DecisionSchema.default('rejected'),
  maxTimeout: TimeoutSchema.default('1h'),
  policies: z.record(z.string().min(1), DecisionPolicySchema).default({}),
});

const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  format: z.enum(['json', 'pretty']).default('json'),
});

export const ConfigSchema = z.object({
  hitl: HitlConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
}).superRefine((data, ctx) => {
  const max = tryParseDuration(data.hitl.maxTimeout);
  if (max === null) return;

  if ((tryParseDuration(data.hitl.defaultTimeout) ?? 0) > max) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `HITL defaultTimeout "${data.hitl.defaultTimeout}" exceeds maxTimeout "${data.hitl.maxTimeout}"`,
      path: ['hitl', 'defaultTimeout'],
    });
  }

  for (const [key, policy] of Object.entries(data.hitl.policies)) {
    if (policy.timeout && (tryParseDuration(policy.timeout) ?? 0) > max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `HITL timeout "${policy.timeout}" for ${key} exceeds maxTimeout "${data.hitl.maxTimeout}"`,
        path: ['hitl', 'policies', key, 'timeout'],
      });
    }
  }
});

export type Config = z.infer<typeof ConfigSchema>;
export type HitlConfig = z.infer<typeof HitlConfigSchema>;
export type DecisionPolicyConfig = z.infer<typeof DecisionPolicySchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
