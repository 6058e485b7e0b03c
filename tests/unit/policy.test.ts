import { describe, it, expect } from 'vitest';
import { ConfigSchema } from '../../src/config/schema.js';
import { getDecisionPolicy, getMaxTimeout } from '../../src/config/policy.js';

describe('getDecisionPolicy', () => {
  const config = ConfigSchema.parse({
    hitl: {
      defaultTimeout: '30s',
      defaultOutcome: 'rejected',
      maxTimeout: '30m',
      policies: {
        delete_file: { timeout: '2m' },
        list_users: { defaultOutcome: 'approved' },
      },
    },
  });

  it('should use defaults without a key', () => {
    expect(getDecisionPolicy(config)).toEqual({ timeout: 30000, defaultOutcome: 'rejected' });
  });

  it('should apply a timeout override', () => {
    expect(getDecisionPolicy(config, 'delete_file')).toEqual({ timeout: 120000, defaultOutcome: 'rejected' });
  });

  it('should apply a default outcome override', () => {
    expect(getDecisionPolicy(config, 'list_users')).toEqual({ timeout: 30000, defaultOutcome: 'approved' });
  });

  it('should fall back to defaults for unknown keys', () => {
    expect(getDecisionPolicy(config, 'send_email')).toEqual({ timeout: 30000, defaultOutcome: 'rejected' });
    expect(getDecisionPolicy(config, 'toString')).toEqual({ timeout: 30000, defaultOutcome: 'rejected' });
  });
});

describe('getMaxTimeout', () => {
  it('should return the configured maximum in milliseconds', () => {
    expect(getMaxTimeout(ConfigSchema.parse({ hitl: { maxTimeout: '30m' } }))).toBe(1800000);
    expect(getMaxTimeout(ConfigSchema.parse({}))).toBe(3600000);
  });
});
