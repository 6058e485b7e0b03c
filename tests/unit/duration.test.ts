import { describe, it, expect } from 'vitest';
import { assertTimeout, MAX_TIMER_MS, parseDuration, tryParseDuration } from '../../src/utils/duration.js';

describe('parseDuration', () => {
  it('should parse milliseconds', () => {
    expect(parseDuration('500ms')).toBe(500);
  });

  it('should parse seconds', () => {
    expect(parseDuration('30s')).toBe(30000);
  });

  it('should parse minutes', () => {
    expect(parseDuration('3m')).toBe(180000);
  });

  it('should parse hours', () => {
    expect(parseDuration('1h')).toBe(3600000);
  });

  it('should throw on invalid duration', () => {
    expect(() => parseDuration('abc')).toThrow('Invalid duration');
    expect(() => parseDuration('3')).toThrow('Invalid duration');
    expect(() => parseDuration('3d')).toThrow('Invalid duration');
  });

  it('should enforce a minimum', () => {
    expect(() => parseDuration('500ms', 1000)).toThrow('Duration 500ms is less than minimum 1000ms');
    expect(parseDuration('1s', 1000)).toBe(1000);
  });
});

describe('tryParseDuration', () => {
  it('should return null for malformed values', () => {
    expect(tryParseDuration('soon')).toBeNull();
    expect(tryParseDuration('2m')).toBe(120000);
  });
});

describe('assertTimeout', () => {
  it('should accept positive finite timeouts', () => {
    expect(() => assertTimeout(1)).not.toThrow();
    expect(() => assertTimeout(MAX_TIMER_MS)).not.toThrow();
  });

  it('should reject zero, negative and non-finite timeouts', () => {
    for (const bad of [0, -5, Number.NaN, Number.POSITIVE_INFINITY]) {
      expect(() => assertTimeout(bad)).toThrow(RangeError);
    }
  });

  it('should reject timeouts above the maximum', () => {
    expect(() => assertTimeout(MAX_TIMER_MS + 1)).toThrow(RangeError);
    expect(() => assertTimeout(2000, 1000)).toThrow('Timeout 2000ms exceeds maximum 1000ms');
  });
});
