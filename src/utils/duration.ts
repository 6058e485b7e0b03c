export const DURATION_PATTERN = /^(\d+)(ms|s|m|h)$/;

// setTimeout fires immediately for anything above a signed 32-bit delay
export const MAX_TIMER_MS = 2_147_483_647;

export function parseDuration(duration: string, minMs = 0): number {
  const match = duration.match(DURATION_PATTERN);
  if (!match) throw new Error(`Invalid duration: ${duration}`);
  const [, value, unit] = match;
  const num = parseInt(value, 10);
  let ms: number;
  switch (unit) {
    case 'ms': ms = num; break;
    case 's': ms = num * 1000; break;
    case 'm': ms = num * 60 * 1000; break;
    case 'h': ms = num * 60 * 60 * 1000; break;
    default: throw new Error(`Unknown unit: ${unit}`);
  }
  if (ms < minMs) throw new Error(`Duration ${duration} is less than minimum ${minMs}ms`);
  return ms;
}

export function assertTimeout(timeout: number, maxMs = MAX_TIMER_MS): void {
  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new RangeError(`Timeout must be a finite number of milliseconds greater than zero, got ${timeout}`);
  }
  if (timeout > maxMs) {
    throw new RangeError(`Timeout ${timeout}ms exceeds maximum ${maxMs}ms`);
  }
}

export function tryParseDuration(duration: string): number | null {
  return DURATION_PATTERN.test(duration) ? parseDuration(duration) : null;
}
