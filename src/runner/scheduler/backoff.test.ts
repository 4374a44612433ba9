import { describe, expect, it } from 'vitest';

import { backoffDelay, DEFAULT_RESTART_POLICY } from '@/runner/scheduler/backoff';

describe('backoffDelay', () => {
  it('grows exponentially from the base delay', () => {
    const p = DEFAULT_RESTART_POLICY;
    expect([1, 2, 3, 4].map((n) => backoffDelay(n, p))).toEqual([500, 1000, 2000, 4000]);
  });

  it('is capped at maxDelayMs', () => {
    expect(backoffDelay(10, DEFAULT_RESTART_POLICY)).toBe(10_000);
  });

  it('stays flat with factor 1', () => {
    const p = { ...DEFAULT_RESTART_POLICY, baseDelayMs: 250, factor: 1 };
    expect(backoffDelay(1, p)).toBe(250);
    expect(backoffDelay(7, p)).toBe(250);
  });
});
