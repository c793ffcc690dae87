import { DEFAULT_BACKOFF_POLICY, computeBackoffDelay } from '../../../lib/utils/backoff';

describe('computeBackoffDelay', () => {
  const policy = { maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 5000 };

  test('doubles per attempt at full jitter', () => {
    const nearlyOne = () => 0.999999;
    expect([1, 2, 3].map((attempt) => computeBackoffDelay(attempt, policy, nearlyOne))).toEqual([999, 1999, 3999]);
  });

  test('halves the delay at the low end of the jitter', () => {
    expect(computeBackoffDelay(2, policy, () => 0)).toBe(1000);
  });

  test('caps at the maximum delay', () => {
    expect(computeBackoffDelay(10, policy, () => 0)).toBe(2500);
  });

  test('treats attempt zero like the first', () => {
    expect(computeBackoffDelay(0, policy, () => 0)).toBe(500);
  });

  test('default policy waits between 7.5 and 15 seconds before the second attempt', () => {
    const delay = computeBackoffDelay(1, DEFAULT_BACKOFF_POLICY);
    expect(delay).toBeGreaterThanOrEqual(7500);
    expect(delay).toBeLessThan(15_000);
  });
});
