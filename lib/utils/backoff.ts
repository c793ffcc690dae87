// lib/utils/backoff.ts

export interface BackoffPolicy {
  /** Total attempts including the first one. */
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export const DEFAULT_BACKOFF_POLICY: BackoffPolicy = {
  maxAttempts: 4,
  baseDelayMs: 15_000,
  maxDelayMs: 120_000,
};

/**
 * Exponential delay for the given 1-based attempt, capped at maxDelayMs and
 * scaled by a jitter factor in [0.5, 1) so overlapping pipeline runs spread out.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: BackoffPolicy,
  random: () => number = Math.random,
): number {
  const exponential = policy.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  const capped = Math.min(policy.maxDelayMs, exponential);
  return Math.floor(capped * (0.5 + random() / 2));
}
