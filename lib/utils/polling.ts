// lib/utils/polling.ts
import { Clock, Sleeper, sleep, systemClock } from './clock';

/**
 * Budget for waiting on a long-running cloud operation (endpoint rollout,
 * pipeline execution). The wait sleeps between checks; it never spins.
 */
export interface PollingBudget {
  /** Delay between two checks. */
  readonly intervalMs: number;
  /** Total wall-clock time allowed before giving up. */
  readonly budgetMs: number;
}

export interface PollingOptions extends PollingBudget {
  readonly clock?: Clock;
  readonly sleep?: Sleeper;
}

export type PollOutcome<T> =
  | { readonly status: 'done'; readonly value: T; readonly attempts: number; readonly elapsedMs: number }
  | { readonly status: 'timeout'; readonly attempts: number; readonly elapsedMs: number };

/**
 * Calls `check` every `intervalMs` until it returns a value or the budget runs out.
 * `undefined` from `check` means "not there yet". The last sleep is cut short at
 * the deadline.
 */
export async function pollUntil<T>(
  check: (attempt: number) => Promise<T | undefined>,
  options: PollingOptions,
): Promise<PollOutcome<T>> {
  const clock = options.clock ?? systemClock;
  const wait = options.sleep ?? sleep;
  const startedAt = clock.now().getTime();
  const deadline = startedAt + options.budgetMs;
  let attempts = 0;

  for (let now = clock.now().getTime(); now < deadline; now = clock.now().getTime()) {
    await wait(Math.min(options.intervalMs, deadline - now));
    attempts++;
    const value = await check(attempts);
    if (value !== undefined) {
      return { status: 'done', value, attempts, elapsedMs: clock.now().getTime() - startedAt };
    }
  }

  return { status: 'timeout', attempts, elapsedMs: clock.now().getTime() - startedAt };
}
