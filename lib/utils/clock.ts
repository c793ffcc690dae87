// lib/utils/clock.ts

/** Source of the current time. Injected wherever names or deadlines depend on it. */
export interface Clock {
  now(): Date;
}

export type Sleeper = (ms: number) => Promise<void>;

export const systemClock: Clock = {
  now: () => new Date(),
};

export const sleep: Sleeper = (ms: number) =>
  new Promise((resolve) => setTimeout(resolve, ms));
