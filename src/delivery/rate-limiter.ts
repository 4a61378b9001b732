import { sleep as defaultSleep } from "../timing";
import type { ClockFn, SleepFn } from "../timing";

export type RateLimiterOptions = {
  readonly limit: number;
  readonly windowMs: number;
};

export type RateLimiter = {
  /** Resolves once a slot in the current window is free, then takes it. */
  readonly acquire: () => Promise<void>;
};

/**
 * Sliding-window limiter: at most `limit` acquisitions in any `windowMs`.
 * Waits instead of failing when the window is full.
 */
export function createRateLimiter(
  options: RateLimiterOptions,
  deps: { readonly now?: ClockFn; readonly sleep?: SleepFn } = {},
): RateLimiter {
  const now = deps.now ?? Date.now;
  const sleep = deps.sleep ?? defaultSleep;
  const taken: Array<number> = [];

  return {
    acquire: async () => {
      for (;;) {
        const current = now();
        while (taken.length > 0 && current - (taken[0] ?? current) >= options.windowMs) {
          taken.shift();
        }

        const oldest = taken[0];
        if (taken.length < options.limit || oldest === undefined) {
          taken.push(current);
          return;
        }

        await sleep(options.windowMs - (current - oldest));
      }
    },
  };
}
