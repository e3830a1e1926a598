/**
 * Clock
 *
 * Time source for every polling loop (SSH channel polling, readiness
 * checks, editor warm-up). Tests substitute a simulated clock so that
 * elapsed time advances without real delays.
 */

import { setTimeout as delay } from 'node:timers/promises';

export interface Clock {
  /** Milliseconds since the Unix epoch */
  now(): number;
  /** Resolve after `ms` milliseconds */
  sleep(ms: number): Promise<void>;
}

/**
 * Wall-clock implementation backed by Node timers.
 */
export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms: number) => {
    if (ms > 0) {
      await delay(ms);
    }
  },
};
