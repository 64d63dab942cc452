/**
 * Time source for retry backoff and job polling. Tests substitute a fake
 * that records requested delays instead of waiting.
 */

import { setTimeout as delay } from 'node:timers/promises';

export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;
  /**
   * Resolve after `ms` milliseconds; reject with the signal's reason when it
   * aborts first
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms, signal) => {
    await delay(ms, undefined, { signal });
  },
};
