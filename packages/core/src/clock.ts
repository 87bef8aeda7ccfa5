/**
 * @module clock
 * Wall-clock time source used for touch timestamps.
 */

import type { Clock } from '@notecore/types';

/** Clock backed by `Date.now()`. */
export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Clock that always reports the same instant, for deterministic reduction.
 *
 * @param at - The instant to report, in epoch milliseconds.
 */
export function fixedClock(at: number): Clock {
  return { now: () => at };
}
