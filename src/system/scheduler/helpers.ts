/**
 * Scheduler helper functions
 */

/**
 * Delay before the next tick so that ticks start one interval apart
 *
 * @param intervalMs - Target interval between tick starts
 * @param elapsedMs - Time the previous tick took
 * @returns Remaining delay, 0 when the tick overran the interval
 */
export function nextDelay(intervalMs: number, elapsedMs: number): number {
  return Math.max(0, intervalMs - elapsedMs);
}
