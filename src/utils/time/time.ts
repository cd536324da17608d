/**
 * Time utility functions
 */

import { TIME_CONSTANTS } from '../constants';

/**
 * Get current Unix timestamp in seconds
 * @returns Current time in seconds since epoch
 */
export function now(): number {
  return Math.floor(Date.now() / TIME_CONSTANTS.MS_PER_SECOND);
}

/**
 * Get current timestamp in milliseconds
 * @returns Current time in milliseconds since epoch
 */
export function nowMs(): number {
  return Date.now();
}

/**
 * Monotonic clock in whole microseconds
 * Unaffected by wall-clock adjustments; only differences are meaningful.
 */
export function monotonicUs(): number {
  return Number(process.hrtime.bigint() / 1000n);
}

/**
 * Convert a microsecond duration to a timer delay in milliseconds
 * Rounded up so that a wait never ends early; at least 1 ms.
 */
export function usToTimerMs(us: number): number {
  return Math.max(1, Math.ceil(us / TIME_CONSTANTS.US_PER_MS));
}

/**
 * Resolve after the given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
