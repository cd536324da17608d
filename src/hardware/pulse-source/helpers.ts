/**
 * Pulse source helper functions
 */

import type { RequestCallback } from 'pigpio-client';

import type { Level } from '../../types/common';
import { HardwareUnavailableError } from '../../types/errors';
import { PROTOCOL_CONSTANTS } from '../../utils/constants';

/**
 * Microseconds elapsed between two pigpio ticks
 *
 * The daemon's tick is an unsigned 32-bit microsecond counter that wraps
 * roughly every 72 minutes.
 */
export function tickDiff(fromTick: number, toTick: number): number {
  return (toTick - fromTick) >>> 0;
}

/**
 * Normalise a raw level reported by the daemon
 */
export function toLevel(raw: number): Level {
  return raw === 0 ? 0 : 1;
}

/**
 * True once every falling edge of a full frame has been recorded
 */
export function isFrameComplete(fallingEdges: number): boolean {
  return fallingEdges >= PROTOCOL_CONSTANTS.FRAME_FALLING_EDGES;
}

/**
 * Run a callback-style daemon request with a deadline
 *
 * pigpio-client never calls back once its socket has dropped, so every
 * request is bounded by timeoutMs.
 *
 * @param action - Completes "Cannot ..." in the error message
 * @param request - Issues the request and passes the completion callback on
 * @returns The daemon's return code
 * @throws {HardwareUnavailableError} The daemon refused the request or did not answer in time
 */
export function daemonCall(
  action: string,
  timeoutMs: number,
  request: (callback: RequestCallback) => void
): Promise<number | undefined> {
  return new Promise((resolve, reject) => {
    let settled = false;

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      reject(new HardwareUnavailableError(
        'Cannot ' + action + ': pigpio daemon did not answer within ' + timeoutMs + 'ms'
      ));
    }, timeoutMs);

    function fail(cause: unknown): void {
      settled = true;
      clearTimeout(timer);
      reject(new HardwareUnavailableError('Cannot ' + action, { cause: cause }));
    }

    try {
      request((err, res) => {
        if (settled) return;
        if (err) {
          fail(err);
          return;
        }
        settled = true;
        clearTimeout(timer);
        resolve(res);
      });
    } catch (err) {
      if (!settled) fail(err);
    }
  });
}
