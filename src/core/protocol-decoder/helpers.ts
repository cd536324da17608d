/**
 * Protocol decoder helper functions
 * Byte assembly, checksum and per-model conversions
 */

import type { Frame } from '../../types/common';
import { PROTOCOL_CONSTANTS, READING_LIMITS } from '../../utils/constants';
import type { Bit, Measurement } from './types';

/**
 * Sum of the four data bytes, truncated to 8 bits
 */
export function computeChecksum(b0: number, b1: number, b2: number, b3: number): number {
  return (b0 + b1 + b2 + b3) & 0xff;
}

/**
 * Pack bits (MSB first) into a frame
 * @param bits - Exactly 40 decoded bits
 */
export function bitsToFrame(bits: readonly Bit[]): Frame {
  const bytes = [0, 0, 0, 0, 0];
  for (let i = 0; i < bits.length && i < PROTOCOL_CONSTANTS.FRAME_BITS; i++) {
    const byteIndex = Math.floor(i / 8);
    bytes[byteIndex] = (bytes[byteIndex] << 1) | bits[i];
  }
  return [bytes[0], bytes[1], bytes[2], bytes[3], bytes[4]];
}

/**
 * DHT22 layout: 16-bit humidity and sign/magnitude temperature, both in tenths
 */
export function convertDht22(frame: Frame): Measurement {
  const humidity = ((frame[0] << 8) | frame[1]) / 10;
  const magnitude = (((frame[2] & 0x7f) << 8) | frame[3]) / 10;
  const negative = (frame[2] & 0x80) !== 0 && magnitude !== 0;

  return {
    humidity: humidity,
    temperature: negative ? -magnitude : magnitude
  };
}

/**
 * DHT11 layout: integral humidity in byte 0 and temperature in byte 2
 * @returns Measurement, or null when the fractional bytes are set or values
 *   fall outside what a DHT11 can report
 */
export function convertDht11(frame: Frame): Measurement | null {
  const humidity = frame[0];
  const temperature = frame[2];

  if (frame[1] !== 0 || frame[3] !== 0) return null;
  if (temperature > 60) return null;
  if (humidity < 9 || humidity > 90) return null;

  return { humidity: humidity, temperature: temperature };
}

/**
 * Check a measurement against the plausible physical range
 */
export function isInRange(measurement: Measurement): boolean {
  return (
    measurement.humidity >= READING_LIMITS.HUMIDITY_MIN &&
    measurement.humidity <= READING_LIMITS.HUMIDITY_MAX &&
    measurement.temperature >= READING_LIMITS.TEMPERATURE_MIN &&
    measurement.temperature <= READING_LIMITS.TEMPERATURE_MAX
  );
}
