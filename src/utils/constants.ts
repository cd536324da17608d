/**
 * Global constants used throughout the application
 */

export const TIME_CONSTANTS = {
  MS_PER_SECOND: 1000,
  US_PER_MS: 1000,
} as const;

export const PROTOCOL_CONSTANTS = {
  FRAME_BITS: 40,
  // Response low start, response high end, then one per data bit
  FRAME_FALLING_EDGES: 42,
} as const;

export const READING_LIMITS = {
  HUMIDITY_MIN: 0,
  HUMIDITY_MAX: 100,
  TEMPERATURE_MIN: -40,
  TEMPERATURE_MAX: 80,
} as const;
