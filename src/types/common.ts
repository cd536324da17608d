/**
 * Common type definitions used throughout the project
 */

/**
 * Line level after a transition (0 = low, 1 = high)
 */
export type Level = 0 | 1;

/**
 * A single level transition on the sensor data line
 */
export interface Edge {
  /** Level the line moved to */
  readonly level: Level;

  /** Monotonic timestamp of the transition in microseconds */
  readonly timestampUs: number;
}

/**
 * Every transition recorded for one trigger-to-timeout cycle, in chronological order
 */
export interface CaptureWindow {
  readonly edges: readonly Edge[];

  /** Wall-clock time (unix seconds) at which the capture was triggered */
  readonly capturedAt: number;
}

/**
 * The 5 bytes transmitted by the sensor:
 * [humidity_hi, humidity_lo, temp_hi, temp_lo, checksum]
 */
export type Frame = readonly [number, number, number, number, number];

/**
 * A validated sensor reading
 */
export interface Reading {
  /** Relative humidity in percent */
  readonly humidity: number;

  /** Temperature in °C */
  readonly temperature: number;

  /** Unix seconds at which the reading was captured */
  readonly timestamp: number;
}

/**
 * Supported sensor families
 * - dht22: 16-bit humidity and sign/magnitude temperature, tenths of a unit
 * - dht11: integral humidity and temperature bytes
 * - auto: dht22 conversion first, dht11 when that yields implausible values
 */
export type SensorModel = 'dht22' | 'dht11' | 'auto';

export const SENSOR_MODELS: readonly SensorModel[] = ['dht22', 'dht11', 'auto'];
