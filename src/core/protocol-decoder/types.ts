/**
 * Protocol decoder type definitions
 */

import type { SensorModel } from '../../types/common';

/**
 * Decoder configuration
 */
export interface DecoderConfig {
  /** Byte layout used to convert a valid frame into physical values */
  model: SensorModel;

  /** High pulses shorter than this decode as 0, the rest as 1 */
  bitThresholdUs: number;

  /** High pulses longer than this end the decodable part of the window */
  bitMaxUs: number;

  /** Lower bound for each of the two response pulses */
  responseMinUs: number;

  /** Upper bound for each of the two response pulses */
  responseMaxUs: number;
}

/**
 * Physical values decoded from one frame
 */
export interface Measurement {
  /** Relative humidity in percent */
  humidity: number;

  /** Temperature in °C */
  temperature: number;
}

export type Bit = 0 | 1;
