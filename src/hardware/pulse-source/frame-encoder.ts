/**
 * Frame encoder
 * Produces the bytes and line transitions a DHT22 would emit for a measurement
 */

import { computeChecksum } from '../../core/protocol-decoder';
import type { Measurement } from '../../core/protocol-decoder';
import type { Edge, Frame } from '../../types/common';
import type { PulseTiming } from './types';

export const DEFAULT_PULSE_TIMING: PulseTiming = {
  releaseUs: 30,
  responseLowUs: 80,
  responseHighUs: 80,
  bitLowUs: 50,
  zeroHighUs: 26,
  oneHighUs: 70
};

/**
 * Pick bit widths that decode correctly for a given threshold
 */
export function timingForThreshold(bitThresholdUs: number, bitMaxUs: number): PulseTiming {
  return {
    ...DEFAULT_PULSE_TIMING,
    zeroHighUs: Math.max(1, Math.floor(bitThresholdUs / 2)),
    oneHighUs: Math.min(bitMaxUs, bitThresholdUs + 20)
  };
}

/**
 * Encode a measurement with the DHT22 byte layout (tenths, sign/magnitude temperature)
 */
export function encodeDht22Frame(measurement: Measurement): Frame {
  const humidity = Math.round(measurement.humidity * 10) & 0xffff;
  const magnitude = Math.round(Math.abs(measurement.temperature) * 10) & 0x7fff;
  const temperature = measurement.temperature < 0 ? magnitude | 0x8000 : magnitude;

  const b0 = humidity >> 8;
  const b1 = humidity & 0xff;
  const b2 = temperature >> 8;
  const b3 = temperature & 0xff;

  return [b0, b1, b2, b3, computeChecksum(b0, b1, b2, b3)];
}

/**
 * Emit the edges a sensor produces for a frame, starting at host release
 *
 * @param frame - Bytes to transmit, MSB first
 * @param startUs - Timestamp of the host releasing the line
 * @param timing - Pulse widths
 */
export function frameToEdges(frame: Frame, startUs: number, timing: PulseTiming = DEFAULT_PULSE_TIMING): Edge[] {
  const edges: Edge[] = [];
  let t = startUs;

  edges.push({ level: 1, timestampUs: t });
  t += timing.releaseUs;
  edges.push({ level: 0, timestampUs: t });
  t += timing.responseLowUs;
  edges.push({ level: 1, timestampUs: t });
  t += timing.responseHighUs;
  edges.push({ level: 0, timestampUs: t });

  for (const byte of frame) {
    for (let bit = 7; bit >= 0; bit--) {
      t += timing.bitLowUs;
      edges.push({ level: 1, timestampUs: t });
      t += ((byte >> bit) & 1) === 1 ? timing.oneHighUs : timing.zeroHighUs;
      edges.push({ level: 0, timestampUs: t });
    }
  }

  // Sensor releases the line after the last bit
  t += timing.bitLowUs;
  edges.push({ level: 1, timestampUs: t });

  return edges;
}
