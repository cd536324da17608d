/**
 * Synthetic pulse source for dummy mode
 *
 * Generates a random plausible reading on every capture and emits exactly
 * the transitions a DHT22 would produce for it, so the full decode path runs
 * without a sensor attached.
 */

import type { Measurement } from '../../core/protocol-decoder';
import type { CaptureWindow } from '../../types/common';
import { monotonicUs, now } from '../../utils/time';
import { encodeDht22Frame, frameToEdges, timingForThreshold } from './frame-encoder';
import type { PulseSource, SyntheticSourceConfig, SyntheticSourceDeps } from './types';

const SYNTHETIC_MIN = 15;
const SYNTHETIC_SPAN = 15;

/**
 * Draw a measurement with humidity and temperature uniformly in 15-30,
 * rounded to the sensor's 0.1 resolution
 */
export function generateMeasurement(random: () => number): Measurement {
  return {
    humidity: roundTenths(SYNTHETIC_MIN + random() * SYNTHETIC_SPAN),
    temperature: roundTenths(SYNTHETIC_MIN + random() * SYNTHETIC_SPAN)
  };
}

/**
 * Create a synthetic pulse source
 *
 * @example
 * ```typescript
 * const source = createSyntheticPulseSource({ bitThresholdUs: 50, bitMaxUs: 150 });
 * const window = await source.capture(1000, 50000);
 * ```
 */
export function createSyntheticPulseSource(
  config: SyntheticSourceConfig,
  deps: SyntheticSourceDeps = { random: Math.random, monotonicUs: monotonicUs, now: now }
): PulseSource {
  const timing = timingForThreshold(config.bitThresholdUs, config.bitMaxUs);

  function capture(triggerLowUs: number): Promise<CaptureWindow> {
    const capturedAt = deps.now();
    const releaseUs = deps.monotonicUs() + triggerLowUs;
    const frame = encodeDht22Frame(generateMeasurement(deps.random));

    return Promise.resolve({
      edges: frameToEdges(frame, releaseUs, timing),
      capturedAt: capturedAt
    });
  }

  function close(): Promise<void> {
    return Promise.resolve();
  }

  return {
    capture: capture,
    close: close
  };
}

function roundTenths(value: number): number {
  return Math.round(value * 10) / 10;
}
