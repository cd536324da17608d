/**
 * Sensor sampler type definitions
 */

import type { Logger } from '../../logging';
import type { PulseSource } from '../../hardware/pulse-source';
import type { MetricsStore } from '../../system/metrics-store';
import type { Reading } from '../../types/common';
import type { SensorError } from '../../types/errors';
import type { DecoderConfig } from '../protocol-decoder';

export type SamplerPhase = 'idle' | 'sampling';

export type SampleOutcome = 'none' | 'success' | 'failed';

/**
 * Sampler state (owned by the sampler, exposed read-only through getState)
 */
export interface SamplerState {
  /** Most recent reading that passed every check */
  lastGoodReading: Reading | null;

  /** Failed samples since the last success */
  consecutiveFailures: number;

  /** Failed samples since startup */
  readErrorsTotal: number;

  phase: SamplerPhase;

  lastOutcome: SampleOutcome;
}

/**
 * Result of one sampling attempt
 */
export type SampleResult =
  | { ok: true; reading: Reading }
  | { ok: false; error: SensorError };

export interface SamplerConfig {
  /** How long the host holds the line low to wake the sensor */
  triggerLowUs: number;

  /** Idle time that ends a capture */
  captureTimeoutUs: number;

  /** Consecutive failures that raise a CRITICAL log (once per streak) */
  failureAlertThreshold: number;

  decoder: DecoderConfig;
}

export interface SamplerDependencies {
  source: PulseSource;
  store: MetricsStore;
  logger: Logger;
}

export interface SensorSampler {
  /**
   * Trigger, capture and decode one reading, then publish the outcome
   *
   * @throws {Error} When called while a previous sample is still in flight,
   *   or when something other than a sensor failure goes wrong
   */
  sample(): Promise<SampleResult>;

  /** Copy of the current state */
  getState(): Readonly<SamplerState>;
}
