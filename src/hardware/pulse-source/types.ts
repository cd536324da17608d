/**
 * Pulse source type definitions
 */

import type { Pigpio } from 'pigpio-client';

import type { Logger } from '../../logging';
import type { CaptureWindow } from '../../types/common';

/**
 * Capability to trigger the sensor and record the resulting line transitions
 */
export interface PulseSource {
  /**
   * Drive the line low for triggerLowUs, release it and record every
   * transition until a full frame has been seen or timeoutUs passes
   * without a transition.
   *
   * @throws {HardwareUnavailableError} The pin could not be driven
   */
  capture(triggerLowUs: number, timeoutUs: number): Promise<CaptureWindow>;

  /** Release the underlying capability */
  close(): Promise<void>;
}

/**
 * Pulse widths used when emitting a frame as edges
 */
export interface PulseTiming {
  /** Host release until the sensor pulls the line low */
  releaseUs: number;
  responseLowUs: number;
  responseHighUs: number;
  /** Low period preceding every data bit */
  bitLowUs: number;
  zeroHighUs: number;
  oneHighUs: number;
}

/**
 * The part of a pigpio connection a pulse source needs
 */
export type PigpioHandle = Pick<Pigpio, 'gpio' | 'end' | 'on' | 'removeListener'>;

export interface PigpioSourceConfig {
  /** Daemon address, used to reconnect after the connection drops */
  host: string;
  port: number;

  /** BCM pin number of the sensor data line */
  pin: number;

  /** Deadline for a single daemon request */
  callTimeoutMs: number;
}

/**
 * Injectable connection, logging, clocks and waits for the pigpio source
 */
export interface PigpioSourceDeps {
  connect: (host: string, port: number) => Promise<PigpioHandle>;
  logger: Logger;
  sleep: (ms: number) => Promise<void>;
  now: () => number;
}

export interface SyntheticSourceConfig {
  bitThresholdUs: number;
  bitMaxUs: number;
}

/**
 * Injectable randomness and clocks for the synthetic source
 */
export interface SyntheticSourceDeps {
  /** Uniform random number in [0, 1) */
  random: () => number;
  monotonicUs: () => number;
  now: () => number;
}
