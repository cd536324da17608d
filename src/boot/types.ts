/**
 * Boot type definitions
 */

import type { PigpioHandle, PulseSource } from '../hardware/pulse-source';
import type { Logger, ConsoleStreams } from '../logging';
import type { SensorSampler } from '../core/sensor-sampler';
import type { MetricsStore } from '../system/metrics-store';
import type { Scheduler } from '../system/scheduler';
import type { ExpositionServer } from '../system/exposition';
import type { ExporterConfig } from '../types/config';
import type { ValidationIssue } from '../validation';
import type { Env } from './config';

/**
 * Process-level capabilities handed to initialize()
 */
export interface InitDependencies {
  /** Environment variables (process.env after dotenv has run) */
  env: Env;

  /** Console streams for the log sink */
  streams: ConsoleStreams;

  /** Colour log lines (usually stdout.isTTY) */
  colors: boolean;

  /** Open a pigpio daemon connection; only called outside dummy mode */
  connect: (host: string, port: number) => Promise<PigpioHandle>;

  /** Called after the sampling loop died; the exporter should exit */
  onFatal: (err: unknown) => void;
}

/**
 * A fully wired, listening exporter
 */
export interface ExporterApp {
  config: ExporterConfig;
  warnings: ValidationIssue[];
  logger: Logger;
  source: PulseSource;
  store: MetricsStore;
  sampler: SensorSampler;
  scheduler: Scheduler;
  server: ExpositionServer;

  /** Begin sampling */
  start(): void;

  /** Stop sampling, then close the HTTP server and the pulse source */
  stop(): Promise<void>;
}
