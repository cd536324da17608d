/**
 * Type definition for exporter configuration
 */

import type { LogLevel, LogLevels } from '../logging/types';
import type { SensorModel } from './common';

/**
 * User-configurable settings, read once from the environment at startup
 */
export interface ExporterUserConfig {
  // ───────── SENSOR ─────────
  readonly GPIO_PIN: number;
  readonly SENSOR_MODEL: SensorModel;
  readonly INTERVAL_SECONDS: number;
  readonly DUMMY_MODE: boolean;

  // ───────── PIGPIO DAEMON ─────────
  readonly PIGPIO_HOST: string;
  readonly PIGPIO_PORT: number;

  // ───────── PROTOCOL TIMING ─────────
  readonly BIT_THRESHOLD_US: number;
  readonly TRIGGER_LOW_US: number;
  readonly CAPTURE_TIMEOUT_US: number;

  // ───────── FAILURE POLICY ─────────
  readonly FAILURE_ALERT_THRESHOLD: number;

  // ───────── HTTP ─────────
  readonly HTTP_PORT: number;
  readonly HTTP_ADDR: string;
  readonly METRICS_PREFIX: string;

  // ───────── LOGGING ─────────
  readonly LOG_LEVEL: LogLevel;
  readonly LOG_AUTO_DEMOTE_HOURS: number;
}

/**
 * Application constants
 * Internal engine constants that should rarely change
 */
export interface ExporterAppConstants {
  readonly LOG_LEVELS: LogLevels;
  readonly METRICS_PATH: string;
  readonly RESPONSE_MIN_US: number;
  readonly RESPONSE_MAX_US: number;
  readonly BIT_MAX_US: number;
  readonly MIN_RECOMMENDED_INTERVAL_SEC: number;
  readonly PIGPIO_CALL_TIMEOUT_MS: number;
}

/**
 * Complete configuration (user config + app constants)
 */
export type ExporterConfig = ExporterUserConfig & ExporterAppConstants;
