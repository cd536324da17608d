/**
 * Exporter configuration
 *
 * User settings come from the environment (plus an optional .env file that
 * main.ts loads with dotenv before anything reads process.env). Every value
 * is parsed strictly: a variable that is set but unparsable is an error, not
 * a silent fallback to the default.
 */

import type { ExporterAppConstants, ExporterConfig, ExporterUserConfig } from '../types/config';
import { SENSOR_MODELS } from '../types/common';
import type { SensorModel } from '../types/common';
import { ConfigValidationError } from '../types/errors';
import { parseLogLevel } from '../logging/helpers';
import type { LogLevel } from '../logging/types';
import { parseStrictInteger, parseStrictNumber } from '../utils/number';
import { addError, validateConfig } from '../validation';
import type { ValidationIssue } from '../validation';

// ─────────────────────────────────────────────────────────────
// USER CONFIGURATION DEFAULTS
//   Used for every variable that is unset or empty.
// ─────────────────────────────────────────────────────────────

export const USER_CONFIG_DEFAULTS: Readonly<Omit<ExporterUserConfig, 'TRIGGER_LOW_US'>> = {
  // GPIO_PIN
  //   Role: BCM number of the pin wired to the sensor data line.
  //   Critical: Integer in [0, 53].
  GPIO_PIN: 4,

  // SENSOR_MODEL
  //   Role: Byte layout of the sensor's frame.
  //   Critical: dht22 | dht11 | auto (auto tries dht22, then dht11).
  SENSOR_MODEL: 'dht22',

  // INTERVAL_SECONDS
  //   Role: Time between the starts of consecutive samples.
  //   Critical: Integer in [1, 86400].
  //   Recommended: >= 2 s; DHT22 sensors return stale data when read faster.
  INTERVAL_SECONDS: 10,

  // DUMMY_MODE
  //   Role: Serve random plausible readings instead of talking to pigpiod.
  //   Accepts 1/true/yes/on and 0/false/no/off.
  DUMMY_MODE: false,

  // PIGPIO_HOST / PIGPIO_PORT
  //   Role: Address of the pigpio daemon socket interface.
  PIGPIO_HOST: 'localhost',
  PIGPIO_PORT: 8888,

  // BIT_THRESHOLD_US
  //   Role: High pulses shorter than this decode as 0, the rest as 1.
  //   Critical: Integer in [10, BIT_MAX_US].
  //   Recommended: 50 us, halfway between the nominal 26 us and 70 us pulses.
  BIT_THRESHOLD_US: 50,

  // CAPTURE_TIMEOUT_US
  //   Role: Idle time on the line that ends a capture.
  //   Critical: Integer in [1000, 1000000].
  CAPTURE_TIMEOUT_US: 50000,

  // FAILURE_ALERT_THRESHOLD
  //   Role: Consecutive failed samples that raise a CRITICAL log (once per streak).
  //   Critical: Integer >= 1.
  FAILURE_ALERT_THRESHOLD: 5,

  // HTTP_PORT / HTTP_ADDR
  //   Role: Address the metrics endpoint binds.
  HTTP_PORT: 9200,
  HTTP_ADDR: '0.0.0.0',

  // METRICS_PREFIX
  //   Role: Prepended to every metric name, e.g. "dht22_".
  //   Critical: Empty, or a valid Prometheus metric name prefix.
  METRICS_PREFIX: '',

  // LOG_LEVEL
  //   Role: Minimum level written to the console.
  //   Accepts debug | info | warning | critical (warn and error as aliases).
  LOG_LEVEL: 1,

  // LOG_AUTO_DEMOTE_HOURS
  //   Role: Hide INFO logs after this much uptime unless LOG_LEVEL is debug.
  //   Critical: 0-8760; 0 disables.
  LOG_AUTO_DEMOTE_HOURS: 24
};

/**
 * Trigger low time per sensor family
 * DHT22 wakes on a 1 ms pulse; DHT11 needs at least 18 ms.
 */
export const DEFAULT_TRIGGER_LOW_US: Readonly<Record<SensorModel, number>> = {
  dht22: 1000,
  dht11: 18000,
  auto: 18000
};

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
//   Internal engine constants that should rarely change.
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<ExporterAppConstants> = {
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3
  },

  METRICS_PATH: '/metrics',

  RESPONSE_MIN_US: 40,
  RESPONSE_MAX_US: 120,

  BIT_MAX_US: 150,

  MIN_RECOMMENDED_INTERVAL_SEC: 2,

  // Longest wait for one pigpio daemon request before the sample fails
  PIGPIO_CALL_TIMEOUT_MS: 1000
};

export type Env = Readonly<Record<string, string | undefined>>;

export interface LoadedConfig {
  config: ExporterConfig;
  warnings: ValidationIssue[];
}

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off'];

/**
 * Read, parse and validate the configuration
 *
 * @param env - Environment variables (process.env in production)
 * @returns Complete configuration and any non-fatal warnings
 * @throws {ConfigValidationError} A variable is unparsable or out of range
 */
export function loadConfig(env: Env): LoadedConfig {
  const errors: ValidationIssue[] = [];
  const d = USER_CONFIG_DEFAULTS;

  function raw(name: string): string | null {
    const value = env[name];
    if (value === undefined || value.trim() === '') return null;
    return value.trim();
  }

  function integer(name: string, fallback: number): number {
    const text = raw(name);
    if (text === null) return fallback;
    const value = parseStrictInteger(text);
    if (value === null) {
      addError(errors, name, `${name} must be an integer (got "${text}")`);
      return fallback;
    }
    return value;
  }

  function decimal(name: string, fallback: number): number {
    const text = raw(name);
    if (text === null) return fallback;
    const value = parseStrictNumber(text);
    if (value === null) {
      addError(errors, name, `${name} must be a number (got "${text}")`);
      return fallback;
    }
    return value;
  }

  function bool(name: string, fallback: boolean): boolean {
    const text = raw(name);
    if (text === null) return fallback;
    const lower = text.toLowerCase();
    if (TRUE_VALUES.indexOf(lower) !== -1) return true;
    if (FALSE_VALUES.indexOf(lower) !== -1) return false;
    addError(errors, name, `${name} must be one of ${TRUE_VALUES.concat(FALSE_VALUES).join(', ')} (got "${text}")`);
    return fallback;
  }

  function text(name: string, fallback: string): string {
    const value = raw(name);
    return value === null ? fallback : value;
  }

  function model(): SensorModel {
    const value = raw('SENSOR_MODEL');
    if (value === null) return d.SENSOR_MODEL;
    const lower = value.toLowerCase();
    for (const candidate of SENSOR_MODELS) {
      if (candidate === lower) return candidate;
    }
    addError(errors, 'SENSOR_MODEL', `SENSOR_MODEL must be one of ${SENSOR_MODELS.join(', ')} (got "${value}")`);
    return d.SENSOR_MODEL;
  }

  function logLevel(): LogLevel {
    const value = raw('LOG_LEVEL');
    if (value === null) return d.LOG_LEVEL;
    const level = parseLogLevel(value, APP_CONSTANTS.LOG_LEVELS);
    if (level === null) {
      addError(errors, 'LOG_LEVEL', `LOG_LEVEL must be one of debug, info, warning, critical (got "${value}")`);
      return d.LOG_LEVEL;
    }
    return level;
  }

  const sensorModel = model();

  const config: ExporterConfig = {
    GPIO_PIN: integer('GPIO_PIN', d.GPIO_PIN),
    SENSOR_MODEL: sensorModel,
    INTERVAL_SECONDS: integer('INTERVAL_SECONDS', d.INTERVAL_SECONDS),
    DUMMY_MODE: bool('DUMMY_MODE', d.DUMMY_MODE),
    PIGPIO_HOST: text('PIGPIO_HOST', d.PIGPIO_HOST),
    PIGPIO_PORT: integer('PIGPIO_PORT', d.PIGPIO_PORT),
    BIT_THRESHOLD_US: integer('BIT_THRESHOLD_US', d.BIT_THRESHOLD_US),
    TRIGGER_LOW_US: integer('TRIGGER_LOW_US', DEFAULT_TRIGGER_LOW_US[sensorModel]),
    CAPTURE_TIMEOUT_US: integer('CAPTURE_TIMEOUT_US', d.CAPTURE_TIMEOUT_US),
    FAILURE_ALERT_THRESHOLD: integer('FAILURE_ALERT_THRESHOLD', d.FAILURE_ALERT_THRESHOLD),
    HTTP_PORT: integer('HTTP_PORT', d.HTTP_PORT),
    HTTP_ADDR: text('HTTP_ADDR', d.HTTP_ADDR),
    METRICS_PREFIX: text('METRICS_PREFIX', d.METRICS_PREFIX),
    LOG_LEVEL: logLevel(),
    LOG_AUTO_DEMOTE_HOURS: decimal('LOG_AUTO_DEMOTE_HOURS', d.LOG_AUTO_DEMOTE_HOURS),
    ...APP_CONSTANTS
  };

  const validation = validateConfig(config);
  const allErrors = errors.concat(validation.errors);

  if (allErrors.length > 0) {
    throw new ConfigValidationError(allErrors.map((e) => e.message));
  }

  return { config: config, warnings: validation.warnings };
}
