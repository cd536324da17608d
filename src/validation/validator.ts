/**
 * Exporter configuration validator
 */

import type { ExporterConfig } from '../types/config';
import { SENSOR_MODELS } from '../types/common';
import {
  addError,
  addWarning,
  validateIntegerRange,
  validateNonEmpty,
  validateNumberRange,
  validateOneOf
} from './helpers';
import type { ValidationIssue, ValidationResult } from './types';

const METRIC_PREFIX_PATTERN = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
const DHT11_MIN_TRIGGER_LOW_US = 18000;

export function validateConfig(config: ExporterConfig): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  // Sensor
  validateIntegerRange(config.GPIO_PIN, 'GPIO_PIN', 0, 53, errors);
  validateOneOf(config.SENSOR_MODEL, SENSOR_MODELS, 'SENSOR_MODEL', errors);

  if (validateIntegerRange(config.INTERVAL_SECONDS, 'INTERVAL_SECONDS', 1, 86400, errors)) {
    if (config.INTERVAL_SECONDS < config.MIN_RECOMMENDED_INTERVAL_SEC) {
      addWarning(
        warnings,
        'INTERVAL_SECONDS',
        `INTERVAL_SECONDS below ${config.MIN_RECOMMENDED_INTERVAL_SEC}s; DHT22 sensors need ${config.MIN_RECOMMENDED_INTERVAL_SEC}s between reads (got ${config.INTERVAL_SECONDS})`
      );
    }
  }

  // pigpio daemon (unused in dummy mode)
  if (!config.DUMMY_MODE) {
    validateNonEmpty(config.PIGPIO_HOST, 'PIGPIO_HOST', errors);
    validateIntegerRange(config.PIGPIO_PORT, 'PIGPIO_PORT', 1, 65535, errors);
  }

  // Protocol timing
  validateIntegerRange(config.BIT_THRESHOLD_US, 'BIT_THRESHOLD_US', 10, config.BIT_MAX_US, errors);

  if (validateIntegerRange(config.TRIGGER_LOW_US, 'TRIGGER_LOW_US', 500, 50000, errors)) {
    if (config.SENSOR_MODEL !== 'dht22' && config.TRIGGER_LOW_US < DHT11_MIN_TRIGGER_LOW_US) {
      addWarning(
        warnings,
        'TRIGGER_LOW_US',
        `TRIGGER_LOW_US below ${DHT11_MIN_TRIGGER_LOW_US}us may not wake a DHT11 (got ${config.TRIGGER_LOW_US})`
      );
    }
  }

  validateIntegerRange(config.CAPTURE_TIMEOUT_US, 'CAPTURE_TIMEOUT_US', 1000, 1000000, errors);

  // Failure policy
  validateIntegerRange(config.FAILURE_ALERT_THRESHOLD, 'FAILURE_ALERT_THRESHOLD', 1, 100000, errors);

  // HTTP
  validateIntegerRange(config.HTTP_PORT, 'HTTP_PORT', 1, 65535, errors);
  validateNonEmpty(config.HTTP_ADDR, 'HTTP_ADDR', errors);
  if (config.METRICS_PREFIX !== '' && !METRIC_PREFIX_PATTERN.test(config.METRICS_PREFIX)) {
    addError(
      errors,
      'METRICS_PREFIX',
      `METRICS_PREFIX must start with a letter, '_' or ':' and contain only letters, digits, '_' or ':' (got ${config.METRICS_PREFIX})`
    );
  }

  // Logging
  validateNumberRange(config.LOG_AUTO_DEMOTE_HOURS, 'LOG_AUTO_DEMOTE_HOURS', 0, 8760, errors);

  if (!config.DUMMY_MODE && config.HTTP_PORT === config.PIGPIO_PORT && isLocalHost(config.PIGPIO_HOST) && isLocalHost(config.HTTP_ADDR)) {
    addError(errors, 'HTTP_PORT', `HTTP_PORT must differ from PIGPIO_PORT on the same host (got ${config.HTTP_PORT})`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings
  };
}

function isLocalHost(host: string): boolean {
  return host === 'localhost' || host === '127.0.0.1' || host === '0.0.0.0' || host === '::' || host === '::1';
}
