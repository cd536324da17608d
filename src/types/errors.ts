/**
 * Global error types for the exporter
 *
 * Sensor errors are recoverable: the sampler counts them and retries on the next tick.
 * Validation and startup errors are fatal and end the process with a non-zero exit code.
 */

/**
 * Machine-readable sensor error codes (also used as log tags)
 */
export type SensorErrorCode =
  | 'HARDWARE_UNAVAILABLE'
  | 'RESPONSE_MISSING'
  | 'INCOMPLETE_FRAME'
  | 'CHECKSUM_ERROR'
  | 'OUT_OF_RANGE';

/**
 * Base class for every per-sample failure
 */
export abstract class SensorError extends Error {
  abstract readonly code: SensorErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SensorError';
  }
}

/**
 * The pin or the pigpio daemon could not be driven for this attempt
 */
export class HardwareUnavailableError extends SensorError {
  readonly code = 'HARDWARE_UNAVAILABLE';

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'HardwareUnavailableError';
  }
}

/**
 * The sensor's response pulses were absent or malformed
 */
export class ResponseMissingError extends SensorError {
  readonly code = 'RESPONSE_MISSING';

  constructor(message: string) {
    super(message);
    this.name = 'ResponseMissingError';
  }
}

/**
 * Fewer than 40 decodable bits were present in the capture window
 */
export class IncompleteFrameError extends SensorError {
  readonly code = 'INCOMPLETE_FRAME';

  constructor(readonly bitsDecoded: number) {
    super('Incomplete frame: decoded ' + bitsDecoded + ' of 40 bits');
    this.name = 'IncompleteFrameError';
  }
}

/**
 * Checksum byte did not match the sum of the data bytes
 */
export class ChecksumError extends SensorError {
  readonly code = 'CHECKSUM_ERROR';

  constructor(readonly expected: number, readonly received: number) {
    super('Checksum mismatch: expected 0x' + toHex(expected) + ', received 0x' + toHex(received));
    this.name = 'ChecksumError';
  }
}

/**
 * Frame passed the checksum but decoded to physically implausible values
 */
export class OutOfRangeError extends SensorError {
  readonly code = 'OUT_OF_RANGE';

  constructor(readonly humidity: number, readonly temperature: number) {
    super('Reading out of range: humidity=' + humidity.toFixed(1) + '%, temperature=' + temperature.toFixed(1) + 'C');
    this.name = 'OutOfRangeError';
  }
}

/**
 * Base validation error for all modules
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when the exporter configuration is invalid
 */
export class ConfigValidationError extends ValidationError {
  constructor(readonly issues: readonly string[]) {
    super('Invalid configuration: ' + issues.join('; '));
    this.name = 'ConfigValidationError';
  }
}

/**
 * Error thrown when a required capability cannot be acquired at startup
 * (pigpio daemon unreachable, HTTP address cannot be bound)
 */
export class StartupError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StartupError';
  }
}

export function isSensorError(err: unknown): err is SensorError {
  return err instanceof SensorError;
}

function toHex(value: number): string {
  return value.toString(16).toUpperCase().padStart(2, '0');
}
