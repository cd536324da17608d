/**
 * Validation helper functions
 * Provides reusable utilities for configuration validation
 */

import type { ValidationIssue } from './types';
import { isFiniteNumber, isInteger } from '../utils/number';

// ═══════════════════════════════════════════════════════════════
// ERROR AND WARNING BUILDERS
// ═══════════════════════════════════════════════════════════════

/**
 * Add a critical error to the errors list
 * @param errors - Array to append the error to
 * @param field - Field name that failed validation
 * @param message - Human-readable error message
 */
export function addError(errors: ValidationIssue[], field: string, message: string): void {
  errors.push({ level: 'CRITICAL', field: field, message: message });
}

/**
 * Add a warning to the warnings list
 */
export function addWarning(warnings: ValidationIssue[], field: string, message: string): void {
  warnings.push({ level: 'WARNING', field: field, message: message });
}

// ═══════════════════════════════════════════════════════════════
// RANGE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate a number against a hard range
 *
 * @param value - Value to validate
 * @param field - Field name for error messages
 * @param min - Minimum acceptable value (inclusive)
 * @param max - Maximum acceptable value (inclusive)
 * @param errors - Array to append errors to
 * @returns True when the value passed
 */
export function validateNumberRange(
  value: number,
  field: string,
  min: number,
  max: number,
  errors: ValidationIssue[]
): boolean {
  if (!isFiniteNumber(value) || value < min || value > max) {
    addError(errors, field, `${field} must be between ${min} and ${max} (got ${value})`);
    return false;
  }
  return true;
}

/**
 * Validate an integer against a hard range
 *
 * First checks if the value is an integer, then validates the range
 */
export function validateIntegerRange(
  value: number,
  field: string,
  min: number,
  max: number,
  errors: ValidationIssue[]
): boolean {
  if (!isInteger(value)) {
    addError(errors, field, `${field} must be an integer (got ${value})`);
    return false;
  }
  return validateNumberRange(value, field, min, max, errors);
}

// ═══════════════════════════════════════════════════════════════
// STRING VALIDATORS
// ═══════════════════════════════════════════════════════════════

export function validateNonEmpty(value: string, field: string, errors: ValidationIssue[]): boolean {
  if (value.trim() === '') {
    addError(errors, field, `${field} must not be empty`);
    return false;
  }
  return true;
}

/**
 * Validate that a value is one of a fixed set
 */
export function validateOneOf<T extends string>(
  value: string,
  allowed: readonly T[],
  field: string,
  errors: ValidationIssue[]
): value is T {
  for (const candidate of allowed) {
    if (candidate === value) return true;
  }
  addError(errors, field, `${field} must be one of ${allowed.join(', ')} (got ${value})`);
  return false;
}
