/**
 * Validation type definitions
 */

/**
 * One problem found in a configuration value
 */
export interface ValidationIssue {
  field: string;
  message: string;
  level: 'CRITICAL' | 'WARNING';
}

export interface ValidationResult {
  /** False when any CRITICAL issue was found */
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}
