export { validateConfig } from './validator';
export {
  addError,
  addWarning,
  validateNumberRange,
  validateIntegerRange,
  validateNonEmpty,
  validateOneOf
} from './helpers';
export type { ValidationIssue, ValidationResult } from './types';
