/**
 * Validation helper functions
 * Provides reusable utilities for configuration validation
 */

import { isFiniteNumber, isInteger } from '@utils/number';

import type { ValidationError, ValidationWarning } from './types';

// ═══════════════════════════════════════════════════════════════
// ERROR AND WARNING BUILDERS
// ═══════════════════════════════════════════════════════════════

/**
 * Add a critical error to the errors list
 * @param errors - Array to append the error to
 * @param field - Field name that failed validation
 * @param message - Human-readable error message
 */
export function addError(errors: ValidationError[], field: string, message: string): void {
  errors.push({ level: 'CRITICAL', field: field, message: message });
}

/**
 * Add a warning to the warnings list
 * @param warnings - Array to append the warning to
 * @param field - Field name with sub-optimal value
 * @param message - Human-readable warning message
 */
export function addWarning(warnings: ValidationWarning[], field: string, message: string): void {
  warnings.push({ level: 'WARNING', field: field, message: message });
}

// ═══════════════════════════════════════════════════════════════
// PRESENCE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Require a non-blank string
 * @param value - Value to check
 * @param field - Field name for error messages
 * @param reason - Why the field is needed, appended to the message
 * @param errors - Array to append errors to
 */
export function validateRequiredString(
  value: string,
  field: string,
  reason: string,
  errors: ValidationError[]
): void {
  if (value.trim() === '') {
    addError(errors, field, `${field} is required ${reason}`);
  }
}

/**
 * Require a value from a fixed set
 */
export function validateOneOf<T extends string>(
  value: string,
  field: string,
  allowed: readonly T[],
  errors: ValidationError[]
): void {
  if (!allowed.some(function(option) { return option === value; })) {
    addError(errors, field, `${field} must be one of ${allowed.join(', ')} (got ${value})`);
  }
}

// ═══════════════════════════════════════════════════════════════
// RANGE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate a number against critical and recommended ranges
 *
 * Critical range violations produce errors (validation fails)
 * Recommended range violations produce warnings (validation passes)
 *
 * @param value - Value to validate
 * @param field - Field name for error messages
 * @param criticalMin - Minimum acceptable value (hard limit)
 * @param criticalMax - Maximum acceptable value (hard limit)
 * @param errors - Array to append errors to
 * @param warnings - Array to append warnings to
 * @param recommendedMin - Recommended minimum value (optional)
 * @param recommendedMax - Recommended maximum value (optional)
 */
export function validateNumberRange(
  value: number,
  field: string,
  criticalMin: number,
  criticalMax: number,
  errors: ValidationError[],
  warnings: ValidationWarning[],
  recommendedMin?: number,
  recommendedMax?: number
): void {
  // NaN and Infinity fail the critical range
  if (!isFiniteNumber(value) || value < criticalMin || value > criticalMax) {
    addError(
      errors,
      field,
      `${field} must be between ${criticalMin} and ${criticalMax} (got ${value})`
    );
    return;
  }

  if (recommendedMin !== undefined && recommendedMax !== undefined) {
    if (value < recommendedMin || value > recommendedMax) {
      addWarning(
        warnings,
        field,
        `${field} is outside recommended range ${recommendedMin}-${recommendedMax} (got ${value})`
      );
    }
  }
}

/**
 * Validate an integer against critical and recommended ranges
 *
 * First checks if the value is an integer, then validates ranges
 */
export function validateIntegerRange(
  value: number,
  field: string,
  criticalMin: number,
  criticalMax: number,
  errors: ValidationError[],
  warnings: ValidationWarning[],
  recommendedMin?: number,
  recommendedMax?: number
): void {
  if (!isInteger(value)) {
    addError(errors, field, `${field} must be an integer (got ${value})`);
    return;
  }

  validateNumberRange(
    value,
    field,
    criticalMin,
    criticalMax,
    errors,
    warnings,
    recommendedMin,
    recommendedMax
  );
}
