/**
 * Validation result types
 */

export type ValidationLevel = 'CRITICAL' | 'WARNING';

/**
 * Setting that makes the configuration unusable
 */
export interface ValidationError {
  /** Setting name */
  field: string;
  message: string;
  level?: ValidationLevel;
}

/**
 * Setting outside its recommended range; startup continues
 */
export interface ValidationWarning {
  field: string;
  message: string;
  level?: ValidationLevel;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}
