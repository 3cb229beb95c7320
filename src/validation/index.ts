export { validateConfig } from './validator';
export type { ValidationError, ValidationWarning, ValidationResult, ValidationLevel } from './types';
