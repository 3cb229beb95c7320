/**
 * Global error types for the charge controller
 * Custom errors for validation, plug and battery failures
 */

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
 * Single field problem reported by configuration validation
 */
export interface ConfigFieldError {
  field: string;
  message: string;
}

/**
 * Error thrown at startup when the configuration cannot be used.
 * Fatal: the control loop must not start.
 */
export class ConfigValidationError extends ValidationError {
  readonly fieldErrors: ConfigFieldError[];

  constructor(fieldErrors: ConfigFieldError[]) {
    super('Invalid configuration: ' + fieldErrors.map(function(e) {
      return e.field + ' (' + e.message + ')';
    }).join(', '));
    this.name = 'ConfigValidationError';
    this.fieldErrors = fieldErrors;
  }
}

/**
 * Error thrown when charge thresholds are invalid
 */
export class ChargePolicyValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'ChargePolicyValidationError';
  }
}

/**
 * Base error for smart plug communication
 */
export class PlugError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PlugError';
  }
}

/**
 * Error reported by the plug vendor API (RPC error object or non-zero error_code)
 */
export class PlugApiError extends PlugError {
  readonly code: number;

  constructor(code: number, message: string) {
    super('API error ' + code + ': ' + message);
    this.name = 'PlugApiError';
    this.code = code;
  }
}

/**
 * Error thrown when a plug request exceeds its time budget
 */
export class PlugTimeoutError extends PlugError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('Request timeout after ' + timeoutMs + 'ms');
    this.name = 'PlugTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Error thrown when the configured plug cannot be found
 */
export class PlugNotFoundError extends PlugError {
  constructor(message: string) {
    super(message);
    this.name = 'PlugNotFoundError';
  }
}

/**
 * Error thrown when a battery readout fails for reasons other than "no battery"
 */
export class BatterySensorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BatterySensorError';
  }
}

/**
 * Extract a printable message from an unknown thrown value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
