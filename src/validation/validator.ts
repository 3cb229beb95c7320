import type { ChargeUserConfig } from '$types';

import {
  addError,
  addWarning,
  validateIntegerRange,
  validateNumberRange,
  validateOneOf,
  validateRequiredString
} from './helpers';
import type { ValidationError, ValidationResult, ValidationWarning } from './types';

const PLUG_BACKENDS = ['tplink-cloud', 'shelly'] as const;
const UNVERIFIED_POLICIES = ['assume-success', 'warn', 'fail'] as const;

/**
 * Narrowest dead band (percent points) before toggling gets frequent
 */
const MIN_RECOMMENDED_BAND_PCT = 10;

function validateThresholds(
  config: ChargeUserConfig,
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  validateIntegerRange(config.START_THRESHOLD_PCT, 'START_THRESHOLD_PCT', 0, 100, errors, warnings, 20, 50);
  validateIntegerRange(config.STOP_THRESHOLD_PCT, 'STOP_THRESHOLD_PCT', 0, 100, errors, warnings, 60, 90);

  if (config.STOP_THRESHOLD_PCT <= config.START_THRESHOLD_PCT) {
    addError(errors, 'STOP_THRESHOLD_PCT', 'Must be greater than START_THRESHOLD_PCT');
  } else if (config.STOP_THRESHOLD_PCT - config.START_THRESHOLD_PCT < MIN_RECOMMENDED_BAND_PCT) {
    addWarning(
      warnings,
      'STOP_THRESHOLD_PCT',
      `Dead band of ${config.STOP_THRESHOLD_PCT - config.START_THRESHOLD_PCT} points is narrow, the plug will switch often`
    );
  }

  validateNumberRange(config.POLL_INTERVAL_SEC, 'POLL_INTERVAL_SEC', 1, 86400, errors, warnings, 30, 600);
}

function validatePlugAccess(config: ChargeUserConfig, errors: ValidationError[], warnings: ValidationWarning[]): void {
  validateOneOf(config.PLUG_BACKEND, 'PLUG_BACKEND', PLUG_BACKENDS, errors);

  if (config.PLUG_BACKEND === 'tplink-cloud') {
    validateRequiredString(config.TPLINK_EMAIL, 'TPLINK_EMAIL', 'for the tplink-cloud backend', errors);
    validateRequiredString(config.TPLINK_PASSWORD, 'TPLINK_PASSWORD', 'for the tplink-cloud backend', errors);
  }

  if (config.PLUG_BACKEND === 'shelly') {
    validateRequiredString(config.PLUG_ADDRESS, 'PLUG_ADDRESS', 'for the shelly backend', errors);
    validateIntegerRange(config.SHELLY_SWITCH_ID, 'SHELLY_SWITCH_ID', 0, 255, errors, warnings);
    if ((config.SHELLY_USER === '') !== (config.SHELLY_PASSWORD === '')) {
      addWarning(warnings, 'SHELLY_USER', 'SHELLY_USER and SHELLY_PASSWORD must both be set to enable authentication');
    }
  }

  validateIntegerRange(config.SETTLE_DELAY_MS, 'SETTLE_DELAY_MS', 0, 60000, errors, warnings, 1000, 10000);
  validateIntegerRange(config.PLUG_TIMEOUT_MS, 'PLUG_TIMEOUT_MS', 1000, 120000, errors, warnings);
  validateOneOf(config.UNVERIFIED_COMMAND_POLICY, 'UNVERIFIED_COMMAND_POLICY', UNVERIFIED_POLICIES, errors);
}

/**
 * Validate the user configuration
 *
 * Errors are fatal at startup. Warnings flag values outside the
 * recommended ranges and are only logged.
 */
export function validateConfig(config: ChargeUserConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  validateThresholds(config, errors, warnings);
  validatePlugAccess(config, errors, warnings);

  validateNumberRange(config.GLOBAL_LOG_AUTO_DEMOTE_HOURS, 'GLOBAL_LOG_AUTO_DEMOTE_HOURS', 0, 720, errors, warnings);

  if (config.SLACK_WEBHOOK_URL !== '' && !config.SLACK_WEBHOOK_URL.startsWith('https://')) {
    addError(errors, 'SLACK_WEBHOOK_URL', 'Must be an https URL');
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings
  };
}
