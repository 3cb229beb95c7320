/**
 * Charge policy helper functions
 */

import { isFiniteNumber, isInteger } from '@utils/number';
import { ChargePolicyValidationError } from '$types/errors';

import type { ChargePolicyConfig } from './types';

/**
 * Validate charge window configuration
 * @throws {ChargePolicyValidationError} If configuration is invalid
 */
export function validateChargePolicyConfig(config: ChargePolicyConfig): void {
  const { startThreshold, stopThreshold } = config;
  if (!isInteger(startThreshold) || startThreshold < 0 || startThreshold > 100) {
    throw new ChargePolicyValidationError('startThreshold must be an integer 0-100, got ' + startThreshold);
  }
  if (!isInteger(stopThreshold) || stopThreshold < 0 || stopThreshold > 100) {
    throw new ChargePolicyValidationError('stopThreshold must be an integer 0-100, got ' + stopThreshold);
  }
  if (startThreshold >= stopThreshold) {
    throw new ChargePolicyValidationError(
      'Invalid thresholds: startThreshold (' + startThreshold + ') must be less than stopThreshold (' + stopThreshold + ')'
    );
  }
}

/**
 * Validate a battery percentage
 * @throws {ChargePolicyValidationError} If the value is outside 0-100
 */
export function validatePercent(percent: number, context: string): void {
  if (!isFiniteNumber(percent) || percent < 0 || percent > 100) {
    throw new ChargePolicyValidationError(context + ': percent must be within 0-100, got ' + percent);
  }
}

/**
 * Build the policy window from threshold settings
 */
export function toChargePolicyConfig(config: {
  readonly START_THRESHOLD_PCT: number;
  readonly STOP_THRESHOLD_PCT: number;
}): ChargePolicyConfig {
  return {
    startThreshold: config.START_THRESHOLD_PCT,
    stopThreshold: config.STOP_THRESHOLD_PCT
  };
}
