/**
 * Plug controller helper functions
 */

import type { LogLevel } from '@logging';
import type { PlugState } from '$types/common';
import type { UnverifiedCommandPolicy } from '$types/config';

/**
 * How an unverifiable command is reported
 */
export interface UnverifiedOutcome {
  success: boolean;
  level: LogLevel;
  message: string;
}

/**
 * Map a normalized power flag to a plug state
 */
export function toPlugState(on: boolean | null): PlugState {
  if (on === null) {
    return 'UNKNOWN';
  }
  return on ? 'ON' : 'OFF';
}

/**
 * Map a plug state back to a power flag
 */
export function plugIsOn(state: PlugState): boolean | null {
  if (state === 'UNKNOWN') {
    return null;
  }
  return state === 'ON';
}

/**
 * Resolve a command whose effect could not be read back
 * @param policy - Configured leniency
 * @param label - Requested state, 'ON' or 'OFF'
 */
export function resolveUnverified(policy: UnverifiedCommandPolicy, label: string): UnverifiedOutcome {
  switch (policy) {
    case 'assume-success':
      return {
        success: true,
        level: 1,
        message: 'Command sent but charger state could not be verified, assuming ' + label
      };
    case 'warn':
      return {
        success: true,
        level: 2,
        message: 'Command sent but charger state could not be verified, check that the device is ' + label
      };
    case 'fail':
      return {
        success: false,
        level: 2,
        message: 'Command sent but charger state could not be verified, treating turn ' + label + ' as failed'
      };
  }
}
