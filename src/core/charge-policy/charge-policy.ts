/**
 * Hysteresis charge decision
 */

import type { ChargeAction, ChargePolicyConfig } from './types';

/**
 * Decide the plug action for one battery reading
 *
 * Both thresholds are inclusive and the ON branch is checked first.
 * Between the thresholds the plug is left as it is. An unknown plug
 * state (null) never yields an "already" no-op.
 *
 * @param percent - Battery charge level
 * @param plugIsOn - Current plug state, null when unknown
 * @param config - Charge window
 */
export function decide(
  percent: number,
  plugIsOn: boolean | null,
  config: ChargePolicyConfig
): ChargeAction {
  if (percent <= config.startThreshold) {
    if (plugIsOn === true) {
      return { kind: 'NO_OP', reason: 'ALREADY_ON' };
    }
    return { kind: 'TURN_ON' };
  }

  if (percent >= config.stopThreshold) {
    if (plugIsOn === false) {
      return { kind: 'NO_OP', reason: 'ALREADY_OFF' };
    }
    return { kind: 'TURN_OFF' };
  }

  // Dead band
  return { kind: 'NO_OP', reason: 'HOLD_CURRENT_STATE' };
}
