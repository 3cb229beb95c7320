/**
 * Control loop helper functions
 * Log line builders for the charge controller
 */

import { fmtPercent } from '@logging';
import type { ChargeAction, ChargePolicyConfig } from '@core/charge-policy';
import type { BatteryReading, PlugState } from '$types/common';

/**
 * Describe where the laptop draws power from
 */
export function formatPowerSource(pluggedIn: boolean | null): string {
  if (pluggedIn === null) {
    return 'Power source unknown';
  }
  return pluggedIn ? 'Plugged in' : 'On battery';
}

/**
 * Status line logged on every iteration
 * Example: "Battery: 72.0% | Plugged in | Charger: ON"
 */
export function formatStatusLine(reading: BatteryReading, plugState: PlugState): string {
  return 'Battery: ' + fmtPercent(reading.percent) + ' | ' + formatPowerSource(reading.pluggedIn) + ' | Charger: ' + plugState;
}

/**
 * Explain a decision in terms of the thresholds
 */
export function formatDecision(
  action: ChargeAction,
  percent: number,
  config: ChargePolicyConfig,
  plugState: PlugState
): string {
  const prefix = 'Battery at ' + fmtPercent(percent);
  const low = ' (<= ' + config.startThreshold + '%)';
  const high = ' (>= ' + config.stopThreshold + '%)';

  switch (action.kind) {
    case 'TURN_ON':
      return prefix + low + ', turning charger ON';
    case 'TURN_OFF':
      return prefix + high + ', turning charger OFF';
    case 'NO_OP':
      if (action.reason === 'ALREADY_ON') {
        return prefix + low + ', charger already ON';
      }
      if (action.reason === 'ALREADY_OFF') {
        return prefix + high + ', charger already OFF';
      }
      return prefix + ' (between ' + config.startThreshold + '% and ' + config.stopThreshold + '%), charger remains ' + plugState;
  }
}

/**
 * Error text for the loop's CRITICAL line, with the innermost stack frame when known
 */
export function formatLoopError(err: unknown): string {
  if (!(err instanceof Error)) {
    return 'Error in monitoring loop: ' + String(err);
  }

  const frame = (err.stack ?? '')
    .split('\n')
    .map(function(line) { return line.trim(); })
    .find(function(line) { return line.startsWith('at '); });

  const text = 'Error in monitoring loop: ' + err.name + ': ' + err.message;
  return frame === undefined ? text : text + ' (' + frame + ')';
}
