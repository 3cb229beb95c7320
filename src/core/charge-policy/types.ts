/**
 * Charge policy type definitions
 */

/**
 * Two-threshold charge window, in whole percent
 */
export interface ChargePolicyConfig {
  /** Turn charging ON at or below this level */
  startThreshold: number;

  /** Turn charging OFF at or above this level */
  stopThreshold: number;
}

export type NoOpReason = 'ALREADY_ON' | 'ALREADY_OFF' | 'HOLD_CURRENT_STATE';

/**
 * What the controller should do this iteration
 */
export type ChargeAction =
  | { kind: 'TURN_ON' }
  | { kind: 'TURN_OFF' }
  | { kind: 'NO_OP'; reason: NoOpReason };
