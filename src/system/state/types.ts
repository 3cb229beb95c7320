/**
 * Loop memo type definitions
 */

/**
 * Last outcome the control loop recorded
 * IN_RANGE_ON / IN_RANGE_OFF are dead-band holds with the plug ON or OFF
 */
export type LoopMemoEntry =
  | 'NONE'
  | 'TURNED_ON'
  | 'TURNED_OFF'
  | 'ALREADY_ON'
  | 'ALREADY_OFF'
  | 'IN_RANGE_ON'
  | 'IN_RANGE_OFF';

/**
 * Per-loop memory used only to suppress repeated log lines
 */
export interface LoopMemo {
  lastAction: LoopMemoEntry;
}
