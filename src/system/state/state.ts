/**
 * Loop memo
 * Remembers the last logged outcome so steady states are announced once
 */

import type { ChargeAction, NoOpReason } from '@core/charge-policy';

import type { LoopMemo, LoopMemoEntry } from './types';

export * from './types';

/**
 * Create an empty loop memo
 */
export function createLoopMemo(): LoopMemo {
  return { lastAction: 'NONE' };
}

/**
 * Map an action to the memo entry it leaves behind
 *
 * Commands map to TURNED_ON / TURNED_OFF and should only be recorded
 * once the plug accepted them. Holds split on the plug state; an
 * unknown plug counts as OFF.
 */
export function memoEntryFor(action: ChargeAction, plugIsOn: boolean | null): LoopMemoEntry {
  switch (action.kind) {
    case 'TURN_ON':
      return 'TURNED_ON';
    case 'TURN_OFF':
      return 'TURNED_OFF';
    case 'NO_OP':
      if (action.reason === 'ALREADY_ON') return 'ALREADY_ON';
      if (action.reason === 'ALREADY_OFF') return 'ALREADY_OFF';
      return plugIsOn === true ? 'IN_RANGE_ON' : 'IN_RANGE_OFF';
  }
}

/**
 * No-op reason behind a memo entry, null for commands and NONE
 */
function reasonOf(entry: LoopMemoEntry): NoOpReason | null {
  switch (entry) {
    case 'ALREADY_ON':
      return 'ALREADY_ON';
    case 'ALREADY_OFF':
      return 'ALREADY_OFF';
    case 'IN_RANGE_ON':
    case 'IN_RANGE_OFF':
      return 'HOLD_CURRENT_STATE';
    default:
      return null;
  }
}

/**
 * Whether an outcome deserves a log line
 *
 * Commands are always announced. A no-op is announced only when the
 * previous entry carried a different reason.
 */
export function shouldAnnounce(memo: LoopMemo, entry: LoopMemoEntry): boolean {
  const reason = reasonOf(entry);
  if (reason === null) {
    return true;
  }
  return reasonOf(memo.lastAction) !== reason;
}

/**
 * Record an outcome
 */
export function recordEntry(memo: LoopMemo, entry: LoopMemoEntry): void {
  memo.lastAction = entry;
}
