export { createLoopMemo, memoEntryFor, shouldAnnounce, recordEntry } from './state';
export type { LoopMemo, LoopMemoEntry } from './types';
