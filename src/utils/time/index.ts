export { nowMs, sleep } from './time';
export type { SleepFn } from './time';
export { formatTimestamp } from './helpers';
