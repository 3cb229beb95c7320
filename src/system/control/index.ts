export { runIteration, runLoop } from './control';
export { formatStatusLine, formatDecision, formatPowerSource, formatLoopError } from './helpers';
export type { Controller, ControlLoopConfig, RunLoopOptions } from './types';
