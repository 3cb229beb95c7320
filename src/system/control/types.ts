/**
 * Control module type definitions
 */

import type { Logger } from '@logging';
import type { BatterySensor } from '@hardware/battery';
import type { PlugController } from '@hardware/plug';
import type { ChargeConfig } from '$types/config';
import type { SleepFn } from '@utils/time';

/**
 * Settings the control loop reads
 */
export type ControlLoopConfig = Readonly<Pick<ChargeConfig, 'START_THRESHOLD_PCT' | 'STOP_THRESHOLD_PCT' | 'POLL_INTERVAL_SEC'>>;

/**
 * Everything one control loop needs, wired once at startup
 */
export interface Controller {
  config: ControlLoopConfig;
  logger: Logger;
  battery: BatterySensor;
  plug: PlugController;
  sleep: SleepFn;
}

export interface RunLoopOptions {
  /** Stops the loop at the next suspension point */
  signal: AbortSignal;
}
