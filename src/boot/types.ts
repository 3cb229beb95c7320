/**
 * Boot type definitions
 */

import type { ConsoleAPI, FetchFn, Logger } from '@logging';
import type { BatteryReaderDeps, BatterySensor } from '@hardware/battery';
import type { PlugController } from '@hardware/plug';
import type { Controller } from '@system/control';
import type { ChargeConfig } from '$types/config';
import type { SleepFn } from '@utils/time';

/**
 * Process-level collaborators, swapped for fakes in tests
 */
export interface InitDependencies {
  fetchFn: FetchFn;
  consoleApi: ConsoleAPI;
  /** Value of process.platform */
  platform: string;
  readerDeps?: BatteryReaderDeps;
  sleep: SleepFn;
  timeSource: () => number;
  /** Identifier sent to the TP-Link cloud at login */
  terminalUUID: () => string;
  /** Colorize console log lines */
  colors: boolean;
}

/**
 * Everything wired at startup
 */
export interface AppRuntime {
  config: ChargeConfig;
  logger: Logger;
  battery: BatterySensor;
  plug: PlugController;
  controller: Controller;
}

/**
 * User-facing output of CLI commands
 */
export interface CommandOutput {
  log(message: string): void;
  error(message: string): void;
}

/**
 * Ask the user for one line of input
 */
export type PromptFn = (question: string) => Promise<string>;
