/**
 * Smart plug type definitions
 */

import type { Logger } from '@logging';
import type { UnverifiedCommandPolicy } from '$types/config';
import type { PlugState } from '$types/common';
import type { SleepFn } from '@utils/time';

/**
 * Device details shown by the CLI
 * Vendor fields a device does not report are null
 */
export interface PlugDeviceInfo {
  alias: string;
  model: string | null;
  deviceId: string | null;
  hardwareVersion: string | null;
  firmwareVersion: string | null;
  state: PlugState;
  /** Why the details could not be read, null when they could */
  error: string | null;
}

/**
 * Vendor adapter with a normalized surface
 *
 * `readPowerState` resolves null when the device answers without a usable
 * power flag. Transport and API failures are thrown.
 */
export interface PlugDriver {
  readPowerState(): Promise<boolean | null>;
  setPower(on: boolean): Promise<void>;
  describe(): Promise<PlugDeviceInfo>;
  listDevices(): Promise<PlugDeviceInfo[]>;
}

/**
 * Plug operations used by the control loop and the CLI
 */
export interface PlugController {
  /** Observe the plug; errors propagate to the caller */
  getStatus(): Promise<PlugState>;
  /** True when the command was accepted and verified (or unverifiable and tolerated) */
  turnOn(signal?: AbortSignal): Promise<boolean>;
  turnOff(signal?: AbortSignal): Promise<boolean>;
  getDeviceInfo(): Promise<PlugDeviceInfo>;
  listDevices(): Promise<PlugDeviceInfo[]>;
}

export interface PlugControllerOptions {
  settleDelayMs: number;
  unverifiedPolicy: UnverifiedCommandPolicy;
  sleep: SleepFn;
}

export interface PlugControllerDependencies {
  driver: PlugDriver;
  logger: Logger;
}
