/**
 * Shelly Gen2 RPC types
 */

import type { FetchFn } from '@logging';

export interface ShellyClientConfig {
  /** Host, host:port or full http(s) URL of the device */
  address: string;
  timeoutMs: number;
  auth?: {
    user: string;
    password: string;
  };
  fetchFn?: FetchFn;
}

/**
 * Relevant fields of Switch.GetStatus
 */
export interface ShellySwitchStatus {
  id: number;
  /** Relay output, null when the device omits it */
  output: boolean | null;
  /** Active power in watts, when the switch meters it */
  apower: number | null;
}

/**
 * Relevant fields of Shelly.GetDeviceInfo
 */
export interface ShellyDeviceInfo {
  id: string;
  name: string | null;
  model: string | null;
  mac: string | null;
  gen: number | null;
  ver: string | null;
}
