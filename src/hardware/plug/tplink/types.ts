/**
 * TP-Link cloud API types
 */

import type { FetchFn } from '@logging';

export interface TPLinkCloudClientConfig {
  email: string;
  password: string;
  timeoutMs: number;
  /** Cloud endpoint used for login and the device list */
  cloudUrl: string;
  appType: string;
  /** Stable per-client identifier sent at login */
  terminalUUID: string;
  fetchFn?: FetchFn;
}

/**
 * Device entry from getDeviceList
 */
export interface TPLinkCloudDevice {
  deviceId: string;
  alias: string;
  deviceType: string;
  deviceModel: string | null;
  deviceHwVer: string | null;
  fwVer: string | null;
  appServerUrl: string;
  /** 1 when the cloud sees the device online */
  status: number | null;
}

/**
 * Request shape family; Tapo (SMART.*) and Kasa devices speak different payloads
 */
export type TPLinkDeviceFamily = 'tapo' | 'kasa';

/**
 * Fields read from a device info response
 */
export interface TPLinkSysInfo {
  on: boolean | null;
  alias: string | null;
  model: string | null;
  deviceId: string | null;
  hardwareVersion: string | null;
  firmwareVersion: string | null;
}
