/**
 * TP-Link request builders and response readers
 */

import { PlugApiError } from '$types/errors';
import { isRecord, readNumber, readRecord, readString } from '@utils/json';
import type { JSONValue } from '@utils/json';

import type { TPLinkCloudDevice, TPLinkDeviceFamily, TPLinkSysInfo } from './types';

/** Cloud error code for an expired session token */
export const TOKEN_EXPIRED_CODE = -20651;

/**
 * Tapo devices report SMART.* device types
 */
export function deviceFamily(deviceType: string): TPLinkDeviceFamily {
  return deviceType.startsWith('SMART.') ? 'tapo' : 'kasa';
}

export function buildInfoRequest(family: TPLinkDeviceFamily): Record<string, JSONValue> {
  if (family === 'tapo') {
    return { method: 'get_device_info' };
  }
  return { system: { get_sysinfo: {} } };
}

export function buildSetPowerRequest(family: TPLinkDeviceFamily, on: boolean): Record<string, JSONValue> {
  if (family === 'tapo') {
    return { method: 'set_device_info', params: { device_on: on } };
  }
  return { system: { set_relay_state: { state: on ? 1 : 0 } } };
}

/**
 * Throw on a cloud envelope with a non-zero error_code
 */
export function checkCloudEnvelope(data: unknown): Record<string, unknown> {
  if (!isRecord(data)) {
    throw new PlugApiError(-1, 'Malformed cloud response');
  }
  const code = readNumber(data, 'error_code') ?? 0;
  if (code !== 0) {
    throw new PlugApiError(code, readString(data, 'msg') ?? 'unknown error');
  }
  return readRecord(data, 'result') ?? {};
}

/**
 * Tapo nicknames are base64 encoded; plain aliases pass through
 */
export function decodeNickname(value: string | null): string | null {
  if (value === null) {
    return null;
  }
  const decoded = Buffer.from(value, 'base64').toString('utf8');
  if (decoded !== '' && Buffer.from(decoded, 'utf8').toString('base64') === value) {
    return decoded;
  }
  return value;
}

function readTapoInfo(response: Record<string, unknown>): TPLinkSysInfo {
  const code = readNumber(response, 'error_code') ?? 0;
  if (code !== 0) {
    throw new PlugApiError(code, readString(response, 'msg') ?? 'device rejected request');
  }
  const result = readRecord(response, 'result') ?? {};
  const deviceOn = result.device_on;
  return {
    on: typeof deviceOn === 'boolean' ? deviceOn : null,
    alias: decodeNickname(readString(result, 'nickname')),
    model: readString(result, 'model'),
    deviceId: readString(result, 'device_id'),
    hardwareVersion: readString(result, 'hw_ver'),
    firmwareVersion: readString(result, 'fw_ver')
  };
}

function readKasaInfo(response: Record<string, unknown>): TPLinkSysInfo {
  const system = readRecord(response, 'system') ?? {};
  const sysinfo = readRecord(system, 'get_sysinfo') ?? {};
  const errCode = readNumber(sysinfo, 'err_code') ?? 0;
  if (errCode !== 0) {
    throw new PlugApiError(errCode, readString(sysinfo, 'err_msg') ?? 'device rejected request');
  }
  const relayState = readNumber(sysinfo, 'relay_state');
  return {
    on: relayState === null ? null : relayState === 1,
    alias: readString(sysinfo, 'alias'),
    model: readString(sysinfo, 'model'),
    deviceId: readString(sysinfo, 'deviceId'),
    hardwareVersion: readString(sysinfo, 'hw_ver'),
    firmwareVersion: readString(sysinfo, 'sw_ver')
  };
}

/**
 * Read a device info passthrough response
 */
export function readSysInfo(family: TPLinkDeviceFamily, response: Record<string, unknown>): TPLinkSysInfo {
  return family === 'tapo' ? readTapoInfo(response) : readKasaInfo(response);
}

/**
 * Throw when a set-power passthrough response reports an error
 */
export function checkSetPowerResponse(family: TPLinkDeviceFamily, response: Record<string, unknown>): void {
  if (family === 'tapo') {
    const code = readNumber(response, 'error_code') ?? 0;
    if (code !== 0) {
      throw new PlugApiError(code, readString(response, 'msg') ?? 'device rejected command');
    }
    return;
  }

  const system = readRecord(response, 'system') ?? {};
  const setState = readRecord(system, 'set_relay_state') ?? {};
  const errCode = readNumber(setState, 'err_code') ?? 0;
  if (errCode !== 0) {
    throw new PlugApiError(errCode, readString(setState, 'err_msg') ?? 'device rejected command');
  }
}

/**
 * Read the deviceList of a getDeviceList result, skipping malformed entries
 */
export function readDeviceList(result: Record<string, unknown>): TPLinkCloudDevice[] {
  const list = result.deviceList;
  if (!Array.isArray(list)) {
    return [];
  }

  const devices: TPLinkCloudDevice[] = [];
  for (const entry of list) {
    if (!isRecord(entry)) continue;
    const deviceId = readString(entry, 'deviceId');
    const appServerUrl = readString(entry, 'appServerUrl');
    if (deviceId === null || appServerUrl === null) continue;
    devices.push({
      deviceId: deviceId,
      alias: readString(entry, 'alias') ?? deviceId,
      deviceType: readString(entry, 'deviceType') ?? '',
      deviceModel: readString(entry, 'deviceModel'),
      deviceHwVer: readString(entry, 'deviceHwVer'),
      fwVer: readString(entry, 'fwVer'),
      appServerUrl: appServerUrl,
      status: readNumber(entry, 'status')
    });
  }
  return devices;
}

/**
 * Pick the device by alias (case-insensitive), or the first one without an alias
 */
export function selectDevice(devices: readonly TPLinkCloudDevice[], alias: string): TPLinkCloudDevice | null {
  if (alias === '') {
    return devices[0] ?? null;
  }
  const wanted = alias.toLowerCase();
  return devices.find(function(device) { return device.alias.toLowerCase() === wanted; }) ?? null;
}
