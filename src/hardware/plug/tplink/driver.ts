/**
 * TP-Link cloud plug driver
 */

import { PlugNotFoundError, errorMessage } from '$types/errors';

import { toPlugState } from '../helpers';
import type { PlugDeviceInfo, PlugDriver } from '../types';

import type { TPLinkCloudClient } from './client';
import {
  buildInfoRequest,
  buildSetPowerRequest,
  checkSetPowerResponse,
  deviceFamily,
  readSysInfo,
  selectDevice
} from './helpers';
import type { TPLinkCloudDevice } from './types';

/**
 * Create a driver for one plug on a TP-Link cloud account
 *
 * Every state read refreshes the device list first; the cloud caches device
 * entries and app server URLs.
 *
 * @param client - Cloud client holding the account session
 * @param alias - Device alias to control, empty for the first device
 */
export function createTPLinkCloudDriver(client: TPLinkCloudClient, alias: string): PlugDriver {
  let cached: TPLinkCloudDevice | null = null;

  async function resolveDevice(refresh: boolean): Promise<TPLinkCloudDevice> {
    if (cached !== null && !refresh) {
      return cached;
    }
    const devices = await client.getDeviceList();
    if (devices.length === 0) {
      throw new PlugNotFoundError('No devices found on the TP-Link cloud account');
    }
    const device = selectDevice(devices, alias);
    if (device === null) {
      throw new PlugNotFoundError("Device '" + alias + "' not found");
    }
    cached = device;
    return device;
  }

  /**
   * Details from the device itself, falling back to the cloud list entry.
   * Devices the cloud reports offline are not queried.
   */
  async function describeDevice(device: TPLinkCloudDevice): Promise<PlugDeviceInfo> {
    const base: PlugDeviceInfo = {
      alias: device.alias,
      model: device.deviceModel,
      deviceId: device.deviceId,
      hardwareVersion: device.deviceHwVer,
      firmwareVersion: device.fwVer,
      state: 'UNKNOWN',
      error: null
    };

    if (device.status === 0) {
      return { ...base, error: 'Device is offline' };
    }

    try {
      const family = deviceFamily(device.deviceType);
      const info = readSysInfo(family, await client.passthrough(device, buildInfoRequest(family)));
      return {
        ...base,
        alias: info.alias ?? base.alias,
        model: info.model ?? base.model,
        deviceId: info.deviceId ?? base.deviceId,
        hardwareVersion: info.hardwareVersion ?? base.hardwareVersion,
        firmwareVersion: info.firmwareVersion ?? base.firmwareVersion,
        state: toPlugState(info.on)
      };
    } catch (err) {
      return { ...base, error: errorMessage(err) };
    }
  }

  return {
    readPowerState: async function() {
      const device = await resolveDevice(true);
      const family = deviceFamily(device.deviceType);
      const response = await client.passthrough(device, buildInfoRequest(family));
      return readSysInfo(family, response).on;
    },

    setPower: async function(on) {
      const device = await resolveDevice(false);
      const family = deviceFamily(device.deviceType);
      const response = await client.passthrough(device, buildSetPowerRequest(family, on));
      checkSetPowerResponse(family, response);
    },

    describe: async function() {
      return describeDevice(await resolveDevice(true));
    },

    listDevices: async function() {
      const devices = await client.getDeviceList();
      const described: PlugDeviceInfo[] = [];
      for (const device of devices) {
        described.push(await describeDevice(device));
      }
      return described;
    }
  };
}
