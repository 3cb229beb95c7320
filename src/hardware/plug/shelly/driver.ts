/**
 * Shelly plug driver
 */

import { errorMessage } from '$types/errors';

import { toPlugState } from '../helpers';
import type { PlugDeviceInfo, PlugDriver } from '../types';

import type { ShellyRPCClient } from './client';

/**
 * Create a driver for one switch channel of a Shelly device
 * @param client - RPC client bound to the device address
 * @param switchId - Switch component id, 0 on single-relay plugs
 */
export function createShellyDriver(client: ShellyRPCClient, switchId: number): PlugDriver {
  async function readPowerState(): Promise<boolean | null> {
    const status = await client.getSwitchStatus(switchId);
    return status.output;
  }

  async function describe(): Promise<PlugDeviceInfo> {
    const info = await client.getDeviceInfo();
    let state: PlugDeviceInfo['state'] = 'UNKNOWN';
    let error: string | null = null;
    try {
      state = toPlugState(await readPowerState());
    } catch (err) {
      error = errorMessage(err);
    }

    return {
      alias: info.name ?? info.id,
      model: info.model,
      deviceId: info.id,
      hardwareVersion: info.gen === null ? null : 'Gen' + info.gen,
      firmwareVersion: info.ver,
      state: state,
      error: error
    };
  }

  return {
    readPowerState: readPowerState,
    setPower: async function(on) {
      await client.setSwitch(switchId, on);
    },
    describe: describe,
    listDevices: async function() {
      return [await describe()];
    }
  };
}
