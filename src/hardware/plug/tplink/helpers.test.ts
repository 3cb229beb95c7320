import { PlugApiError } from '$types/errors';

import {
  buildInfoRequest,
  buildSetPowerRequest,
  checkCloudEnvelope,
  checkSetPowerResponse,
  decodeNickname,
  deviceFamily,
  readDeviceList,
  readSysInfo,
  selectDevice
} from './helpers';
import type { TPLinkCloudDevice } from './types';

function device(alias: string, deviceType = 'SMART.TAPOPLUG'): TPLinkCloudDevice {
  return {
    deviceId: 'id-' + alias,
    alias: alias,
    deviceType: deviceType,
    deviceModel: 'P110(EU)',
    deviceHwVer: '1.0',
    fwVer: '1.1.0',
    appServerUrl: 'https://eu-wap.tplinkcloud.com',
    status: 1
  };
}

describe('tplink helpers', () => {
  describe('deviceFamily', () => {
    it('should detect Tapo and Kasa devices', () => {
      expect(deviceFamily('SMART.TAPOPLUG')).toBe('tapo');
      expect(deviceFamily('IOT.SMARTPLUGSWITCH')).toBe('kasa');
    });
  });

  describe('request builders', () => {
    it('should build Tapo requests', () => {
      expect(buildInfoRequest('tapo')).toEqual({ method: 'get_device_info' });
      expect(buildSetPowerRequest('tapo', true)).toEqual({ method: 'set_device_info', params: { device_on: true } });
    });

    it('should build Kasa requests', () => {
      expect(buildInfoRequest('kasa')).toEqual({ system: { get_sysinfo: {} } });
      expect(buildSetPowerRequest('kasa', false)).toEqual({ system: { set_relay_state: { state: 0 } } });
    });
  });

  describe('checkCloudEnvelope', () => {
    it('should return the result of a successful envelope', () => {
      expect(checkCloudEnvelope({ error_code: 0, result: { token: 'abc' } })).toEqual({ token: 'abc' });
    });

    it('should return an empty result when none is given', () => {
      expect(checkCloudEnvelope({ error_code: 0 })).toEqual({});
    });

    it('should throw PlugApiError on a non-zero error_code', () => {
      expect(() => checkCloudEnvelope({ error_code: -20601, msg: 'Incorrect email or password' })).toThrow(
        'API error -20601: Incorrect email or password'
      );
    });

    it('should reject non-object payloads', () => {
      expect(() => checkCloudEnvelope('oops')).toThrow(PlugApiError);
    });
  });

  describe('decodeNickname', () => {
    it('should decode base64 nicknames', () => {
      expect(decodeNickname(Buffer.from('Laptop plug').toString('base64'))).toBe('Laptop plug');
    });

    it('should keep plain aliases', () => {
      expect(decodeNickname('Laptop plug')).toBe('Laptop plug');
      expect(decodeNickname(null)).toBeNull();
    });
  });

  describe('readSysInfo', () => {
    it('should read a Tapo get_device_info response', () => {
      const response = {
        error_code: 0,
        result: {
          device_on: true,
          nickname: Buffer.from('Desk').toString('base64'),
          model: 'P110',
          device_id: 'dev-9',
          hw_ver: '1.0',
          fw_ver: '1.2.1'
        }
      };

      expect(readSysInfo('tapo', response)).toEqual({
        on: true,
        alias: 'Desk',
        model: 'P110',
        deviceId: 'dev-9',
        hardwareVersion: '1.0',
        firmwareVersion: '1.2.1'
      });
    });

    it('should read a Kasa get_sysinfo response', () => {
      const response = {
        system: {
          get_sysinfo: { relay_state: 0, alias: 'Desk', model: 'HS100(EU)', deviceId: 'k-1', hw_ver: '2.0', sw_ver: '1.5.4', err_code: 0 }
        }
      };

      expect(readSysInfo('kasa', response)).toEqual({
        on: false,
        alias: 'Desk',
        model: 'HS100(EU)',
        deviceId: 'k-1',
        hardwareVersion: '2.0',
        firmwareVersion: '1.5.4'
      });
    });

    it('should report a missing power flag as null', () => {
      expect(readSysInfo('tapo', { error_code: 0, result: {} }).on).toBeNull();
      expect(readSysInfo('kasa', { system: { get_sysinfo: {} } }).on).toBeNull();
    });

    it('should throw on device error codes', () => {
      expect(() => readSysInfo('tapo', { error_code: -1501, msg: 'Invalid request' })).toThrow(
        'API error -1501: Invalid request'
      );
      expect(() => readSysInfo('kasa', { system: { get_sysinfo: { err_code: -2, err_msg: 'member not support' } } })).toThrow(
        'API error -2: member not support'
      );
    });
  });

  describe('checkSetPowerResponse', () => {
    it('should accept successful responses', () => {
      expect(() => checkSetPowerResponse('tapo', { error_code: 0 })).not.toThrow();
      expect(() => checkSetPowerResponse('kasa', { system: { set_relay_state: { err_code: 0 } } })).not.toThrow();
    });

    it('should throw on rejected commands', () => {
      expect(() => checkSetPowerResponse('tapo', { error_code: -1008 })).toThrow('API error -1008: device rejected command');
      expect(() => checkSetPowerResponse('kasa', { system: { set_relay_state: { err_code: -3 } } })).toThrow(PlugApiError);
    });
  });

  describe('readDeviceList', () => {
    it('should keep well-formed entries', () => {
      const result = {
        deviceList: [
          { deviceId: 'a', alias: 'Desk', deviceType: 'SMART.TAPOPLUG', appServerUrl: 'https://x', status: 1 },
          { alias: 'broken' },
          'junk'
        ]
      };

      expect(readDeviceList(result)).toEqual([{
        deviceId: 'a',
        alias: 'Desk',
        deviceType: 'SMART.TAPOPLUG',
        deviceModel: null,
        deviceHwVer: null,
        fwVer: null,
        appServerUrl: 'https://x',
        status: 1
      }]);
    });

    it('should return an empty list without deviceList', () => {
      expect(readDeviceList({})).toEqual([]);
    });
  });

  describe('selectDevice', () => {
    const devices = [device('Kitchen'), device('Laptop Charger')];

    it('should pick the first device without an alias', () => {
      expect(selectDevice(devices, '')?.alias).toBe('Kitchen');
    });

    it('should match aliases case-insensitively', () => {
      expect(selectDevice(devices, 'laptop charger')?.alias).toBe('Laptop Charger');
    });

    it('should return null for an unknown alias or an empty list', () => {
      expect(selectDevice(devices, 'Garage')).toBeNull();
      expect(selectDevice([], '')).toBeNull();
    });
  });
});
