/**
 * Tests for CLI commands
 */

import chalk from 'chalk';
import type { Mock } from 'vitest';

import { createRecordingLogger } from '@logging/testing';
import type { BatterySensor } from '@hardware/battery';
import type { PlugController, PlugDeviceInfo } from '@hardware/plug';
import type { BatterySample } from '$types/common';
import { PlugTimeoutError } from '$types/errors';
import type { SleepFn } from '@utils/time';

import {
  controlDevice,
  formatDeviceInfo,
  formatDeviceSummary,
  listDevices,
  showBatteryStatus,
  showDeviceInfo,
  startMonitoring
} from './commands';
import { loadConfig } from './config';
import type { AppRuntime, CommandOutput } from './types';

const DEVICE: PlugDeviceInfo = {
  alias: 'Desk Charger',
  model: 'P110',
  deviceId: 'dev-1',
  hardwareVersion: '1.0',
  firmwareVersion: '1.2.3',
  state: 'ON',
  error: null
};

interface RecordingOutput extends CommandOutput {
  log: Mock<(message: string) => void>;
  error: Mock<(message: string) => void>;
}

function createOutput(): RecordingOutput {
  return { log: vi.fn<(message: string) => void>(), error: vi.fn<(message: string) => void>() };
}

function lines(mock: Mock<(message: string) => void>): string[] {
  return mock.mock.calls.map((call) => call[0]);
}

function createPlug(overrides: Partial<PlugController> = {}): PlugController {
  return {
    getStatus: async () => 'ON',
    turnOn: async () => true,
    turnOff: async () => true,
    getDeviceInfo: async () => DEVICE,
    listDevices: async () => [DEVICE],
    ...overrides
  };
}

function createRuntime(sample: BatterySample, plug: PlugController = createPlug(), sleep: SleepFn = async () => undefined): AppRuntime {
  const config = loadConfig({ PLUG_BACKEND: 'shelly', PLUG_ADDRESS: '192.168.1.50' }).config;
  const logger = createRecordingLogger();
  const battery: BatterySensor = { read: async () => sample };
  return {
    config,
    logger,
    battery,
    plug,
    controller: { config, logger, battery, plug, sleep }
  };
}

describe('CLI commands', () => {
  beforeEach(() => {
    chalk.level = 0;
  });

  describe('formatDeviceInfo', () => {
    it('should list every field', () => {
      expect(formatDeviceInfo(DEVICE)).toEqual([
        'Alias:            Desk Charger',
        'Model:            P110',
        'Device ID:        dev-1',
        'Hardware version: 1.0',
        'Firmware version: 1.2.3',
        'State:            ON'
      ]);
    });

    it('should show missing fields and read errors', () => {
      const info = { ...DEVICE, model: null, state: 'UNKNOWN' as const, error: 'Request timeout after 10000ms' };

      expect(formatDeviceInfo(info)).toContain('Model:            n/a');
      expect(formatDeviceInfo(info)).toContain('Error:            Request timeout after 10000ms');
    });
  });

  describe('formatDeviceSummary', () => {
    it('should include model and state', () => {
      expect(formatDeviceSummary(DEVICE)).toBe('Desk Charger (P110) [ON]');
      expect(formatDeviceSummary({ ...DEVICE, model: null, state: 'OFF' })).toBe('Desk Charger [OFF]');
    });
  });

  describe('showDeviceInfo', () => {
    it('should print the device details', async () => {
      const out = createOutput();

      await expect(showDeviceInfo(createRuntime(null), out)).resolves.toBe(true);
      expect(lines(out.log)[0]).toBe('Device Information:');
      expect(lines(out.log)).toContain('  State:            ON');
    });

    it('should report errors without throwing', async () => {
      const out = createOutput();
      const plug = createPlug({
        getDeviceInfo: async () => {
          throw new PlugTimeoutError(10000);
        }
      });

      await expect(showDeviceInfo(createRuntime(null, plug), out)).resolves.toBe(false);
      expect(lines(out.error)).toEqual(['Error: Request timeout after 10000ms']);
    });
  });

  describe('listDevices', () => {
    it('should print one line per device', async () => {
      const out = createOutput();
      const plug = createPlug({ listDevices: async () => [DEVICE, { ...DEVICE, alias: 'Lamp', model: null, state: 'OFF' }] });

      await expect(listDevices(createRuntime(null, plug), out)).resolves.toBe(true);
      expect(lines(out.log)).toEqual(['Found 2 device(s):', '  - Desk Charger (P110) [ON]', '  - Lamp [OFF]']);
    });
  });

  describe('showBatteryStatus', () => {
    it('should print level and power source', async () => {
      const out = createOutput();

      await expect(showBatteryStatus(createRuntime({ percent: 72, pluggedIn: true }), out)).resolves.toBe(true);
      expect(lines(out.log)).toEqual(['Battery Status:', '  Battery level: 72.0%', '  Power status:  Plugged in']);
    });

    it('should refuse when no battery is readable', async () => {
      const out = createOutput();

      await expect(showBatteryStatus(createRuntime(null), out)).resolves.toBe(false);
      expect(lines(out.error)).toEqual([
        'Unable to access battery information.',
        'This program requires a laptop with battery monitoring capabilities.'
      ]);
    });
  });

  describe('controlDevice', () => {
    it('should confirm a verified command', async () => {
      const out = createOutput();

      await expect(controlDevice(createRuntime(null), out, true)).resolves.toBe(true);
      expect(lines(out.log)).toEqual(['✓ Charger turned ON']);
    });

    it('should report a failed command', async () => {
      const out = createOutput();
      const plug = createPlug({ turnOff: async () => false });

      await expect(controlDevice(createRuntime(null, plug), out, false)).resolves.toBe(false);
      expect(lines(out.error)).toEqual(['✗ Failed to turn charger OFF']);
    });
  });

  describe('startMonitoring', () => {
    it('should refuse to start without a battery', async () => {
      const out = createOutput();
      const abort = new AbortController();
      const runtime = createRuntime(null);

      await expect(startMonitoring(runtime, out, abort.signal)).resolves.toBe(false);
      expect(lines(out.error)[0]).toBe('Unable to access battery information.');
    });

    it('should run the control loop until aborted', async () => {
      const out = createOutput();
      const abort = new AbortController();
      const turnOn = vi.fn(async () => true);
      const plug = createPlug({ getStatus: async () => 'OFF', turnOn });
      const sleep = vi.fn<SleepFn>(async () => {
        abort.abort();
      });
      const runtime = createRuntime({ percent: 20, pluggedIn: false }, plug, sleep);

      await expect(startMonitoring(runtime, out, abort.signal)).resolves.toBe(true);
      expect(turnOn).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(60000, abort.signal);
    });
  });
});
