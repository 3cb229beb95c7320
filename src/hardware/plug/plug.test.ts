/**
 * Unit tests for verified plug control
 */

import type { Mock } from 'vitest';

import { createRecordingLogger } from '@logging/testing';
import { PlugApiError, PlugNotFoundError, PlugTimeoutError } from '$types/errors';
import type { UnverifiedCommandPolicy } from '$types/config';

import { createPlugController } from './plug';
import type { PlugDeviceInfo, PlugDriver } from './types';

const INFO: PlugDeviceInfo = {
  alias: 'Desk plug',
  model: 'P110',
  deviceId: 'dev-1',
  hardwareVersion: '1.0',
  firmwareVersion: '1.2.3',
  state: 'OFF',
  error: null
};

interface FakeDriver extends PlugDriver {
  setPower: Mock<(on: boolean) => Promise<void>>;
}

/**
 * Driver fake whose reads return the queued values in order
 */
function createFakeDriver(reads: Array<boolean | null | Error>): FakeDriver {
  const queue = [...reads];
  return {
    readPowerState: vi.fn(async () => {
      const next = queue.shift();
      if (next instanceof Error) throw next;
      return next ?? null;
    }),
    setPower: vi.fn<(on: boolean) => Promise<void>>(async () => undefined),
    describe: vi.fn(async () => INFO),
    listDevices: vi.fn(async () => [INFO])
  };
}

function setup(reads: Array<boolean | null | Error>, policy: UnverifiedCommandPolicy = 'assume-success') {
  const driver = createFakeDriver(reads);
  const logger = createRecordingLogger();
  const sleep = vi.fn(async (_ms: number) => undefined);
  const plug = createPlugController({ driver, logger }, { settleDelayMs: 3000, unverifiedPolicy: policy, sleep });
  return { driver, logger, sleep, plug };
}

describe('createPlugController', () => {
  describe('getStatus', () => {
    it('should map driver reads to plug states', async () => {
      const { plug } = setup([true, false, null]);

      expect(await plug.getStatus()).toBe('ON');
      expect(await plug.getStatus()).toBe('OFF');
      expect(await plug.getStatus()).toBe('UNKNOWN');
    });

    it('should propagate driver errors', async () => {
      const { plug } = setup([new PlugTimeoutError(10000)]);

      await expect(plug.getStatus()).rejects.toBeInstanceOf(PlugTimeoutError);
    });
  });

  describe('turnOn / turnOff', () => {
    it('should send the command, wait the settle delay and verify', async () => {
      const { plug, driver, sleep, logger } = setup([false, true]);

      expect(await plug.turnOn()).toBe(true);

      expect(driver.setPower).toHaveBeenCalledWith(true);
      expect(sleep).toHaveBeenCalledWith(3000, undefined);
      expect(logger.at(0)).toEqual(['Current charger state: OFF', 'Verified charger is ON']);
    });

    it('should verify turning OFF', async () => {
      const { plug, driver } = setup([true, false]);

      expect(await plug.turnOff()).toBe(true);
      expect(driver.setPower).toHaveBeenCalledWith(false);
    });

    it('should fail when the plug still reports the old state', async () => {
      const { plug, logger } = setup([false, false]);

      expect(await plug.turnOn()).toBe(false);
      expect(logger.at(2)).toEqual(['Charger still reports OFF after turn ON, check the device']);
    });

    it('should resolve false when the driver rejects the command', async () => {
      const { plug, driver, sleep, logger } = setup([false]);
      driver.setPower.mockRejectedValueOnce(new PlugApiError(-1, 'device offline'));

      expect(await plug.turnOn()).toBe(false);
      expect(sleep).not.toHaveBeenCalled();
      expect(logger.at(2)).toEqual(['Turn ON command failed: API error -1: device offline']);
    });

    it('should proceed when the pre-command state is unknown', async () => {
      const { plug, driver, logger } = setup([null, true]);

      expect(await plug.turnOn()).toBe(true);
      expect(driver.setPower).toHaveBeenCalledWith(true);
      expect(logger.at(2)).toEqual(['Could not determine current charger state, sending command anyway']);
    });

    it('should proceed when the pre-command read throws', async () => {
      const { plug, logger } = setup([new Error('socket hang up'), true]);

      expect(await plug.turnOn()).toBe(true);
      expect(logger.at(2)).toEqual(['Could not read charger state (socket hang up), sending command anyway']);
    });

    it('should fail when the device disappears before verification', async () => {
      const { plug, logger } = setup([true, new PlugNotFoundError("Device 'Desk' not found")]);

      expect(await plug.turnOff()).toBe(false);
      expect(logger.at(2)).toEqual(["Could not verify charger state: Device 'Desk' not found"]);
    });
  });

  describe('unverifiable commands', () => {
    it('should assume success by default', async () => {
      const { plug, logger } = setup([false, null]);

      expect(await plug.turnOn()).toBe(true);
      expect(logger.at(1)).toEqual(['Command sent but charger state could not be verified, assuming ON']);
    });

    it('should treat a throwing verification read as unverifiable', async () => {
      const { plug, logger } = setup([true, new PlugTimeoutError(10000)]);

      expect(await plug.turnOff()).toBe(true);
      expect(logger.at(0)).toContain('Verification read failed: Request timeout after 10000ms');
    });

    it('should warn under the warn policy', async () => {
      const { plug, logger } = setup([false, null], 'warn');

      expect(await plug.turnOn()).toBe(true);
      expect(logger.at(2)).toEqual(['Command sent but charger state could not be verified, check that the device is ON']);
    });

    it('should fail under the fail policy', async () => {
      const { plug } = setup([true, null], 'fail');

      expect(await plug.turnOff()).toBe(false);
    });
  });

  describe('cancellation', () => {
    it('should not send the command when aborted during the pre-command read', async () => {
      const abort = new AbortController();
      const { plug, driver, sleep, logger } = setup([]);
      driver.readPowerState = vi.fn(async () => {
        abort.abort();
        return false;
      });

      expect(await plug.turnOn(abort.signal)).toBe(false);
      expect(driver.setPower).not.toHaveBeenCalled();
      expect(sleep).not.toHaveBeenCalled();
      expect(logger.at(1)).toEqual(['Turn ON cancelled']);
    });

    it('should cut the settle delay short and skip the verification read', async () => {
      const abort = new AbortController();
      const { plug, driver, sleep, logger } = setup([true, false]);
      sleep.mockImplementationOnce(async () => {
        abort.abort();
        return undefined;
      });

      expect(await plug.turnOff(abort.signal)).toBe(true);
      expect(driver.setPower).toHaveBeenCalledWith(false);
      expect(sleep).toHaveBeenCalledWith(3000, abort.signal);
      expect(driver.readPowerState).toHaveBeenCalledTimes(1);
      expect(logger.at(1)).toEqual(['Command sent but charger state could not be verified, assuming OFF']);
    });

    it('should apply the fail policy to a command cut short', async () => {
      const abort = new AbortController();
      const { plug, sleep } = setup([false], 'fail');
      sleep.mockImplementationOnce(async () => {
        abort.abort();
        return undefined;
      });

      expect(await plug.turnOn(abort.signal)).toBe(false);
    });
  });

  describe('device info', () => {
    it('should pass through describe and listDevices', async () => {
      const { plug } = setup([]);

      expect(await plug.getDeviceInfo()).toEqual(INFO);
      expect(await plug.listDevices()).toEqual([INFO]);
    });
  });
});
