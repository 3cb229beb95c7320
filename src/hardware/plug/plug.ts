/**
 * Verified plug control
 * Wraps a vendor driver with pre-read, settle delay and post-verification
 */

import { PlugNotFoundError, errorMessage } from '$types/errors';

import { resolveUnverified, toPlugState } from './helpers';
import type {
  PlugController,
  PlugControllerDependencies,
  PlugControllerOptions,
  PlugDriver
} from './types';

/**
 * Create a plug controller
 *
 * A command counts as successful when the driver accepted it and the state
 * read back after `settleDelayMs` matches. When the state cannot be read back,
 * `unverifiedPolicy` decides. Rejected commands resolve false; they do not throw.
 * An aborted `signal` stops the command before it is sent, or cuts the settle
 * delay short and skips the verification read.
 *
 * @param deps - Driver and logger
 * @param options - Settle delay, unverified-command policy and sleep function
 */
export function createPlugController(
  deps: PlugControllerDependencies,
  options: PlugControllerOptions
): PlugController {
  const driver: PlugDriver = deps.driver;
  const logger = deps.logger;

  async function readBefore(): Promise<void> {
    try {
      const before = await driver.readPowerState();
      if (before === null) {
        logger.warning('Could not determine current charger state, sending command anyway');
      } else {
        logger.debug('Current charger state: ' + toPlugState(before));
      }
    } catch (err) {
      logger.warning('Could not read charger state (' + errorMessage(err) + '), sending command anyway');
    }
  }

  async function readAfter(): Promise<boolean | null> {
    try {
      return await driver.readPowerState();
    } catch (err) {
      if (err instanceof PlugNotFoundError) {
        throw err;
      }
      logger.debug('Verification read failed: ' + errorMessage(err));
      return null;
    }
  }

  async function switchTo(on: boolean, signal?: AbortSignal): Promise<boolean> {
    const label = on ? 'ON' : 'OFF';

    await readBefore();
    if (signal?.aborted) {
      logger.info('Turn ' + label + ' cancelled');
      return false;
    }

    try {
      await driver.setPower(on);
    } catch (err) {
      logger.warning('Turn ' + label + ' command failed: ' + errorMessage(err));
      return false;
    }

    await options.sleep(options.settleDelayMs, signal);
    if (signal?.aborted) {
      const outcome = resolveUnverified(options.unverifiedPolicy, label);
      logger.log(outcome.level, outcome.message);
      return outcome.success;
    }

    let after: boolean | null;
    try {
      after = await readAfter();
    } catch (err) {
      logger.warning('Could not verify charger state: ' + errorMessage(err));
      return false;
    }

    if (after === on) {
      logger.debug('Verified charger is ' + label);
      return true;
    }

    if (after === null) {
      const outcome = resolveUnverified(options.unverifiedPolicy, label);
      logger.log(outcome.level, outcome.message);
      return outcome.success;
    }

    logger.warning('Charger still reports ' + toPlugState(after) + ' after turn ' + label + ', check the device');
    return false;
  }

  return {
    getStatus: async function() {
      return toPlugState(await driver.readPowerState());
    },
    turnOn: function(signal) {
      return switchTo(true, signal);
    },
    turnOff: function(signal) {
      return switchTo(false, signal);
    },
    getDeviceInfo: function() {
      return driver.describe();
    },
    listDevices: function() {
      return driver.listDevices();
    }
  };
}
