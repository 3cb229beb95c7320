/**
 * Control loop implementation
 * Hysteresis charge controller: read battery, observe plug, decide, act
 */

import {
  decide,
  toChargePolicyConfig,
  validateChargePolicyConfig,
  validatePercent
} from '@core/charge-policy';
import { plugIsOn } from '@hardware/plug';
import { createLoopMemo, memoEntryFor, recordEntry, shouldAnnounce } from '@system/state';
import type { LoopMemo } from '@system/state';

import { formatDecision, formatLoopError, formatStatusLine } from './helpers';
import type { Controller, RunLoopOptions } from './types';

/**
 * Run one control iteration
 *
 * Errors thrown by the battery sensor or the plug propagate to the caller.
 * Once `signal` is aborted no plug command is sent.
 *
 * @param controller - Wired collaborators and settings
 * @param memo - Loop memo, updated in place
 * @param signal - Optional abort signal checked after every suspension
 */
export async function runIteration(controller: Controller, memo: LoopMemo, signal?: AbortSignal): Promise<void> {
  const { logger, battery, plug } = controller;
  const policy = toChargePolicyConfig(controller.config);

  const reading = await battery.read();
  if (signal?.aborted) return;

  if (reading === null) {
    logger.warning('Unable to get battery information');
    return;
  }
  validatePercent(reading.percent, 'Battery reading');

  const plugState = await plug.getStatus();
  if (signal?.aborted) return;

  logger.info(formatStatusLine(reading, plugState));

  const on = plugIsOn(plugState);
  const action = decide(reading.percent, on, policy);
  const entry = memoEntryFor(action, on);
  const message = formatDecision(action, reading.percent, policy, plugState);

  if (action.kind === 'NO_OP') {
    if (shouldAnnounce(memo, entry)) {
      logger.info(message);
    }
    recordEntry(memo, entry);
    return;
  }

  logger.info(message);
  const label = action.kind === 'TURN_ON' ? 'ON' : 'OFF';
  const ok = action.kind === 'TURN_ON' ? await plug.turnOn(signal) : await plug.turnOff(signal);
  if (!ok && signal?.aborted) return;

  if (ok) {
    logger.info('Charger turned ' + label);
    recordEntry(memo, entry);
  } else {
    logger.warning('Failed to turn charger ' + label);
  }
}

/**
 * Run the control loop until `signal` aborts
 *
 * Each iteration is followed by a sleep of POLL_INTERVAL_SEC. A thrown
 * error is logged at CRITICAL and the loop carries on after the sleep.
 *
 * @throws {ChargePolicyValidationError} If the thresholds are invalid
 */
export async function runLoop(controller: Controller, options: RunLoopOptions): Promise<void> {
  const { config, logger } = controller;
  const signal = options.signal;
  const intervalSec = config.POLL_INTERVAL_SEC;

  validateChargePolicyConfig(toChargePolicyConfig(config));

  logger.info(
    'Starting battery monitoring loop (start charging at ' + config.START_THRESHOLD_PCT +
    '%, stop at ' + config.STOP_THRESHOLD_PCT + '%, check every ' + intervalSec + 's)'
  );

  const memo = createLoopMemo();

  while (!signal.aborted) {
    try {
      await runIteration(controller, memo, signal);
    } catch (err) {
      logger.critical(formatLoopError(err));
      logger.info('Retrying in ' + intervalSec + ' seconds...');
    }

    if (signal.aborted) break;
    await controller.sleep(intervalSec * 1000, signal);
  }

  logger.info('Stopping battery monitoring loop');
}
