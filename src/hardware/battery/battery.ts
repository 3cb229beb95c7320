/**
 * System battery sensor
 * Reads charge level and AC state from the host OS
 */

import { execFile } from 'node:child_process';
import { readdir, readFile } from 'node:fs/promises';
import { promisify } from 'node:util';

import type { BatterySample } from '$types/common';
import { BatterySensorError, errorMessage } from '$types/errors';

import {
  isBatterySupply,
  isMainsSupply,
  isMissingFile,
  parsePmsetOutput,
  parseSysfsCapacity,
  parseSysfsStatus,
  parseWin32BatteryOutput,
  toBatteryPlatform
} from './helpers';
import type { BatteryPlatform, BatteryReaderDeps, BatterySensor } from './types';

export const POWER_SUPPLY_ROOT = '/sys/class/power_supply';
export const BATTERY_COMMAND_TIMEOUT_MS = 5000;

const WIN32_BATTERY_QUERY =
  'Get-CimInstance -ClassName Win32_Battery | ' +
  'Select-Object -First 1 EstimatedChargeRemaining,BatteryStatus | ' +
  'ConvertTo-Json -Compress';

const execFileAsync = promisify(execFile);

/**
 * OS access backed by node:child_process and node:fs
 */
export function createNodeReaderDeps(): BatteryReaderDeps {
  return {
    execFile: async function(file, args, timeoutMs) {
      const { stdout } = await execFileAsync(file, [...args], { timeout: timeoutMs, windowsHide: true });
      return stdout;
    },
    readFile: function(path) {
      return readFile(path, 'utf-8');
    },
    readdir: function(path) {
      return readdir(path);
    }
  };
}

async function readOptional(deps: BatteryReaderDeps, path: string): Promise<string | null> {
  try {
    return await deps.readFile(path);
  } catch (err) {
    if (isMissingFile(err)) {
      return null;
    }
    throw err;
  }
}

async function readLinux(deps: BatteryReaderDeps): Promise<BatterySample> {
  let entries: string[];
  try {
    entries = await deps.readdir(POWER_SUPPLY_ROOT);
  } catch (err) {
    if (isMissingFile(err)) {
      return null;
    }
    throw err;
  }

  const sorted = [...entries].sort();
  const battery = sorted.find(isBatterySupply);
  if (battery === undefined) {
    return null;
  }

  const capacityPath = POWER_SUPPLY_ROOT + '/' + battery + '/capacity';
  const capacity = await readOptional(deps, capacityPath);
  if (capacity === null) {
    return null;
  }
  const percent = parseSysfsCapacity(capacity, capacityPath);

  const mains = sorted.find(isMainsSupply);
  if (mains !== undefined) {
    const online = await readOptional(deps, POWER_SUPPLY_ROOT + '/' + mains + '/online');
    if (online !== null && (online.trim() === '1' || online.trim() === '0')) {
      return { percent: percent, pluggedIn: online.trim() === '1' };
    }
  }

  const status = await readOptional(deps, POWER_SUPPLY_ROOT + '/' + battery + '/status');
  return { percent: percent, pluggedIn: parseSysfsStatus(status) };
}

async function readDarwin(deps: BatteryReaderDeps): Promise<BatterySample> {
  const stdout = await deps.execFile('pmset', ['-g', 'batt'], BATTERY_COMMAND_TIMEOUT_MS);
  return parsePmsetOutput(stdout);
}

async function readWindows(deps: BatteryReaderDeps): Promise<BatterySample> {
  const stdout = await deps.execFile(
    'powershell',
    ['-NoProfile', '-NonInteractive', '-Command', WIN32_BATTERY_QUERY],
    BATTERY_COMMAND_TIMEOUT_MS
  );
  return parseWin32BatteryOutput(stdout);
}

/**
 * Create a battery sensor for the given platform
 *
 * Unsupported platforms always read null. Failures other than a missing
 * battery are raised as BatterySensorError.
 *
 * @param platform - Node platform name, usually `process.platform`
 * @param deps - OS access, defaults to the real filesystem and child processes
 */
export function createSystemBatterySensor(
  platform: string,
  deps: BatteryReaderDeps = createNodeReaderDeps()
): BatterySensor {
  const target: BatteryPlatform = toBatteryPlatform(platform);

  async function readForPlatform(): Promise<BatterySample> {
    switch (target) {
      case 'linux':
        return readLinux(deps);
      case 'darwin':
        return readDarwin(deps);
      case 'win32':
        return readWindows(deps);
      case 'other':
        return null;
    }
  }

  return {
    read: async function() {
      try {
        return await readForPlatform();
      } catch (err) {
        if (err instanceof BatterySensorError) {
          throw err;
        }
        throw new BatterySensorError('Battery read failed on ' + target + ': ' + errorMessage(err));
      }
    }
  };
}
