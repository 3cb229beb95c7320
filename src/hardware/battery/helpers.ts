/**
 * Battery readout parsers
 * Turn raw platform output into a BatterySample
 */

import { clampPercent } from '@utils/number';
import { isRecord, parseJson, readNumber } from '@utils/json';
import type { BatterySample } from '$types/common';
import { BatterySensorError } from '$types/errors';

import type { BatteryPlatform } from './types';

/** Win32_Battery.BatteryStatus codes that mean the laptop is on AC */
const WIN32_AC_STATUSES: readonly number[] = [2, 3, 6, 7, 8, 9, 11];

/**
 * Map a Node platform name to a supported reader
 */
export function toBatteryPlatform(platform: string): BatteryPlatform {
  if (platform === 'linux' || platform === 'darwin' || platform === 'win32') {
    return platform;
  }
  return 'other';
}

/**
 * Parse `pmset -g batt` output
 *
 * Example:
 *   Now drawing from 'AC Power'
 *    -InternalBattery-0 (id=4653155)	72%; charging; 0:54 remaining present: true
 */
export function parsePmsetOutput(stdout: string): BatterySample {
  const line = stdout.split('\n').find(function(l) { return l.includes('InternalBattery'); });
  if (line === undefined) {
    return null;
  }

  const match = /(\d+(?:\.\d+)?)%/.exec(line);
  if (match === null) {
    throw new BatterySensorError('No charge level in pmset output: ' + line.trim());
  }

  let pluggedIn: boolean | null = null;
  if (stdout.includes("'AC Power'")) {
    pluggedIn = true;
  } else if (stdout.includes("'Battery Power'")) {
    pluggedIn = false;
  }

  return { percent: clampPercent(Number(match[1])), pluggedIn: pluggedIn };
}

/**
 * Parse the compressed JSON written by the Win32_Battery PowerShell query
 * Empty output means the machine has no battery
 */
export function parseWin32BatteryOutput(stdout: string): BatterySample {
  const text = stdout.trim();
  if (text === '') {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = parseJson(text);
  } catch (err) {
    throw new BatterySensorError('Unreadable Win32_Battery output: ' + String(err));
  }

  // Several batteries serialize as an array; the first one is reported
  const entry: unknown = Array.isArray(parsed) ? parsed[0] : parsed;
  if (!isRecord(entry)) {
    return null;
  }

  const percent = readNumber(entry, 'EstimatedChargeRemaining');
  if (percent === null) {
    throw new BatterySensorError('Win32_Battery reported no EstimatedChargeRemaining');
  }

  const status = readNumber(entry, 'BatteryStatus');
  return {
    percent: clampPercent(percent),
    pluggedIn: status === null ? null : WIN32_AC_STATUSES.includes(status)
  };
}

/**
 * Interpret a sysfs battery `status` file
 * "Discharging" means on battery; Charging, Full and Not charging mean on AC
 */
export function parseSysfsStatus(status: string | null): boolean | null {
  if (status === null) {
    return null;
  }
  const value = status.trim().toLowerCase();
  if (value === 'discharging') return false;
  if (value === 'charging' || value === 'full' || value === 'not charging') return true;
  return null;
}

/**
 * Parse a sysfs `capacity` file
 */
export function parseSysfsCapacity(text: string, path: string): number {
  const value = Number(text.trim());
  if (text.trim() === '' || !Number.isFinite(value)) {
    throw new BatterySensorError('Unreadable battery capacity in ' + path + ': ' + text.trim());
  }
  return clampPercent(value);
}

export function isBatterySupply(name: string): boolean {
  return name.startsWith('BAT');
}

export function isMainsSupply(name: string): boolean {
  return name === 'Mains' || name.startsWith('ADP') || name.startsWith('AC');
}

/**
 * Check for a "file or directory missing" error from fs
 */
export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
