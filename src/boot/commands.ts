/**
 * CLI commands
 * One function per user action; each resolves false when the action failed
 */

import chalk from 'chalk';

import { fmtPercent } from '@logging';
import type { PlugDeviceInfo } from '@hardware/plug';
import { formatPowerSource, runLoop } from '@system/control';
import { errorMessage } from '$types/errors';
import type { BatterySample } from '$types/common';

import type { AppRuntime, CommandOutput } from './types';

const NO_BATTERY_LINES = [
  'Unable to access battery information.',
  'This program requires a laptop with battery monitoring capabilities.'
];

function orUnknown(value: string | null): string {
  return value ?? 'n/a';
}

/**
 * Printable lines for one device
 */
export function formatDeviceInfo(info: PlugDeviceInfo): string[] {
  const lines = [
    'Alias:            ' + info.alias,
    'Model:            ' + orUnknown(info.model),
    'Device ID:        ' + orUnknown(info.deviceId),
    'Hardware version: ' + orUnknown(info.hardwareVersion),
    'Firmware version: ' + orUnknown(info.firmwareVersion),
    'State:            ' + info.state
  ];
  if (info.error !== null) {
    lines.push('Error:            ' + info.error);
  }
  return lines;
}

/**
 * One-line summary used by the device list
 */
export function formatDeviceSummary(info: PlugDeviceInfo): string {
  const model = info.model === null ? '' : ' (' + info.model + ')';
  return info.alias + model + ' [' + info.state + ']';
}

function reportError(out: CommandOutput, err: unknown): false {
  out.error(chalk.red('Error: ') + errorMessage(err));
  return false;
}

/**
 * Read the battery, printing why when it cannot be used
 */
async function readBatteryOrExplain(runtime: AppRuntime, out: CommandOutput): Promise<BatterySample> {
  const reading = await runtime.battery.read();
  if (reading === null) {
    for (const line of NO_BATTERY_LINES) {
      out.error(chalk.red(line));
    }
  }
  return reading;
}

export async function showDeviceInfo(runtime: AppRuntime, out: CommandOutput): Promise<boolean> {
  try {
    const info = await runtime.plug.getDeviceInfo();
    out.log(chalk.cyan.bold('Device Information:'));
    for (const line of formatDeviceInfo(info)) {
      out.log('  ' + line);
    }
    return info.error === null;
  } catch (err) {
    return reportError(out, err);
  }
}

export async function listDevices(runtime: AppRuntime, out: CommandOutput): Promise<boolean> {
  try {
    const devices = await runtime.plug.listDevices();
    out.log(chalk.cyan.bold('Found ' + devices.length + ' device(s):'));
    for (const device of devices) {
      out.log('  - ' + formatDeviceSummary(device));
    }
    return true;
  } catch (err) {
    return reportError(out, err);
  }
}

export async function showBatteryStatus(runtime: AppRuntime, out: CommandOutput): Promise<boolean> {
  try {
    const reading = await readBatteryOrExplain(runtime, out);
    if (reading === null) {
      return false;
    }
    out.log(chalk.cyan.bold('Battery Status:'));
    out.log('  Battery level: ' + fmtPercent(reading.percent));
    out.log('  Power status:  ' + formatPowerSource(reading.pluggedIn));
    return true;
  } catch (err) {
    return reportError(out, err);
  }
}

/**
 * Switch the charger plug by hand
 */
export async function controlDevice(runtime: AppRuntime, out: CommandOutput, on: boolean): Promise<boolean> {
  const label = on ? 'ON' : 'OFF';
  try {
    const ok = on ? await runtime.plug.turnOn() : await runtime.plug.turnOff();
    if (ok) {
      out.log(chalk.green('✓ Charger turned ' + label));
    } else {
      out.error(chalk.red('✗ Failed to turn charger ' + label));
    }
    return ok;
  } catch (err) {
    return reportError(out, err);
  }
}

/**
 * Run the control loop until `signal` aborts
 * Refuses to start when no battery is readable
 */
export async function startMonitoring(runtime: AppRuntime, out: CommandOutput, signal: AbortSignal): Promise<boolean> {
  try {
    const reading = await readBatteryOrExplain(runtime, out);
    if (reading === null) {
      return false;
    }
    out.log(chalk.gray('Monitoring... (Press Ctrl+C to stop)'));
    await runLoop(runtime.controller, { signal: signal });
    return true;
  } catch (err) {
    return reportError(out, err);
  }
}
