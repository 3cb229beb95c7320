/**
 * CLI entry point
 *
 * Usage: tsx src/boot/main.ts [command]
 * Without a command the interactive menu is shown.
 */

import * as readline from 'node:readline/promises';

import chalk from 'chalk';
import { Command } from 'commander';

import { errorMessage } from '$types/errors';

import {
  controlDevice,
  listDevices,
  showBatteryStatus,
  showDeviceInfo,
  startMonitoring
} from './commands';
import { loadEnvFile } from './config';
import { startApp } from './init';
import { runMenu } from './menu';
import type { AppRuntime, CommandOutput } from './types';

type Task = (runtime: AppRuntime, out: CommandOutput, signal: AbortSignal) => Promise<boolean>;

const out: CommandOutput = console;

const program = new Command();

program
  .name('charge-keeper')
  .description('Keep a laptop battery between two charge thresholds by switching a smart plug')
  .option('-e, --env-file <path>', 'Read settings from this .env file instead of ./.env');

/**
 * Abort controller tied to SIGINT and SIGTERM for the lifetime of `task`
 */
async function withShutdownSignal<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const abort = new AbortController();
  function stop(): void {
    out.log(chalk.gray('\nStopping...'));
    abort.abort();
  }

  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
  try {
    return await task(abort.signal);
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
  }
}

/**
 * Boot the runtime and run one task, setting the exit code from its result
 */
async function run(task: Task): Promise<void> {
  const envFile: string | undefined = program.opts<{ envFile?: string }>().envFile;
  loadEnvFile(envFile);

  const runtime = await startApp(process.env, out);
  if (runtime === null) {
    process.exitCode = 1;
    return;
  }

  const ok = await withShutdownSignal(function(signal) {
    return task(runtime, out, signal);
  });
  if (!ok) {
    process.exitCode = 1;
  }
}

async function interactive(runtime: AppRuntime, output: CommandOutput, signal: AbortSignal): Promise<boolean> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const menuAbort = new AbortController();
  const menuSignal = menuAbort.signal;
  signal.addEventListener('abort', function() { menuAbort.abort(); }, { once: true });

  // readline consumes Ctrl+C while a prompt is open
  rl.on('SIGINT', function() { menuAbort.abort(); });

  try {
    await runMenu({
      deviceInfo: function() { return showDeviceInfo(runtime, output); },
      batteryStatus: function() { return showBatteryStatus(runtime, output); },
      turnOn: function() { return controlDevice(runtime, output, true); },
      turnOff: function() { return controlDevice(runtime, output, false); },
      monitor: function() { return startMonitoring(runtime, output, menuSignal); }
    }, function(question) {
      return rl.question(question, { signal: menuSignal });
    }, output, menuSignal);
    return true;
  } finally {
    rl.close();
  }
}

program
  .command('device-info')
  .description('Show plug device information')
  .action(function() { return run(showDeviceInfo); });

program
  .command('devices')
  .description('List plugs reachable with the configured backend')
  .action(function() { return run(listDevices); });

program
  .command('battery-status')
  .description('Show laptop battery status')
  .action(function() { return run(showBatteryStatus); });

program
  .command('on')
  .description('Turn the charger plug ON')
  .action(function() {
    return run(function(runtime, output) { return controlDevice(runtime, output, true); });
  });

program
  .command('off')
  .description('Turn the charger plug OFF')
  .action(function() {
    return run(function(runtime, output) { return controlDevice(runtime, output, false); });
  });

program
  .command('monitor')
  .alias('loop')
  .description('Start the battery monitoring loop')
  .action(function() { return run(startMonitoring); });

program.action(function() { return run(interactive); });

program.parseAsync(process.argv).catch(function(err: unknown) {
  out.error(chalk.red('Fatal error: ') + errorMessage(err));
  process.exitCode = 1;
});
