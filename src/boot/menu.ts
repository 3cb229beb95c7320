/**
 * Interactive menu
 * Shown when the CLI is started without a command
 */

import chalk from 'chalk';

import { errorMessage } from '$types/errors';

import type { CommandOutput, PromptFn } from './types';

/**
 * Actions the menu can run
 */
export interface MenuActions {
  deviceInfo(): Promise<unknown>;
  batteryStatus(): Promise<unknown>;
  turnOn(): Promise<unknown>;
  turnOff(): Promise<unknown>;
  monitor(): Promise<unknown>;
}

export const MENU_PROMPT = 'Enter your choice (1-6): ';

export const MENU_LINES = [
  'Options:',
  '  1. Show device info',
  '  2. Show battery status',
  '  3. Turn charger ON',
  '  4. Turn charger OFF',
  '  5. Start battery monitoring loop',
  '  6. Exit'
];

function printMenu(out: CommandOutput): void {
  out.log('');
  out.log(chalk.cyan('═'.repeat(60)));
  out.log(chalk.cyan.bold('Charge Keeper: plug control & battery monitoring'));
  out.log(chalk.cyan('═'.repeat(60)));
  for (const line of MENU_LINES) {
    out.log(line);
  }
}

/**
 * Run the menu until the user exits, monitoring ends or `signal` aborts
 *
 * @param actions - Menu entries 1-5
 * @param ask - Reads one answer; rejects when input is closed
 * @param out - User-facing output
 * @param signal - Aborts the menu at the next prompt
 */
export async function runMenu(
  actions: MenuActions,
  ask: PromptFn,
  out: CommandOutput,
  signal: AbortSignal
): Promise<void> {
  while (!signal.aborted) {
    printMenu(out);

    let choice: string;
    try {
      choice = (await ask(MENU_PROMPT)).trim();
    } catch (_err) {
      out.log('Exiting...');
      return;
    }

    try {
      switch (choice) {
        case '1':
          await actions.deviceInfo();
          break;
        case '2':
          await actions.batteryStatus();
          break;
        case '3':
          await actions.turnOn();
          break;
        case '4':
          await actions.turnOff();
          break;
        case '5':
          await actions.monitor();
          return;
        case '6':
          out.log('Exiting...');
          return;
        default:
          out.log(chalk.yellow('Invalid choice. Please enter a number between 1-6.'));
      }
    } catch (err) {
      out.error(chalk.red('Error: ') + errorMessage(err));
    }
  }
}
