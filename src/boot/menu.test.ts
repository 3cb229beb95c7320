/**
 * Tests for the interactive menu
 */

import chalk from 'chalk';
import type { Mock } from 'vitest';

import { MENU_PROMPT, runMenu } from './menu';
import type { MenuActions } from './menu';
import type { CommandOutput, PromptFn } from './types';

type ActionMock = Mock<() => Promise<unknown>>;

interface FakeActions extends MenuActions {
  deviceInfo: ActionMock;
  batteryStatus: ActionMock;
  turnOn: ActionMock;
  turnOff: ActionMock;
  monitor: ActionMock;
}

function createActions(): FakeActions {
  return {
    deviceInfo: vi.fn(async (): Promise<unknown> => true),
    batteryStatus: vi.fn(async (): Promise<unknown> => true),
    turnOn: vi.fn(async (): Promise<unknown> => true),
    turnOff: vi.fn(async (): Promise<unknown> => true),
    monitor: vi.fn(async (): Promise<unknown> => true)
  };
}

/**
 * Prompt that replays answers, then reports closed input
 */
function scripted(answers: string[]): Mock<PromptFn> {
  const queue = [...answers];
  return vi.fn<PromptFn>(async () => {
    const next = queue.shift();
    if (next === undefined) throw new Error('input closed');
    return next;
  });
}

function createOutput(): CommandOutput & { log: Mock<(message: string) => void>; error: Mock<(message: string) => void> } {
  return { log: vi.fn<(message: string) => void>(), error: vi.fn<(message: string) => void>() };
}

describe('runMenu', () => {
  beforeEach(() => {
    chalk.level = 0;
  });

  it('should dispatch each option to its action', async () => {
    const actions = createActions();
    const ask = scripted(['1', '2', '3', '4', '6']);

    await runMenu(actions, ask, createOutput(), new AbortController().signal);

    expect(actions.deviceInfo).toHaveBeenCalledTimes(1);
    expect(actions.batteryStatus).toHaveBeenCalledTimes(1);
    expect(actions.turnOn).toHaveBeenCalledTimes(1);
    expect(actions.turnOff).toHaveBeenCalledTimes(1);
    expect(actions.monitor).not.toHaveBeenCalled();
    expect(ask).toHaveBeenCalledTimes(5);
    expect(ask).toHaveBeenCalledWith(MENU_PROMPT);
  });

  it('should exit after monitoring ends', async () => {
    const actions = createActions();
    const ask = scripted(['5', '1']);

    await runMenu(actions, ask, createOutput(), new AbortController().signal);

    expect(actions.monitor).toHaveBeenCalledTimes(1);
    expect(actions.deviceInfo).not.toHaveBeenCalled();
    expect(ask).toHaveBeenCalledTimes(1);
  });

  it('should re-prompt on invalid input', async () => {
    const out = createOutput();
    const ask = scripted(['7', ' 6 ']);

    await runMenu(createActions(), ask, out, new AbortController().signal);

    expect(ask).toHaveBeenCalledTimes(2);
    expect(out.log).toHaveBeenCalledWith('Invalid choice. Please enter a number between 1-6.');
    expect(out.log).toHaveBeenLastCalledWith('Exiting...');
  });

  it('should exit when input closes', async () => {
    const out = createOutput();

    await runMenu(createActions(), scripted([]), out, new AbortController().signal);

    expect(out.log).toHaveBeenLastCalledWith('Exiting...');
  });

  it('should keep going after an action throws', async () => {
    const actions = createActions();
    actions.deviceInfo.mockRejectedValueOnce(new Error('boom'));
    const out = createOutput();

    await runMenu(actions, scripted(['1', '2', '6']), out, new AbortController().signal);

    expect(out.error).toHaveBeenCalledWith('Error: boom');
    expect(actions.batteryStatus).toHaveBeenCalledTimes(1);
  });

  it('should not prompt once aborted', async () => {
    const abort = new AbortController();
    abort.abort();
    const ask = scripted(['1']);

    await runMenu(createActions(), ask, createOutput(), abort.signal);

    expect(ask).not.toHaveBeenCalled();
  });
});
