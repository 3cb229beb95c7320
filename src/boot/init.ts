/**
 * Application initialization
 * Wires logger, battery sensor, plug driver and controller from the configuration
 */

import { randomUUID } from 'node:crypto';

import chalk from 'chalk';

import { createSystemBatterySensor, toBatteryPlatform } from '@hardware/battery';
import {
  ShellyRPCClient,
  TPLinkCloudClient,
  createPlugController,
  createShellyDriver,
  createTPLinkCloudDriver
} from '@hardware/plug';
import type { PlugDriver } from '@hardware/plug';
import { createConsoleSink, createLogger, createSlackSink } from '@logging';
import type { FetchFn, Logger, SinkWithLevel } from '@logging';
import type { ValidationWarning } from '@validation';
import type { ChargeConfig } from '$types/config';
import { ConfigValidationError } from '$types/errors';
import { nowMs, sleep } from '@utils/time';

import { loadConfig } from './config';
import type { EnvSource, LoadedConfig } from './config';
import type { AppRuntime, CommandOutput, InitDependencies } from './types';

/**
 * Production collaborators
 */
export function defaultInitDependencies(): InitDependencies {
  return {
    fetchFn: fetch,
    consoleApi: console,
    platform: process.platform,
    sleep: sleep,
    timeSource: nowMs,
    terminalUUID: randomUUID,
    colors: process.stdout.isTTY === true
  };
}

/**
 * Logger with a console sink and, when a webhook is configured, a Slack sink
 */
export function createAppLogger(config: ChargeConfig, deps: InitDependencies): Logger {
  const sinks: SinkWithLevel[] = [
    { sink: createConsoleSink(deps.consoleApi, { colors: deps.colors }), minLevel: config.LOG_LEVELS.DEBUG }
  ];

  if (config.SLACK_WEBHOOK_URL !== '') {
    sinks.push({
      sink: createSlackSink(deps.fetchFn, {
        webhookUrl: config.SLACK_WEBHOOK_URL,
        bufferSize: config.SLACK_BUFFER_SIZE,
        retryDelayMs: config.SLACK_RETRY_DELAY_MS,
        maxRetries: config.SLACK_MAX_RETRIES
      }),
      minLevel: config.SLACK_LOG_LEVEL
    });
  }

  return createLogger({
    level: config.GLOBAL_LOG_LEVEL,
    demoteHours: config.GLOBAL_LOG_AUTO_DEMOTE_HOURS
  }, {
    timeSource: deps.timeSource,
    sinks: sinks
  }, config.LOG_LEVELS);
}

/**
 * Driver for the configured plug backend
 */
export function createPlugDriver(config: ChargeConfig, fetchFn: FetchFn, terminalUUID: () => string): PlugDriver {
  if (config.PLUG_BACKEND === 'shelly') {
    const auth = config.SHELLY_USER !== '' && config.SHELLY_PASSWORD !== ''
      ? { user: config.SHELLY_USER, password: config.SHELLY_PASSWORD }
      : undefined;
    const client = new ShellyRPCClient({
      address: config.PLUG_ADDRESS,
      timeoutMs: config.PLUG_TIMEOUT_MS,
      auth: auth,
      fetchFn: fetchFn
    });
    return createShellyDriver(client, config.SHELLY_SWITCH_ID);
  }

  const client = new TPLinkCloudClient({
    email: config.TPLINK_EMAIL,
    password: config.TPLINK_PASSWORD,
    timeoutMs: config.PLUG_TIMEOUT_MS,
    cloudUrl: config.TPLINK_CLOUD_URL,
    appType: config.TPLINK_APP_TYPE,
    terminalUUID: terminalUUID(),
    fetchFn: fetchFn
  });
  return createTPLinkCloudDriver(client, config.PLUG_ALIAS);
}

/**
 * Build the runtime from a validated configuration
 *
 * Sink initialization failures and configuration warnings are logged at
 * WARNING; neither stops startup.
 *
 * @param config - Frozen configuration from loadConfig()
 * @param warnings - Configuration warnings to report once the logger exists
 * @param deps - Process-level collaborators
 */
export async function initialize(
  config: ChargeConfig,
  warnings: ValidationWarning[],
  deps: InitDependencies = defaultInitDependencies()
): Promise<AppRuntime> {
  const logger = createAppLogger(config, deps);

  const messages = await logger.initialize();
  for (const msg of messages) {
    if (!msg.success) {
      logger.warning(msg.message);
    }
  }

  for (const warn of warnings) {
    logger.warning('Config [' + warn.field + ']: ' + warn.message);
  }

  const battery = createSystemBatterySensor(deps.platform, deps.readerDeps);

  const plug = createPlugController({
    driver: createPlugDriver(config, deps.fetchFn, deps.terminalUUID),
    logger: logger
  }, {
    settleDelayMs: config.SETTLE_DELAY_MS,
    unverifiedPolicy: config.UNVERIFIED_COMMAND_POLICY,
    sleep: deps.sleep
  });

  logger.debug('Plug backend: ' + config.PLUG_BACKEND + ', battery platform: ' + toBatteryPlatform(deps.platform));

  return {
    config: config,
    logger: logger,
    battery: battery,
    plug: plug,
    controller: {
      config: config,
      logger: logger,
      battery: battery,
      plug: plug,
      sleep: deps.sleep
    }
  };
}

/**
 * Load the configuration and build the runtime
 *
 * Configuration errors are printed one per line and resolve null; the
 * caller exits with status 1.
 *
 * @param env - Variable source, usually process.env after loadEnvFile()
 * @param out - Where configuration errors are printed
 * @param deps - Process-level collaborators
 */
export async function startApp(
  env: EnvSource,
  out: CommandOutput,
  deps: InitDependencies = defaultInitDependencies()
): Promise<AppRuntime | null> {
  let loaded: LoadedConfig;
  try {
    loaded = loadConfig(env);
  } catch (err) {
    if (!(err instanceof ConfigValidationError)) {
      throw err;
    }
    out.error(chalk.red('Configuration errors:'));
    for (const fieldError of err.fieldErrors) {
      out.error(chalk.red('  - ' + fieldError.field + ': ' + fieldError.message));
    }
    return null;
  }

  return initialize(loaded.config, loaded.warnings, deps);
}
