/**
 * Configuration
 * Defaults, constants and the environment loader
 */

import * as path from 'node:path';

import * as dotenv from 'dotenv';

import { parseLogLevel } from '@logging';
import type { LogLevel, LogLevels } from '@logging';
import { validateConfig } from '@validation';
import type { ValidationWarning } from '@validation';
import { ConfigValidationError } from '$types/errors';
import type { ConfigFieldError } from '$types/errors';
import type {
  ChargeAppConstants,
  ChargeConfig,
  ChargeUserConfig,
  PlugBackend,
  UnverifiedCommandPolicy
} from '$types';

// ─────────────────────────────────────────────────────────────
// USER CONFIGURATION
//   Defaults for every setting the environment can override.
// ─────────────────────────────────────────────────────────────

export const DEFAULT_USER_CONFIG: Readonly<ChargeUserConfig> = {
  // START_THRESHOLD_PCT / STOP_THRESHOLD_PCT
  //   Role: Charger goes ON at or below START, OFF at or above STOP.
  //   Critical: Integers 0-100, STOP > START.
  //   Recommended: START 20-50, STOP 60-90, at least 10 points apart.
  START_THRESHOLD_PCT: 40,
  STOP_THRESHOLD_PCT: 80,

  // POLL_INTERVAL_SEC
  //   Role: Sleep between control iterations.
  //   Critical: 1-86400 s.
  //   Recommended: 30-600 s; battery level moves slowly.
  POLL_INTERVAL_SEC: 60,

  // PLUG_BACKEND
  //   Role: Which plug API drives the charger.
  //   Critical: 'tplink-cloud' or 'shelly'.
  PLUG_BACKEND: 'tplink-cloud',

  // PLUG_ADDRESS
  //   Role: Host or IP of a local-network plug.
  //   Critical: Required for the shelly backend.
  PLUG_ADDRESS: '',

  // PLUG_ALIAS
  //   Role: Cloud device alias, matched case-insensitively.
  //   Recommended: Empty picks the first device on the account.
  PLUG_ALIAS: '',

  // TPLINK_EMAIL / TPLINK_PASSWORD
  //   Role: TP-Link cloud account, passed to the cloud as-is.
  //   Critical: Required for the tplink-cloud backend.
  TPLINK_EMAIL: '',
  TPLINK_PASSWORD: '',

  // SHELLY_SWITCH_ID
  //   Role: Switch channel on the Shelly device.
  //   Critical: Integer 0-255.
  SHELLY_SWITCH_ID: 0,

  // SHELLY_USER / SHELLY_PASSWORD
  //   Role: Optional basic auth for the Shelly RPC endpoint.
  SHELLY_USER: '',
  SHELLY_PASSWORD: '',

  // SETTLE_DELAY_MS
  //   Role: Wait between a plug command and reading the state back.
  //   Critical: 0-60000 ms.
  //   Recommended: 1000-10000 ms; the cloud reports new state with a lag.
  SETTLE_DELAY_MS: 3000,

  // PLUG_TIMEOUT_MS
  //   Role: Time budget of every plug HTTP request.
  //   Critical: 1000-120000 ms.
  PLUG_TIMEOUT_MS: 10000,

  // UNVERIFIED_COMMAND_POLICY
  //   Role: Outcome of a command whose effect cannot be read back.
  //   Critical: 'assume-success', 'warn' or 'fail'.
  UNVERIFIED_COMMAND_POLICY: 'assume-success',

  // SLACK_WEBHOOK_URL / SLACK_LOG_LEVEL
  //   Role: Optional Slack incoming webhook and the minimum level it receives.
  //   Critical: https URL when set.
  SLACK_WEBHOOK_URL: '',
  SLACK_LOG_LEVEL: 2,

  // GLOBAL_LOG_LEVEL
  //   Role: Master log verbosity (0=DEBUG..3=CRITICAL).
  GLOBAL_LOG_LEVEL: 1,

  // GLOBAL_LOG_AUTO_DEMOTE_HOURS
  //   Role: Hours of uptime after which INFO lines are dropped.
  //   Critical: 0-720 h, 0 disables.
  GLOBAL_LOG_AUTO_DEMOTE_HOURS: 0
};

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<ChargeAppConstants> = {
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3
  },

  // SLACK_*
  //   Role: Retry buffer of the Slack sink. Delay doubles per attempt, capped at 60 s.
  SLACK_BUFFER_SIZE: 10,
  SLACK_RETRY_DELAY_MS: 1000,
  SLACK_MAX_RETRIES: 5,

  // TPLINK_*
  //   Role: Cloud endpoint and the app type it expects at login.
  TPLINK_CLOUD_URL: 'https://wap.tplinkcloud.com',
  TPLINK_APP_TYPE: 'Kasa_Android'
};

// ─────────────────────────────────────────────────────────────
// ENVIRONMENT
// ─────────────────────────────────────────────────────────────

export type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Environment variable behind each user setting
 */
export const ENV_VARIABLES: Readonly<Record<keyof ChargeUserConfig, string>> = {
  START_THRESHOLD_PCT: 'BATTERY_START_THRESHOLD',
  STOP_THRESHOLD_PCT: 'BATTERY_STOP_THRESHOLD',
  POLL_INTERVAL_SEC: 'BATTERY_CHECK_INTERVAL',
  PLUG_BACKEND: 'PLUG_BACKEND',
  PLUG_ADDRESS: 'PLUG_ADDRESS',
  PLUG_ALIAS: 'PLUG_ALIAS',
  TPLINK_EMAIL: 'TP_LINK_EMAIL',
  TPLINK_PASSWORD: 'TP_LINK_PASSWORD',
  SHELLY_SWITCH_ID: 'SHELLY_SWITCH_ID',
  SHELLY_USER: 'SHELLY_USER',
  SHELLY_PASSWORD: 'SHELLY_PASSWORD',
  SETTLE_DELAY_MS: 'SETTLE_DELAY_MS',
  PLUG_TIMEOUT_MS: 'PLUG_TIMEOUT_MS',
  UNVERIFIED_COMMAND_POLICY: 'UNVERIFIED_COMMAND_POLICY',
  SLACK_WEBHOOK_URL: 'SLACK_WEBHOOK_URL',
  SLACK_LOG_LEVEL: 'SLACK_LOG_LEVEL',
  GLOBAL_LOG_LEVEL: 'LOG_LEVEL',
  GLOBAL_LOG_AUTO_DEMOTE_HOURS: 'LOG_AUTO_DEMOTE_HOURS'
};

/**
 * Load a .env file into process.env
 *
 * A missing file is not an error; settings may come from the real environment.
 * Values in the file take precedence over variables already set.
 *
 * @param envPath - Defaults to .env in the working directory
 * @returns Whether a file was read
 */
export function loadEnvFile(envPath: string = path.resolve(process.cwd(), '.env')): boolean {
  const result = dotenv.config({ path: envPath, override: true });
  return result.error === undefined;
}

/**
 * Configured value of a setting, trimmed; undefined when unset or blank
 */
function readRaw(env: EnvSource, key: keyof ChargeUserConfig): string | undefined {
  const value = env[ENV_VARIABLES[key]];
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

function readText(env: EnvSource, key: keyof ChargeUserConfig, fallback: string): string {
  return readRaw(env, key) ?? fallback;
}

/**
 * Numeric setting; unparseable text becomes NaN and is reported by validation
 */
function readNumeric(env: EnvSource, key: keyof ChargeUserConfig, fallback: number): number {
  const raw = readRaw(env, key);
  return raw === undefined ? fallback : Number(raw);
}

function readChoice<T extends string>(
  env: EnvSource,
  key: keyof ChargeUserConfig,
  choices: readonly T[],
  fallback: T,
  errors: ConfigFieldError[]
): T {
  const raw = readRaw(env, key);
  if (raw === undefined) return fallback;

  const match = choices.find(function(choice) { return choice === raw.toLowerCase(); });
  if (match === undefined) {
    errors.push({ field: ENV_VARIABLES[key], message: 'must be one of ' + choices.join(', ') + ' (got ' + raw + ')' });
    return fallback;
  }
  return match;
}

function readLevel(
  env: EnvSource,
  key: keyof ChargeUserConfig,
  fallback: LogLevel,
  logLevels: LogLevels,
  errors: ConfigFieldError[]
): LogLevel {
  const raw = readRaw(env, key);
  if (raw === undefined) return fallback;

  const level = parseLogLevel(raw, logLevels);
  if (level === null) {
    errors.push({ field: ENV_VARIABLES[key], message: 'must be DEBUG, INFO, WARNING or CRITICAL (got ' + raw + ')' });
    return fallback;
  }
  return level;
}

const PLUG_BACKENDS: readonly PlugBackend[] = ['tplink-cloud', 'shelly'];
const UNVERIFIED_POLICIES: readonly UnverifiedCommandPolicy[] = ['assume-success', 'warn', 'fail'];

/**
 * Build the user configuration from environment variables over the defaults
 *
 * @param env - Variable source
 * @param errors - Receives settings that could not be parsed at all
 */
export function readUserConfig(env: EnvSource, errors: ConfigFieldError[]): ChargeUserConfig {
  const d = DEFAULT_USER_CONFIG;
  const levels = APP_CONSTANTS.LOG_LEVELS;

  return {
    START_THRESHOLD_PCT: readNumeric(env, 'START_THRESHOLD_PCT', d.START_THRESHOLD_PCT),
    STOP_THRESHOLD_PCT: readNumeric(env, 'STOP_THRESHOLD_PCT', d.STOP_THRESHOLD_PCT),
    POLL_INTERVAL_SEC: readNumeric(env, 'POLL_INTERVAL_SEC', d.POLL_INTERVAL_SEC),
    PLUG_BACKEND: readChoice(env, 'PLUG_BACKEND', PLUG_BACKENDS, d.PLUG_BACKEND, errors),
    PLUG_ADDRESS: readText(env, 'PLUG_ADDRESS', d.PLUG_ADDRESS),
    PLUG_ALIAS: readText(env, 'PLUG_ALIAS', d.PLUG_ALIAS),
    TPLINK_EMAIL: readText(env, 'TPLINK_EMAIL', d.TPLINK_EMAIL),
    TPLINK_PASSWORD: readText(env, 'TPLINK_PASSWORD', d.TPLINK_PASSWORD),
    SHELLY_SWITCH_ID: readNumeric(env, 'SHELLY_SWITCH_ID', d.SHELLY_SWITCH_ID),
    SHELLY_USER: readText(env, 'SHELLY_USER', d.SHELLY_USER),
    SHELLY_PASSWORD: readText(env, 'SHELLY_PASSWORD', d.SHELLY_PASSWORD),
    SETTLE_DELAY_MS: readNumeric(env, 'SETTLE_DELAY_MS', d.SETTLE_DELAY_MS),
    PLUG_TIMEOUT_MS: readNumeric(env, 'PLUG_TIMEOUT_MS', d.PLUG_TIMEOUT_MS),
    UNVERIFIED_COMMAND_POLICY: readChoice(
      env, 'UNVERIFIED_COMMAND_POLICY', UNVERIFIED_POLICIES, d.UNVERIFIED_COMMAND_POLICY, errors
    ),
    SLACK_WEBHOOK_URL: readText(env, 'SLACK_WEBHOOK_URL', d.SLACK_WEBHOOK_URL),
    SLACK_LOG_LEVEL: readLevel(env, 'SLACK_LOG_LEVEL', d.SLACK_LOG_LEVEL, levels, errors),
    GLOBAL_LOG_LEVEL: readLevel(env, 'GLOBAL_LOG_LEVEL', d.GLOBAL_LOG_LEVEL, levels, errors),
    GLOBAL_LOG_AUTO_DEMOTE_HOURS: readNumeric(env, 'GLOBAL_LOG_AUTO_DEMOTE_HOURS', d.GLOBAL_LOG_AUTO_DEMOTE_HOURS)
  };
}

/**
 * Name settings after the variables the user sets
 */
function toEnvNames(text: string): string {
  let out = text;
  for (const [key, name] of Object.entries(ENV_VARIABLES)) {
    out = out.split(key).join(name);
  }
  return out;
}

export interface LoadedConfig {
  config: ChargeConfig;
  /** Settings outside their recommended range, with env variable names */
  warnings: ValidationWarning[];
}

/**
 * Build and validate the frozen runtime configuration
 *
 * @param env - Variable source, usually process.env after loadEnvFile()
 * @throws {ConfigValidationError} Listing every unusable setting
 */
export function loadConfig(env: EnvSource): LoadedConfig {
  const parseErrors: ConfigFieldError[] = [];
  const userConfig = readUserConfig(env, parseErrors);
  const result = validateConfig(userConfig);

  const fieldErrors = parseErrors.concat(result.errors.map(function(err) {
    return { field: toEnvNames(err.field), message: toEnvNames(err.message) };
  }));

  if (fieldErrors.length > 0) {
    throw new ConfigValidationError(fieldErrors);
  }

  return {
    config: Object.freeze({ ...userConfig, ...APP_CONSTANTS }),
    warnings: result.warnings.map(function(warn) {
      return { field: toEnvNames(warn.field), message: toEnvNames(warn.message), level: warn.level };
    })
  };
}
