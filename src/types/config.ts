/**
 * Type definition for charge controller configuration
 */

import type { LogLevel, LogLevels } from '@logging';

/**
 * Supported smart plug integrations
 */
export type PlugBackend = 'tplink-cloud' | 'shelly';

/**
 * What a plug command counts as when its effect cannot be read back
 */
export type UnverifiedCommandPolicy = 'assume-success' | 'warn' | 'fail';

/**
 * User-configurable settings
 * Everything a user might reasonably tune for charging, device access and observability
 */
export interface ChargeUserConfig {
  // ───────── CHARGE THRESHOLDS ─────────
  readonly START_THRESHOLD_PCT: number;
  readonly STOP_THRESHOLD_PCT: number;
  readonly POLL_INTERVAL_SEC: number;

  // ───────── PLUG ACCESS ─────────
  readonly PLUG_BACKEND: PlugBackend;
  readonly PLUG_ADDRESS: string;
  readonly PLUG_ALIAS: string;
  readonly TPLINK_EMAIL: string;
  readonly TPLINK_PASSWORD: string;
  readonly SHELLY_SWITCH_ID: number;
  readonly SHELLY_USER: string;
  readonly SHELLY_PASSWORD: string;

  // ───────── COMMAND VERIFICATION ─────────
  readonly SETTLE_DELAY_MS: number;
  readonly PLUG_TIMEOUT_MS: number;
  readonly UNVERIFIED_COMMAND_POLICY: UnverifiedCommandPolicy;

  // ───────── SLACK SETTINGS ─────────
  readonly SLACK_WEBHOOK_URL: string;
  readonly SLACK_LOG_LEVEL: LogLevel;

  // ───────── GLOBAL LOGGING SETTINGS ─────────
  readonly GLOBAL_LOG_LEVEL: LogLevel;
  readonly GLOBAL_LOG_AUTO_DEMOTE_HOURS: number;
}

/**
 * Application constants
 * Internal engine constants that should rarely change
 */
export interface ChargeAppConstants {
  // ───────── LOGGING CONSTANTS ─────────
  readonly LOG_LEVELS: LogLevels;

  // ───────── SLACK CONSTANTS ─────────
  readonly SLACK_BUFFER_SIZE: number;
  readonly SLACK_RETRY_DELAY_MS: number;
  readonly SLACK_MAX_RETRIES: number;

  // ───────── CLOUD CONSTANTS ─────────
  readonly TPLINK_CLOUD_URL: string;
  readonly TPLINK_APP_TYPE: string;
}

/**
 * Complete charge controller configuration
 * Combines user config and app constants
 */
export type ChargeConfig = ChargeUserConfig & ChargeAppConstants;
