/**
 * Logging helper functions
 */

import type { LogLevel, LogLevels, FilterContext } from './types';

/**
 * Format a battery percentage for log lines
 * @param percent - Charge level, null when unknown
 * @returns e.g. "72.0%" or "n/a"
 */
export function fmtPercent(percent: number | null): string {
  if (percent === null) return 'n/a';
  return percent.toFixed(1) + '%';
}

/**
 * Format log message with level tag
 *
 * Adds a prefix tag to the message based on log level:
 * - DEBUG: "[DEBUG]    "
 * - INFO: "ℹ️ [INFO]     "
 * - WARNING: "⚠️ [WARNING]  "
 * - CRITICAL: "🚨 [CRITICAL] "
 *
 * @param level - Log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL)
 * @param msg - Message to format
 * @param logLevels - Log level constants object
 * @returns Formatted log line with level tag prefix
 */
export function formatLogMessage(level: LogLevel, msg: string, logLevels: LogLevels): string {
  let tag = '[DEBUG]    ';
  if (level === logLevels.INFO) tag = 'ℹ️ [INFO]     ';
  if (level === logLevels.WARNING) tag = '⚠️ [WARNING]  ';
  if (level === logLevels.CRITICAL) tag = '🚨 [CRITICAL] ';

  return tag + msg;
}

/**
 * Check if message should be logged based on level and auto-demotion
 *
 * Filtering rules:
 * 1. Basic level filtering: message level must be >= current level
 * 2. Auto-demotion: INFO logs are suppressed after demoteHours uptime
 *    (only when not in DEBUG mode, and demoteHours > 0)
 *
 * @param level - Log level to check
 * @param context - Filtering context with currentLevel, uptime, demoteHours
 * @param logLevels - Log level constants object
 * @returns True if message should be logged, false to suppress
 */
export function shouldLog(level: LogLevel, context: FilterContext, logLevels: LogLevels): boolean {
  if (level < context.currentLevel) {
    return false;
  }

  if (level === logLevels.INFO &&
      context.currentLevel > logLevels.DEBUG &&
      context.demoteHours > 0) {
    if (context.uptime > context.demoteHours * 3600) {
      return false;
    }
  }

  return true;
}

/**
 * Resolve a level name from configuration ("info", "WARNING", ...)
 * @returns The numeric level, or null for unknown names
 */
export function parseLogLevel(name: string, logLevels: LogLevels): LogLevel | null {
  const key = name.trim().toUpperCase();
  if (key === 'WARN') return logLevels.WARNING;
  if (key === 'DEBUG' || key === 'INFO' || key === 'WARNING' || key === 'CRITICAL') {
    return logLevels[key];
  }
  return null;
}
