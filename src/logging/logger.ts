/**
 * Main logger coordinator
 *
 * Combines filtering, formatting, and output sinks into a unified logging system.
 *
 * Features:
 * - Multiple log levels (DEBUG, INFO, WARNING, CRITICAL)
 * - Timestamped lines
 * - Auto-demotion of INFO logs after configurable uptime
 * - Multiple output sinks (console, Slack) with per-sink minimum level
 * - Runtime level adjustment
 */

import { formatTimestamp } from '@utils/time';

import { formatLogMessage, shouldLog } from './helpers';
import type { LogLevel, LogLevels, Logger, LoggerConfig, LoggerDependencies, InitMessage, SinkWithLevel } from './types';

/**
 * Create a logger instance
 *
 * Each message is:
 * 1. Checked against the current log level and auto-demotion rules
 * 2. Prefixed with a timestamp and a level-appropriate tag
 * 3. Written to every sink whose minimum level it meets
 *
 * @param config - Logger configuration (level, demoteHours)
 * @param dependencies - External dependencies (timeSource, sinks)
 * @param logLevels - Log level constants object
 *
 * @example
 * ```typescript
 * const logger = createLogger(
 *   { level: LOG_LEVELS.INFO, demoteHours: 0 },
 *   {
 *     timeSource: nowMs,
 *     sinks: [
 *       { sink: consoleSink, minLevel: LOG_LEVELS.DEBUG },
 *       { sink: slackSink, minLevel: LOG_LEVELS.WARNING }
 *     ]
 *   },
 *   LOG_LEVELS
 * );
 *
 * logger.info("Charger turned ON");   // Console only
 * logger.warning("Plug unreachable"); // Console + Slack
 * ```
 */
export function createLogger(
  config: LoggerConfig,
  dependencies: LoggerDependencies,
  logLevels: LogLevels
): Logger {
  let currentLevel = config.level;
  const demoteHours = config.demoteHours;
  const timeSource = dependencies.timeSource;
  const sinks: SinkWithLevel[] = dependencies.sinks;
  const startTime = timeSource();

  function log(level: LogLevel, msg: string): void {
    const t = timeSource();
    const context = {
      currentLevel: currentLevel,
      uptime: (t - startTime) / 1000,
      demoteHours: demoteHours
    };

    if (!shouldLog(level, context, logLevels)) {
      return;
    }

    const formattedMessage = '[' + formatTimestamp(t) + '] ' + formatLogMessage(level, msg, logLevels);

    for (const entry of sinks) {
      if (level < entry.minLevel) {
        continue;
      }

      try {
        entry.sink.write(formattedMessage, level);
      } catch (err) {
        // Sink errors should not crash the logger
        console.error('Logger sink error: ' + String(err));
      }
    }
  }

  /**
   * Initialize all sinks that need it
   * A rejecting initializer is reported as a failed InitMessage
   */
  async function initialize(): Promise<InitMessage[]> {
    const pending: Promise<InitMessage>[] = [];

    for (const entry of sinks) {
      if (entry.sink.initialize) {
        pending.push(entry.sink.initialize().catch(function(err: unknown): InitMessage {
          return { success: false, message: 'Sink initialization failed: ' + String(err) };
        }));
      }
    }

    return Promise.all(pending);
  }

  return {
    log: log,
    debug: function(msg: string) { log(logLevels.DEBUG, msg); },
    info: function(msg: string) { log(logLevels.INFO, msg); },
    warning: function(msg: string) { log(logLevels.WARNING, msg); },
    critical: function(msg: string) { log(logLevels.CRITICAL, msg); },
    setLevel: function(newLevel: LogLevel) { currentLevel = newLevel; },
    getLevel: function() { return currentLevel; },
    initialize: initialize
  };
}
