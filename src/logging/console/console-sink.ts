/**
 * Console output sink
 *
 * Writes each line as it arrives. WARNING and CRITICAL go to the error
 * stream so they survive stdout redirection.
 */

import chalk from 'chalk';

import type { ConsoleAPI, ConsoleSinkConfig, LogLevel, LogSink } from '../types';

function colorize(level: LogLevel, line: string): string {
  if (level === 0) return chalk.gray(line);
  if (level === 2) return chalk.yellow(line);
  if (level === 3) return chalk.red.bold(line);
  return line;
}

/**
 * Create a console sink
 *
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(console, { colors: process.stdout.isTTY === true });
 * consoleSink.write("[2024-01-01 10:00:00] ℹ️ [INFO]     Hello", 1);
 * ```
 */
export function createConsoleSink(consoleApi: ConsoleAPI, config: ConsoleSinkConfig): LogSink {
  function write(formattedMessage: string, level: LogLevel): void {
    const line = config.colors ? colorize(level, formattedMessage) : formattedMessage;
    if (level >= 2) {
      consoleApi.error(line);
    } else {
      consoleApi.log(line);
    }
  }

  return {
    write: write
  };
}
