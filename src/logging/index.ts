/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger)
 * - Console sink (createConsoleSink)
 * - Slack webhook sink (createSlackSink)
 * - Pure filter and format functions
 */

export { formatLogMessage, shouldLog, fmtPercent, parseLogLevel } from './helpers';
export { createConsoleSink } from './console';
export { createSlackSink } from './slack';
export { createLogger } from './logger';

export type {
  LogLevel,
  LogLevelName,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleSinkConfig,
  ConsoleAPI,
  SlackSink,
  SlackSinkConfig,
  FetchFn,
  FilterContext,
  InitMessage
} from './types';
