/**
 * Logging type definitions
 *
 * Types for the logging system including:
 * - Logger interface and configuration
 * - Sink interfaces (console, slack)
 * - Filter context
 * - Initialization messages
 */

// ═══════════════════════════════════════════════════════════════
// LOG LEVEL TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Log level (matches CONFIG.LOG_LEVELS values)
 */
export type LogLevel = 0 | 1 | 2 | 3; // DEBUG | INFO | WARNING | CRITICAL

/**
 * Log level constants structure
 * Passed to pure functions instead of importing CONFIG
 */
export interface LogLevels {
  DEBUG: 0;
  INFO: 1;
  WARNING: 2;
  CRITICAL: 3;
}

/**
 * Log level names as accepted in configuration
 */
export type LogLevelName = keyof LogLevels;

// ═══════════════════════════════════════════════════════════════
// LOGGER TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Main logger interface
 * Provides leveled logging methods and runtime configuration
 */
export interface Logger {
  /** Log at specified level */
  log(level: LogLevel, msg: string): void;
  /** Log DEBUG level message */
  debug(msg: string): void;
  /** Log INFO level message */
  info(msg: string): void;
  /** Log WARNING level message */
  warning(msg: string): void;
  /** Log CRITICAL level message */
  critical(msg: string): void;
  /** Update log level at runtime */
  setLevel(newLevel: LogLevel): void;
  /** Get current log level */
  getLevel(): LogLevel;
  /** Initialize all sinks, resolving with one message per sink that has an initializer */
  initialize(): Promise<InitMessage[]>;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Current log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL) */
  level: LogLevel;
  /** Hours after which to auto-demote INFO logs (0 to disable) */
  demoteHours: number;
}

/**
 * Sink with its minimum log level
 * Logger filters messages before sending to each sink
 */
export interface SinkWithLevel {
  sink: LogSink;
  /** Minimum level this sink receives */
  minLevel: LogLevel;
}

/**
 * Logger external dependencies
 */
export interface LoggerDependencies {
  /** Function returning current time in milliseconds */
  timeSource: () => number;
  sinks: SinkWithLevel[];
}

// ═══════════════════════════════════════════════════════════════
// SINK TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Base sink interface
 * Level filtering happens in logger before write() is called
 */
export interface LogSink {
  /** Write formatted message to sink (already filtered by level) */
  write(formattedMessage: string, level: LogLevel): void;
  /** Optional initialization (e.g., check webhook URL) */
  initialize?(): Promise<InitMessage>;
}

/**
 * Console sink configuration
 */
export interface ConsoleSinkConfig {
  /** Colorize lines by level */
  colors: boolean;
}

/**
 * Console API interface
 * Abstraction over global console for testability
 */
export interface ConsoleAPI {
  /** Standard output */
  log(message: string): void;
  /** Error output, used for WARNING and CRITICAL */
  error(message: string): void;
}

/**
 * Slack sink interface
 * Buffers failed messages and retries with exponential backoff
 */
export interface SlackSink extends LogSink {
  initialize(): Promise<InitMessage>;
  /** Get current retry buffer size (for testing/monitoring) */
  getBufferSize(): number;
}

/**
 * Slack sink configuration
 */
export interface SlackSinkConfig {
  /** Incoming webhook URL */
  webhookUrl: string;
  /** Maximum messages in retry buffer before dropping oldest */
  bufferSize: number;
  /** Initial retry delay in ms (exponential: 1000 -> 2000 -> 4000...) */
  retryDelayMs: number;
  /** Maximum retry attempts before dropping message */
  maxRetries: number;
}

/**
 * Minimal fetch signature used by the Slack sink
 */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

// ═══════════════════════════════════════════════════════════════
// FILTER TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Context for log filtering decisions
 */
export interface FilterContext {
  /** Current minimum log level */
  currentLevel: LogLevel;
  /** Logger uptime in seconds */
  uptime: number;
  /** Hours after which to demote INFO logs */
  demoteHours: number;
}

// ═══════════════════════════════════════════════════════════════
// INITIALIZATION TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Initialization result message
 * Returned by sinks during initialization
 */
export interface InitMessage {
  success: boolean;
  message: string;
}
