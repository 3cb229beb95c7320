/**
 * In-memory logger for unit tests
 */

import type { LogLevel, Logger } from './types';

export interface RecordedLine {
  level: LogLevel;
  msg: string;
}

export interface RecordingLogger extends Logger {
  lines: RecordedLine[];
  /** Messages logged at the given level, in order */
  at(level: LogLevel): string[];
}

/**
 * Create a logger that keeps every line instead of writing it
 */
export function createRecordingLogger(): RecordingLogger {
  const lines: RecordedLine[] = [];
  let level: LogLevel = 0;

  function log(lineLevel: LogLevel, msg: string): void {
    lines.push({ level: lineLevel, msg: msg });
  }

  return {
    lines: lines,
    at: function(wanted) {
      return lines.filter(function(line) { return line.level === wanted; }).map(function(line) { return line.msg; });
    },
    log: log,
    debug: function(msg) { log(0, msg); },
    info: function(msg) { log(1, msg); },
    warning: function(msg) { log(2, msg); },
    critical: function(msg) { log(3, msg); },
    setLevel: function(newLevel) { level = newLevel; },
    getLevel: function() { return level; },
    initialize: async function() { return []; }
  };
}
