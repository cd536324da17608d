/**
 * Main logger coordinator
 *
 * Combines filtering, formatting, and output sinks into a unified logging system.
 *
 * Features:
 * - Multiple log levels (DEBUG, INFO, WARNING, CRITICAL)
 * - Auto-demotion of INFO logs after configurable uptime
 * - Multiple output sinks, each with its own minimum level
 * - Runtime level adjustment
 */

import { formatLogMessage, shouldLog } from './helpers';
import type { LogLevel, LogLevels, Logger, LoggerConfig, LoggerDependencies, SinkWithLevel } from './types';

/**
 * Create a logger instance
 *
 * Each message is:
 * 1. Checked against the current log level and auto-demotion rules
 * 2. Formatted with a level-appropriate tag
 * 3. Written to every sink whose minimum level it meets
 *
 * @param config - Logger configuration (level, demoteHours)
 * @param dependencies - External dependencies (timeSource, sinks)
 * @param logLevels - Log level constants object
 * @returns Logger instance with log methods
 *
 * @example
 * ```typescript
 * const logger = createLogger(
 *   { level: LOG_LEVELS.INFO, demoteHours: 24 },
 *   { timeSource: now, sinks: [{ sink: consoleSink, minLevel: LOG_LEVELS.DEBUG }] },
 *   LOG_LEVELS
 * );
 *
 * logger.info("Listening on 0.0.0.0:9200");
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
    const context = {
      currentLevel: currentLevel,
      uptime: timeSource() - startTime,
      demoteHours: demoteHours
    };
    if (!shouldLog(level, context, logLevels)) {
      return;
    }

    const formattedMessage = formatLogMessage(level, msg, logLevels);

    for (const entry of sinks) {
      if (level < entry.minLevel) {
        continue;
      }

      try {
        entry.sink.write(level, formattedMessage);
      } catch (err) {
        // Sink errors should not crash the logger
        process.stderr.write('Logger sink error: ' + String(err) + '\n');
      }
    }
  }

  function debug(msg: string): void {
    log(logLevels.DEBUG, msg);
  }

  function info(msg: string): void {
    log(logLevels.INFO, msg);
  }

  function warning(msg: string): void {
    log(logLevels.WARNING, msg);
  }

  function critical(msg: string): void {
    log(logLevels.CRITICAL, msg);
  }

  function setLevel(newLevel: LogLevel): void {
    currentLevel = newLevel;
  }

  function getLevel(): LogLevel {
    return currentLevel;
  }

  return {
    log: log,
    debug: debug,
    info: info,
    warning: warning,
    critical: critical,
    setLevel: setLevel,
    getLevel: getLevel
  };
}
