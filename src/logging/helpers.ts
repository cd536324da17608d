/**
 * Logging helper functions
 */

import type { Reading } from '../types/common';
import type { LogLevel, LogLevels, LogLevelName, FilterContext } from './types';

/**
 * Format a reading for log output
 * @param reading - Reading to format, null if none has been taken yet
 * @returns e.g. "21.4C 48.2%RH"
 */
export function fmtReading(reading: Reading | null): string {
  if (reading === null) return "n/a";

  return reading.temperature.toFixed(1) + "C " + reading.humidity.toFixed(1) + "%RH";
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
  let tag = "[DEBUG]    ";
  if (level === logLevels.INFO) tag = "ℹ️ [INFO]     ";
  if (level === logLevels.WARNING) tag = "⚠️ [WARNING]  ";
  if (level === logLevels.CRITICAL) tag = "🚨 [CRITICAL] ";

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

  // Auto-demote INFO logs after configured uptime
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
 * Resolve a level name ("debug", "INFO", "warn", ...) to its numeric level
 * @returns The level, or null when the name is not recognised
 */
export function parseLogLevel(name: string, logLevels: LogLevels): LogLevel | null {
  const normalized = name.trim().toLowerCase();
  const aliases: Record<string, LogLevelName> = {
    debug: 'debug',
    info: 'info',
    warn: 'warning',
    warning: 'warning',
    error: 'critical',
    critical: 'critical',
  };

  const resolved = aliases[normalized];
  switch (resolved) {
    case 'debug':
      return logLevels.DEBUG;
    case 'info':
      return logLevels.INFO;
    case 'warning':
      return logLevels.WARNING;
    case 'critical':
      return logLevels.CRITICAL;
    default:
      return null;
  }
}
