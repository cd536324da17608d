/**
 * Logging type definitions
 *
 * Types for the logging system including:
 * - Logger interface and configuration
 * - Sink interfaces
 * - Filter context
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

export type LogLevelName = Lowercase<keyof LogLevels>;

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
  /** Function returning current time in seconds */
  timeSource: () => number;
  sinks: SinkWithLevel[];
}

// ═══════════════════════════════════════════════════════════════
// SINK TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Base sink interface
 * Level filtering happens in the logger before write() is called;
 * the level is passed along so sinks can route or colour by severity.
 */
export interface LogSink {
  write(level: LogLevel, formattedMessage: string): void;
}

/**
 * Console sink configuration
 */
export interface ConsoleSinkConfig {
  /** Colour the level tag (disable for log collectors that keep raw bytes) */
  colors: boolean;
}

/**
 * Output streams used by the console sink
 * Abstraction over process.stdout / process.stderr for testability
 */
export interface ConsoleStreams {
  out: { write(chunk: string): unknown };
  err: { write(chunk: string): unknown };
}

// ═══════════════════════════════════════════════════════════════
// FILTER TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Context for log filtering decisions
 */
export interface FilterContext {
  /** Current minimum log level */
  currentLevel: LogLevel;
  /** System uptime in seconds */
  uptime: number;
  /** Hours after which to demote INFO logs */
  demoteHours: number;
}
