/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger)
 * - Console sink (createConsoleSink)
 * - Pure filter and format functions
 */

export { formatLogMessage, shouldLog, fmtReading, parseLogLevel } from './helpers';
export { createConsoleSink } from './console';
export { createLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  LogLevelName,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleSinkConfig,
  ConsoleStreams,
  FilterContext
} from './types';
