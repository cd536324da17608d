/**
 * Console output sink
 *
 * Writes one line per message. DEBUG and INFO go to stdout, WARNING and
 * CRITICAL to stderr so that service managers can tell them apart.
 * Lines are coloured by severity with chalk when colours are enabled.
 */

import chalk from 'chalk';

import type { LogLevel, LogLevels, LogSink, ConsoleSinkConfig, ConsoleStreams } from '../types';

/**
 * Create a console sink
 *
 * @param streams - Output streams (process.stdout / process.stderr in production)
 * @param config - Sink configuration
 * @param logLevels - Log level constants object
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(
 *   { out: process.stdout, err: process.stderr },
 *   { colors: process.stdout.isTTY === true },
 *   LOG_LEVELS
 * );
 * ```
 */
export function createConsoleSink(
  streams: ConsoleStreams,
  config: ConsoleSinkConfig,
  logLevels: LogLevels
): LogSink {
  function colorize(level: LogLevel, line: string): string {
    if (!config.colors) return line;

    if (level === logLevels.DEBUG) return chalk.gray(line);
    if (level === logLevels.WARNING) return chalk.yellow(line);
    if (level === logLevels.CRITICAL) return chalk.red.bold(line);
    return line;
  }

  function write(level: LogLevel, formattedMessage: string): void {
    const line = colorize(level, formattedMessage) + '\n';

    if (level >= logLevels.WARNING) {
      streams.err.write(line);
    } else {
      streams.out.write(line);
    }
  }

  return {
    write: write
  };
}
