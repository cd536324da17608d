/**
 * Unit tests for logger coordinator
 */

import { createLogger } from './logger';
import type { LogLevels, LogSink, SinkWithLevel } from './types';

const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

describe('createLogger', () => {
  let mockTimeSource: jest.Mock<number, []>;
  let write: jest.Mock;
  let mockSink: SinkWithLevel;

  beforeEach(() => {
    mockTimeSource = jest.fn(() => 100);
    write = jest.fn();
    mockSink = {
      sink: { write: write },
      minLevel: LOG_LEVELS.DEBUG
    };
  });

  describe('log level methods', () => {
    test('should log debug messages when level is DEBUG', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.DEBUG, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      logger.debug('test debug');

      expect(write).toHaveBeenCalledWith(LOG_LEVELS.DEBUG, '[DEBUG]    test debug');
    });

    test('should log info messages with the info tag', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      logger.info('test info');

      expect(write).toHaveBeenCalledWith(LOG_LEVELS.INFO, 'ℹ️ [INFO]     test info');
    });

    test('should log warning messages', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.WARNING, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      logger.warning('test warning');

      expect(write).toHaveBeenCalledWith(LOG_LEVELS.WARNING, '⚠️ [WARNING]  test warning');
    });

    test('should log critical messages', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.CRITICAL, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      logger.critical('test critical');

      expect(write).toHaveBeenCalledWith(LOG_LEVELS.CRITICAL, '🚨 [CRITICAL] test critical');
    });

    test('should log via generic log method', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      logger.log(LOG_LEVELS.WARNING, 'generic log');

      expect(write).toHaveBeenCalledWith(LOG_LEVELS.WARNING, '⚠️ [WARNING]  generic log');
    });
  });

  describe('level filtering', () => {
    test('should not log debug when level is INFO', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      logger.debug('should not appear');

      expect(write).not.toHaveBeenCalled();
    });

    test('should skip sinks whose minimum level is above the message', () => {
      const criticalWrite = jest.fn();
      const logger = createLogger(
        { level: LOG_LEVELS.DEBUG, demoteHours: 0 },
        {
          timeSource: mockTimeSource,
          sinks: [mockSink, { sink: { write: criticalWrite }, minLevel: LOG_LEVELS.CRITICAL }]
        },
        LOG_LEVELS
      );

      logger.warning('only the first sink');

      expect(write).toHaveBeenCalledTimes(1);
      expect(criticalWrite).not.toHaveBeenCalled();
    });
  });

  describe('auto-demotion', () => {
    test('should demote INFO after demoteHours of uptime', () => {
      mockTimeSource.mockReturnValueOnce(0).mockReturnValue(25 * 3600);

      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 24 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      logger.info('should be demoted');

      expect(write).not.toHaveBeenCalled();
    });

    test('should keep INFO before demoteHours of uptime', () => {
      mockTimeSource.mockReturnValueOnce(0).mockReturnValue(23 * 3600);

      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 24 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      logger.info('still visible');

      expect(write).toHaveBeenCalledTimes(1);
    });

    test('should not demote WARNING after demoteHours', () => {
      mockTimeSource.mockReturnValueOnce(0).mockReturnValue(25 * 3600);

      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 24 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      logger.warning('should not be demoted');

      expect(write).toHaveBeenCalledTimes(1);
    });
  });

  describe('sink errors', () => {
    test('should keep writing to other sinks when one throws', () => {
      const stderr = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
      const failing: LogSink = {
        write: () => {
          throw new Error('disk full');
        }
      };
      const logger = createLogger(
        { level: LOG_LEVELS.DEBUG, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [{ sink: failing, minLevel: LOG_LEVELS.DEBUG }, mockSink] },
        LOG_LEVELS
      );

      expect(() => logger.info('survives')).not.toThrow();
      expect(write).toHaveBeenCalledTimes(1);
      expect(stderr).toHaveBeenCalledWith('Logger sink error: Error: disk full\n');
    });
  });

  describe('setLevel and getLevel', () => {
    test('should return initial level', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.WARNING, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      expect(logger.getLevel()).toBe(LOG_LEVELS.WARNING);
    });

    test('should update level at runtime', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.WARNING, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [mockSink] },
        LOG_LEVELS
      );

      logger.setLevel(LOG_LEVELS.DEBUG);
      logger.debug('now visible');

      expect(logger.getLevel()).toBe(LOG_LEVELS.DEBUG);
      expect(write).toHaveBeenCalledWith(LOG_LEVELS.DEBUG, '[DEBUG]    now visible');
    });
  });
});
