/**
 * Unit tests for logging helper functions
 */

import { formatLogMessage, shouldLog, fmtReading, parseLogLevel } from './helpers';
import type { LogLevels } from './types';

const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

describe('formatLogMessage', () => {
  test('should format DEBUG level with correct tag', () => {
    expect(formatLogMessage(LOG_LEVELS.DEBUG, 'test message', LOG_LEVELS)).toBe('[DEBUG]    test message');
  });

  test('should format INFO level with emoji and correct tag', () => {
    expect(formatLogMessage(LOG_LEVELS.INFO, 'test message', LOG_LEVELS)).toBe('ℹ️ [INFO]     test message');
  });

  test('should format WARNING level with emoji and correct tag', () => {
    expect(formatLogMessage(LOG_LEVELS.WARNING, 'test message', LOG_LEVELS)).toBe('⚠️ [WARNING]  test message');
  });

  test('should format CRITICAL level with emoji and correct tag', () => {
    expect(formatLogMessage(LOG_LEVELS.CRITICAL, 'test message', LOG_LEVELS)).toBe('🚨 [CRITICAL] test message');
  });

  test('should handle empty message', () => {
    expect(formatLogMessage(LOG_LEVELS.INFO, '', LOG_LEVELS)).toBe('ℹ️ [INFO]     ');
  });
});

describe('shouldLog', () => {
  describe('basic level filtering', () => {
    test('should log when level equals current log level', () => {
      expect(shouldLog(LOG_LEVELS.INFO, { currentLevel: LOG_LEVELS.INFO, uptime: 100, demoteHours: 24 }, LOG_LEVELS)).toBe(true);
    });

    test('should not log when level below current log level', () => {
      expect(shouldLog(LOG_LEVELS.DEBUG, { currentLevel: LOG_LEVELS.INFO, uptime: 100, demoteHours: 24 }, LOG_LEVELS)).toBe(false);
    });

    test('should log when level above current log level', () => {
      expect(shouldLog(LOG_LEVELS.CRITICAL, { currentLevel: LOG_LEVELS.INFO, uptime: 100, demoteHours: 24 }, LOG_LEVELS)).toBe(true);
    });
  });

  describe('auto-demotion of INFO logs', () => {
    test('should demote INFO logs after uptime threshold', () => {
      expect(shouldLog(LOG_LEVELS.INFO, { currentLevel: LOG_LEVELS.INFO, uptime: 25 * 3600, demoteHours: 24 }, LOG_LEVELS)).toBe(false);
    });

    test('should not demote INFO logs before uptime threshold', () => {
      expect(shouldLog(LOG_LEVELS.INFO, { currentLevel: LOG_LEVELS.INFO, uptime: 23 * 3600, demoteHours: 24 }, LOG_LEVELS)).toBe(true);
    });

    test('should not demote INFO logs in DEBUG mode', () => {
      expect(shouldLog(LOG_LEVELS.INFO, { currentLevel: LOG_LEVELS.DEBUG, uptime: 25 * 3600, demoteHours: 24 }, LOG_LEVELS)).toBe(true);
    });

    test('should not demote when demoteHours is 0 (disabled)', () => {
      expect(shouldLog(LOG_LEVELS.INFO, { currentLevel: LOG_LEVELS.INFO, uptime: 100000, demoteHours: 0 }, LOG_LEVELS)).toBe(true);
    });

    test('should not demote WARNING logs regardless of uptime', () => {
      expect(shouldLog(LOG_LEVELS.WARNING, { currentLevel: LOG_LEVELS.INFO, uptime: 100 * 3600, demoteHours: 24 }, LOG_LEVELS)).toBe(true);
    });
  });
});

describe('fmtReading', () => {
  test('should format temperature and humidity with one decimal place', () => {
    expect(fmtReading({ humidity: 48.2, temperature: 21.4, timestamp: 0 })).toBe('21.4C 48.2%RH');
  });

  test('should format negative temperatures', () => {
    expect(fmtReading({ humidity: 80, temperature: -10.1, timestamp: 0 })).toBe('-10.1C 80.0%RH');
  });

  test('should return n/a when there is no reading', () => {
    expect(fmtReading(null)).toBe('n/a');
  });
});

describe('parseLogLevel', () => {
  test('should resolve canonical names case-insensitively', () => {
    expect(parseLogLevel('debug', LOG_LEVELS)).toBe(LOG_LEVELS.DEBUG);
    expect(parseLogLevel('INFO', LOG_LEVELS)).toBe(LOG_LEVELS.INFO);
    expect(parseLogLevel(' Warning ', LOG_LEVELS)).toBe(LOG_LEVELS.WARNING);
    expect(parseLogLevel('critical', LOG_LEVELS)).toBe(LOG_LEVELS.CRITICAL);
  });

  test('should accept common aliases', () => {
    expect(parseLogLevel('warn', LOG_LEVELS)).toBe(LOG_LEVELS.WARNING);
    expect(parseLogLevel('error', LOG_LEVELS)).toBe(LOG_LEVELS.CRITICAL);
  });

  test('should return null for unknown names', () => {
    expect(parseLogLevel('verbose', LOG_LEVELS)).toBeNull();
    expect(parseLogLevel('', LOG_LEVELS)).toBeNull();
  });
});
