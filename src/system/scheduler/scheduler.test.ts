/**
 * Unit tests for the sampling scheduler
 */

import { createScheduler } from './scheduler';
import { nextDelay } from './helpers';
import type { Logger, LogLevel } from '../../logging';

describe('nextDelay', () => {
  it('should return the remainder of the interval', () => {
    expect(nextDelay(10000, 3000)).toBe(7000);
  });

  it('should return 0 when the tick overran the interval', () => {
    expect(nextDelay(10000, 10000)).toBe(0);
    expect(nextDelay(10000, 15000)).toBe(0);
  });
});

describe('createScheduler', () => {
  let logger: jest.Mocked<Logger>;
  let onError: jest.Mock<void, [unknown]>;

  beforeEach(() => {
    jest.useFakeTimers();
    logger = {
      log: jest.fn(),
      debug: jest.fn(),
      info: jest.fn(),
      warning: jest.fn(),
      critical: jest.fn(),
      setLevel: jest.fn(),
      getLevel: jest.fn((): LogLevel => 1)
    };
    onError = jest.fn((_err: unknown) => undefined);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  function taskTaking(ms: number): jest.Mock<Promise<void>, []> {
    return jest.fn(() => new Promise<void>((resolve) => {
      setTimeout(resolve, ms);
    }));
  }

  function createWith(task: () => Promise<unknown>, intervalMs: number = 10000): ReturnType<typeof createScheduler> {
    return createScheduler(
      { intervalMs: intervalMs },
      { task: task, onError: onError, clock: () => Date.now(), logger: logger }
    );
  }

  it('should run the first tick immediately', () => {
    const task = taskTaking(0);

    createWith(task).start();

    expect(task).toHaveBeenCalledTimes(1);
  });

  it('should run one tick per interval', async () => {
    const task = jest.fn(() => Promise.resolve());
    createWith(task).start();

    await jest.advanceTimersByTimeAsync(9999);
    expect(task).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(1);
    expect(task).toHaveBeenCalledTimes(2);

    await jest.advanceTimersByTimeAsync(20000);
    expect(task).toHaveBeenCalledTimes(4);
  });

  it('should subtract the tick duration from the next delay', async () => {
    const task = taskTaking(3000);
    createWith(task).start();

    await jest.advanceTimersByTimeAsync(9999);
    expect(task).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(1);
    expect(task).toHaveBeenCalledTimes(2);
  });

  it('should start the next tick right away after an overrun and warn', async () => {
    const task = taskTaking(15000);
    createWith(task).start();

    await jest.advanceTimersByTimeAsync(15001);

    expect(task).toHaveBeenCalledTimes(2);
    expect(logger.warning).toHaveBeenCalledWith('Sample took 15000ms, longer than the 10000ms interval');
  });

  it('should never run ticks concurrently', async () => {
    let active = 0;
    let maxActive = 0;
    const task = jest.fn(() => {
      active++;
      maxActive = Math.max(maxActive, active);
      return new Promise<void>((resolve) => {
        setTimeout(() => {
          active--;
          resolve();
        }, 25000);
      });
    });
    createWith(task).start();

    await jest.advanceTimersByTimeAsync(99000);

    expect(task).toHaveBeenCalledTimes(4);
    expect(maxActive).toBe(1);
  });

  it('should ignore a second start', () => {
    const task = taskTaking(0);
    const scheduler = createWith(task);

    scheduler.start();
    scheduler.start();

    expect(task).toHaveBeenCalledTimes(1);
  });

  describe('stop', () => {
    it('should cancel the pending tick', async () => {
      const task = jest.fn(() => Promise.resolve());
      const scheduler = createWith(task);
      scheduler.start();
      await jest.advanceTimersByTimeAsync(0);

      await scheduler.stop();
      await jest.advanceTimersByTimeAsync(30000);

      expect(task).toHaveBeenCalledTimes(1);
      expect(scheduler.isRunning()).toBe(false);
    });

    it('should wait for the tick in flight', async () => {
      const task = taskTaking(3000);
      const scheduler = createWith(task);
      scheduler.start();
      let stopped = false;

      const stopping = scheduler.stop().then(() => {
        stopped = true;
      });
      await jest.advanceTimersByTimeAsync(2999);
      expect(stopped).toBe(false);

      await jest.advanceTimersByTimeAsync(1);
      await stopping;
      expect(stopped).toBe(true);

      await jest.advanceTimersByTimeAsync(30000);
      expect(task).toHaveBeenCalledTimes(1);
    });
  });

  describe('task errors', () => {
    it('should stop and report a rejected task', async () => {
      const error = new Error('bug');
      const task = jest.fn(() => Promise.reject(error));
      const scheduler = createWith(task);

      scheduler.start();
      await jest.advanceTimersByTimeAsync(30000);

      expect(onError).toHaveBeenCalledWith(error);
      expect(scheduler.isRunning()).toBe(false);
      expect(task).toHaveBeenCalledTimes(1);
    });
  });
});
