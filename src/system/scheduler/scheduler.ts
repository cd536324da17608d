/**
 * Sampling scheduler
 *
 * Runs a task once per interval, measured start to start. A tick is only
 * scheduled after the previous one settles, so ticks never overlap; a tick
 * that overruns the interval is followed immediately by the next one.
 */

import { nextDelay } from './helpers';
import type { Scheduler, SchedulerConfig, SchedulerDependencies } from './types';

export function createScheduler(config: SchedulerConfig, deps: SchedulerDependencies): Scheduler {
  let running = false;
  let timer: ReturnType<typeof setTimeout> | null = null;
  let inFlight: Promise<void> | null = null;

  function tick(): void {
    timer = null;
    const startedAt = deps.clock();

    inFlight = runTask().then(() => {
      inFlight = null;
      if (running) scheduleNext(deps.clock() - startedAt);
    });
  }

  async function runTask(): Promise<void> {
    try {
      await deps.task();
    } catch (err) {
      running = false;
      deps.onError(err);
    }
  }

  function scheduleNext(elapsedMs: number): void {
    if (elapsedMs > config.intervalMs) {
      deps.logger.warning(
        'Sample took ' + elapsedMs + 'ms, longer than the ' + config.intervalMs + 'ms interval'
      );
    }
    timer = setTimeout(tick, nextDelay(config.intervalMs, elapsedMs));
  }

  function start(): void {
    if (running) return;
    running = true;
    tick();
  }

  async function stop(): Promise<void> {
    running = false;
    if (timer !== null) {
      clearTimeout(timer);
      timer = null;
    }
    if (inFlight !== null) {
      await inFlight;
    }
  }

  function isRunning(): boolean {
    return running;
  }

  return {
    start: start,
    stop: stop,
    isRunning: isRunning
  };
}
