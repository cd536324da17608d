/**
 * Scheduler type definitions
 */

import type { Logger } from '../../logging';

export interface SchedulerConfig {
  /** Target time between the starts of consecutive ticks */
  intervalMs: number;
}

export interface SchedulerDependencies {
  /** Work to run on every tick; the next tick waits for it to settle */
  task: () => Promise<unknown>;

  /** Called when the task rejects; the scheduler stops first */
  onError: (err: unknown) => void;

  /** Millisecond clock used to measure tick duration */
  clock: () => number;

  logger: Logger;
}

export interface Scheduler {
  /** Run the first tick immediately, then one per interval */
  start(): void;

  /** Cancel the pending tick and wait for one in flight to settle */
  stop(): Promise<void>;

  isRunning(): boolean;
}
