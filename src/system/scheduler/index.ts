export { createScheduler } from './scheduler';
export { nextDelay } from './helpers';
export type { Scheduler, SchedulerConfig, SchedulerDependencies } from './types';
