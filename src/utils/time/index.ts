export { now, nowMs, monotonicUs, usToTimerMs, sleep } from './time';
