export { createPigpioPulseSource, connectPigpio } from './pigpio-source';
export { createSyntheticPulseSource, generateMeasurement } from './synthetic-source';
export { encodeDht22Frame, frameToEdges, timingForThreshold, DEFAULT_PULSE_TIMING } from './frame-encoder';
export { tickDiff, toLevel, isFrameComplete } from './helpers';
export type { PulseSource, PigpioHandle, PulseTiming, PigpioSourceConfig, PigpioSourceDeps, SyntheticSourceConfig, SyntheticSourceDeps } from './types';
