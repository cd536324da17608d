export { createSensorSampler, createInitialSamplerState } from './sampler';
export type {
  SamplerPhase,
  SampleOutcome,
  SamplerState,
  SampleResult,
  SamplerConfig,
  SamplerDependencies,
  SensorSampler
} from './types';
