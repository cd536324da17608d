export { createExporterRegistry } from './registry';
export { createExpositionServer, createMetricsHandler } from './server';
export type {
  RegistryOptions,
  MetricsRegistry,
  ExpositionConfig,
  ExpositionDependencies,
  ExpositionServer
} from './types';
