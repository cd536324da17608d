export { createMetricsStore, EMPTY_SNAPSHOT } from './metrics-store';
export type { MetricsSnapshot, MetricField, MetricsStore } from './types';
