/**
 * Metrics store
 *
 * Every publish builds a new frozen snapshot and swaps the reference, so a
 * scrape that grabbed a snapshot keeps a consistent view.
 */

import type { MetricField, MetricsSnapshot, MetricsStore } from './types';

export const EMPTY_SNAPSHOT: MetricsSnapshot = Object.freeze({
  humidity: null,
  temperature: null,
  readErrorsTotal: 0,
  lastSuccessTimestamp: null
});

export function createMetricsStore(initial: MetricsSnapshot = EMPTY_SNAPSHOT): MetricsStore {
  let current: MetricsSnapshot = Object.freeze({ ...initial });

  function publish<K extends MetricField>(field: K, value: MetricsSnapshot[K]): void {
    const next: MetricsSnapshot = { ...current, [field]: value };
    current = Object.freeze(next);
  }

  function publishAll(values: Partial<MetricsSnapshot>): void {
    current = Object.freeze({
      humidity: values.humidity !== undefined ? values.humidity : current.humidity,
      temperature: values.temperature !== undefined ? values.temperature : current.temperature,
      readErrorsTotal: values.readErrorsTotal !== undefined ? values.readErrorsTotal : current.readErrorsTotal,
      lastSuccessTimestamp:
        values.lastSuccessTimestamp !== undefined ? values.lastSuccessTimestamp : current.lastSuccessTimestamp
    });
  }

  function snapshot(): MetricsSnapshot {
    return current;
  }

  return {
    publish: publish,
    publishAll: publishAll,
    snapshot: snapshot
  };
}
