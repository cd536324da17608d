/**
 * Prometheus registry backed by the metrics store
 *
 * Metric values are pulled from the current snapshot at scrape time, so a
 * scrape never blocks on or interferes with sampling.
 */

import { Counter, Gauge, Registry } from 'prom-client';

import type { MetricsStore } from '../metrics-store';
import type { RegistryOptions } from './types';

/**
 * Gauges report NaN until the first good reading
 */
function valueOrNaN(value: number | null): number {
  return value === null ? NaN : value;
}

export function createExporterRegistry(
  store: MetricsStore,
  options: RegistryOptions = { prefix: '' }
): Registry {
  const registry = new Registry();
  const prefix = options.prefix;
  let countedErrors = 0;

  new Gauge({
    name: prefix + 'humidity',
    help: 'Relative humidity (percent) as read by the sensor',
    registers: [registry],
    collect() {
      this.set(valueOrNaN(store.snapshot().humidity));
    }
  });

  new Gauge({
    name: prefix + 'temperature',
    help: 'Temperature (Celsius) as read by the sensor',
    registers: [registry],
    collect() {
      this.set(valueOrNaN(store.snapshot().temperature));
    }
  });

  new Counter({
    name: prefix + 'read_errors_total',
    help: 'Failed sensor reads since startup',
    registers: [registry],
    collect() {
      const total = store.snapshot().readErrorsTotal;
      if (total > countedErrors) {
        this.inc(total - countedErrors);
        countedErrors = total;
      }
    }
  });

  new Gauge({
    name: prefix + 'last_success_timestamp',
    help: 'Unix time (seconds) of the last successful sensor read',
    registers: [registry],
    collect() {
      this.set(valueOrNaN(store.snapshot().lastSuccessTimestamp));
    }
  });

  return registry;
}
