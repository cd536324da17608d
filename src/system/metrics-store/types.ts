/**
 * Metrics store type definitions
 */

/**
 * Values served to scrapers. Readings are null until the first good sample.
 */
export interface MetricsSnapshot {
  readonly humidity: number | null;
  readonly temperature: number | null;
  readonly readErrorsTotal: number;
  readonly lastSuccessTimestamp: number | null;
}

export type MetricField = keyof MetricsSnapshot;

/**
 * Single-writer, many-reader holder of the latest published values
 */
export interface MetricsStore {
  /** Replace one field */
  publish<K extends MetricField>(field: K, value: MetricsSnapshot[K]): void;

  /** Replace several fields at once; readers never observe a partial update */
  publishAll(values: Partial<MetricsSnapshot>): void;

  /** Current snapshot; the same object is returned until the next publish */
  snapshot(): MetricsSnapshot;
}
