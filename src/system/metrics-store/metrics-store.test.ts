/**
 * Unit tests for the metrics store
 */

import { createMetricsStore, EMPTY_SNAPSHOT } from './metrics-store';

describe('createMetricsStore', () => {
  it('should start empty', () => {
    expect(createMetricsStore().snapshot()).toEqual({
      humidity: null,
      temperature: null,
      readErrorsTotal: 0,
      lastSuccessTimestamp: null
    });
  });

  it('should return the same snapshot between publishes', () => {
    const store = createMetricsStore();

    expect(store.snapshot()).toBe(store.snapshot());
  });

  it('should replace one field on publish', () => {
    const store = createMetricsStore();

    store.publish('readErrorsTotal', 3);

    expect(store.snapshot()).toEqual({ ...EMPTY_SNAPSHOT, readErrorsTotal: 3 });
  });

  it('should replace several fields together on publishAll', () => {
    const store = createMetricsStore();
    store.publish('readErrorsTotal', 2);

    store.publishAll({ humidity: 48.2, temperature: 21.4, lastSuccessTimestamp: 1700000000 });

    expect(store.snapshot()).toEqual({
      humidity: 48.2,
      temperature: 21.4,
      readErrorsTotal: 2,
      lastSuccessTimestamp: 1700000000
    });
  });

  it('should leave previously taken snapshots untouched', () => {
    const store = createMetricsStore();
    const before = store.snapshot();

    store.publishAll({ humidity: 50, temperature: 26 });

    expect(before.humidity).toBeNull();
    expect(store.snapshot()).not.toBe(before);
  });

  it('should freeze snapshots', () => {
    const store = createMetricsStore();
    store.publish('humidity', 40);

    expect(Object.isFrozen(store.snapshot())).toBe(true);
  });

  it('should accept an initial snapshot', () => {
    const store = createMetricsStore({ ...EMPTY_SNAPSHOT, readErrorsTotal: 7 });

    expect(store.snapshot().readErrorsTotal).toBe(7);
  });
});
