/**
 * Exporter initialization
 *
 * Builds every component from the configuration and binds the HTTP
 * endpoint. Nothing samples until the returned app is started.
 */

import { loadConfig } from './config';
import { createPigpioPulseSource, createSyntheticPulseSource } from '../hardware/pulse-source';
import type { PulseSource } from '../hardware/pulse-source';
import { createConsoleSink, createLogger } from '../logging';
import type { Logger } from '../logging';
import { createSensorSampler } from '../core/sensor-sampler';
import { createMetricsStore } from '../system/metrics-store';
import { createScheduler } from '../system/scheduler';
import { createExporterRegistry, createExpositionServer } from '../system/exposition';
import type { ExporterConfig } from '../types/config';
import { now, nowMs, sleep } from '../utils/time';
import type { ExporterApp, InitDependencies } from './types';

/**
 * Load the configuration and wire the exporter
 *
 * @returns The app, already listening for scrapes
 * @throws {ConfigValidationError} The environment holds an invalid setting
 * @throws {StartupError} The pigpio daemon or the HTTP address is unavailable
 */
export async function initialize(deps: InitDependencies): Promise<ExporterApp> {
  const { config, warnings } = loadConfig(deps.env);

  const consoleSink = createConsoleSink(deps.streams, { colors: deps.colors }, config.LOG_LEVELS);
  const logger = createLogger({
    level: config.LOG_LEVEL,
    demoteHours: config.LOG_AUTO_DEMOTE_HOURS
  }, {
    timeSource: now,
    sinks: [{ sink: consoleSink, minLevel: config.LOG_LEVELS.DEBUG }]
  }, config.LOG_LEVELS);

  for (const warn of warnings) {
    logger.warning('[' + warn.field + ']: ' + warn.message);
  }

  const source = await openSource(config, deps, logger);

  const store = createMetricsStore();
  const registry = createExporterRegistry(store, { prefix: config.METRICS_PREFIX });
  const server = createExpositionServer({
    host: config.HTTP_ADDR,
    port: config.HTTP_PORT,
    metricsPath: config.METRICS_PATH
  }, {
    registry: registry,
    logger: logger
  });

  try {
    await server.listen();
  } catch (err) {
    await source.close();
    throw err;
  }

  const sampler = createSensorSampler({
    triggerLowUs: config.TRIGGER_LOW_US,
    captureTimeoutUs: config.CAPTURE_TIMEOUT_US,
    failureAlertThreshold: config.FAILURE_ALERT_THRESHOLD,
    decoder: {
      model: config.SENSOR_MODEL,
      bitThresholdUs: config.BIT_THRESHOLD_US,
      bitMaxUs: config.BIT_MAX_US,
      responseMinUs: config.RESPONSE_MIN_US,
      responseMaxUs: config.RESPONSE_MAX_US
    }
  }, {
    source: source,
    store: store,
    logger: logger
  });

  const scheduler = createScheduler({
    intervalMs: config.INTERVAL_SECONDS * 1000
  }, {
    task: sampler.sample,
    onError: (err) => {
      logger.critical('Sampling stopped: ' + String(err));
      deps.onFatal(err);
    },
    clock: nowMs,
    logger: logger
  });

  function start(): void {
    if (config.DUMMY_MODE) {
      logger.info('Running in dummy mode, metrics update every ' + config.INTERVAL_SECONDS + 's');
    } else {
      logger.info('Reading ' + config.SENSOR_MODEL + ' on GPIO ' + config.GPIO_PIN + ' every ' + config.INTERVAL_SECONDS + 's');
    }
    scheduler.start();
  }

  async function stop(): Promise<void> {
    await scheduler.stop();
    await server.close();
    await source.close();
    logger.info('Exporter stopped');
  }

  return {
    config: config,
    warnings: warnings,
    logger: logger,
    source: source,
    store: store,
    sampler: sampler,
    scheduler: scheduler,
    server: server,
    start: start,
    stop: stop
  };
}

async function openSource(config: ExporterConfig, deps: InitDependencies, logger: Logger): Promise<PulseSource> {
  if (config.DUMMY_MODE) {
    return createSyntheticPulseSource({
      bitThresholdUs: config.BIT_THRESHOLD_US,
      bitMaxUs: config.BIT_MAX_US
    });
  }

  logger.debug('Connecting to pigpio daemon at ' + config.PIGPIO_HOST + ':' + config.PIGPIO_PORT);
  const pi = await deps.connect(config.PIGPIO_HOST, config.PIGPIO_PORT);
  return createPigpioPulseSource(pi, {
    host: config.PIGPIO_HOST,
    port: config.PIGPIO_PORT,
    pin: config.GPIO_PIN,
    callTimeoutMs: config.PIGPIO_CALL_TIMEOUT_MS
  }, {
    connect: deps.connect,
    logger: logger,
    sleep: sleep,
    now: now
  });
}
