/**
 * Sensor sampler
 *
 * Drives one trigger-capture-decode cycle per call and applies the failure
 * policy: a failed sample is counted and logged, the last good reading keeps
 * being served, and the next scheduled sample is the retry.
 */

import { fmtReading } from '../../logging';
import type { Reading } from '../../types/common';
import { isSensorError } from '../../types/errors';
import type { SensorError } from '../../types/errors';
import { decodeCapture } from '../protocol-decoder';
import type {
  SampleResult,
  SamplerConfig,
  SamplerDependencies,
  SamplerState,
  SensorSampler
} from './types';

export function createInitialSamplerState(): SamplerState {
  return {
    lastGoodReading: null,
    consecutiveFailures: 0,
    readErrorsTotal: 0,
    phase: 'idle',
    lastOutcome: 'none'
  };
}

/**
 * Create a sensor sampler
 *
 * @param config - Trigger timing, decoder settings and alert threshold
 * @param deps - Pulse source to read from, store to publish to, logger
 *
 * @example
 * ```typescript
 * const sampler = createSensorSampler(samplerConfig, { source, store, logger });
 * const result = await sampler.sample();
 * if (!result.ok) console.log(result.error.code);
 * ```
 */
export function createSensorSampler(config: SamplerConfig, deps: SamplerDependencies): SensorSampler {
  const state = createInitialSamplerState();
  const logger = deps.logger;

  async function sample(): Promise<SampleResult> {
    if (state.phase === 'sampling') {
      throw new Error('sample() called while a sample is in flight');
    }
    state.phase = 'sampling';

    try {
      const window = await deps.source.capture(config.triggerLowUs, config.captureTimeoutUs);
      logger.debug('Captured ' + window.edges.length + ' edges');

      return recordSuccess(decodeCapture(window, config.decoder));
    } catch (err) {
      if (!isSensorError(err)) throw err;
      return recordFailure(err);
    } finally {
      state.phase = 'idle';
    }
  }

  function recordSuccess(reading: Reading): SampleResult {
    const failedBefore = state.consecutiveFailures;

    state.lastGoodReading = reading;
    state.consecutiveFailures = 0;
    state.lastOutcome = 'success';

    deps.store.publishAll({
      humidity: reading.humidity,
      temperature: reading.temperature,
      lastSuccessTimestamp: reading.timestamp
    });

    if (failedBefore > 0) {
      logger.info('Sensor recovered after ' + failedBefore + ' failed read(s): ' + fmtReading(reading));
    } else {
      logger.debug('Reading: ' + fmtReading(reading));
    }

    return { ok: true, reading: reading };
  }

  function recordFailure(error: SensorError): SampleResult {
    state.consecutiveFailures++;
    state.readErrorsTotal++;
    state.lastOutcome = 'failed';

    deps.store.publish('readErrorsTotal', state.readErrorsTotal);

    logger.warning(
      'Sensor read failed [' + error.code + ']: ' + error.message +
      ' (' + state.consecutiveFailures + ' in a row, serving ' + fmtReading(state.lastGoodReading) + ')'
    );

    if (state.consecutiveFailures === config.failureAlertThreshold) {
      logger.critical(
        'Sensor has failed ' + state.consecutiveFailures + ' consecutive reads, last good reading: ' +
        fmtReading(state.lastGoodReading)
      );
    }

    return { ok: false, error: error };
  }

  function getState(): Readonly<SamplerState> {
    return { ...state };
  }

  return {
    sample: sample,
    getState: getState
  };
}
