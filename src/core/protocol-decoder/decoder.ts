/**
 * DHT single-wire protocol decoder
 *
 * Turns the edges recorded for one trigger cycle into a validated reading.
 * Pure: no I/O, no clock, no shared state.
 *
 * Line activity after the host releases the line:
 *
 *   ‾‾‾|___80µs___|‾‾‾80µs‾‾‾|__50µs__|‾26µs‾ or ‾70µs‾|__50µs__| ... x40
 *      response low  response high     bit 0 high          bit 1
 */

import type { CaptureWindow, Edge, Frame, Reading } from '../../types/common';
import {
  ChecksumError,
  IncompleteFrameError,
  OutOfRangeError,
  ResponseMissingError
} from '../../types/errors';
import { PROTOCOL_CONSTANTS } from '../../utils/constants';
import { bitsToFrame, computeChecksum, convertDht11, convertDht22, isInRange } from './helpers';
import type { Bit, DecoderConfig, Measurement } from './types';

/**
 * Locate the sensor's response and decode up to 40 data bits
 *
 * @returns Decoded bits (possibly fewer than 40 if the window is cut short)
 * @throws {ResponseMissingError} No well-formed response pulse pair was found
 */
export function extractBits(edges: readonly Edge[], config: DecoderConfig): Bit[] {
  let i = 0;

  // Host release pulls the line high before the sensor answers
  while (i < edges.length && edges[i].level === 1) i++;

  if (i + 2 >= edges.length) {
    throw new ResponseMissingError('No response from sensor (' + edges.length + ' edges captured)');
  }

  const responseStart = edges[i];
  const responseHigh = edges[i + 1];
  const dataStart = edges[i + 2];

  if (responseHigh.level !== 1 || dataStart.level !== 0) {
    throw new ResponseMissingError('Malformed response: levels do not alternate');
  }

  checkResponsePulse('low', responseHigh.timestampUs - responseStart.timestampUs, config);
  checkResponsePulse('high', dataStart.timestampUs - responseHigh.timestampUs, config);

  const bits: Bit[] = [];
  let j = i + 3;

  while (bits.length < PROTOCOL_CONSTANTS.FRAME_BITS && j + 1 < edges.length) {
    const rise = edges[j];
    const fall = edges[j + 1];

    if (rise.level !== 1 || fall.level !== 0) break;

    const highUs = fall.timestampUs - rise.timestampUs;
    if (highUs > config.bitMaxUs) break;

    bits.push(highUs < config.bitThresholdUs ? 0 : 1);
    j += 2;
  }

  return bits;
}

/**
 * Validate a complete frame and convert it for the configured model
 *
 * @throws {ChecksumError} Checksum byte does not match the data bytes
 * @throws {OutOfRangeError} Values are outside the physical range
 */
export function decodeFrame(frame: Frame, model: DecoderConfig['model']): Measurement {
  const expected = computeChecksum(frame[0], frame[1], frame[2], frame[3]);
  if (expected !== frame[4]) {
    throw new ChecksumError(expected, frame[4]);
  }

  const dht22 = convertDht22(frame);

  if (model === 'dht11') {
    const dht11 = convertDht11(frame);
    if (dht11 === null) {
      throw new OutOfRangeError(frame[0], frame[2]);
    }
    return dht11;
  }

  if (isInRange(dht22)) return dht22;

  if (model === 'auto') {
    const dht11 = convertDht11(frame);
    if (dht11 !== null) return dht11;
  }

  throw new OutOfRangeError(dht22.humidity, dht22.temperature);
}

/**
 * Decode one capture window into a reading
 *
 * @throws {ResponseMissingError | IncompleteFrameError | ChecksumError | OutOfRangeError}
 */
export function decodeCapture(window: CaptureWindow, config: DecoderConfig): Reading {
  const bits = extractBits(window.edges, config);

  if (bits.length < PROTOCOL_CONSTANTS.FRAME_BITS) {
    throw new IncompleteFrameError(bits.length);
  }

  const measurement = decodeFrame(bitsToFrame(bits), config.model);

  return {
    humidity: measurement.humidity,
    temperature: measurement.temperature,
    timestamp: window.capturedAt
  };
}

function checkResponsePulse(name: 'low' | 'high', durationUs: number, config: DecoderConfig): void {
  if (durationUs < config.responseMinUs || durationUs > config.responseMaxUs) {
    throw new ResponseMissingError(
      'Response ' + name + ' pulse of ' + durationUs + 'us outside ' +
      config.responseMinUs + '-' + config.responseMaxUs + 'us'
    );
  }
}
