/**
 * Pulse source backed by the pigpio daemon
 *
 * Talks to pigpiod over its socket interface (pigpio-client). The daemon
 * timestamps every transition with its own microsecond tick, so capture
 * timing does not depend on Node's event loop latency.
 */

import { pigpio } from 'pigpio-client';
import type { Gpio, Pigpio, RequestCallback } from 'pigpio-client';

import type { CaptureWindow, Edge } from '../../types/common';
import { HardwareUnavailableError, StartupError } from '../../types/errors';
import { usToTimerMs } from '../../utils/time';
import { daemonCall, isFrameComplete, tickDiff, toLevel } from './helpers';
import type { PigpioHandle, PigpioSourceConfig, PigpioSourceDeps, PulseSource } from './types';

const PUD_UP = 2;

interface Link {
  client: PigpioHandle;
  gpio: Gpio;
}

/**
 * Open a connection to the pigpio daemon
 *
 * @throws {StartupError} The daemon is unreachable
 */
export function connectPigpio(host: string, port: number): Promise<Pigpio> {
  return new Promise((resolve, reject) => {
    const pi = pigpio({ host: host, port: port });

    function onConnected(): void {
      pi.removeListener('error', onError);
      resolve(pi);
    }

    function onError(err: unknown): void {
      pi.removeListener('connected', onConnected);
      reject(new StartupError('Cannot connect to pigpio daemon at ' + host + ':' + port, { cause: err }));
    }

    pi.once('connected', onConnected);
    pi.once('error', onError);
  });
}

/**
 * Create a pulse source on one GPIO pin of a connected daemon
 *
 * The source listens to the connection for its whole life. When the daemon
 * goes away every capture fails at once with HardwareUnavailableError and
 * starts a reconnect in the background; the first capture after it succeeds
 * samples again. Each daemon request has a deadline, so a capture always
 * settles.
 *
 * @param pi - Client connected at startup
 * @param config - Daemon address, pin and request deadline
 * @param deps - Reconnect, logging, clock and wait functions (injectable for tests)
 */
export function createPigpioPulseSource(
  pi: PigpioHandle,
  config: PigpioSourceConfig,
  deps: PigpioSourceDeps
): PulseSource {
  const pin = config.pin;
  const address = config.host + ':' + config.port;
  const logger = deps.logger;
  let link: Link | null = null;
  let reconnecting: Promise<void> | null = null;
  let closed = false;

  function call(action: string, request: (callback: RequestCallback) => void): Promise<number | undefined> {
    return daemonCall(action, config.callTimeoutMs, request);
  }

  function attach(client: PigpioHandle): void {
    const current: Link = { client: client, gpio: client.gpio(pin) };

    client.on('error', (err: unknown) => {
      logger.warning('pigpio daemon error: ' + String(err));
    });

    client.on('disconnected', () => {
      if (link !== current) return;
      link = null;
      logger.warning('Lost connection to pigpio daemon at ' + address);
    });

    link = current;
  }

  function reconnect(): void {
    if (reconnecting !== null || closed) return;

    logger.info('Reconnecting to pigpio daemon at ' + address);
    reconnecting = deps.connect(config.host, config.port).then(
      (client) => {
        if (closed) {
          client.end();
          return;
        }
        attach(client);
        logger.info('Reconnected to pigpio daemon at ' + address);
      },
      (err: unknown) => {
        logger.warning('Cannot reconnect to pigpio daemon at ' + address + ': ' + String(err));
      }
    ).finally(() => {
      reconnecting = null;
    });
  }

  async function capture(triggerLowUs: number, timeoutUs: number): Promise<CaptureWindow> {
    const current = link;
    if (current === null) {
      reconnect();
      throw new HardwareUnavailableError('pigpio daemon at ' + address + ' is disconnected');
    }

    const gpio = current.gpio;
    const capturedAt = deps.now();

    await call('drive GPIO ' + pin + ' low', (done) => gpio.pullUpDown(PUD_UP, done));
    await call('drive GPIO ' + pin + ' low', (done) => gpio.modeSet('output', done));
    await call('drive GPIO ' + pin + ' low', (done) => gpio.write(0, done));

    await deps.sleep(usToTimerMs(triggerLowUs));

    const recorder = recordEdges(gpio, timeoutUs);
    let releaseFailure: { error: unknown } | null = null;

    try {
      await call('release GPIO ' + pin, (done) => gpio.modeSet('input', done));
    } catch (err) {
      releaseFailure = { error: err };
      recorder.cancel();
    }

    const edges = await recorder.done;

    await call('stop notifications on GPIO ' + pin, (done) => gpio.endNotify(done));

    if (releaseFailure !== null) {
      throw releaseFailure.error;
    }

    return { edges: edges, capturedAt: capturedAt };
  }

  async function close(): Promise<void> {
    closed = true;
    if (reconnecting !== null) {
      await reconnecting;
    }

    const current = link;
    link = null;
    if (current === null) return;

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        logger.warning('pigpio daemon at ' + address + ' did not acknowledge close');
        resolve();
      }, config.callTimeoutMs);

      current.client.end(() => {
        clearTimeout(timer);
        resolve();
      });
    });
  }

  attach(pi);

  return {
    capture: capture,
    close: close
  };
}

/**
 * Record transitions until a full frame is seen or the line stays idle for timeoutUs
 */
function recordEdges(gpio: Gpio, timeoutUs: number): { done: Promise<Edge[]>; cancel: () => void } {
  const edges: Edge[] = [];
  const idleMs = usToTimerMs(timeoutUs);
  let firstTick: number | null = null;
  let fallingEdges = 0;
  let finished = false;
  let timer: ReturnType<typeof setTimeout> | null = null;
  let finish: () => void = () => undefined;

  const done = new Promise<Edge[]>((resolve) => {
    finish = () => {
      if (finished) return;
      finished = true;
      if (timer !== null) clearTimeout(timer);
      resolve(edges);
    };
  });

  function armIdleTimer(): void {
    if (timer !== null) clearTimeout(timer);
    timer = setTimeout(finish, idleMs);
  }

  gpio.notify((level, tick) => {
    if (finished) return;

    if (firstTick === null) firstTick = tick;
    const edge: Edge = { level: toLevel(level), timestampUs: tickDiff(firstTick, tick) };
    edges.push(edge);

    if (edge.level === 0) fallingEdges++;

    if (isFrameComplete(fallingEdges)) {
      finish();
    } else {
      armIdleTimer();
    }
  });

  armIdleTimer();

  return { done: done, cancel: finish };
}
