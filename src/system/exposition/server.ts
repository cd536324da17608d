/**
 * HTTP exposition endpoint
 *
 * Serves the registry in the Prometheus text format on GET and HEAD of the
 * metrics path. Anything else is a 404 or a 405.
 */

import * as http from 'http';
import type { AddressInfo } from 'net';

import { StartupError } from '../../types/errors';
import type { ExpositionConfig, ExpositionDependencies, ExpositionServer } from './types';

type RequestHandler = (req: http.IncomingMessage, res: http.ServerResponse) => Promise<void>;

function sendText(res: http.ServerResponse, status: number, body: string, headers: http.OutgoingHttpHeaders = {}): void {
  res.writeHead(status, { ...headers, 'Content-Type': 'text/plain; charset=utf-8' });
  res.end(body);
}

/**
 * Build the request handler for the metrics endpoint
 */
export function createMetricsHandler(metricsPath: string, deps: ExpositionDependencies): RequestHandler {
  return async function handle(req, res) {
    const url = req.url !== undefined ? req.url : '/';
    const path = url.split('?')[0];

    if (path !== metricsPath) {
      sendText(res, 404, 'Not Found\n');
      return;
    }

    if (req.method !== 'GET' && req.method !== 'HEAD') {
      sendText(res, 405, 'Method Not Allowed\n', { Allow: 'GET, HEAD' });
      return;
    }

    try {
      const body = await deps.registry.metrics();
      res.writeHead(200, { 'Content-Type': deps.registry.contentType });
      res.end(req.method === 'HEAD' ? undefined : body);
    } catch (err) {
      deps.logger.critical('Failed to render metrics: ' + String(err));
      sendText(res, 500, 'Internal Server Error\n');
    }
  };
}

export function createExpositionServer(config: ExpositionConfig, deps: ExpositionDependencies): ExpositionServer {
  const handle = createMetricsHandler(config.metricsPath, deps);

  const server = http.createServer((req, res) => {
    void handle(req, res);
  });

  function listen(): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      function onError(err: Error): void {
        reject(new StartupError('Cannot bind ' + config.host + ':' + config.port, { cause: err }));
      }

      server.once('error', onError);
      server.listen(config.port, config.host, () => {
        server.removeListener('error', onError);
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new StartupError('Unexpected server address for ' + config.host + ':' + config.port));
          return;
        }
        deps.logger.info('Serving metrics on http://' + address.address + ':' + address.port + config.metricsPath);
        resolve(address);
      });
    });
  }

  function close(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!server.listening) {
        resolve();
        return;
      }
      server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
      server.closeAllConnections();
    });
  }

  return {
    listen: listen,
    close: close
  };
}
