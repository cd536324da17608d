/**
 * Exposition type definitions
 */

import type { AddressInfo } from 'net';
import type { Registry } from 'prom-client';

import type { Logger } from '../../logging';

export interface RegistryOptions {
  /** Prepended to every metric name (e.g. "dht22_") */
  prefix: string;
}

/**
 * The part of a prom-client registry the HTTP handler needs
 */
export type MetricsRegistry = Pick<Registry, 'metrics' | 'contentType'>;

export interface ExpositionConfig {
  host: string;
  port: number;
  metricsPath: string;
}

export interface ExpositionDependencies {
  registry: MetricsRegistry;
  logger: Logger;
}

export interface ExpositionServer {
  /**
   * Bind the configured address
   * @throws {StartupError} The address cannot be bound
   */
  listen(): Promise<AddressInfo>;

  /** Stop accepting connections and drop idle keep-alive sockets */
  close(): Promise<void>;
}
