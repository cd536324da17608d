/**
 * Type declarations for pigpio-client (ships without typings)
 * Covers the subset of the socket client API used by the exporter.
 */

declare module 'pigpio-client' {
  import type { EventEmitter } from 'events';

  export interface PigpioOptions {
    host?: string;
    port?: number;
  }

  /**
   * Completion callback of a daemon request; res is the daemon's return code.
   * A request made without a callback reports its failure as an 'error' event.
   */
  export type RequestCallback = (err: Error | null | undefined, res?: number) => void;

  export type NotifyCallback = (level: number, tick: number) => void;

  export interface Gpio {
    modeSet(mode: 'input' | 'output', callback?: RequestCallback): void;
    pullUpDown(pud: 0 | 1 | 2, callback?: RequestCallback): void;
    write(level: 0 | 1, callback: RequestCallback): void;
    notify(callback: NotifyCallback): void;
    endNotify(callback?: RequestCallback): void;
  }

  /**
   * Emits 'connected' once the sockets are up, 'disconnected' when the
   * daemon goes away and 'error' for socket and unanswered-request failures.
   */
  export interface Pigpio extends EventEmitter {
    gpio(pin: number): Gpio;
    end(callback?: () => void): void;
  }

  export function pigpio(options?: PigpioOptions): Pigpio;
}
