#!/usr/bin/env node
/**
 * Exporter entry point
 */

import dotenv from 'dotenv';

import { initialize } from './init';
import { connectPigpio } from '../hardware/pulse-source';
import type { ExporterApp } from './types';

dotenv.config();

let app: ExporterApp | null = null;
let stopping = false;

function shutdown(exitCode: number): void {
  if (stopping) return;
  stopping = true;

  const running = app;
  if (running === null) {
    process.exit(exitCode);
  }

  running.stop().then(
    () => process.exit(exitCode),
    (err: unknown) => {
      console.error('Shutdown failed: ' + String(err));
      process.exit(1);
    }
  );
}

initialize({
  env: process.env,
  streams: { out: process.stdout, err: process.stderr },
  colors: process.stdout.isTTY === true,
  connect: connectPigpio,
  onFatal: () => shutdown(1)
}).then(
  (ready) => {
    app = ready;
    process.once('SIGINT', () => shutdown(0));
    process.once('SIGTERM', () => shutdown(0));
    ready.start();
  },
  (err: unknown) => {
    console.error('INIT FAIL: ' + (err instanceof Error ? err.message : String(err)));
    process.exit(1);
  }
);
