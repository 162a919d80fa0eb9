#!/usr/bin/env node
import { createDefaultRegistry } from '../transports/index.js';
import { EXIT_FAILURE, runCli } from './run.js';

function waitForStop(): Promise<void> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });
}

runCli(process.argv.slice(2), {
  stdin: process.stdin,
  stdout: (chunk) => {
    process.stdout.write(chunk);
  },
  stderr: (line) => console.error(line),
  env: process.env,
  waitForStop,
  createRegistry: createDefaultRegistry,
}).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err instanceof Error ? `error: ${err.message}` : err);
    process.exitCode = EXIT_FAILURE;
  },
);
