/**
 * Worker process entry point, forked by ProcessPool.
 *
 * Usage: node worker.js [preloadModule...]
 * Requests arrive over IPC; each is answered with one result message.
 */

import { createLogger } from '../logging/logger.js';
import { WorkerRuntime } from './WorkerRuntime.js';

// stdout is not ours to write; pino goes to stderr.
const logger = createLogger({
  name: 'tool-registry-worker',
  destination: process.stderr,
}).child({ pid: process.pid });

const send = process.send?.bind(process);
if (send === undefined) {
  process.stderr.write('Fatal: worker must be started with an IPC channel\n');
  process.exit(1);
}

const runtime = new WorkerRuntime({ logger });
const ready = runtime.preload(process.argv.slice(2));

ready.catch((err: unknown) => {
  logger.fatal({ err }, 'failed to preload modules');
  process.exit(1);
});

process.on('message', (message: unknown) => {
  ready
    .then(() => runtime.handle(message))
    .then(
      (response) => {
        if (response !== undefined) {
          send(response);
        }
      },
      (err: unknown) => {
        logger.error({ err }, 'failed to handle request');
      },
    );
});

// Parent gone: nothing left to serve.
process.on('disconnect', () => process.exit(0));
