/**
 * Server Entry Point — Clustering & Graceful Shutdown
 * Layer: Entry Point
 *
 * The primary process forks one worker per CPU core (or WEB_CONCURRENCY) and
 * replaces any worker that dies. Each worker runs its own Express app; the
 * kernel balances connections across them on the shared port.
 *
 * On SIGTERM/SIGINT a worker stops accepting connections, lets in-flight
 * requests finish, then exits.
 */
import cluster from 'node:cluster';
import os from 'node:os';

import { config } from '@core/config';
import { logger } from '@core/logger';
import { createApp } from '@interfaces/http/app';

const numWorkers = config.cluster.workers || os.cpus().length;

if (cluster.isPrimary) {
  logger.info(
    { pid: process.pid, workers: numWorkers },
    `Primary process starting >> forking ${numWorkers} workers`,
  );

  if (config.errors.displayErrorDetails && config.isProd) {
    logger.warn('DISPLAY_ERROR_DETAILS is enabled in production; error bodies will expose traces');
  }

  for (let i = 0; i < numWorkers; i++) {
    cluster.fork();
  }

  cluster.on('exit', (worker, code, signal) => {
    logger.warn({ pid: worker.process.pid, code, signal }, 'Worker died — restarting');
    cluster.fork();
  });
} else {
  const app = createApp();

  const server = app.listen(config.port, () => {
    logger.info({ pid: process.pid, port: config.port }, `Worker listening on :${config.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info({ pid: process.pid, signal }, 'Graceful shutdown initiated');
    server.close(() => {
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}
