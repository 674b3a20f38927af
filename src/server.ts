/**
 * HTTP entry point (`npm start`).
 *
 * The primary process only forks WEB_CONCURRENCY workers (all CPUs when 0)
 * and replaces any that exit. Each worker owns its Express app, its knex
 * pool and its upstream sockets; the port is shared.
 *
 * Ingestion is I/O-bound and every worker adds load on the upstream, so one
 * worker is usually enough.
 *
 * On SIGTERM/SIGINT a worker stops accepting connections, lets in-flight
 * requests (and the runs behind them) finish, closes its pool and exits.
 */
import cluster from 'node:cluster';
import os from 'node:os';

import { config } from '@core/config';
import { logger } from '@core/logger';
import { destroyDbConnection } from '@infrastructure/database/connection';
import { createApp } from '@interfaces/http/app';

const numWorkers = config.cluster.workers || os.cpus().length;

if (cluster.isPrimary) {
  logger.info(
    { pid: process.pid, workers: numWorkers },
    `Primary process starting >> forking ${numWorkers} workers`,
  );

  for (let i = 0; i < numWorkers; i++) {
    cluster.fork();
  }

  cluster.on('exit', (worker, code, signal) => {
    logger.warn({ pid: worker.process.pid, code, signal }, 'Worker exited, forking a replacement');
    cluster.fork();
  });
} else {
  const app = createApp();

  const server = app.listen(config.port, () => {
    logger.info({ pid: process.pid, port: config.port }, `Worker listening on :${config.port}`);
  });

  const shutdown = (signal: string): void => {
    logger.info({ pid: process.pid, signal }, 'Graceful shutdown initiated');
    server.close(() => {
      destroyDbConnection().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, 'Failed to close the database pool');
          process.exit(1);
        },
      );
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}
