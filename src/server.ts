/**
 * Server Entry Point - HTTP API & Graceful Shutdown
 * Layer: Entry Point (top of the dependency tree)
 *
 * Starts the HTTP API (`npm start` / `npm run dev`) in a single process: the
 * work per request is dominated by OpenAI round trips, not CPU.
 *
 * Required settings are checked before the app is built, so a missing
 * DATABASE_URL or OPENAI_API_KEY stops the process with one clear line.
 *
 * Graceful shutdown on SIGTERM/SIGINT:
 *   1. Stop accepting new connections (server.close()).
 *   2. Wait for in-flight requests to finish.
 *   3. Destroy the knex pool.
 *   4. Exit with code 0.
 */
import 'reflect-metadata';

import { assertRequiredSettings, config } from '@core/config';
import { logger } from '@core/logger';
import { destroyDbConnection } from '@infrastructure/database/connection';
import { createApp } from '@interfaces/http/app';
import { errorMessage } from '@shared/errors/AppError';

try {
  assertRequiredSettings();
} catch (err) {
  logger.fatal(errorMessage(err));
  process.exit(1);
}

const app = createApp();

const server = app.listen(config.port, () => {
  logger.info({ pid: process.pid, port: config.port }, `HTTP API listening on :${config.port}`);
});

let shuttingDown = false;

const shutdown = (signal: string) => {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ pid: process.pid, signal }, 'Graceful shutdown initiated');

  server.close(() => {
    destroyDbConnection()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, 'Error while closing the database pool');
        process.exit(1);
      });
  });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
