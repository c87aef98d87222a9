/**
 * Database Connection Pool - Singleton
 * Layer: Infrastructure
 * Pattern: Singleton
 *
 * One knex pool per process, built lazily from DATABASE_URL the first time
 * anything asks for it (the digest, the chat loop or an HTTP request). The
 * pool is small: introspection and the occasional generated query are the
 * only traffic.
 *
 * `destroyDbConnection()` runs during graceful shutdown and at the end of the
 * CLI scripts so the process can exit.
 */
import knex, { Knex } from 'knex';

import { config } from '@core/config';
import { logger } from '@core/logger';
import { describeDatabase } from '@shared/redact';

let instance: Knex | null = null;

export function getDbConnection(): Knex {
  if (!instance) {
    instance = knex({
      client: 'pg',
      connection: {
        connectionString: config.database.url,
        ssl: config.database.ssl ? { rejectUnauthorized: false } : false,
      },
      pool: {
        min: config.database.pool.min,
        max: config.database.pool.max,
        afterCreate: (conn: unknown, done: (err: Error | null, conn: unknown) => void) => {
          logger.debug('New database connection established');
          done(null, conn);
        },
      },
      acquireConnectionTimeout: 10000,
    });

    logger.info(
      { database: describeDatabase(config.database.url), schema: config.database.schema },
      'Database connection pool initialized',
    );
  }

  return instance;
}

/** Tears down the pool (used on SIGTERM / script exit). */
export async function destroyDbConnection(): Promise<void> {
  if (instance) {
    await instance.destroy();
    instance = null;
    logger.info('Database connection pool destroyed');
  }
}
