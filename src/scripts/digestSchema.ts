/**
 * Digest CLI Script - Schema Enrichment & Indexing
 * Layer: Entry Point (CLI, not HTTP)
 *
 * npm run digest. On the very first run I only write a commented
 * .nlsqlignore and stop, so tables can be excluded before anything is sent
 * to OpenAI. After that: check settings, offer to reuse an existing enriched
 * schema (anything but "y" exits), otherwise introspect + describe every
 * table, then embed and store one point per table in Qdrant and print a
 * summary. Any failure is logged and exits with code 1.
 */
import 'reflect-metadata';

import readline from 'node:readline/promises';

import type { SchemaDigestService } from '@application/services/SchemaDigestService';
import { assertRequiredSettings, config } from '@core/config';
import { container } from '@core/container';
import { logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { EnrichedSchema } from '@domain/entities/EnrichedSchema';
import type { ISchemaCache } from '@domain/interfaces/ISchemaCache';
import { destroyDbConnection } from '@infrastructure/database/connection';
import { TableIgnoreList } from '@infrastructure/files/TableIgnoreList';
import { describeQdrant } from '@infrastructure/vector/QdrantVectorStore';
import { formatDuration } from '@interfaces/cli/formatters';
import { errorMessage } from '@shared/errors/AppError';
import { describeDatabase } from '@shared/redact';

// eslint-disable-next-line no-console
const log = console.log;

async function confirm(prompt: string): Promise<boolean> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    const reply = await rl.question(prompt);
    return reply.trim().toLowerCase() === 'y';
  } finally {
    rl.close();
  }
}

async function main(): Promise<void> {
  log('');
  log('╔══════════════════════════════════════════════════╗');
  log('║            nlsql - Schema Digest                 ║');
  log('╚══════════════════════════════════════════════════╝');
  log('');

  const ignoreFile = config.schema.ignoreFile;
  if (TableIgnoreList.createDefaultIgnoreFile(ignoreFile)) {
    logger.info({ file: ignoreFile }, 'Created default ignore file');
    log(`  A default ${ignoreFile} file has been created.`);
    log('  Please review and modify it to specify tables you want to exclude.');
    log('  Then run this script again.');
    return;
  }

  assertRequiredSettings();

  log(`  Database:     ${describeDatabase(config.database.url)} (schema ${config.database.schema})`);
  log(`  Vector store: ${describeQdrant(config.qdrant.url, config.qdrant.port)}`);
  log('');

  const cache = container.resolve<ISchemaCache>(TOKENS.SchemaCache);
  let existing: EnrichedSchema | null = null;
  if (cache.exists()) {
    log(`  Found an existing enriched schema at ${cache.location}.`);
    log('  To regenerate it, delete the cache directory first.');
    if (!(await confirm('Do you want to continue with the existing schema? (y/n) '))) {
      logger.info('Exiting as per user request');
      return;
    }
    existing = await cache.load();
  }

  const digest = container.resolve<SchemaDigestService>(TOKENS.SchemaDigestService);
  const result = await digest.digest(existing);

  log('');
  log('  ✓ Digestion complete');
  log('='.repeat(50));
  log(`  Total tables processed: ${result.tableCount}`);
  log(`  Embeddings stored:      ${result.chunkCount}`);
  log(`  Duration:               ${formatDuration(result.durationMs)}`);
  if (result.ignoredPatterns.length > 0) {
    log('');
    log('  Ignored table patterns:');
    for (const pattern of result.ignoredPatterns) log(`    - ${pattern}`);
  }
  log('');
  log(`  Enriched schema file: ${result.cacheFile}`);
  log(`  Vector store:         ${describeQdrant(config.qdrant.url, config.qdrant.port)}`);
  log(`  Collection:           ${result.collection}`);
  log('');
  log('  You can now run `npm run chat` to query your database.');
  log('');
}

main()
  .then(() => destroyDbConnection())
  .catch(async (err: unknown) => {
    logger.error({ err }, 'Error during schema digestion');
    // eslint-disable-next-line no-console
    console.error(`Error: ${errorMessage(err)}`);
    await destroyDbConnection();
    process.exit(1);
  });
