/**
 * Dependency Injection Container - The Central "Phone Book"
 * Layer: Core
 *
 * The single place where every token is mapped to an implementation:
 *   - `useValue` for ready-made singletons (config, logger).
 *   - `instanceCachingFactory` for the external clients (knex pool, OpenAI,
 *     Qdrant) and the ignore list, so nothing connects or reads a file until
 *     the first class that needs it is resolved. The health endpoint and the
 *     unit tests never open a socket.
 *   - `useClass` for adapters and services; each declares its own
 *     dependencies with @inject(TOKENS.X).
 *
 * Tests swap any of these by registering a fake under the same token before
 * resolving the class under test.
 */
import 'reflect-metadata';
import { QdrantClient } from '@qdrant/js-client-rest';
import OpenAI from 'openai';
import { container, instanceCachingFactory } from 'tsyringe';

import { config } from './config';
import { logger } from './logger';
import { TOKENS } from './types';

import { ChatService } from '@application/services/ChatService';
import { SchemaDigestService } from '@application/services/SchemaDigestService';
import { SchemaEnrichmentService } from '@application/services/SchemaEnrichmentService';
import { SchemaIndexService } from '@application/services/SchemaIndexService';
import { TextToSqlService } from '@application/services/TextToSqlService';
import { FileSchemaCache } from '@infrastructure/cache/FileSchemaCache';
import { getDbConnection } from '@infrastructure/database/connection';
import { KnexQueryExecutor } from '@infrastructure/database/KnexQueryExecutor';
import { PostgresSchemaIntrospector } from '@infrastructure/database/PostgresSchemaIntrospector';
import { TableIgnoreList } from '@infrastructure/files/TableIgnoreList';
import { OpenAiLanguageModel } from '@infrastructure/llm/OpenAiLanguageModel';
import { buildQdrantClientParams, QdrantVectorStore } from '@infrastructure/vector/QdrantVectorStore';

container.register(TOKENS.Config, { useValue: config });
container.register(TOKENS.Logger, { useValue: logger });

container.register(TOKENS.Knex, { useFactory: instanceCachingFactory(() => getDbConnection()) });
container.register(TOKENS.OpenAI, {
  useFactory: instanceCachingFactory(
    () =>
      new OpenAI({
        apiKey: config.openai.apiKey,
        baseURL: config.openai.baseUrl,
        timeout: config.openai.timeoutMs,
        maxRetries: config.openai.maxRetries,
      }),
  ),
});
container.register(TOKENS.Qdrant, {
  useFactory: instanceCachingFactory(
    () =>
      new QdrantClient(
        buildQdrantClientParams(config.qdrant.url, config.qdrant.port, config.qdrant.apiKey),
      ),
  ),
});
container.register(TOKENS.TableIgnoreList, {
  useFactory: instanceCachingFactory(() => TableIgnoreList.fromFile(config.schema.ignoreFile, logger)),
});

container.register(TOKENS.SchemaIntrospector, { useClass: PostgresSchemaIntrospector });
container.register(TOKENS.QueryExecutor, { useClass: KnexQueryExecutor });
container.register(TOKENS.LanguageModel, { useClass: OpenAiLanguageModel });
container.register(TOKENS.VectorStore, { useClass: QdrantVectorStore });
container.register(TOKENS.SchemaCache, { useClass: FileSchemaCache });

container.register(TOKENS.TextToSqlEngine, { useClass: TextToSqlService });
container.register(TOKENS.SchemaEnrichmentService, { useClass: SchemaEnrichmentService });
container.register(TOKENS.SchemaIndexService, { useClass: SchemaIndexService });
container.register(TOKENS.SchemaDigestService, { useClass: SchemaDigestService });
container.register(TOKENS.ChatService, { useClass: ChatService });

export { container };
