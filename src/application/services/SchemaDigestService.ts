/**
 * Schema Digest Service
 * Layer: Application
 * Pattern: Facade
 *
 * The digest entry point in one call: reuse the enriched schema the user
 * chose to keep, or build a new one, then index it in the vector store.
 */
import { inject, injectable } from 'tsyringe';

import type { SchemaEnrichmentService } from '@application/services/SchemaEnrichmentService';
import type { SchemaIndexService } from '@application/services/SchemaIndexService';
import type { AppConfig } from '@core/config';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { EnrichedSchema } from '@domain/entities/EnrichedSchema';
import type { ISchemaCache } from '@domain/interfaces/ISchemaCache';
import type { DigestResult } from '@shared/types';

@injectable()
export class SchemaDigestService {
  constructor(
    @inject(TOKENS.SchemaEnrichmentService) private enrichment: SchemaEnrichmentService,
    @inject(TOKENS.SchemaIndexService) private index: SchemaIndexService,
    @inject(TOKENS.SchemaCache) private cache: ISchemaCache,
    @inject(TOKENS.Config) private settings: AppConfig,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async digest(existing: EnrichedSchema | null = null): Promise<DigestResult> {
    const started = Date.now();

    let schema: EnrichedSchema;
    if (existing) {
      this.log.info({ file: this.cache.location }, 'Reusing cached enriched schema');
      schema = existing;
    } else {
      schema = await this.enrichment.processSchema();
    }

    const chunkCount = await this.index.storeSchemaEmbeddings(schema);

    return {
      tableCount: Object.keys(schema.tables).length,
      chunkCount,
      durationMs: Date.now() - started,
      ignoredPatterns: schema.metadata.ignoredPatterns,
      cacheFile: this.cache.location,
      collection: this.settings.qdrant.collection,
    };
  }
}
