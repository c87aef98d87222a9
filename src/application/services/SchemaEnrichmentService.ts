/**
 * Schema Enrichment Service
 * Layer: Application
 *
 * First half of the digest: introspect every table that survives the ignore
 * list, ask the description model to explain each one, and write the result
 * to the schema cache. The chat side later reads the same cache back through
 * loadEnrichedSchema().
 */
import { inject, injectable } from 'tsyringe';

import { buildTableDescriptionPrompt } from '@application/prompts/tableDescription.prompt';
import type { AppConfig } from '@core/config';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { EnrichedSchema, EnrichedTable } from '@domain/entities/EnrichedSchema';
import type { TableSchema } from '@domain/entities/TableSchema';
import type { ILanguageModel } from '@domain/interfaces/ILanguageModel';
import type { ISchemaCache } from '@domain/interfaces/ISchemaCache';
import type { ISchemaIntrospector } from '@domain/interfaces/ISchemaIntrospector';
import type { TableIgnoreList } from '@infrastructure/files/TableIgnoreList';
import { NotFoundError } from '@shared/errors/AppError';
import { redactConnectionString } from '@shared/redact';

@injectable()
export class SchemaEnrichmentService {
  constructor(
    @inject(TOKENS.SchemaIntrospector) private introspector: ISchemaIntrospector,
    @inject(TOKENS.LanguageModel) private llm: ILanguageModel,
    @inject(TOKENS.SchemaCache) private cache: ISchemaCache,
    @inject(TOKENS.TableIgnoreList) private ignoreList: TableIgnoreList,
    @inject(TOKENS.Config) private settings: AppConfig,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  get ignoredPatterns(): string[] {
    return this.ignoreList.patterns;
  }

  async extractSchema(): Promise<Record<string, TableSchema>> {
    const names = await this.introspector.listTables();
    const { sampleRows } = this.settings.schema;
    const tables: Record<string, TableSchema> = {};

    for (const name of names) {
      if (!this.ignoreList.shouldProcess(name)) continue;

      const schema = await this.introspector.describeTable(name);
      if (sampleRows > 0) {
        const samples = await this.introspector.sampleValues(name, sampleRows);
        if (Object.keys(samples).length > 0) schema.sampleValues = samples;
      }
      tables[name] = schema;
    }

    this.log.info(
      { found: names.length, kept: Object.keys(tables).length },
      'Schema extracted',
    );
    return tables;
  }

  async describeTable(tableName: string, schema: TableSchema): Promise<string> {
    const answer = await this.llm.complete(buildTableDescriptionPrompt(tableName, schema), {
      model: this.settings.openai.descriptionModel,
    });
    return answer.trim();
  }

  async processSchema(): Promise<EnrichedSchema> {
    this.log.info('Starting schema enrichment');
    const extracted = await this.extractSchema();
    const names = Object.keys(extracted);

    if (names.length === 0) {
      throw new NotFoundError(`No tables found in schema "${this.settings.database.schema}"`);
    }

    const tables: Record<string, EnrichedTable> = {};
    for (const [index, name] of names.entries()) {
      this.log.info({ table: name, progress: `${index + 1}/${names.length}` }, 'Describing table');
      tables[name] = {
        schema: extracted[name],
        description: await this.describeTable(name, extracted[name]),
      };
    }

    const enriched: EnrichedSchema = {
      metadata: {
        generatedAt: new Date().toISOString(),
        database: redactConnectionString(this.settings.database.url),
        schema: this.settings.database.schema,
        ignoredPatterns: [...this.ignoreList.patterns],
      },
      tables,
    };

    await this.cache.save(enriched);
    this.log.info({ tables: names.length }, 'Schema enrichment completed');
    return enriched;
  }

  loadEnrichedSchema(): Promise<EnrichedSchema | null> {
    return this.cache.load();
  }
}
