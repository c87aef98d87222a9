/**
 * Schema Index Service - Embedding & Retrieval
 * Layer: Application
 *
 * Owns the vector side of the system. During the digest every table becomes
 * exactly one chunk (id = position in the enriched schema), the chunk texts
 * are embedded in batches and written to a freshly recreated collection, so
 * tables dropped from the database disappear from the index too. During the
 * chat a question is embedded once and the nearest chunks come back as
 * RelevantTable records, best match first.
 */
import { inject, injectable } from 'tsyringe';

import type { AppConfig } from '@core/config';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { EnrichedSchema } from '@domain/entities/EnrichedSchema';
import type { RelevantTable, SchemaChunk, VectorPoint } from '@domain/entities/SchemaChunk';
import type { TableSchema } from '@domain/entities/TableSchema';
import type { ILanguageModel } from '@domain/interfaces/ILanguageModel';
import type { IVectorStore } from '@domain/interfaces/IVectorStore';
import { EMBEDDING_BATCH_SIZE } from '@shared/constants';

export function formatChunkText(tableName: string, description: string, schema: TableSchema): string {
  const lines = [`Table: ${tableName}`, description, 'Columns:'];

  for (const [name, column] of Object.entries(schema.columns)) {
    let line = `- ${name} (${column.type})`;
    if (!column.nullable) line += ' NOT NULL';
    if (column.primaryKey) line += ' PRIMARY KEY';
    lines.push(line);
  }

  const samples = Object.entries(schema.sampleValues ?? {});
  if (samples.length > 0) {
    lines.push('Sample values:');
    for (const [column, values] of samples) {
      lines.push(`- ${column}: ${values.join(', ')}`);
    }
  }

  return lines.join('\n');
}

@injectable()
export class SchemaIndexService {
  constructor(
    @inject(TOKENS.LanguageModel) private llm: ILanguageModel,
    @inject(TOKENS.VectorStore) private store: IVectorStore,
    @inject(TOKENS.Config) private settings: AppConfig,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  buildChunks(schema: EnrichedSchema): SchemaChunk[] {
    return Object.entries(schema.tables).map(([tableName, table], id) => {
      const text = formatChunkText(tableName, table.description, table.schema);
      return {
        id,
        text,
        payload: { tableName, description: table.description, schema: table.schema, text },
      };
    });
  }

  async storeSchemaEmbeddings(schema: EnrichedSchema): Promise<number> {
    const chunks = this.buildChunks(schema);
    await this.store.recreateCollection();

    if (chunks.length === 0) {
      this.log.warn('Enriched schema has no tables, nothing to embed');
      return 0;
    }

    const points: VectorPoint[] = [];
    for (let start = 0; start < chunks.length; start += EMBEDDING_BATCH_SIZE) {
      const batch = chunks.slice(start, start + EMBEDDING_BATCH_SIZE);
      const vectors = await this.llm.embedMany(batch.map((chunk) => chunk.text));
      batch.forEach((chunk, i) => points.push({ id: chunk.id, vector: vectors[i], payload: chunk.payload }));
      this.log.debug({ embedded: points.length, total: chunks.length }, 'Embedding progress');
    }

    await this.store.upsert(points);
    this.log.info(
      { chunks: points.length, collection: this.settings.qdrant.collection },
      'Schema embeddings stored',
    );
    return points.length;
  }

  async findRelevantTables(
    question: string,
    topK: number = this.settings.retrieval.topK,
  ): Promise<RelevantTable[]> {
    const vector = await this.llm.embed(question);
    const hits = await this.store.search(vector, topK);

    const tables = hits
      .map((hit) => ({
        tableName: hit.payload.tableName,
        description: hit.payload.description,
        schema: hit.payload.schema,
        similarityScore: hit.score,
      }))
      .sort((a, b) => b.similarityScore - a.similarityScore);

    this.log.debug(
      { tables: tables.map((t) => `${t.tableName} (${t.similarityScore.toFixed(3)})`) },
      'Relevant tables retrieved',
    );
    return tables;
  }
}
