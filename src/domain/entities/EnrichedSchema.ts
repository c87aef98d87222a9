/**
 * Enriched Schema - Introspection + Model-Written Descriptions
 * Layer: Domain
 *
 * The digest writes this document to the schema cache and both the vector
 * store payloads and the chat validator read from it. `metadata.database` is
 * the connection string with its password masked.
 */
import type { TableSchema } from '@domain/entities/TableSchema';

export interface SchemaMetadata {
  generatedAt: string;
  database: string;
  schema: string;
  ignoredPatterns: string[];
}

export interface EnrichedTable {
  schema: TableSchema;
  description: string;
}

export interface EnrichedSchema {
  metadata: SchemaMetadata;
  tables: Record<string, EnrichedTable>;
}
