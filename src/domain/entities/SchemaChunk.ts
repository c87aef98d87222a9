/**
 * Schema Chunk - The Unit Stored in the Vector Store
 * Layer: Domain
 *
 * One chunk per table. `text` is what gets embedded; `payload` travels with
 * the vector so a search hit can be turned back into a RelevantTable without
 * re-reading the cache.
 */
import type { TableSchema } from '@domain/entities/TableSchema';

// A type alias (not an interface) so it stays assignable to the vector
// store's `Record<string, unknown>` payload type.
export type SchemaChunkPayload = {
  tableName: string;
  description: string;
  schema: TableSchema;
  text: string;
};

export interface SchemaChunk {
  id: number;
  text: string;
  payload: SchemaChunkPayload;
}

export interface VectorPoint {
  id: number;
  vector: number[];
  payload: SchemaChunkPayload;
}

export interface ScoredChunk {
  score: number;
  payload: SchemaChunkPayload;
}

/** A search hit as the SQL generator consumes it. */
export interface RelevantTable {
  tableName: string;
  description: string;
  schema: TableSchema;
  similarityScore: number;
}
