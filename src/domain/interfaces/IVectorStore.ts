/**
 * Vector Store Interface
 * Layer: Domain
 *
 * The digest rebuilds the collection from scratch on every run (no
 * incremental updates): rebuild, upsert and search are all it needs.
 */
import type { ScoredChunk, VectorPoint } from '@domain/entities/SchemaChunk';

export interface IVectorStore {
  /** Drops the collection if it exists and creates an empty one. */
  recreateCollection(): Promise<void>;

  upsert(points: VectorPoint[]): Promise<void>;

  /** Nearest neighbours of `vector`, best first. */
  search(vector: number[], limit: number): Promise<ScoredChunk[]>;
}
