/**
 * Qdrant Vector Store
 * Layer: Infrastructure
 * Pattern: Adapter (implements IVectorStore)
 *
 * One collection holds one point per table. The digest always recreates it
 * (cosine distance, EMBEDDING_DIMENSIONS wide), so there is never a stale
 * point from a dropped table. Payloads read back from a search are parsed
 * with Zod; a point written by something else is skipped with a warning.
 */
import type { QdrantClient } from '@qdrant/js-client-rest';
import { inject, injectable } from 'tsyringe';

import type { AppConfig } from '@core/config';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { ScoredChunk, VectorPoint } from '@domain/entities/SchemaChunk';
import type { IVectorStore } from '@domain/interfaces/IVectorStore';
import { errorMessage, ExternalServiceError } from '@shared/errors/AppError';
import { schemaChunkPayloadSchema } from '@shared/schemas';

export interface QdrantConnectionParams {
  url?: string;
  host?: string;
  port: number;
  apiKey?: string;
}

/** `http(s)://` values are passed as URLs, anything else as a host name. */
export function buildQdrantClientParams(
  url: string,
  port: number,
  apiKey?: string,
): QdrantConnectionParams {
  const params: QdrantConnectionParams = /^https?:\/\//i.test(url) ? { url, port } : { host: url, port };
  if (apiKey) params.apiKey = apiKey;
  return params;
}

/** Address shown by the digest summary. */
export function describeQdrant(url: string, port: number): string {
  return /^https?:\/\//i.test(url) ? url : `${url}:${port}`;
}

@injectable()
export class QdrantVectorStore implements IVectorStore {
  constructor(
    @inject(TOKENS.Qdrant) private client: QdrantClient,
    @inject(TOKENS.Config) private settings: AppConfig,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  private get collection(): string {
    return this.settings.qdrant.collection;
  }

  async recreateCollection(): Promise<void> {
    await this.call('recreate collection', async () => {
      const { exists } = await this.client.collectionExists(this.collection);
      if (exists) {
        await this.client.deleteCollection(this.collection);
        this.log.info({ collection: this.collection }, 'Deleted existing collection');
      }
      await this.client.createCollection(this.collection, {
        vectors: { size: this.settings.qdrant.vectorSize, distance: 'Cosine' },
      });
      this.log.info(
        { collection: this.collection, size: this.settings.qdrant.vectorSize },
        'Created collection',
      );
    });
  }

  async upsert(points: VectorPoint[]): Promise<void> {
    if (points.length === 0) return;
    await this.call('upsert', () =>
      this.client.upsert(this.collection, {
        wait: true,
        points: points.map((point) => ({ id: point.id, vector: point.vector, payload: point.payload })),
      }),
    );
  }

  async search(vector: number[], limit: number): Promise<ScoredChunk[]> {
    const hits = await this.call('search', () =>
      this.client.search(this.collection, { vector, limit, with_payload: true }),
    );

    const chunks: ScoredChunk[] = [];
    for (const hit of hits) {
      const payload = schemaChunkPayloadSchema.safeParse(hit.payload);
      if (!payload.success) {
        this.log.warn({ id: hit.id }, 'Skipping vector point with an unexpected payload');
        continue;
      }
      chunks.push({ score: hit.score, payload: payload.data });
    }
    return chunks;
  }

  private async call<T>(operation: string, request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (err) {
      throw new ExternalServiceError('Qdrant', `${operation}: ${errorMessage(err)}`, err);
    }
  }
}
