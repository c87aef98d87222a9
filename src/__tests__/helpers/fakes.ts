/**
 * Test Doubles for the Ports
 * Layer: Test Helpers
 *
 * Mock factories (every method a jest.fn()) for the language model and the
 * query executor, and small in-process stand-ins for the vector store and
 * the schema cache that behave like the real thing: the vector store keeps
 * points in memory and ranks them by cosine similarity.
 *
 * keywordEmbedding() is a deterministic "embedding": one dimension per
 * vocabulary word, counting how often it appears. Texts about the same
 * tables end up close to each other, which is all retrieval tests need.
 */
import type { EnrichedSchema } from '@domain/entities/EnrichedSchema';
import type { ScoredChunk, VectorPoint } from '@domain/entities/SchemaChunk';
import type { ILanguageModel } from '@domain/interfaces/ILanguageModel';
import type { IQueryExecutor } from '@domain/interfaces/IQueryExecutor';
import type { ISchemaCache } from '@domain/interfaces/ISchemaCache';
import type { IVectorStore } from '@domain/interfaces/IVectorStore';

export type MockLanguageModel = jest.Mocked<ILanguageModel>;
export type MockQueryExecutor = jest.Mocked<IQueryExecutor>;

export const EMBEDDING_VOCABULARY = ['customer', 'order', 'product', 'price'];

export function keywordEmbedding(text: string): number[] {
  const lower = text.toLowerCase();
  return EMBEDDING_VOCABULARY.map((word) => lower.split(word).length - 1);
}

export function createMockLanguageModel(): MockLanguageModel {
  return {
    complete: jest.fn(),
    embed: jest.fn(async (text: string) => keywordEmbedding(text)),
    embedMany: jest.fn(async (texts: string[]) => texts.map(keywordEmbedding)),
    isConfigured: jest.fn().mockReturnValue(true),
  };
}

export function createMockQueryExecutor(): MockQueryExecutor {
  return { execute: jest.fn() };
}

function cosine(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  a.forEach((value, i) => {
    dot += value * (b[i] ?? 0);
    normA += value * value;
    normB += (b[i] ?? 0) * (b[i] ?? 0);
  });
  return normA === 0 || normB === 0 ? 0 : dot / Math.sqrt(normA * normB);
}

export class InMemoryVectorStore implements IVectorStore {
  points: VectorPoint[] = [];
  recreateCount = 0;

  async recreateCollection(): Promise<void> {
    this.points = [];
    this.recreateCount++;
  }

  async upsert(points: VectorPoint[]): Promise<void> {
    for (const point of points) {
      this.points = this.points.filter((existing) => existing.id !== point.id);
      this.points.push(point);
    }
  }

  async search(vector: number[], limit: number): Promise<ScoredChunk[]> {
    return this.points
      .map((point) => ({ score: cosine(vector, point.vector), payload: point.payload }))
      .sort((a, b) => b.score - a.score)
      .slice(0, limit);
  }
}

export class InMemorySchemaCache implements ISchemaCache {
  readonly location = 'memory/enriched_schema.json';

  constructor(public schema: EnrichedSchema | null = null) {}

  exists(): boolean {
    return this.schema !== null;
  }

  async load(): Promise<EnrichedSchema | null> {
    return this.schema;
  }

  async save(schema: EnrichedSchema): Promise<void> {
    this.schema = schema;
  }
}

export interface CompletionScript {
  description?: (tableName: string) => string;
  selection?: string;
  sql?: string;
  confidence?: string;
}

/**
 * Answers each prompt kind from the script, keyed on the system prompt, so
 * a whole digest-then-ask flow can run against one mock.
 */
export function scriptCompletions(llm: MockLanguageModel, script: CompletionScript): void {
  llm.complete.mockImplementation(async (messages) => {
    const system = messages[0]?.content ?? '';
    const user = messages[1]?.content ?? '';
    if (system.includes('Analyze the provided table schema')) {
      const table = /^Table: (.+)$/m.exec(user)?.[1] ?? '';
      return script.description?.(table) ?? `Rows of ${table}.`;
    }
    if (system.includes('Analyze the provided tables')) return script.selection ?? '';
    if (system.includes('Evaluate the confidence')) return script.confidence ?? '0';
    return script.sql ?? '';
  });
}
