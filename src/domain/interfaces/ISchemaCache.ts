import type { EnrichedSchema } from '@domain/entities/EnrichedSchema';

/** Persists the enriched schema between the digest and chat runs. */
export interface ISchemaCache {
  /** Where the cache lives (shown to the user). */
  readonly location: string;

  exists(): boolean;

  /** The cached schema, or null when nothing has been digested yet. */
  load(): Promise<EnrichedSchema | null>;

  save(schema: EnrichedSchema): Promise<void>;
}
