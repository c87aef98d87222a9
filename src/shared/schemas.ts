/**
 * Runtime Schemas (Zod)
 * Layer: Shared
 *
 * TypeScript types vanish at runtime, so anything that crosses a process
 * boundary is parsed here first: the cache file on disk, vector-store
 * payloads coming back from Qdrant, and HTTP request bodies. The inferred
 * types line up with the domain entities, so a parsed value can be returned
 * where the entity type is expected.
 */
import { z } from 'zod';

import { MAX_QUESTION_LENGTH } from '@shared/constants';

const columnInfoSchema = z.object({
  type: z.string(),
  nullable: z.boolean(),
  default: z.string().nullable(),
  primaryKey: z.boolean(),
});

const foreignKeySchema = z.object({
  name: z.string(),
  constrainedColumns: z.array(z.string()),
  referredTable: z.string(),
  referredColumns: z.array(z.string()),
});

const indexSchema = z.object({
  name: z.string(),
  columns: z.array(z.string()),
  unique: z.boolean(),
});

export const tableSchemaSchema = z.object({
  columns: z.record(z.string(), columnInfoSchema),
  foreignKeys: z.array(foreignKeySchema),
  primaryKey: z.array(z.string()),
  indexes: z.array(indexSchema),
  sampleValues: z.record(z.string(), z.array(z.string())).optional(),
});

export const enrichedSchemaSchema = z.object({
  metadata: z.object({
    generatedAt: z.string(),
    database: z.string(),
    schema: z.string(),
    ignoredPatterns: z.array(z.string()),
  }),
  tables: z.record(
    z.string(),
    z.object({
      schema: tableSchemaSchema,
      description: z.string(),
    }),
  ),
});

export const schemaChunkPayloadSchema = z.object({
  tableName: z.string(),
  description: z.string(),
  schema: tableSchemaSchema,
  text: z.string(),
});

export const askBodySchema = z.object({
  question: z
    .string({ error: 'question is required' })
    .trim()
    .min(1, 'question must not be empty')
    .max(MAX_QUESTION_LENGTH, `question must be at most ${MAX_QUESTION_LENGTH} characters`),
  execute: z.boolean().optional(),
});

export type AskBody = z.infer<typeof askBodySchema>;

