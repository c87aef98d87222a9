/**
 * Chat Service - The Question Pipeline
 * Layer: Application
 * Pattern: Facade (shared by the CLI loop and the HTTP controller)
 *
 * ask() walks one question through the whole pipeline:
 *
 *   guard      → non-blank question, engine configured, schema digested
 *   retrieve   → nearest tables from the vector store
 *   generate   → SQL candidate from the text-to-SQL engine
 *   validate   → checked against the FULL cached schema, not just the
 *                retrieved tables, so a join to a table the model remembered
 *                on its own is still accepted when it exists
 *   execute    → only when validation passed and the caller asked for it
 *
 * A rejected candidate is a normal outcome (status 'rejected'), not an error;
 * the caller shows the suggestion. Nothing is retried.
 */
import { inject, injectable } from 'tsyringe';

import type { SchemaIndexService } from '@application/services/SchemaIndexService';
import { validateSql } from '@application/sql/sqlValidator';
import type { AppConfig } from '@core/config';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { EnrichedSchema } from '@domain/entities/EnrichedSchema';
import type { TableSchema } from '@domain/entities/TableSchema';
import type { IQueryExecutor } from '@domain/interfaces/IQueryExecutor';
import type { ISchemaCache } from '@domain/interfaces/ISchemaCache';
import type { ITextToSqlEngine } from '@domain/interfaces/ITextToSqlEngine';
import { AppError, ConflictError, NotFoundError, ValidationError } from '@shared/errors/AppError';
import type { AskOptions, ChatOutcome } from '@shared/types';

export const SCHEMA_NOT_DIGESTED = 'Schema not digested. Run `npm run digest` first';

@injectable()
export class ChatService {
  constructor(
    @inject(TOKENS.TextToSqlEngine) private engine: ITextToSqlEngine,
    @inject(TOKENS.SchemaIndexService) private index: SchemaIndexService,
    @inject(TOKENS.SchemaCache) private cache: ISchemaCache,
    @inject(TOKENS.QueryExecutor) private executor: IQueryExecutor,
    @inject(TOKENS.Config) private settings: AppConfig,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async getSchema(): Promise<EnrichedSchema> {
    const schema = await this.cache.load();
    if (!schema) throw new ConflictError(SCHEMA_NOT_DIGESTED);
    return schema;
  }

  async ask(rawQuestion: string, options: AskOptions = {}): Promise<ChatOutcome> {
    const question = rawQuestion.trim();
    if (question.length === 0) throw new ValidationError('Question must not be empty');

    if (!this.engine.isAvailable()) {
      throw new AppError('Text-to-SQL engine is not available. Check OPENAI_API_KEY', 503);
    }

    const schema = await this.getSchema();

    const relevant = await this.index.findRelevantTables(question);
    if (relevant.length === 0) {
      throw new NotFoundError('No relevant tables found for the question');
    }

    const candidate = await this.engine.generateSql(question, relevant);
    if (candidate.sql.trim().length === 0) {
      throw new AppError('Failed to generate SQL query', 502);
    }

    const tables: Record<string, TableSchema> = {};
    for (const [name, table] of Object.entries(schema.tables)) tables[name] = table.schema;

    const validation = validateSql(candidate.sql, tables, {
      allowWrites: this.settings.sql.allowWrites,
    });

    if (!validation.valid) {
      this.log.warn(
        { sql: candidate.sql, issues: validation.issues, unknownTables: validation.unknownTables },
        'Generated SQL rejected',
      );
      return { status: 'rejected', question, candidate, validation };
    }

    if (options.execute === false) {
      return { status: 'generated', question, candidate, validation };
    }

    const result = await this.executor.execute(candidate.sql);
    this.log.info({ rowCount: result.rowCount }, 'Query executed');
    return { status: 'executed', question, candidate, validation, result };
  }
}
