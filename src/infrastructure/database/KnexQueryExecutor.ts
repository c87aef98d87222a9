/**
 * Knex Query Executor
 * Layer: Infrastructure
 * Pattern: Adapter (implements IQueryExecutor)
 *
 * Sends validated SQL to PostgreSQL through knex.raw. The pg driver
 * returns `{ rows, fields, rowCount }`; column order comes from `fields` so
 * that a query with zero rows still has a header.
 *
 * knex rewrites every bare `?` into a `$n` placeholder, including those in
 * string literals and the jsonb `?` operators, so each one is escaped first.
 */
import type { Knex } from 'knex';
import { inject, injectable } from 'tsyringe';

import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { QueryResult } from '@domain/entities/SqlCandidate';
import type { IQueryExecutor } from '@domain/interfaces/IQueryExecutor';
import { errorMessage, SqlExecutionError } from '@shared/errors/AppError';

interface PgRawResult {
  rows?: Record<string, unknown>[];
  fields?: { name: string }[];
  rowCount?: number | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Maps a pg raw result (or the array pg returns for multi-statement input) to a QueryResult. */
export function toQueryResult(sql: string, raw: PgRawResult | PgRawResult[]): QueryResult {
  const result: PgRawResult = Array.isArray(raw) ? (raw[raw.length - 1] ?? {}) : raw;
  const rows = (result.rows ?? []).filter(isRecord);
  const columns =
    result.fields && result.fields.length > 0
      ? result.fields.map((field) => field.name)
      : rows.length > 0
        ? Object.keys(rows[0])
        : [];

  return {
    sql,
    columns,
    rows,
    rowCount: rows.length > 0 ? rows.length : (result.rowCount ?? 0),
  };
}

/** Escapes `?` so knex passes it through instead of treating it as a binding. */
export function escapeBindingMarkers(sql: string): string {
  return sql.replace(/\?/g, '\\?');
}

@injectable()
export class KnexQueryExecutor implements IQueryExecutor {
  constructor(
    @inject(TOKENS.Knex) private db: Knex,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async execute(sql: string): Promise<QueryResult> {
    const startMs = Date.now();
    try {
      const raw: PgRawResult | PgRawResult[] = await this.db.raw(escapeBindingMarkers(sql));
      const result = toQueryResult(sql, raw);
      this.log.debug({ rowCount: result.rowCount, ms: Date.now() - startMs }, 'Query executed');
      return result;
    } catch (err) {
      this.log.error({ err, sql }, 'Query execution failed');
      throw new SqlExecutionError(errorMessage(err), sql);
    }
  }
}
