import type { QueryResult } from '@domain/entities/SqlCandidate';

/** Runs generated SQL against the target database. Throws SqlExecutionError on failure. */
export interface IQueryExecutor {
  execute(sql: string): Promise<QueryResult>;
}
