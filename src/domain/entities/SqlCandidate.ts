/**
 * SQL Candidate & Query Result
 * Layer: Domain
 *
 * A candidate lives for one question: it is validated, maybe executed, then
 * dropped. `confidence` is null when the whole table selection fit into a
 * single prompt and no scoring round was needed.
 */
export interface SqlCandidate {
  sql: string;
  tables: string[];
  confidence: number | null;
}

export interface QueryResult {
  sql: string;
  columns: string[];
  rows: Record<string, unknown>[];
  rowCount: number;
}

export interface SqlValidationResult {
  valid: boolean;
  referencedTables: string[];
  unknownTables: string[];
  unknownColumns: string[];
  issues: string[];
  suggestion: string | null;
}
