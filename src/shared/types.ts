/**
 * Shared Type Definitions
 * Layer: Shared (cross-cutting, used by every layer)
 *
 * Request/response shapes that no single layer owns. ChatOutcome is what the
 * ChatService hands to both the CLI loop and the HTTP controller; the
 * `status` discriminant says how far the question got (SQL only, rejected by
 * validation, or executed). DigestResult is the summary the digest script
 * prints.
 */
import type { QueryResult, SqlCandidate, SqlValidationResult } from '@domain/entities/SqlCandidate';

export interface AskOptions {
  /** Run the SQL after it validates. Defaults to true. */
  execute?: boolean;
}

interface OutcomeBase {
  question: string;
  candidate: SqlCandidate;
  validation: SqlValidationResult;
}

export interface GeneratedOutcome extends OutcomeBase {
  status: 'generated';
}

export interface RejectedOutcome extends OutcomeBase {
  status: 'rejected';
}

export interface ExecutedOutcome extends OutcomeBase {
  status: 'executed';
  result: QueryResult;
}

export type ChatOutcome = GeneratedOutcome | RejectedOutcome | ExecutedOutcome;

export interface DigestResult {
  tableCount: number;
  chunkCount: number;
  durationMs: number;
  ignoredPatterns: string[];
  cacheFile: string;
  collection: string;
}
