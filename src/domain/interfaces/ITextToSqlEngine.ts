/**
 * Text-to-SQL Engine Interface
 * Layer: Domain
 * Pattern: Strategy Pattern
 *
 * Turns a natural-language question plus the tables the vector search found
 * into a SQL candidate. The OpenAI-backed TextToSqlService is the one
 * implementation today; a self-hosted model or a rule-based generator would
 * slot in behind the same contract.
 *
 * `isAvailable()` lets callers refuse early (503) when the engine has no
 * credentials instead of failing halfway through a request.
 */
import type { RelevantTable } from '@domain/entities/SchemaChunk';
import type { SqlCandidate } from '@domain/entities/SqlCandidate';

export interface ITextToSqlEngine {
  generateSql(question: string, relevantTables: RelevantTable[]): Promise<SqlCandidate>;
  isAvailable(): boolean;
}
