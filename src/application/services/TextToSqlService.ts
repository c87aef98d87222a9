/**
 * Text-to-SQL Service - Retrieval-Augmented SQL Generation
 * Layer: Application
 * Pattern: Strategy implementation (ITextToSqlEngine)
 *
 * Turns a question plus the tables retrieved for it into one SQL candidate:
 *
 *   1. selectTables()      - the chat model narrows the retrieved tables down
 *                            to the ones it considers relevant.
 *   2. generateForTables() - schema context + rules → raw SQL → post-processing
 *                            (fences, dangling commas, table-name case).
 *   3. When the selection is too large for one prompt it is split into chunks
 *      of `PROMPT_MAX_TOKENS / PROMPT_TOKENS_PER_TABLE` tables. Each chunk
 *      produces a candidate, evaluateConfidence() scores it, and the highest
 *      score wins (the earliest chunk on ties).
 *
 * A single-prompt candidate is never scored, so its confidence is null.
 */
import { inject, injectable } from 'tsyringe';

import { buildConfidencePrompt, parseConfidence } from '@application/prompts/confidence.prompt';
import { buildSqlGenerationPrompt } from '@application/prompts/sqlGeneration.prompt';
import {
  buildTableSelectionPrompt,
  parseTableSelection,
} from '@application/prompts/tableSelection.prompt';
import { postProcessSql } from '@application/sql/sqlPostProcessor';
import type { AppConfig } from '@core/config';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { RelevantTable } from '@domain/entities/SchemaChunk';
import type { SqlCandidate } from '@domain/entities/SqlCandidate';
import type { ILanguageModel } from '@domain/interfaces/ILanguageModel';
import type { ITextToSqlEngine } from '@domain/interfaces/ITextToSqlEngine';
import { ValidationError } from '@shared/errors/AppError';

@injectable()
export class TextToSqlService implements ITextToSqlEngine {
  constructor(
    @inject(TOKENS.LanguageModel) private llm: ILanguageModel,
    @inject(TOKENS.Config) private settings: AppConfig,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  isAvailable(): boolean {
    return this.llm.isConfigured();
  }

  /** How many tables fit into one generation prompt. */
  get tablesPerPrompt(): number {
    const { maxPromptTokens, tokensPerTable } = this.settings.retrieval;
    return Math.max(1, Math.floor(maxPromptTokens / tokensPerTable));
  }

  async selectTables(question: string, tables: RelevantTable[]): Promise<RelevantTable[]> {
    const answer = await this.llm.complete(buildTableSelectionPrompt(question, tables), {
      model: this.settings.openai.chatModel,
    });

    const named = parseTableSelection(answer);
    const exact = new Set(named);
    const lowered = new Set(named.map((name) => name.toLowerCase()));

    const selected = tables.filter(
      (table) => exact.has(table.tableName) || lowered.has(table.tableName.toLowerCase()),
    );

    if (selected.length === 0) {
      this.log.warn({ answer }, 'Table selection matched no retrieved table, keeping all of them');
      return tables;
    }

    this.log.debug({ selected: selected.map((t) => t.tableName) }, 'Tables selected');
    return selected;
  }

  async generateForTables(question: string, tables: RelevantTable[]): Promise<string> {
    const raw = await this.llm.complete(buildSqlGenerationPrompt(question, tables), {
      model: this.settings.openai.chatModel,
    });
    return postProcessSql(
      raw,
      tables.map((table) => table.tableName),
    );
  }

  async evaluateConfidence(sql: string, question: string, tables: RelevantTable[]): Promise<number> {
    const answer = await this.llm.complete(buildConfidencePrompt(sql, question, tables), {
      model: this.settings.openai.chatModel,
    });
    return parseConfidence(answer);
  }

  async generateSql(question: string, relevantTables: RelevantTable[]): Promise<SqlCandidate> {
    if (relevantTables.length === 0) {
      throw new ValidationError('At least one relevant table is required to generate SQL');
    }

    const selected = await this.selectTables(question, relevantTables);
    const perPrompt = this.tablesPerPrompt;

    if (selected.length <= perPrompt) {
      const sql = await this.generateForTables(question, selected);
      return { sql, tables: selected.map((t) => t.tableName), confidence: null };
    }

    let best: SqlCandidate | null = null;
    for (let start = 0; start < selected.length; start += perPrompt) {
      const chunk = selected.slice(start, start + perPrompt);
      const sql = await this.generateForTables(question, chunk);
      const confidence = await this.evaluateConfidence(sql, question, chunk);
      this.log.debug({ tables: chunk.map((t) => t.tableName), confidence }, 'Scored SQL candidate');

      if (best === null || confidence > (best.confidence ?? 0)) {
        best = { sql, tables: chunk.map((t) => t.tableName), confidence };
      }
    }

    // selected is never empty here, so the loop ran at least once
    if (best === null) throw new ValidationError('No SQL candidate was produced');
    return best;
  }
}
