import { quoteIdentifier } from '@application/sql/identifiers';
import type { RelevantTable } from '@domain/entities/SchemaChunk';
import type { ChatMessage } from '@domain/interfaces/ILanguageModel';

const SYSTEM_PROMPT = `You are a SQL expert. Evaluate the confidence score
(0.0 to 1.0) of the generated SQL query based on:
1. Query completeness
2. Proper table usage and case sensitivity
3. Correct joins
4. Appropriate filtering
Return only the numeric score.`;

export function buildConfidencePrompt(
  sql: string,
  question: string,
  tables: RelevantTable[],
): ChatMessage[] {
  const available = tables.map((table) => `- ${quoteIdentifier(table.tableName)}`).join('\n');
  return [
    { role: 'system', content: SYSTEM_PROMPT },
    {
      role: 'user',
      content: `Original question: ${question}\nGenerated SQL: ${sql}\n\nAvailable tables:\n${available}`,
    },
  ];
}

/**
 * First number in the answer, clamped to [0, 1]. Anything without a number
 * scores 0.
 */
export function parseConfidence(answer: string): number {
  const match = /-?\d+(?:\.\d+)?|-?\.\d+/.exec(answer);
  if (!match) return 0;
  const value = Number.parseFloat(match[0]);
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
