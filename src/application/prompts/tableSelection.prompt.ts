import { quoteIdentifier } from '@application/sql/identifiers';
import type { RelevantTable } from '@domain/entities/SchemaChunk';
import type { ChatMessage } from '@domain/interfaces/ILanguageModel';

const SYSTEM_PROMPT = `You are a database expert. Analyze the provided tables and their relevance scores.
Return only the table names that are truly relevant, ordered by importance.
Format: table1,table2,table3
Note: Preserve the exact case of table names.`;

export function buildTableSelectionPrompt(question: string, tables: RelevantTable[]): ChatMessage[] {
  const listing = tables
    .map(
      (table) =>
        `Table: ${quoteIdentifier(table.tableName)}\n` +
        `Relevance Score: ${table.similarityScore.toFixed(4)}\n` +
        `Description: ${table.description}`,
    )
    .join('\n\n');

  return [
    { role: 'system', content: SYSTEM_PROMPT },
    {
      role: 'user',
      content:
        `Question: ${question}\n\n` +
        'Given the following tables and their relevance scores, analyze which ones are most appropriate for the question:\n\n' +
        listing,
    },
  ];
}

/**
 * Splits a `table1,table2` answer into names. Quotes and whitespace the model
 * sometimes adds are dropped.
 */
export function parseTableSelection(answer: string): string[] {
  return answer
    .split(/[,\n]/)
    .map((name) => name.trim().replace(/^["'`]+|["'`]+$/g, '').trim())
    .filter((name) => name.length > 0);
}
