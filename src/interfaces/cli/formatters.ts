/**
 * Console Formatters
 * Layer: Interfaces (CLI)
 *
 * Pure string builders for the digest and chat scripts, so the scripts only
 * deal with I/O and the output can be asserted line by line in tests.
 */
import type { EnrichedSchema } from '@domain/entities/EnrichedSchema';
import type { QueryResult } from '@domain/entities/SqlCandidate';
import { MAX_CELL_WIDTH } from '@shared/constants';
import type { ChatOutcome } from '@shared/types';

export const RULE = '-'.repeat(50);

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = (ms / 1000).toFixed(1);
  if (ms < 60_000) return `${seconds}s`;
  const minutes = Math.floor(ms / 60_000);
  const remainingSec = ((ms % 60_000) / 1000).toFixed(0);
  return `${minutes}m ${remainingSec}s`;
}

export function formatCell(value: unknown): string {
  let text: string;
  if (value === null || value === undefined) text = 'NULL';
  else if (value instanceof Date) text = value.toISOString();
  else if (typeof value === 'object') text = JSON.stringify(value);
  else text = String(value);

  text = text.replace(/\r?\n/g, ' ');
  return text.length > MAX_CELL_WIDTH ? `${text.slice(0, MAX_CELL_WIDTH - 3)}...` : text;
}

/**
 * Fixed-width table of the first `maxRows` rows:
 *
 *   id | name
 *   ---+------
 *   1  | Alice
 */
export function formatResultTable(result: QueryResult, maxRows: number): string {
  if (result.rows.length === 0) return 'No results found.';

  const shown = result.rows.slice(0, maxRows);
  const cells = shown.map((row) => result.columns.map((column) => formatCell(row[column])));
  const widths = result.columns.map((column, i) =>
    Math.max(column.length, ...cells.map((row) => row[i].length)),
  );

  const renderRow = (values: string[]) =>
    values.map((value, i) => value.padEnd(widths[i])).join(' | ').trimEnd();

  const lines = [
    renderRow(result.columns),
    widths.map((width) => '-'.repeat(width)).join('-+-'),
    ...cells.map(renderRow),
  ];

  const hidden = result.rows.length - shown.length;
  if (hidden > 0) lines.push(`... ${hidden} more row${hidden === 1 ? '' : 's'}`);
  lines.push('', `Total rows: ${result.rowCount}`);
  return lines.join('\n');
}

export function formatSchema(schema: EnrichedSchema): string {
  const blocks = Object.entries(schema.tables).map(([name, table]) => {
    const title = `Table: ${name}`;
    const lines = [title, '-'.repeat(title.length), 'Description:', table.description, 'Columns:'];

    for (const [columnName, column] of Object.entries(table.schema.columns)) {
      const attrs: string[] = [];
      if (!column.nullable) attrs.push('NOT NULL');
      if (column.primaryKey) attrs.push('PRIMARY KEY');
      lines.push(`  - ${columnName} (${column.type}) ${attrs.join(' ')}`.trimEnd());
    }

    if (table.schema.foreignKeys.length > 0) {
      lines.push('Relationships:');
      for (const fk of table.schema.foreignKeys) {
        lines.push(
          `  - ${fk.constrainedColumns.join(', ')} -> ${fk.referredTable} (${fk.referredColumns.join(', ')})`,
        );
      }
    }
    return lines.join('\n');
  });

  return ['Available Tables:', '='.repeat(50), '', blocks.join('\n\n')].join('\n');
}

/** What the chat loop prints for one answered question. */
export function formatOutcome(outcome: ChatOutcome, maxRows: number): string {
  const lines = ['Generated SQL Query:', RULE, outcome.candidate.sql, RULE];
  if (outcome.candidate.confidence !== null) {
    lines.push(`Confidence: ${outcome.candidate.confidence.toFixed(2)}`);
  }

  switch (outcome.status) {
    case 'rejected':
      lines.push('', 'The query was not executed.', outcome.validation.suggestion ?? '');
      break;
    case 'generated':
      lines.push('', 'Query generated but not executed.');
      break;
    case 'executed':
      lines.push(
        '',
        ...(outcome.result.rows.length > 0 ? ['Results:', RULE] : []),
        formatResultTable(outcome.result, maxRows),
      );
      break;
  }

  return lines.join('\n');
}
