import type { ChatMessage } from '@domain/interfaces/ILanguageModel';
import type { TableSchema } from '@domain/entities/TableSchema';

const SYSTEM_PROMPT = `You are a database expert. Analyze the provided table schema and generate a detailed description including:
1. The purpose of the table
2. Explanation of key columns
3. Relationships with other tables
4. Common business use cases
Be concise but comprehensive.`;

/** Column and relationship listing the description model reads. */
export function formatTableForDescription(tableName: string, schema: TableSchema): string {
  const lines = [`Table: ${tableName}`, 'Columns:'];

  for (const [name, column] of Object.entries(schema.columns)) {
    const attrs: string[] = [];
    if (!column.nullable) attrs.push('NOT NULL');
    if (column.primaryKey) attrs.push('PRIMARY KEY');
    if (column.default !== null) attrs.push(`DEFAULT ${column.default}`);
    lines.push(`- ${name} (${column.type})${attrs.length > 0 ? ` ${attrs.join(' ')}` : ''}`);
  }

  if (schema.foreignKeys.length > 0) {
    lines.push('', 'Relationships:');
    for (const fk of schema.foreignKeys) {
      lines.push(
        `- ${fk.constrainedColumns.join(', ')} references ${fk.referredTable} (${fk.referredColumns.join(', ')})`,
      );
    }
  }

  return lines.join('\n');
}

export function buildTableDescriptionPrompt(tableName: string, schema: TableSchema): ChatMessage[] {
  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: formatTableForDescription(tableName, schema) },
  ];
}
