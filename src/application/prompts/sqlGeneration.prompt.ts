/**
 * SQL generation prompt: the schema context of the selected tables followed
 * by the rules the model has to follow. Table names in the context are
 * already quoted the way PostgreSQL needs them, so the model can copy them.
 */
import { quoteIdentifier } from '@application/sql/identifiers';
import type { RelevantTable } from '@domain/entities/SchemaChunk';
import type { ChatMessage } from '@domain/interfaces/ILanguageModel';

const RULES = `Important notes:
1. Some table names are case-sensitive. Use the exact table names as shown above.
2. Generate ONLY the SQL query without any markdown formatting or explanation.
3. Do not include \`\`\`sql or \`\`\` markers.
4. For PostgreSQL, use NOW() - INTERVAL '1 month' for date arithmetic.
5. Do not include trailing commas in column lists.
6. Use table aliases for better readability (e.g., emp for employee).
7. Ensure proper SQL syntax, especially in SELECT clause.
8. Use LEFT JOINs when joining optional tables to preserve main records.`;

export function formatSchemaContext(tables: RelevantTable[]): string {
  return tables
    .map((table) => {
      const lines = [
        `Table: ${quoteIdentifier(table.tableName)}`,
        `Description: ${table.description}`,
        'Columns:',
      ];

      for (const [name, column] of Object.entries(table.schema.columns)) {
        const attrs: string[] = [];
        if (!column.nullable) attrs.push('NOT NULL');
        if (column.primaryKey) attrs.push('PRIMARY KEY');
        lines.push(`- ${name} (${column.type})${attrs.length > 0 ? ` ${attrs.join(' ')}` : ''}`);
      }

      if (table.schema.foreignKeys.length > 0) {
        lines.push('Foreign Keys:');
        for (const fk of table.schema.foreignKeys) {
          lines.push(
            `- ${fk.constrainedColumns.join(', ')} -> ` +
              `${quoteIdentifier(fk.referredTable)}(${fk.referredColumns.join(', ')})`,
          );
        }
      }

      return lines.join('\n');
    })
    .join('\n\n');
}

export function buildSqlGenerationPrompt(question: string, tables: RelevantTable[]): ChatMessage[] {
  const system =
    "You are a SQL expert. Using the following schema, generate a PostgreSQL query for the user's request.\n" +
    'The query should be efficient and use proper joins when necessary.\n\n' +
    `${formatSchemaContext(tables)}\n\n${RULES}`;

  return [
    { role: 'system', content: system },
    { role: 'user', content: question },
  ];
}
