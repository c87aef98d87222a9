/**
 * Clean-up applied to every SQL string the model returns, in order:
 *   1. strip markdown fences (```sql … ```),
 *   2. drop a comma left dangling before FROM / WHERE / GROUP BY / ORDER BY,
 *   3. after FROM|JOIN|UPDATE|INTO|TABLE, restore the exact case of known
 *      tables and quote them when PostgreSQL needs it.
 * Names that are not known tables (CTEs, functions, typos) are left as written
 * so the validator can report them.
 */
import { quoteIdentifier } from '@application/sql/identifiers';

const DANGLING_COMMA = /,(\s*)(FROM|WHERE|GROUP\s+BY|ORDER\s+BY)\b/gi;

// Schema-qualified names and function calls (FROM generate_series(...)) are
// skipped; after INTO the parenthesis is a column list.
const TABLE_POSITION = /\b(FROM|JOIN|UPDATE|INTO|TABLE)(\s+)([A-Za-z_][A-Za-z0-9_]*)\b(?!\s*\.)(?=(\s*\()?)/gi;

export function stripCodeFences(text: string): string {
  return text.replace(/```sql/gi, '').replace(/```/g, '').trim();
}

export function removeDanglingCommas(sql: string): string {
  return sql.replace(DANGLING_COMMA, '$1$2');
}

export function normalizeTableNames(sql: string, tableNames: string[]): string {
  const byLowerCase = new Map(tableNames.map((name) => [name.toLowerCase(), name]));

  return sql.replace(
    TABLE_POSITION,
    (match: string, keyword: string, space: string, name: string, paren: string | undefined) => {
      if (paren !== undefined && keyword.toUpperCase() !== 'INTO') return match;
      const original = byLowerCase.get(name.toLowerCase());
      if (original === undefined) return match;
      return `${keyword}${space}${quoteIdentifier(original)}`;
    },
  );
}

export function postProcessSql(raw: string, tableNames: string[]): string {
  return normalizeTableNames(removeDanglingCommas(stripCodeFences(raw)), tableNames);
}
