/**
 * SQL Validator - Best-Effort Check Before Execution
 * Layer: Application
 *
 * Runs on every candidate before it reaches the database:
 *
 *   Syntax   - empty query, unterminated literal/identifier/comment,
 *              unbalanced parentheses, more than one statement, and the
 *              leading keyword (SELECT/WITH, plus INSERT/UPDATE/DELETE when
 *              writes are allowed). Without write access any DML/DDL keyword
 *              outside a string literal rejects the query.
 *   Tables   - every name after FROM / JOIN / UPDATE / INTO (comma lists
 *              included, schema prefixes dropped, CTE names and subqueries
 *              skipped, `EXTRACT(YEAR FROM col)` and `IS [NOT] DISTINCT FROM`
 *              ignored) must be a digested table. Matching is case-insensitive.
 *   Columns  - `alias.column` references whose alias resolves to a single
 *              known table must name one of its columns. Unqualified columns
 *              are not checked.
 *
 * A failed check never retries; it produces a `suggestion` the chat surfaces
 * to the user instead of executing the query.
 */
import { isName, isPunct, type SqlToken, tokenizeSql } from '@application/sql/sqlTokenizer';
import type { SqlValidationResult } from '@domain/entities/SqlCandidate';
import type { TableSchema } from '@domain/entities/TableSchema';
import { SUGGESTED_TABLES_LIMIT } from '@shared/constants';

export interface ValidateSqlOptions {
  allowWrites?: boolean;
}

type ParenKind = 'query' | 'function' | 'group';

interface TableRef {
  table: string;
  alias: string | null;
  /** Token indices consumed by the reference (name parts and alias). */
  consumed: number[];
  next: number;
}

const READ_STATEMENTS = new Set(['SELECT', 'WITH']);
const WRITE_STATEMENTS = new Set(['INSERT', 'UPDATE', 'DELETE']);
const DDL_KEYWORDS = new Set(['DROP', 'TRUNCATE', 'ALTER', 'CREATE', 'GRANT', 'REVOKE']);
const TABLE_INTRODUCERS = new Set(['FROM', 'JOIN', 'UPDATE', 'INTO']);
const SUBQUERY_STARTERS = new Set(['SELECT', 'WITH', 'VALUES']);

/** Words that may directly precede a parenthesis without making it a function call. */
const NON_FUNCTION_WORDS = new Set([
  'IN', 'EXISTS', 'FROM', 'JOIN', 'AS', 'ON', 'AND', 'OR', 'NOT', 'WHERE', 'SELECT',
  'WHEN', 'THEN', 'ELSE', 'HAVING', 'BY', 'ANY', 'ALL', 'SOME', 'LATERAL', 'USING',
  'VALUES', 'RETURNING', 'SET', 'UNION', 'INTERSECT', 'EXCEPT', 'OVER', 'CASE', 'IS',
]);

/** Words that end a table reference instead of being read as its alias. */
const CLAUSE_WORDS = new Set([
  'WHERE', 'JOIN', 'INNER', 'LEFT', 'RIGHT', 'FULL', 'CROSS', 'NATURAL', 'ON', 'USING',
  'GROUP', 'ORDER', 'LIMIT', 'OFFSET', 'HAVING', 'UNION', 'INTERSECT', 'EXCEPT', 'SET',
  'VALUES', 'RETURNING', 'WINDOW', 'FETCH', 'FOR', 'SELECT', 'DEFAULT', 'OUTER',
  'LATERAL', 'TABLESAMPLE', 'WITH', 'AS',
]);

function classifyParen(tokens: SqlToken[], index: number): ParenKind {
  const next = tokens[index + 1];
  if (next?.kind === 'word' && SUBQUERY_STARTERS.has(next.upper)) return 'query';
  const prev = tokens[index - 1];
  if (prev?.kind === 'quoted') return 'function';
  if (prev?.kind === 'word' && !NON_FUNCTION_WORDS.has(prev.upper)) return 'function';
  return 'group';
}

/**
 * Reads `[schema.]name [[AS] alias]` starting at `start`. A parenthesis right
 * after the name is a function call unless `columnList` is set (INSERT INTO t (a, b)).
 */
function readTableRef(tokens: SqlToken[], start: number, columnList = false): TableRef | null {
  let index = start;
  const skippable = tokens[index];
  if (skippable?.kind === 'word' && (skippable.upper === 'LATERAL' || skippable.upper === 'ONLY')) {
    index++;
  }

  const first = tokens[index];
  if (!isName(first)) return null;

  const consumed = [index];
  let table = first.value;
  index++;
  while (isPunct(tokens[index], '.') && isName(tokens[index + 1])) {
    consumed.push(index, index + 1);
    table = tokens[index + 1].value;
    index += 2;
  }

  if (isPunct(tokens[index], '(')) {
    // FROM generate_series(...) and friends are functions, not tables.
    return columnList ? { table, alias: null, consumed, next: index } : null;
  }

  let alias: string | null = null;
  const candidate = tokens[index];
  if (candidate?.kind === 'word' && candidate.upper === 'AS' && isName(tokens[index + 1])) {
    alias = tokens[index + 1].value;
    consumed.push(index, index + 1);
    index += 2;
  } else if (
    (candidate?.kind === 'word' && !CLAUSE_WORDS.has(candidate.upper)) ||
    candidate?.kind === 'quoted'
  ) {
    alias = candidate.value;
    consumed.push(index);
    index++;
  }

  return { table, alias, consumed, next: index };
}

/** Index of the `)` closing the `(` at `open`, or -1. */
function closingParen(tokens: SqlToken[], open: number): number {
  let depth = 0;
  for (let i = open; i < tokens.length; i++) {
    if (isPunct(tokens[i], '(')) depth++;
    if (isPunct(tokens[i], ')') && --depth === 0) return i;
  }
  return -1;
}

/** Matches `name [(col, ...)] AS [[NOT] MATERIALIZED] (SELECT ...`. */
function isCteHeader(tokens: SqlToken[], start: number): boolean {
  let index = start + 1;
  if (isPunct(tokens[index], '(')) {
    const close = closingParen(tokens, index);
    if (close === -1) return false;
    index = close + 1;
  }
  if (tokens[index]?.upper !== 'AS') return false;
  index++;
  if (tokens[index]?.upper === 'NOT' && tokens[index + 1]?.upper === 'MATERIALIZED') index += 2;
  else if (tokens[index]?.upper === 'MATERIALIZED') index++;
  return isPunct(tokens[index], '(') && classifyParen(tokens, index) === 'query';
}

function collectCteNames(tokens: SqlToken[]): Set<string> {
  const names = new Set<string>();
  tokens.forEach((token, i) => {
    if (isName(token) && isCteHeader(tokens, i)) names.add(token.value.toLowerCase());
  });
  return names;
}

function syntaxIssues(tokens: SqlToken[], allowWrites: boolean): string[] {
  const issues: string[] = [];

  let depth = 0;
  let unbalanced = false;
  for (const token of tokens) {
    if (isPunct(token, '(')) depth++;
    if (isPunct(token, ')')) depth--;
    if (depth < 0) unbalanced = true;
  }
  if (unbalanced || depth !== 0) issues.push('Unbalanced parentheses');

  const semicolon = tokens.findIndex((token) => isPunct(token, ';'));
  if (semicolon !== -1 && tokens.slice(semicolon + 1).some((token) => !isPunct(token, ';'))) {
    issues.push('Multiple statements are not allowed');
  }

  const leading = tokens.find((token) => !isPunct(token, '('));
  const allowed = allowWrites ? new Set([...READ_STATEMENTS, ...WRITE_STATEMENTS]) : READ_STATEMENTS;
  const writes = containsWrite(tokens);

  if (!allowWrites && writes) {
    issues.push('Only read-only queries (SELECT or WITH) are allowed');
  } else if (!leading || leading.kind !== 'word' || !allowed.has(leading.upper)) {
    issues.push(
      allowWrites
        ? 'Query must start with SELECT, WITH, INSERT, UPDATE or DELETE'
        : 'Query must start with SELECT or WITH',
    );
  }

  return issues;
}

function containsWrite(tokens: SqlToken[]): boolean {
  return tokens.some((token, i) => {
    if (token.kind !== 'word') return false;
    if (DDL_KEYWORDS.has(token.upper)) return true;
    if (token.upper === 'INSERT') return tokens[i + 1]?.upper === 'INTO';
    if (token.upper === 'DELETE') return tokens[i + 1]?.upper === 'FROM';
    if (token.upper === 'UPDATE') {
      // UPDATE t SET / UPDATE s.t SET / UPDATE t AS x SET, but not FOR UPDATE
      return tokens.slice(i + 2, i + 6).some((t) => t.upper === 'SET');
    }
    return false;
  });
}

function buildSuggestion(
  issues: string[],
  unknownTables: string[],
  unknownColumns: string[],
  knownTables: string[],
): string | null {
  if (issues.length === 0 && unknownTables.length === 0 && unknownColumns.length === 0) {
    return null;
  }

  const parts: string[] = [];
  if (issues.length > 0) {
    parts.push(`The generated SQL looks malformed: ${issues.join('; ')}.`);
  }
  if (unknownTables.length > 0) {
    const listed = knownTables.slice(0, SUGGESTED_TABLES_LIMIT).join(', ');
    const hidden = knownTables.length - SUGGESTED_TABLES_LIMIT;
    const more = hidden > 0 ? ` (and ${hidden} more)` : '';
    parts.push(`It references tables that are not in the digested schema: ${unknownTables.join(', ')}.`);
    parts.push(`Known tables include: ${listed}${more}.`);
  }
  if (unknownColumns.length > 0) {
    parts.push(`Unknown columns: ${unknownColumns.join(', ')}.`);
  }
  parts.push(
    'Try rephrasing your question with the exact table or column names, or re-run the schema digest if the database changed.',
  );
  return parts.join(' ');
}

export function validateSql(
  sql: string,
  tables: Record<string, TableSchema>,
  options: ValidateSqlOptions = {},
): SqlValidationResult {
  const allowWrites = options.allowWrites ?? false;
  const knownTables = Object.keys(tables);
  const knownByLowerCase = new Map(knownTables.map((name) => [name.toLowerCase(), name]));

  if (sql.trim().length === 0) {
    const issues = ['SQL query is empty'];
    return {
      valid: false,
      referencedTables: [],
      unknownTables: [],
      unknownColumns: [],
      issues,
      suggestion: buildSuggestion(issues, [], [], knownTables),
    };
  }

  const { tokens, unterminated } = tokenizeSql(sql);
  const issues = syntaxIssues(tokens, allowWrites);
  if (unterminated === 'string') issues.unshift('Unterminated string literal');
  if (unterminated === 'identifier') issues.unshift('Unterminated quoted identifier');
  if (unterminated === 'comment') issues.unshift('Unterminated comment');

  const cteNames = collectCteNames(tokens);
  const referenced: string[] = [];
  const consumedByRefs = new Set<number>();
  const aliasTargets = new Map<string, Set<string>>();
  const parens: ParenKind[] = [];

  const bind = (name: string, table: string) => {
    const key = name.toLowerCase();
    const targets = aliasTargets.get(key) ?? new Set<string>();
    targets.add(table);
    aliasTargets.set(key, targets);
  };

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (isPunct(token, '(')) {
      parens.push(classifyParen(tokens, i));
      continue;
    }
    if (isPunct(token, ')')) {
      parens.pop();
      continue;
    }
    if (token.kind !== 'word' || !TABLE_INTRODUCERS.has(token.upper)) continue;
    if (parens[parens.length - 1] === 'function') continue;

    const previous = tokens[i - 1]?.upper;
    if (token.upper === 'UPDATE' && (previous === 'FOR' || previous === 'DO')) continue;
    if (token.upper === 'FROM' && previous === 'DISTINCT') {
      const beforeDistinct = tokens[i - 2]?.upper;
      if (beforeDistinct === 'IS' || beforeDistinct === 'NOT') continue;
    }

    let cursor = i + 1;
    for (;;) {
      const ref = readTableRef(tokens, cursor, token.upper === 'INTO');
      if (!ref) break;
      ref.consumed.forEach((index) => consumedByRefs.add(index));

      const lower = ref.table.toLowerCase();
      if (!cteNames.has(lower)) {
        if (!referenced.some((name) => name.toLowerCase() === lower)) referenced.push(ref.table);
        const known = knownByLowerCase.get(lower);
        if (known !== undefined) {
          bind(ref.table, known);
          if (ref.alias) bind(ref.alias, known);
        }
      }

      cursor = ref.next;
      if (token.upper === 'FROM' && isPunct(tokens[cursor], ',')) {
        cursor++;
        continue;
      }
      break;
    }
  }

  const unknownTables = referenced.filter((name) => !knownByLowerCase.has(name.toLowerCase()));

  const unknownColumns: string[] = [];
  for (let i = 0; i + 2 < tokens.length; i++) {
    if (consumedByRefs.has(i) || isPunct(tokens[i - 1], '.')) continue;
    const qualifier = tokens[i];
    const column = tokens[i + 2];
    if (!isName(qualifier) || !isPunct(tokens[i + 1], '.') || !isName(column)) continue;

    const targets = aliasTargets.get(qualifier.value.toLowerCase());
    if (!targets || targets.size !== 1) continue;
    const [table] = [...targets];
    const columns = Object.keys(tables[table].columns).map((name) => name.toLowerCase());
    if (!columns.includes(column.value.toLowerCase())) {
      const reference = `${qualifier.value}.${column.value}`;
      if (!unknownColumns.includes(reference)) unknownColumns.push(reference);
    }
  }

  return {
    valid: issues.length === 0 && unknownTables.length === 0 && unknownColumns.length === 0,
    referencedTables: referenced,
    unknownTables,
    unknownColumns,
    issues,
    suggestion: buildSuggestion(issues, unknownTables, unknownColumns, knownTables),
  };
}
