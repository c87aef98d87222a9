/**
 * Minimal SQL lexer for the validator.
 *
 * It only needs to tell words from quoted identifiers, string literals and
 * punctuation, and to skip comments, so that keywords inside literals
 * ('drop me a line') never count. Dollar-quoted bodies are treated as string
 * literals. Anything it does not recognise becomes a one-character
 * `operator` token.
 */
export type SqlTokenKind = 'word' | 'quoted' | 'string' | 'number' | 'punct' | 'operator';

export interface SqlToken {
  kind: SqlTokenKind;
  /** Source text; unescaped content for quoted identifiers and strings. */
  value: string;
  /** Upper-cased value of `word` tokens, empty for everything else. */
  upper: string;
}

export type Unterminated = 'string' | 'identifier' | 'comment';

export interface TokenizeResult {
  tokens: SqlToken[];
  unterminated: Unterminated | null;
}

const PUNCTUATION = new Set(['(', ')', ',', '.', ';']);
const WORD_START = /[A-Za-z_\u0080-\uffff]/;
const WORD_PART = /[A-Za-z0-9_$\u0080-\uffff]/;
const DOLLAR_TAG = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/;

/** Index just past the closing `quote`, honouring doubled quotes; -1 if never closed. */
function scanQuoted(sql: string, start: number, quote: string): number {
  let i = start + 1;
  while (i < sql.length) {
    if (sql[i] === quote) {
      if (sql[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return -1;
}

export function tokenizeSql(sql: string): TokenizeResult {
  const tokens: SqlToken[] = [];
  let i = 0;

  const push = (kind: SqlTokenKind, value: string) =>
    tokens.push({ kind, value, upper: kind === 'word' ? value.toUpperCase() : '' });

  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === '-' && next === '-') {
      const end = sql.indexOf('\n', i);
      i = end === -1 ? sql.length : end + 1;
      continue;
    }

    if (ch === '/' && next === '*') {
      const end = sql.indexOf('*/', i + 2);
      if (end === -1) return { tokens, unterminated: 'comment' };
      i = end + 2;
      continue;
    }

    if (ch === "'" || ch === '"') {
      const end = scanQuoted(sql, i, ch);
      if (end === -1) return { tokens, unterminated: ch === "'" ? 'string' : 'identifier' };
      const body = sql.slice(i + 1, end - 1).replace(ch === "'" ? /''/g : /""/g, ch);
      push(ch === "'" ? 'string' : 'quoted', body);
      i = end;
      continue;
    }

    if (ch === '$') {
      const tag = DOLLAR_TAG.exec(sql.slice(i));
      if (tag) {
        const close = sql.indexOf(tag[0], i + tag[0].length);
        if (close === -1) return { tokens, unterminated: 'string' };
        push('string', sql.slice(i + tag[0].length, close));
        i = close + tag[0].length;
        continue;
      }
    }

    if (WORD_START.test(ch)) {
      let end = i + 1;
      while (end < sql.length && WORD_PART.test(sql[end])) end++;
      push('word', sql.slice(i, end));
      i = end;
      continue;
    }

    if (/[0-9]/.test(ch)) {
      let end = i + 1;
      while (end < sql.length && /[0-9.eE]/.test(sql[end])) end++;
      push('number', sql.slice(i, end));
      i = end;
      continue;
    }

    push(PUNCTUATION.has(ch) ? 'punct' : 'operator', ch);
    i++;
  }

  return { tokens, unterminated: null };
}

export function isPunct(token: SqlToken | undefined, value: string): boolean {
  return token !== undefined && token.kind === 'punct' && token.value === value;
}

export function isName(token: SqlToken | undefined): token is SqlToken {
  return token !== undefined && (token.kind === 'word' || token.kind === 'quoted');
}
