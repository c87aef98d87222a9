/**
 * PostgreSQL identifier quoting.
 *
 * Unquoted identifiers are folded to lower case by PostgreSQL, so a table
 * created as "UserAccounts" can only be reached with quotes. An identifier
 * is quoted when it is all upper case, not all lower case, contains anything
 * outside [a-z0-9_$] (spaces, dots, dashes), or is a reserved word.
 */
import reservedKeywords from '@shared/data/pgReservedKeywords.json';

const RESERVED = new Set<string>(reservedKeywords);

const PLAIN_IDENTIFIER = /^[a-z_][a-z0-9_$]*$/;

export function isReservedKeyword(word: string): boolean {
  return RESERVED.has(word.toLowerCase());
}

export function needsQuoting(identifier: string): boolean {
  return (
    identifier.toUpperCase() === identifier ||
    identifier.toLowerCase() !== identifier ||
    !PLAIN_IDENTIFIER.test(identifier) ||
    isReservedKeyword(identifier)
  );
}

export function quoteIdentifier(identifier: string): string {
  if (!needsQuoting(identifier)) return identifier;
  return `"${identifier.replace(/"/g, '""')}"`;
}
