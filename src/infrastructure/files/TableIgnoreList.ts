/**
 * Table Ignore List (.nlsqlignore)
 * Layer: Infrastructure
 *
 * One glob per line, `#` starts a comment, blank lines are skipped. A table
 * matching any pattern (case-insensitively) is left out of the digest.
 *
 *   temp_*      # scratch tables
 *   *_backup
 *   audit_log
 */
import fs from 'fs';
import path from 'path';
import { minimatch } from 'minimatch';

import type { Logger } from '@core/logger';
import { DEFAULT_IGNORE_FILE_CONTENT } from '@shared/constants';

export function parseIgnorePatterns(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.split('#', 1)[0].trim())
    .filter((line) => line.length > 0);
}

export class TableIgnoreList {
  constructor(
    readonly patterns: string[],
    private log: Logger,
  ) {}

  /** Reads the ignore file; a missing file means nothing is ignored. */
  static fromFile(filePath: string, log: Logger): TableIgnoreList {
    if (!fs.existsSync(filePath)) {
      log.debug({ filePath }, 'No ignore file, every table will be processed');
      return new TableIgnoreList([], log);
    }
    const patterns = parseIgnorePatterns(fs.readFileSync(filePath, 'utf8'));
    log.info({ filePath, patterns }, 'Loaded table ignore patterns');
    return new TableIgnoreList(patterns, log);
  }

  /** Writes the commented template when `filePath` does not exist yet. Returns whether it did. */
  static createDefaultIgnoreFile(filePath: string): boolean {
    if (fs.existsSync(filePath)) return false;
    fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
    fs.writeFileSync(filePath, DEFAULT_IGNORE_FILE_CONTENT, 'utf8');
    return true;
  }

  matchingPattern(tableName: string): string | undefined {
    return this.patterns.find((pattern) => minimatch(tableName, pattern, { nocase: true, dot: true }));
  }

  shouldProcess(tableName: string): boolean {
    const pattern = this.matchingPattern(tableName);
    if (pattern === undefined) return true;
    this.log.info({ table: tableName, pattern }, 'Skipping ignored table');
    return false;
  }
}
