import fs from 'fs';
import os from 'os';
import path from 'path';

import { parseIgnorePatterns, TableIgnoreList } from '@infrastructure/files/TableIgnoreList';
import { DEFAULT_IGNORE_FILE_CONTENT } from '@shared/constants';

import { silentLogger } from '../helpers/fixtures';

describe('parseIgnorePatterns', () => {
  it('should drop comments and blank lines', () => {
    expect(parseIgnorePatterns('# header\ntemp_*   # scratch\n\n  *_backup\r\nAudit_Log\n')).toEqual([
      'temp_*',
      '*_backup',
      'Audit_Log',
    ]);
  });

  it('should find nothing in the default template', () => {
    expect(parseIgnorePatterns(DEFAULT_IGNORE_FILE_CONTENT)).toEqual([]);
  });
});

describe('TableIgnoreList', () => {
  const list = new TableIgnoreList(['temp_*', '*_backup', 'audit_log'], silentLogger);

  it('should match globs case-insensitively', () => {
    expect(list.shouldProcess('temp_users')).toBe(false);
    expect(list.shouldProcess('TEMP_users')).toBe(false);
    expect(list.shouldProcess('orders_backup')).toBe(false);
    expect(list.shouldProcess('AUDIT_LOG')).toBe(false);
  });

  it('should keep tables no pattern matches', () => {
    expect(list.shouldProcess('orders')).toBe(true);
    expect(list.shouldProcess('temporary')).toBe(true);
  });

  it('should report which pattern matched', () => {
    expect(list.matchingPattern('orders_backup')).toBe('*_backup');
    expect(list.matchingPattern('orders')).toBeUndefined();
  });

  describe('files', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'nlsql-ignore-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should treat a missing file as an empty list', () => {
      expect(TableIgnoreList.fromFile(path.join(dir, '.nlsqlignore'), silentLogger).patterns).toEqual([]);
    });

    it('should read patterns from the file', () => {
      const file = path.join(dir, '.nlsqlignore');
      fs.writeFileSync(file, 'temp_*\n# keep this\nlegacy_*\n', 'utf8');

      expect(TableIgnoreList.fromFile(file, silentLogger).patterns).toEqual(['temp_*', 'legacy_*']);
    });

    it('should write the template only when the file is absent', () => {
      const file = path.join(dir, '.nlsqlignore');

      expect(TableIgnoreList.createDefaultIgnoreFile(file)).toBe(true);
      expect(fs.readFileSync(file, 'utf8')).toBe(DEFAULT_IGNORE_FILE_CONTENT);

      fs.writeFileSync(file, 'temp_*\n', 'utf8');
      expect(TableIgnoreList.createDefaultIgnoreFile(file)).toBe(false);
      expect(fs.readFileSync(file, 'utf8')).toBe('temp_*\n');
    });
  });
});
