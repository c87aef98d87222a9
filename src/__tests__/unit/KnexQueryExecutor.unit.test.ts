import knex, { type Knex } from 'knex';

import {
  escapeBindingMarkers,
  KnexQueryExecutor,
  toQueryResult,
} from '@infrastructure/database/KnexQueryExecutor';
import { SqlExecutionError } from '@shared/errors/AppError';

import { silentLogger } from '../helpers/fixtures';

describe('toQueryResult', () => {
  it('should take the column order from the driver fields', () => {
    expect(
      toQueryResult('SELECT name, id FROM customers', {
        rows: [{ id: 1, name: 'Ann' }],
        fields: [{ name: 'name' }, { name: 'id' }],
        rowCount: 1,
      }),
    ).toEqual({
      sql: 'SELECT name, id FROM customers',
      columns: ['name', 'id'],
      rows: [{ id: 1, name: 'Ann' }],
      rowCount: 1,
    });
  });

  it('should keep the header of an empty result', () => {
    const result = toQueryResult('SELECT id FROM customers WHERE false', {
      rows: [],
      fields: [{ name: 'id' }],
      rowCount: 0,
    });

    expect(result.columns).toEqual(['id']);
    expect(result.rowCount).toBe(0);
  });

  it('should fall back to the keys of the first row', () => {
    expect(toQueryResult('q', { rows: [{ a: 1, b: 2 }] }).columns).toEqual(['a', 'b']);
  });

  it('should use the last result of a multi-statement response', () => {
    const result = toQueryResult('q', [{ rows: [], rowCount: 0 }, { rows: [{ n: 3 }], fields: [{ name: 'n' }] }]);

    expect(result.rows).toEqual([{ n: 3 }]);
  });

  it('should report affected rows for statements without rows', () => {
    expect(toQueryResult('UPDATE orders SET total = 0', { rows: [], rowCount: 3 }).rowCount).toBe(3);
  });
});

describe('escapeBindingMarkers', () => {
  it('should escape every question mark', () => {
    expect(escapeBindingMarkers("SELECT data ? 'sku' FROM orders WHERE note LIKE '%?%'")).toBe(
      "SELECT data \\? 'sku' FROM orders WHERE note LIKE '%\\?%'",
    );
  });
});

describe('KnexQueryExecutor', () => {
  it('should run the SQL through knex.raw', async () => {
    const raw = jest.fn().mockResolvedValue({ rows: [{ n: 1 }], fields: [{ name: 'n' }], rowCount: 1 });
    const executor = new KnexQueryExecutor({ raw } as unknown as Knex, silentLogger);

    const result = await executor.execute('SELECT 1 AS n');

    expect(raw).toHaveBeenCalledWith('SELECT 1 AS n');
    expect(result).toEqual({ sql: 'SELECT 1 AS n', columns: ['n'], rows: [{ n: 1 }], rowCount: 1 });
  });

  it('should wrap database errors with the attempted SQL', async () => {
    const raw = jest.fn().mockRejectedValue(new Error('syntax error at or near "FORM"'));
    const executor = new KnexQueryExecutor({ raw } as unknown as Knex, silentLogger);

    const error = await executor.execute('SELECT * FORM orders').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(SqlExecutionError);
    expect(error).toMatchObject({
      message: 'Error executing query: syntax error at or near "FORM"',
      sql: 'SELECT * FORM orders',
      statusCode: 422,
    });
  });

  describe('with the pg dialect', () => {
    const db = knex({ client: 'pg' });
    const sent: string[] = [];

    beforeAll(() => {
      jest.spyOn(db.client, 'acquireConnection').mockResolvedValue({});
      jest.spyOn(db.client, 'releaseConnection').mockResolvedValue(undefined);
      jest.spyOn(db.client, '_query').mockImplementation(async (_connection: unknown, query: unknown) => {
        const { sql } = query as { sql: string };
        sent.push(sql);
        return Object.assign(query as object, { response: { rows: [], fields: [{ name: 'id' }], rowCount: 0 } });
      });
    });

    beforeEach(() => {
      sent.length = 0;
    });

    afterAll(() => {
      jest.restoreAllMocks();
    });

    it('should send question marks inside literals to the driver unchanged', async () => {
      const executor = new KnexQueryExecutor(db, silentLogger);

      const result = await executor.execute("SELECT id FROM faq WHERE question LIKE '%?%'");

      expect(sent).toEqual(["SELECT id FROM faq WHERE question LIKE '%?%'"]);
      expect(result.columns).toEqual(['id']);
    });

    it('should keep the jsonb ? operator', async () => {
      const executor = new KnexQueryExecutor(db, silentLogger);

      await executor.execute("SELECT id FROM orders WHERE meta ? 'gift'");

      expect(sent).toEqual(["SELECT id FROM orders WHERE meta ? 'gift'"]);
    });
  });
});
