/**
 * PostgreSQL Schema Introspector
 * Layer: Infrastructure
 * Pattern: Adapter (implements ISchemaIntrospector)
 *
 * I read table structure from information_schema (tables, columns, primary
 * keys) and from the pg_catalog (foreign keys and indexes, where
 * information_schema loses the column pairing of multi-column constraints).
 * Row shapes coming back from the driver are mapped into domain types by the
 * pure helpers at the bottom of the file, which the unit tests exercise
 * directly.
 *
 * Every driver failure is rethrown as ExternalServiceError('PostgreSQL').
 */
import type { Knex } from 'knex';
import { inject, injectable } from 'tsyringe';

import type { AppConfig } from '@core/config';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { ColumnInfo, ForeignKeyInfo, IndexInfo, TableSchema } from '@domain/entities/TableSchema';
import type { ISchemaIntrospector } from '@domain/interfaces/ISchemaIntrospector';
import { MAX_SAMPLE_VALUE_LENGTH, MAX_SAMPLE_VALUES_PER_COLUMN } from '@shared/constants';
import { AppError, errorMessage, ExternalServiceError } from '@shared/errors/AppError';

export interface ColumnRow {
  column_name: string;
  data_type: string;
  udt_name: string;
  character_maximum_length: number | string | null;
  numeric_precision: number | string | null;
  numeric_scale: number | string | null;
  is_nullable: string;
  column_default: string | null;
}

export interface ForeignKeyRow {
  name: string;
  column_name: string;
  referred_table: string;
  referred_column: string;
}

export interface IndexRow {
  name: string;
  column_name: string;
  is_unique: boolean;
}

const FOREIGN_KEYS_SQL = `
  SELECT con.conname AS name,
         att.attname AS column_name,
         ref_cls.relname AS referred_table,
         ref_att.attname AS referred_column
  FROM pg_constraint con
  JOIN pg_class cls ON cls.oid = con.conrelid
  JOIN pg_namespace ns ON ns.oid = cls.relnamespace
  JOIN pg_class ref_cls ON ref_cls.oid = con.confrelid
  CROSS JOIN LATERAL unnest(con.conkey, con.confkey) WITH ORDINALITY AS k(attnum, ref_attnum, ord)
  JOIN pg_attribute att ON att.attrelid = con.conrelid AND att.attnum = k.attnum
  JOIN pg_attribute ref_att ON ref_att.attrelid = con.confrelid AND ref_att.attnum = k.ref_attnum
  WHERE con.contype = 'f' AND ns.nspname = ? AND cls.relname = ?
  ORDER BY con.conname, k.ord`;

const INDEXES_SQL = `
  SELECT idx.relname AS name,
         att.attname AS column_name,
         ix.indisunique AS is_unique
  FROM pg_index ix
  JOIN pg_class tbl ON tbl.oid = ix.indrelid
  JOIN pg_namespace ns ON ns.oid = tbl.relnamespace
  JOIN pg_class idx ON idx.oid = ix.indexrelid
  CROSS JOIN LATERAL unnest(ix.indkey::int2[]) WITH ORDINALITY AS k(attnum, ord)
  JOIN pg_attribute att ON att.attrelid = tbl.oid AND att.attnum = k.attnum
  WHERE NOT ix.indisprimary AND ns.nspname = ? AND tbl.relname = ?
  ORDER BY idx.relname, k.ord`;

@injectable()
export class PostgresSchemaIntrospector implements ISchemaIntrospector {
  constructor(
    @inject(TOKENS.Knex) private db: Knex,
    @inject(TOKENS.Config) private settings: AppConfig,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  private get schemaName(): string {
    return this.settings.database.schema;
  }

  async listTables(): Promise<string[]> {
    return this.run(async () => {
      const rows: { table_name: string }[] = await this.db('information_schema.tables')
        .select('table_name')
        .where({ table_schema: this.schemaName, table_type: 'BASE TABLE' })
        .orderBy('table_name', 'asc');
      return rows.map((row) => row.table_name);
    });
  }

  async describeTable(tableName: string): Promise<TableSchema> {
    return this.run(async () => {
      const columnRows: ColumnRow[] = await this.db('information_schema.columns')
        .select(
          'column_name',
          'data_type',
          'udt_name',
          'character_maximum_length',
          'numeric_precision',
          'numeric_scale',
          'is_nullable',
          'column_default',
        )
        .where({ table_schema: this.schemaName, table_name: tableName })
        .orderBy('ordinal_position', 'asc');

      const pkRows: { column_name: string }[] = await this.db('information_schema.table_constraints as tc')
        .join('information_schema.key_column_usage as kcu', function joinKeyUsage() {
          this.on('kcu.constraint_name', '=', 'tc.constraint_name')
            .andOn('kcu.table_schema', '=', 'tc.table_schema')
            .andOn('kcu.table_name', '=', 'tc.table_name');
        })
        .select('kcu.column_name')
        .where({
          'tc.constraint_type': 'PRIMARY KEY',
          'tc.table_schema': this.schemaName,
          'tc.table_name': tableName,
        })
        .orderBy('kcu.ordinal_position', 'asc');

      const fkResult: { rows: ForeignKeyRow[] } = await this.db.raw(FOREIGN_KEYS_SQL, [
        this.schemaName,
        tableName,
      ]);
      const indexResult: { rows: IndexRow[] } = await this.db.raw(INDEXES_SQL, [
        this.schemaName,
        tableName,
      ]);

      const primaryKey = pkRows.map((row) => row.column_name);
      this.log.debug(
        { table: tableName, columns: columnRows.length, foreignKeys: fkResult.rows.length },
        'Table introspected',
      );

      return {
        columns: buildColumns(columnRows, primaryKey),
        foreignKeys: groupForeignKeys(fkResult.rows),
        primaryKey,
        indexes: groupIndexes(indexResult.rows),
      };
    });
  }

  async sampleValues(tableName: string, rows: number): Promise<Record<string, string[]>> {
    return this.run(async () => {
      const records: Record<string, unknown>[] = await this.db
        .withSchema(this.schemaName)
        .select('*')
        .from(tableName)
        .limit(rows);
      return collectSampleValues(records);
    });
  }

  private async run<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (err) {
      if (err instanceof AppError) throw err;
      throw new ExternalServiceError('PostgreSQL', errorMessage(err), err);
    }
  }
}

function toNumber(value: number | string | null): number | null {
  if (value === null) return null;
  const n = Number(value);
  return Number.isNaN(n) ? null : n;
}

/** Renders information_schema type columns the way they are written in DDL. */
export function formatColumnType(row: ColumnRow): string {
  if (row.data_type === 'ARRAY') return `${row.udt_name.replace(/^_/, '')}[]`;
  if (row.data_type === 'USER-DEFINED') return row.udt_name;

  const length = toNumber(row.character_maximum_length);
  if (length !== null && (row.data_type === 'character varying' || row.data_type === 'character')) {
    return `${row.data_type}(${length})`;
  }

  const precision = toNumber(row.numeric_precision);
  if (row.data_type === 'numeric' && precision !== null) {
    const scale = toNumber(row.numeric_scale);
    return scale !== null && scale > 0 ? `numeric(${precision},${scale})` : `numeric(${precision})`;
  }

  return row.data_type;
}

export function buildColumns(rows: ColumnRow[], primaryKey: string[]): Record<string, ColumnInfo> {
  const columns: Record<string, ColumnInfo> = {};
  for (const row of rows) {
    columns[row.column_name] = {
      type: formatColumnType(row),
      nullable: row.is_nullable === 'YES',
      default: row.column_default,
      primaryKey: primaryKey.includes(row.column_name),
    };
  }
  return columns;
}

/** One ForeignKeyInfo per constraint; rows must arrive ordered by constraint and position. */
export function groupForeignKeys(rows: ForeignKeyRow[]): ForeignKeyInfo[] {
  const byName = new Map<string, ForeignKeyInfo>();
  for (const row of rows) {
    let fk = byName.get(row.name);
    if (!fk) {
      fk = { name: row.name, constrainedColumns: [], referredTable: row.referred_table, referredColumns: [] };
      byName.set(row.name, fk);
    }
    fk.constrainedColumns.push(row.column_name);
    fk.referredColumns.push(row.referred_column);
  }
  return [...byName.values()];
}

export function groupIndexes(rows: IndexRow[]): IndexInfo[] {
  const byName = new Map<string, IndexInfo>();
  for (const row of rows) {
    let index = byName.get(row.name);
    if (!index) {
      index = { name: row.name, columns: [], unique: row.is_unique };
      byName.set(row.name, index);
    }
    index.columns.push(row.column_name);
  }
  return [...byName.values()];
}

function renderSample(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return `<${value.length} bytes>`;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/** Up to five distinct non-null values per column, each cut to 50 characters. */
export function collectSampleValues(records: Record<string, unknown>[]): Record<string, string[]> {
  const samples: Record<string, string[]> = {};
  for (const record of records) {
    for (const [column, value] of Object.entries(record)) {
      const values = samples[column] ?? (samples[column] = []);
      if (value === null || value === undefined) continue;
      if (values.length >= MAX_SAMPLE_VALUES_PER_COLUMN) continue;
      const rendered = renderSample(value).slice(0, MAX_SAMPLE_VALUE_LENGTH);
      if (!values.includes(rendered)) values.push(rendered);
    }
  }
  for (const column of Object.keys(samples)) {
    if (samples[column].length === 0) delete samples[column];
  }
  return samples;
}
