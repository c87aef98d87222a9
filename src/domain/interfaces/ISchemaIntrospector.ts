/**
 * Schema Introspector Interface - Catalog Access Contract
 * Layer: Domain
 * Pattern: Repository Pattern
 *
 * Reads table structure from the target database. The application layer
 * only needs these three questions answered; PostgresSchemaIntrospector
 * answers them from information_schema and pg_catalog.
 */
import type { TableSchema } from '@domain/entities/TableSchema';

export interface ISchemaIntrospector {
  /** Base table names of the configured schema, sorted. */
  listTables(): Promise<string[]>;

  /** Columns, keys and indexes of one table. */
  describeTable(tableName: string): Promise<TableSchema>;

  /** Up to a handful of distinct example values per column, taken from the first `rows` rows. */
  sampleValues(tableName: string, rows: number): Promise<Record<string, string[]>>;
}
