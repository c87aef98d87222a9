/**
 * Table Schema - Introspected Structure of One Table
 * Layer: Domain
 *
 * What the introspector learns about a table from the catalog: columns keyed
 * by name (insertion order = ordinal position), foreign keys, the primary
 * key and secondary indexes. `sampleValues` is only present when sampling is
 * switched on (SCHEMA_SAMPLE_ROWS > 0).
 */
export interface ColumnInfo {
  type: string;
  nullable: boolean;
  default: string | null;
  primaryKey: boolean;
}

export interface ForeignKeyInfo {
  name: string;
  constrainedColumns: string[];
  referredTable: string;
  referredColumns: string[];
}

export interface IndexInfo {
  name: string;
  columns: string[];
  unique: boolean;
}

export interface TableSchema {
  columns: Record<string, ColumnInfo>;
  foreignKeys: ForeignKeyInfo[];
  primaryKey: string[];
  indexes: IndexInfo[];
  sampleValues?: Record<string, string[]>;
}
