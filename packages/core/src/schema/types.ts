import type { SqlDialect } from '../db/types.js';

export interface ColumnInfo {
  readonly name: string;
  readonly dataType: string;
  readonly nullable: boolean;
  readonly isPrimaryKey: boolean;
}

export interface TableInfo {
  readonly name: string;
  readonly schema?: string;
  readonly columns: readonly ColumnInfo[];
  /** True when the filtered column list still exposes the soft-delete column */
  readonly hasSoftDelete: boolean;
}

/**
 * Policy-filtered view of the database. Built once, frozen, and shared by
 * every turn; a snapshot with `connectionError` carries no tables.
 */
export interface SchemaSnapshot {
  readonly dialect: SqlDialect;
  readonly tables: readonly TableInfo[];
  readonly capturedAt: Date;
  readonly connectionError: boolean;
}

export function findTable(snapshot: SchemaSnapshot, name: string): TableInfo | undefined {
  const wanted = name.trim().toLowerCase();
  return snapshot.tables.find((t) => t.name.toLowerCase() === wanted);
}
