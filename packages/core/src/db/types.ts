/**
 * Database abstraction types for askwarden.
 * Adapters for Postgres and SQLite implement DatabaseClient.
 */

export type SqlDialect = 'postgres' | 'sqlite';

export type Row = Record<string, unknown>;

export type DatabaseConnection =
  | { dialect: 'postgres'; connectionString: string; ssl: boolean }
  | { dialect: 'sqlite'; filepath: string };

/** Table structure as introspected, before any policy filtering. */
export interface IntrospectedTable {
  name: string;
  schema?: string;
  columns: IntrospectedColumn[];
}

export interface IntrospectedColumn {
  name: string;
  dataType: string;
  nullable: boolean;
  isPrimaryKey: boolean;
}

export interface ReadOnlyQueryOptions {
  /** Hard cap on rows pulled from the driver */
  fetchLimit: number;
  /** Statement timeout in milliseconds */
  statementTimeoutMs: number;
  signal?: AbortSignal;
}

export interface FetchedRows {
  columns: string[];
  rows: Row[];
}

/**
 * Database adapter interface. Each supported engine implements this.
 * Execution is always read-only and never returns more than fetchLimit rows.
 */
export interface DatabaseClient {
  readonly dialect: SqlDialect;

  /** List tables and views with their columns */
  introspect(): Promise<IntrospectedTable[]>;

  /** Run one read-only statement */
  executeReadOnly(sql: string, options: ReadOnlyQueryOptions): Promise<FetchedRows>;
}
