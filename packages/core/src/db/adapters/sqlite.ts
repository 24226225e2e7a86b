/**
 * SQLite adapter. Uses better-sqlite3 on a read-only handle opened per call.
 *
 * better-sqlite3 is synchronous, so the statement timeout cannot interrupt a
 * running query; the row cap is enforced by stopping iteration instead.
 */

import Database from 'better-sqlite3';
import type { FetchedRows, IntrospectedTable, ReadOnlyQueryOptions, Row } from '../types.js';

export interface SqliteConnectionConfig {
  filepath: string;
}

type MasterRow = {
  name: string;
  type: 'table' | 'view';
};

type ColumnRow = {
  name: string;
  type: string;
  notnull: 0 | 1;
  pk: number;
};

function openDatabase(cfg: SqliteConnectionConfig): Database.Database {
  if (!cfg.filepath.trim()) {
    throw new Error('SQLite database path is required.');
  }
  return new Database(cfg.filepath, { readonly: true, fileMustExist: true });
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export async function executeReadOnly(
  cfg: SqliteConnectionConfig,
  sql: string,
  options: ReadOnlyQueryOptions,
): Promise<FetchedRows> {
  options.signal?.throwIfAborted();
  const db = openDatabase(cfg);
  try {
    const stmt = db.prepare<unknown[], Row>(sql);
    if (!stmt.reader) {
      throw new Error('Only statements that return rows can be executed.');
    }

    const rows: Row[] = [];
    for (const row of stmt.iterate()) {
      if (rows.length >= options.fetchLimit) break;
      rows.push(row);
    }

    return {
      columns: stmt.columns().map((column) => column.name),
      rows,
    };
  } finally {
    db.close();
  }
}

export async function introspect(cfg: SqliteConnectionConfig): Promise<IntrospectedTable[]> {
  const db = openDatabase(cfg);
  try {
    const tables = db
      .prepare<[], MasterRow>(`
        SELECT name, type
        FROM sqlite_master
        WHERE type IN ('table', 'view')
          AND name NOT LIKE 'sqlite_%'
        ORDER BY name
      `)
      .all();

    return tables.map((tableRow) => {
      const columns = db.prepare<[], ColumnRow>(`PRAGMA table_info(${quoteIdent(tableRow.name)})`).all();
      return {
        name: tableRow.name,
        columns: columns.map((column) => ({
          name: column.name,
          dataType: column.type || 'TEXT',
          nullable: column.notnull === 0 && column.pk === 0,
          isPrimaryKey: column.pk > 0,
        })),
      };
    });
  } finally {
    db.close();
  }
}
