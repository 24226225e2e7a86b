/**
 * Postgres adapter for askwarden.
 * Uses the `pg` driver with strict safety defaults: one client per call,
 * a session statement timeout and a READ ONLY transaction.
 */

import pg from 'pg';
import type { Client as PgClient } from 'pg';
import { stripTrailingSemicolons } from '../../policy/parse.js';
import type { FetchedRows, IntrospectedTable, ReadOnlyQueryOptions, Row } from '../types.js';

const { Client } = pg;

export interface PgConnectionConfig {
  connectionString: string;
  ssl: boolean;
}

type TableRow = {
  table_schema: string;
  table_name: string;
};

type ColumnRow = {
  table_schema: string;
  table_name: string;
  column_name: string;
  data_type: string;
  is_nullable: string;
  is_pk: boolean;
};

function createClient(cfg: PgConnectionConfig, connectionTimeoutMillis: number): PgClient {
  return new Client({
    connectionString: cfg.connectionString,
    ssl: cfg.ssl ? { rejectUnauthorized: false } : false,
    connectionTimeoutMillis,
  });
}

async function closeQuietly(client: PgClient): Promise<void> {
  try {
    await client.end();
  } catch {
    // the connection may already be gone after an abort
  }
}

/**
 * Wrap a validated SELECT so the server never returns more than `fetchLimit`
 * rows, whatever LIMIT the statement carries.
 */
export function boundedSql(sql: string, fetchLimit: number): string {
  return `SELECT * FROM (${stripTrailingSemicolons(sql)}) AS bounded LIMIT ${Math.trunc(fetchLimit)}`;
}

/**
 * Execute one read-only statement.
 *
 * The SQL must already have passed the Guard; this layer only bounds it.
 * An abort closes the connection, which rejects the pending query.
 */
export async function executeReadOnly(
  cfg: PgConnectionConfig,
  sql: string,
  options: ReadOnlyQueryOptions,
): Promise<FetchedRows> {
  options.signal?.throwIfAborted();
  const client = createClient(cfg, 10_000);
  const onAbort = (): void => {
    void closeQuietly(client);
  };
  options.signal?.addEventListener('abort', onAbort, { once: true });

  try {
    await client.connect();
    await client.query(`SET statement_timeout = ${Math.trunc(options.statementTimeoutMs)}`);
    await client.query('BEGIN READ ONLY');

    const result = await client.query<Row>(boundedSql(sql, options.fetchLimit));
    await client.query('COMMIT');

    return {
      columns: result.fields.map((f) => f.name),
      rows: result.rows,
    };
  } catch (err: unknown) {
    try {
      await client.query('ROLLBACK');
    } catch {
      // no open transaction
    }
    throw err;
  } finally {
    options.signal?.removeEventListener('abort', onAbort);
    await closeQuietly(client);
  }
}

/**
 * Introspect tables and views outside the system schemas, with columns
 * and primary keys.
 */
export async function introspect(cfg: PgConnectionConfig): Promise<IntrospectedTable[]> {
  const client = createClient(cfg, 15_000);

  try {
    await client.connect();

    const tablesRes = await client.query<TableRow>(`
      SELECT t.table_schema, t.table_name
      FROM information_schema.tables t
      WHERE t.table_schema NOT IN ('pg_catalog', 'information_schema')
        AND t.table_type IN ('BASE TABLE', 'VIEW')
      ORDER BY t.table_schema, t.table_name
    `);

    const colsRes = await client.query<ColumnRow>(`
      SELECT c.table_schema, c.table_name, c.column_name, c.data_type,
             c.is_nullable,
             CASE WHEN pk.column_name IS NOT NULL THEN true ELSE false END AS is_pk
      FROM information_schema.columns c
      LEFT JOIN (
        SELECT ku.table_schema, ku.table_name, ku.column_name
        FROM information_schema.table_constraints tc
        JOIN information_schema.key_column_usage ku
          ON tc.constraint_name = ku.constraint_name
          AND tc.table_schema = ku.table_schema
        WHERE tc.constraint_type = 'PRIMARY KEY'
      ) pk ON pk.table_schema = c.table_schema
          AND pk.table_name = c.table_name
          AND pk.column_name = c.column_name
      WHERE c.table_schema NOT IN ('pg_catalog', 'information_schema')
      ORDER BY c.table_schema, c.table_name, c.ordinal_position
    `);

    const tableMap = new Map<string, IntrospectedTable>();
    for (const row of tablesRes.rows) {
      tableMap.set(`${row.table_schema}.${row.table_name}`, {
        name: row.table_name,
        schema: row.table_schema,
        columns: [],
      });
    }

    for (const row of colsRes.rows) {
      const table = tableMap.get(`${row.table_schema}.${row.table_name}`);
      if (!table) continue;
      table.columns.push({
        name: row.column_name,
        dataType: row.data_type,
        nullable: row.is_nullable === 'YES',
        isPrimaryKey: row.is_pk === true,
      });
    }

    return Array.from(tableMap.values());
  } finally {
    await closeQuietly(client);
  }
}
