/**
 * Connection dispatcher.
 * Parses DATABASE_URL and selects the adapter for its dialect.
 */

import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigError } from '../errors.js';
import * as postgres from './adapters/postgres.js';
import * as sqlite from './adapters/sqlite.js';
import type { DatabaseClient, DatabaseConnection } from './types.js';

function sqlitePath(raw: string): string {
  if (!raw) {
    throw new ConfigError('DATABASE_URL names no SQLite file.');
  }
  return resolve(raw);
}

/**
 * Accepts `postgres://`, `postgresql://`, `sqlite:<path>`, `sqlite:///<abs path>`
 * and `file:` URLs.
 */
export function parseDatabaseUrl(url: string, options: { ssl?: boolean } = {}): DatabaseConnection {
  const trimmed = url.trim();
  const lower = trimmed.toLowerCase();

  if (lower.startsWith('postgres://') || lower.startsWith('postgresql://')) {
    return { dialect: 'postgres', connectionString: trimmed, ssl: options.ssl ?? false };
  }
  if (lower.startsWith('sqlite:')) {
    const rest = trimmed.slice('sqlite:'.length);
    // sqlite:///abs/path keeps one leading slash, sqlite://rel drops both
    const path = rest.startsWith('//') ? rest.slice(2) : rest;
    return { dialect: 'sqlite', filepath: sqlitePath(path) };
  }
  if (lower.startsWith('file://')) {
    return { dialect: 'sqlite', filepath: fileURLToPath(trimmed) };
  }
  if (lower.startsWith('file:')) {
    return { dialect: 'sqlite', filepath: sqlitePath(trimmed.slice('file:'.length)) };
  }

  const scheme = trimmed.includes(':') ? trimmed.slice(0, trimmed.indexOf(':')) : trimmed;
  throw new ConfigError(`Unsupported database URL scheme "${scheme}". Supported: postgres, sqlite.`);
}

/** Bind a connection to its adapter. Connections are opened per call. */
export function createDatabaseClient(connection: DatabaseConnection): DatabaseClient {
  switch (connection.dialect) {
    case 'postgres': {
      const cfg: postgres.PgConnectionConfig = {
        connectionString: connection.connectionString,
        ssl: connection.ssl,
      };
      return {
        dialect: 'postgres',
        introspect: () => postgres.introspect(cfg),
        executeReadOnly: (sql, options) => postgres.executeReadOnly(cfg, sql, options),
      };
    }
    case 'sqlite': {
      const cfg: sqlite.SqliteConnectionConfig = { filepath: connection.filepath };
      return {
        dialect: 'sqlite',
        introspect: () => sqlite.introspect(cfg),
        executeReadOnly: (sql, options) => sqlite.executeReadOnly(cfg, sql, options),
      };
    }
  }
}

/** Connection string safe to print: the password is masked. */
export function describeConnection(connection: DatabaseConnection): string {
  if (connection.dialect === 'sqlite') return `sqlite:${connection.filepath}`;
  try {
    const parsed = new URL(connection.connectionString);
    if (parsed.password) parsed.password = '***';
    return parsed.toString();
  } catch {
    return 'postgres://(unparseable)';
  }
}
