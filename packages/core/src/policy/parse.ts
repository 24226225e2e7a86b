/**
 * AST-based SQL parser for the askwarden guard.
 * Uses node-sql-parser with the dialect of the connected database.
 *
 * The parser is the primary classification mechanism; the lexical scan in
 * guard.ts only adds to it and never overrides a parse result.
 */

import pkg from 'node-sql-parser';
import type { SqlDialect } from '../db/types.js';

const { Parser } = pkg;

const parser = new Parser();

const PARSER_DATABASE: Record<SqlDialect, string> = {
  postgres: 'PostgresQL',
  sqlite: 'Sqlite',
};

export type SqlKind =
  | 'select'
  | 'insert'
  | 'replace'
  | 'update'
  | 'delete'
  | 'create'
  | 'alter'
  | 'drop'
  | 'truncate'
  | 'unknown';

export interface ParseResult {
  /** Parsed statements, in source order */
  statements: unknown[];
  /** Classified type of the first statement */
  kind: SqlKind;
  /** Entries of the form `<action>::<schema|null>::<table>` */
  tableList: string[];
  /** Original SQL with trailing semicolons stripped */
  normalizedSql: string;
}

export interface ParseError {
  ok: false;
  error: string;
}

export type ParseOutcome = ({ ok: true } & ParseResult) | ParseError;

const KNOWN_KINDS: readonly SqlKind[] = [
  'select',
  'insert',
  'replace',
  'update',
  'delete',
  'create',
  'alter',
  'drop',
  'truncate',
];

export function stripTrailingSemicolons(sql: string): string {
  return sql.trim().replace(/[;\s]+$/, '');
}

/**
 * Parse a SQL string into an AST.
 * Returns a structured result or a parse error.
 */
export function parseSql(sql: string, dialect: SqlDialect): ParseOutcome {
  const normalizedSql = stripTrailingSemicolons(sql);

  if (!normalizedSql) {
    return { ok: false, error: 'Empty SQL statement' };
  }

  try {
    const result = parser.parse(normalizedSql, { database: PARSER_DATABASE[dialect] });
    const ast: unknown = result.ast;
    const statements = Array.isArray(ast) ? ast : [ast];

    if (statements.length === 0 || statements[0] == null) {
      return { ok: false, error: 'No statements found' };
    }

    return {
      ok: true,
      statements,
      kind: statementKind(statements[0]),
      tableList: result.tableList,
      normalizedSql,
    };
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `SQL parse error: ${msg}` };
  }
}

export function statementKind(statement: unknown): SqlKind {
  if (typeof statement !== 'object' || statement === null || !('type' in statement)) {
    return 'unknown';
  }
  const raw = typeof statement.type === 'string' ? statement.type.toLowerCase() : '';
  return KNOWN_KINDS.find((kind) => kind === raw) ?? 'unknown';
}
