/**
 * Audit store using better-sqlite3.
 * Keeps one row per finished turn; result rows are never stored.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { Violation, ViolationKind } from '../policy/types.js';
import { OUTCOMES, type AuditListOptions, type AuditSink, type Outcome, type QueryRecord } from './types.js';

// ── Schema migrations ────────────────────────────────────────────────

const MIGRATIONS: string[] = [
  // 0: migrations table (always runs first)
  `CREATE TABLE IF NOT EXISTS migrations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    version INTEGER NOT NULL UNIQUE,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  )`,

  // 1: query records
  `CREATE TABLE IF NOT EXISTS query_records (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    question TEXT NOT NULL,
    final_sql TEXT,
    attempt_count INTEGER NOT NULL,
    outcome TEXT NOT NULL,
    answer TEXT NOT NULL,
    row_count INTEGER,
    truncated INTEGER NOT NULL DEFAULT 0,
    scope_reason TEXT,
    violations_json TEXT NOT NULL DEFAULT '[]',
    error_detail TEXT,
    started_at TEXT NOT NULL,
    finished_at TEXT NOT NULL
  )`,

  // 2: history lookups by user
  `CREATE INDEX IF NOT EXISTS idx_query_records_user ON query_records (user_id, started_at)`,
];

type RecordRow = {
  id: string;
  user_id: string;
  question: string;
  final_sql: string | null;
  attempt_count: number;
  outcome: string;
  answer: string;
  row_count: number | null;
  truncated: number;
  scope_reason: string | null;
  violations_json: string;
  error_detail: string | null;
  started_at: string;
  finished_at: string;
};

const VIOLATION_KINDS: readonly ViolationKind[] = [
  'NOT_READ_ONLY',
  'TABLE_NOT_ALLOWED',
  'TABLE_RESTRICTED',
  'COLUMN_EXCLUDED',
  'MISSING_LIMIT',
  'LIMIT_TOO_LARGE',
  'MISSING_SOFT_DELETE_FILTER',
  'MALFORMED',
];

function toViolation(value: unknown): Violation | null {
  if (typeof value !== 'object' || value === null) return null;
  if (!('kind' in value) || !('detail' in value)) return null;
  const { kind, detail } = value;
  const known = VIOLATION_KINDS.find((k) => k === kind);
  if (!known || typeof detail !== 'string') return null;
  return { kind: known, detail };
}

function parseViolations(json: string): Violation[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return [];
  }
  if (!Array.isArray(parsed)) return [];
  return parsed.map(toViolation).filter((v): v is Violation => v !== null);
}

function toOutcome(value: string): Outcome {
  return OUTCOMES.find((o) => o === value) ?? 'GENERATION_FAILED';
}

function fromRow(row: RecordRow): QueryRecord {
  return {
    id: row.id,
    userId: row.user_id,
    question: row.question,
    finalSql: row.final_sql,
    attemptCount: row.attempt_count,
    outcome: toOutcome(row.outcome),
    answer: row.answer,
    rowCount: row.row_count,
    truncated: row.truncated === 1,
    scopeReason: row.scope_reason,
    violations: parseViolations(row.violations_json),
    errorDetail: row.error_detail,
    startedAt: new Date(row.started_at),
    finishedAt: new Date(row.finished_at),
  };
}

export class SqliteAuditStore implements AuditSink {
  private db: Database.Database;

  /** `:memory:` keeps the store in process. */
  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.migrate();
  }

  /** Run all pending migrations */
  migrate(): void {
    this.db.exec(MIGRATIONS[0]);

    const applied = this.db.prepare<[], { version: number }>('SELECT version FROM migrations ORDER BY version').all();
    const appliedSet = new Set(applied.map((r) => r.version));

    const insert = this.db.prepare<[number]>('INSERT INTO migrations (version) VALUES (?)');

    for (let i = 1; i < MIGRATIONS.length; i++) {
      if (!appliedSet.has(i)) {
        this.db.exec(MIGRATIONS[i]);
        insert.run(i);
      }
    }
  }

  async record(record: QueryRecord): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO query_records (
           id, user_id, question, final_sql, attempt_count, outcome, answer,
           row_count, truncated, scope_reason, violations_json, error_detail,
           started_at, finished_at
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        record.id,
        record.userId,
        record.question,
        record.finalSql,
        record.attemptCount,
        record.outcome,
        record.answer,
        record.rowCount,
        record.truncated ? 1 : 0,
        record.scopeReason,
        JSON.stringify(record.violations),
        record.errorDetail,
        record.startedAt.toISOString(),
        record.finishedAt.toISOString(),
      );
  }

  /** Newest first. */
  list(options: AuditListOptions = {}): QueryRecord[] {
    const limit = options.limit ?? 20;
    const rows =
      options.userId === undefined
        ? this.db
            .prepare<[number], RecordRow>('SELECT * FROM query_records ORDER BY started_at DESC, rowid DESC LIMIT ?')
            .all(limit)
        : this.db
            .prepare<[string, number], RecordRow>(
              'SELECT * FROM query_records WHERE user_id = ? ORDER BY started_at DESC, rowid DESC LIMIT ?',
            )
            .all(options.userId, limit);
    return rows.map(fromRow);
  }

  get(id: string): QueryRecord | null {
    const row = this.db.prepare<[string], RecordRow>('SELECT * FROM query_records WHERE id = ?').get(id);
    return row ? fromRow(row) : null;
  }

  close(): void {
    this.db.close();
  }
}
