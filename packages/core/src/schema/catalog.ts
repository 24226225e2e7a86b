/**
 * Schema Catalog: introspects once, filters by Policy, and hands out the same
 * frozen snapshot to every caller.
 */

import type { DatabaseClient, IntrospectedTable, SqlDialect } from '../db/types.js';
import { createChildLogger } from '../logging/logger.js';
import { errorMessage } from '../errors.js';
import { isExcludedColumn, tableAccess } from '../policy/policy.js';
import type { Policy } from '../policy/types.js';
import type { ColumnInfo, SchemaSnapshot, TableInfo } from './types.js';

const log = createChildLogger('schema');

/** Apply the Policy to raw introspection output. Pure. */
export function filterSchema(tables: readonly IntrospectedTable[], policy: Policy): TableInfo[] {
  const out: TableInfo[] = [];
  for (const table of tables) {
    if (tableAccess(policy, table.name) !== 'allowed') continue;

    const columns: ColumnInfo[] = table.columns
      .filter((col) => !isExcludedColumn(policy, col.name))
      .map((col) => Object.freeze({ ...col }));

    const info: TableInfo = {
      name: table.name,
      ...(table.schema ? { schema: table.schema } : {}),
      columns: Object.freeze(columns),
      hasSoftDelete: columns.some((col) => col.name.toLowerCase() === policy.softDeleteColumn),
    };
    out.push(Object.freeze(info));
  }
  return out;
}

export function buildSnapshot(dialect: SqlDialect, tables: readonly TableInfo[]): SchemaSnapshot {
  const snapshot: SchemaSnapshot = {
    dialect,
    tables: Object.freeze([...tables]),
    capturedAt: new Date(),
    connectionError: false,
  };
  return Object.freeze(snapshot);
}

function unavailableSnapshot(dialect: SqlDialect): SchemaSnapshot {
  const snapshot: SchemaSnapshot = {
    dialect,
    tables: Object.freeze([]),
    capturedAt: new Date(),
    connectionError: true,
  };
  return Object.freeze(snapshot);
}

export class SchemaCatalog {
  private cached: SchemaSnapshot | null = null;
  private inflight: Promise<SchemaSnapshot> | null = null;
  // bumped by invalidate(); a build started under an older value is not cached
  private generation = 0;

  constructor(
    private readonly db: DatabaseClient,
    private readonly policy: Policy,
  ) {}

  /**
   * The filtered snapshot. Concurrent first callers share one introspection;
   * a failed introspection is reported but not cached.
   */
  snapshot(): Promise<SchemaSnapshot> {
    if (this.cached) return Promise.resolve(this.cached);
    if (!this.inflight) {
      const inflight = this.build(this.generation).finally(() => {
        if (this.inflight === inflight) this.inflight = null;
      });
      this.inflight = inflight;
    }
    return this.inflight;
  }

  /** Drop the cached snapshot, and detach any build still running. */
  invalidate(): void {
    this.generation += 1;
    this.cached = null;
    this.inflight = null;
  }

  private async build(generation: number): Promise<SchemaSnapshot> {
    let introspected: IntrospectedTable[];
    try {
      introspected = await this.db.introspect();
    } catch (err: unknown) {
      log.error('Schema introspection failed', { error: errorMessage(err) });
      return unavailableSnapshot(this.db.dialect);
    }

    const tables = filterSchema(introspected, this.policy);
    const snapshot = buildSnapshot(this.db.dialect, tables);
    log.info('Schema snapshot captured', {
      tables: tables.length,
      hidden: introspected.length - tables.length,
    });
    if (generation === this.generation) this.cached = snapshot;
    return snapshot;
  }
}
