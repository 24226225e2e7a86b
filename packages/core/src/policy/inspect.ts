/**
 * Read-only inspection of node-sql-parser ASTs.
 *
 * Every helper takes the AST as `unknown` and narrows node by node, so
 * differences between parser releases (a column given as a string or as
 * `{ expr: { value } }`) are absorbed here and nowhere else.
 */

import type { SqlDialect } from '../db/types.js';
import { parseSql, type ParseResult } from './parse.js';
import type { CandidateQuery } from './types.js';

export type AstNode = { [key: string]: unknown };

export function isNode(value: unknown): value is AstNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Depth-first visit of every object node, arrays included. */
export function walkAst(node: unknown, visitor: (n: AstNode) => void): void {
  if (Array.isArray(node)) {
    for (const item of node) walkAst(item, visitor);
    return;
  }
  if (!isNode(node)) return;
  visitor(node);
  for (const key of Object.keys(node)) {
    walkAst(node[key], visitor);
  }
}

/** Resolve an identifier that may be a bare string or a wrapped value node. */
export function identifierName(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (!isNode(value)) return null;
  if ('expr' in value) return identifierName(value.expr);
  if (typeof value.value === 'string') return value.value;
  return null;
}

export interface ColumnReference {
  /** Table name or alias as written, null when unqualified */
  qualifier: string | null;
  column: string;
}

export function asColumnRef(node: unknown): ColumnReference | null {
  if (!isNode(node) || node.type !== 'column_ref') return null;
  const column = identifierName(node.column);
  if (!column || column === '*') return null;
  return { qualifier: identifierName(node.table), column };
}

export function collectColumnRefs(node: unknown): ColumnReference[] {
  const refs: ColumnReference[] = [];
  walkAst(node, (n) => {
    const ref = asColumnRef(n);
    if (ref) refs.push(ref);
  });
  return refs;
}

/** Names introduced by WITH clauses anywhere in the tree, lowercased. */
export function collectCteNames(node: unknown): Set<string> {
  const names = new Set<string>();
  walkAst(node, (n) => {
    if (!Array.isArray(n.with)) return;
    for (const entry of n.with) {
      const name = isNode(entry) ? identifierName(entry.name) : null;
      if (name) names.add(name.toLowerCase());
    }
  });
  return names;
}

export interface TableListEntry {
  action: string;
  table: string;
}

/** Split node-sql-parser `action::schema::table` entries. */
export function parseTableList(tableList: readonly string[]): TableListEntry[] {
  const entries: TableListEntry[] = [];
  for (const raw of tableList) {
    const parts = raw.split('::');
    const table = parts[parts.length - 1];
    if (parts.length < 2 || !table || table === 'null') continue;
    entries.push({ action: parts[0].toLowerCase(), table });
  }
  return entries;
}

/** Lowercased, de-duplicated names of real tables referenced by the statement. */
export function referencedTables(parsed: Pick<ParseResult, 'statements' | 'tableList'>): string[] {
  const ctes = collectCteNames(parsed.statements);
  const seen = new Set<string>();
  for (const entry of parseTableList(parsed.tableList)) {
    const name = entry.table.toLowerCase();
    if (!ctes.has(name)) seen.add(name);
  }
  return [...seen];
}

export type LimitInfo =
  | { kind: 'none' }
  | { kind: 'literal'; value: number }
  | { kind: 'expression' };

/**
 * LIMIT of the outermost statement. A set operation carries its own LIMIT
 * on `_limit`; branch-level limits do not bound the combined result.
 */
export function outerLimit(statement: unknown): LimitInfo {
  if (!isNode(statement)) return { kind: 'none' };
  if (isNode(statement._limit)) return limitFromClause(statement._limit);
  if (isNode(statement._next)) return { kind: 'none' };
  return limitFromClause(statement.limit);
}

function limitFromClause(clause: unknown): LimitInfo {
  if (!isNode(clause)) return { kind: 'none' };
  const values = clause.value;
  if (!Array.isArray(values) || values.length === 0) return { kind: 'none' };

  // `LIMIT offset, count` lists the offset first; `LIMIT n OFFSET m` lists n first.
  const index = clause.seperator === ',' && values.length === 2 ? 1 : 0;
  const item: unknown = values[index];
  if (isNode(item) && item.type === 'number' && typeof item.value === 'number' && Number.isInteger(item.value)) {
    return { kind: 'literal', value: item.value };
  }
  return { kind: 'expression' };
}

export interface FromTable {
  table: string;
  alias: string | null;
  /** Index of the entry in the block's FROM list */
  position: number;
}

/** A condition and the FROM positions whose rows it actually removes. */
export interface BoundCondition {
  expr: unknown;
  filters: ReadonlySet<number>;
}

/** One SELECT block: the base tables of its FROM list and the conditions bound to them. */
export interface SelectScope {
  tables: FromTable[];
  /** AND-conjuncts of WHERE and of every JOIN ... ON */
  conditions: BoundCondition[];
}

type JoinKind = 'inner' | 'left' | 'right' | 'full';

function joinKind(join: unknown): JoinKind {
  const text = typeof join === 'string' ? join.trim().toUpperCase() : '';
  if (text.startsWith('LEFT')) return 'left';
  if (text.startsWith('RIGHT')) return 'right';
  if (text.startsWith('FULL')) return 'full';
  return 'inner';
}

function range(from: number, to: number): Set<number> {
  const out = new Set<number>();
  for (let i = from; i < to; i++) out.add(i);
  return out;
}

/**
 * FROM positions filtered by an ON conjunct of the entry at `position`.
 * Joins are left-associative: the left input is every entry before it.
 * An outer join keeps the rows of its preserved side whatever ON says.
 */
function onFilters(kind: JoinKind, position: number): Set<number> {
  switch (kind) {
    case 'inner':
      return range(0, position + 1);
    case 'left':
      return new Set([position]);
    case 'right':
      return range(0, position);
    case 'full':
      return new Set();
  }
}

export function collectSelectScopes(node: unknown): SelectScope[] {
  const scopes: SelectScope[] = [];
  walkAst(node, (n) => {
    if (n.type !== 'select') return;
    const tables: FromTable[] = [];
    const from: unknown[] = Array.isArray(n.from) ? n.from : [];
    const all = range(0, from.length);
    const conditions: BoundCondition[] = conjuncts(n.where).map((expr) => ({ expr, filters: all }));

    from.forEach((entry, position) => {
      if (!isNode(entry)) return;
      const table = identifierName(entry.table);
      if (table) {
        tables.push({ table, alias: identifierName(entry.as), position });
      }
      const filters = onFilters(joinKind(entry.join), position);
      for (const expr of conjuncts(entry.on)) conditions.push({ expr, filters });
    });
    scopes.push({ tables, conditions });
  });
  return scopes;
}

/** Flatten a condition tree over AND. */
export function conjuncts(expr: unknown): unknown[] {
  if (!isNode(expr)) return [];
  if (expr.type === 'binary_expr' && typeof expr.operator === 'string' && expr.operator.toUpperCase() === 'AND') {
    return [...conjuncts(expr.left), ...conjuncts(expr.right)];
  }
  return [expr];
}

export interface SqlShape {
  targetTables: Set<string>;
  limitClause: number | null;
}

/** Table and LIMIT metadata of a statement; null when it does not parse. */
export function describeSql(sql: string, dialect: SqlDialect): SqlShape | null {
  const parsed = parseSql(sql, dialect);
  if (!parsed.ok) return null;
  const limit = outerLimit(parsed.statements[0]);
  return {
    targetTables: new Set(referencedTables(parsed)),
    limitClause: limit.kind === 'literal' ? limit.value : null,
  };
}

/** Wrap raw SQL as a Guard candidate. */
export function toCandidate(sql: string, dialect: SqlDialect): CandidateQuery {
  const shape = describeSql(sql, dialect);
  return {
    text: sql,
    targetTables: shape?.targetTables ?? new Set<string>(),
    limitClause: shape?.limitClause ?? null,
    status: 'OK',
    scopeReason: null,
  };
}
