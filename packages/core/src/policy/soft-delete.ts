/**
 * Soft-delete filter detection.
 *
 * A table whose snapshot entry has `hasSoftDelete` must be filtered in every
 * SELECT block that reads it, by an AND-conjunct of that block's WHERE or of
 * a JOIN ... ON that removes rows of that table. OR branches and negations
 * do not count, and neither does the ON of an outer join for its preserved
 * side.
 */

import type { SchemaSnapshot } from '../schema/types.js';
import { findTable } from '../schema/types.js';
import { asColumnRef, collectSelectScopes, isNode, type FromTable } from './inspect.js';
import type { Policy, SoftDeletePredicate, Violation } from './types.js';

interface FilterMatch {
  /** Qualifier written on the column, null when unqualified */
  qualifier: string | null;
}

interface BoundMatch extends FilterMatch {
  filters: ReadonlySet<number>;
}

function matchesShape(op: string, value: unknown, shape: SoftDeletePredicate): boolean {
  if (!isNode(value)) return false;
  switch (shape) {
    case 'is-null':
      return op === 'IS' && value.type === 'null';
    case 'is-false':
      if (value.type === 'bool' && value.value === false) return op === 'IS' || op === '=';
      return op === '=' && value.type === 'number' && value.value === 0;
  }
}

/** Recognize `<col> IS NULL`, `<col> = false` and friends on the soft-delete column. */
export function softDeleteFilter(
  condition: unknown,
  column: string,
  shapes: readonly SoftDeletePredicate[],
): FilterMatch | null {
  if (!isNode(condition) || condition.type !== 'binary_expr') return null;
  if (typeof condition.operator !== 'string') return null;
  const op = condition.operator.toUpperCase();

  let ref = asColumnRef(condition.left);
  let value: unknown = condition.right;
  if (!ref && op === '=') {
    ref = asColumnRef(condition.right);
    value = condition.left;
  }
  if (!ref || ref.column.toLowerCase() !== column) return null;

  return shapes.some((shape) => matchesShape(op, value, shape)) ? { qualifier: ref.qualifier } : null;
}

function isCovered(entry: FromTable, matches: BoundMatch[], softDeleteTables: number): boolean {
  const names = [entry.table.toLowerCase()];
  if (entry.alias) names.push(entry.alias.toLowerCase());
  return matches.some((m) => {
    if (!m.filters.has(entry.position)) return false;
    if (m.qualifier === null) return softDeleteTables === 1;
    return names.includes(m.qualifier.toLowerCase());
  });
}

/**
 * One MISSING_SOFT_DELETE_FILTER violation per unfiltered table occurrence.
 * An unqualified filter only counts when the block reads a single
 * soft-delete table, where the column name cannot be ambiguous.
 */
export function checkSoftDelete(
  statements: readonly unknown[],
  snapshot: SchemaSnapshot,
  policy: Policy,
): Violation[] {
  const violations: Violation[] = [];
  const reported = new Set<string>();

  for (const scope of collectSelectScopes(statements)) {
    const matches: BoundMatch[] = [];
    for (const condition of scope.conditions) {
      const match = softDeleteFilter(condition.expr, policy.softDeleteColumn, policy.softDeletePredicates);
      if (match) matches.push({ ...match, filters: condition.filters });
    }

    const guarded = scope.tables.flatMap((entry) => {
      const table = findTable(snapshot, entry.table);
      return table?.hasSoftDelete ? [{ entry, table }] : [];
    });

    for (const { entry, table } of guarded) {
      if (isCovered(entry, matches, guarded.length)) continue;

      const key = table.name.toLowerCase();
      if (reported.has(key)) continue;
      reported.add(key);
      violations.push({
        kind: 'MISSING_SOFT_DELETE_FILTER',
        detail: `Table "${table.name}" must be filtered with ${describeSoftDeleteFilter(policy)}.`,
      });
    }
  }

  return violations;
}

/** Human-readable accepted filter, e.g. `deleted_at IS NULL`. */
export function describeSoftDeleteFilter(policy: Policy): string {
  const col = policy.softDeleteColumn;
  return policy.softDeletePredicates
    .map((shape) => (shape === 'is-null' ? `${col} IS NULL` : `${col} = false`))
    .join(' or ');
}
