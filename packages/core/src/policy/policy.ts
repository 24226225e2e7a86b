import { ConfigError } from '../errors.js';
import type { Policy, PolicyInput } from './types.js';

export const DEFAULT_MAX_ROWS = 100;
export const DEFAULT_SOFT_DELETE_COLUMN = 'deleted_at';

/** Trim, lowercase and de-duplicate identifier names, dropping blanks. */
export function normalizeNames(values: Iterable<string>): Set<string> {
  const out = new Set<string>();
  for (const value of values) {
    const name = value.trim().toLowerCase();
    if (name) out.add(name);
  }
  return out;
}

/**
 * Build the process-lifetime Policy. The result is frozen; its sets are
 * private copies so later mutation of the input cannot leak in.
 */
export function createPolicy(input: PolicyInput = {}): Policy {
  const maxRows = input.maxRows ?? DEFAULT_MAX_ROWS;
  if (!Number.isInteger(maxRows) || maxRows <= 0) {
    throw new ConfigError(`maxRows must be a positive integer, got ${maxRows}.`);
  }

  const softDeleteColumn = (input.softDeleteColumn ?? DEFAULT_SOFT_DELETE_COLUMN).trim().toLowerCase();
  if (!softDeleteColumn) {
    throw new ConfigError('softDeleteColumn must not be empty.');
  }

  const predicates = input.softDeletePredicates ?? ['is-null'];
  if (predicates.length === 0) {
    throw new ConfigError('At least one soft-delete predicate shape is required.');
  }

  let allowedTables: ReadonlySet<string> | 'all' = 'all';
  if (input.allowedTables !== undefined && input.allowedTables !== 'all') {
    const names = normalizeNames(input.allowedTables);
    // empty allow-list == no allow-list
    allowedTables = names.size > 0 ? names : 'all';
  }

  const policy: Policy = {
    allowedTables,
    restrictedTables: normalizeNames(input.restrictedTables ?? []),
    excludedColumns: normalizeNames(input.excludedColumns ?? []),
    maxRows,
    readOnly: true,
    softDeleteColumn,
    softDeletePredicates: Object.freeze([...new Set(predicates)]),
  };
  return Object.freeze(policy);
}

export type TableAccess = 'allowed' | 'restricted' | 'not_allowed';

/** Decide whether a table may be queried. Restriction takes precedence. */
export function tableAccess(policy: Policy, tableName: string): TableAccess {
  const name = tableName.trim().toLowerCase();
  if (policy.restrictedTables.has(name)) return 'restricted';
  if (policy.allowedTables !== 'all' && !policy.allowedTables.has(name)) return 'not_allowed';
  return 'allowed';
}

export function isExcludedColumn(policy: Policy, columnName: string): boolean {
  return policy.excludedColumns.has(columnName.trim().toLowerCase());
}
