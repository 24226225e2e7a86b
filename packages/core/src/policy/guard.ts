/**
 * The Guard: pure validation of one candidate query against the Policy and
 * the filtered schema snapshot.
 *
 * Checks run in a fixed order and every violation found is reported, so the
 * generator gets the complete list on a retry. Nothing here performs I/O.
 */

import type { SchemaSnapshot } from '../schema/types.js';
import { findTable } from '../schema/types.js';
import { isExcludedColumn, tableAccess } from './policy.js';
import { parseSql, stripTrailingSemicolons } from './parse.js';
import {
  type ColumnReference,
  collectColumnRefs,
  collectSelectScopes,
  outerLimit,
  parseTableList,
  referencedTables,
  walkAst,
} from './inspect.js';
import { checkSoftDelete } from './soft-delete.js';
import type { CandidateQuery, Policy, ValidationResult, Violation } from './types.js';

// Checked on the text with literals and quoted identifiers blanked out.
const MUTATION_KEYWORDS = [
  'INSERT',
  'UPDATE',
  'DELETE',
  'MERGE',
  'UPSERT',
  'DROP',
  'CREATE',
  'ALTER',
  'TRUNCATE',
  'GRANT',
  'REVOKE',
  'COPY',
  'EXEC',
  'EXECUTE',
  'VACUUM',
  'ATTACH',
  'DETACH',
  'PRAGMA',
  'REINDEX',
  'INTO',
];

const MUTATION_RE = new RegExp(`\\b(${MUTATION_KEYWORDS.join('|')})\\b`, 'gi');

const QUOTED_RE = /'(?:[^']|'')*'|"(?:[^"]|"")*"|`[^`]*`/g;

const WRITE_NODE_TYPES = new Set([
  'insert',
  'replace',
  'update',
  'delete',
  'create',
  'alter',
  'drop',
  'truncate',
]);

// Server functions with side effects outside the statement's own result.
const DANGEROUS_FUNCTIONS = new Set([
  'pg_sleep',
  'pg_terminate_backend',
  'pg_cancel_backend',
  'lo_import',
  'lo_export',
  'lo_unlink',
  'dblink',
  'dblink_exec',
  'pg_read_file',
  'pg_read_binary_file',
  'pg_write_file',
  'pg_ls_dir',
  'pg_stat_file',
  'load_extension',
]);

/** Blank out string literals and quoted identifiers. */
export function stripQuoted(sql: string): string {
  return sql.replace(QUOTED_RE, "''");
}

/** Text-level read-only scan; runs even when the statement does not parse. */
export function scanText(sql: string): Violation[] {
  const violations: Violation[] = [];
  const bare = stripQuoted(sql);

  if (bare.includes('--') || bare.includes('/*')) {
    violations.push({ kind: 'NOT_READ_ONLY', detail: 'Comments are not allowed in generated SQL.' });
  }
  if (stripTrailingSemicolons(bare).includes(';')) {
    violations.push({ kind: 'NOT_READ_ONLY', detail: 'Only a single statement is allowed.' });
  }

  const keywords = new Set<string>();
  for (const match of bare.matchAll(MUTATION_RE)) {
    keywords.add(match[1].toUpperCase());
  }
  for (const keyword of keywords) {
    violations.push({ kind: 'NOT_READ_ONLY', detail: `Keyword ${keyword} is not allowed in a read-only query.` });
  }

  return violations;
}

function functionName(value: unknown): string | null {
  if (typeof value === 'string') return value;
  // v5 wraps function names: { name: [{ type, value }] }
  if (typeof value === 'object' && value !== null && 'name' in value && Array.isArray(value.name)) {
    const parts: unknown[] = value.name;
    const last = parts[parts.length - 1];
    if (typeof last === 'object' && last !== null && 'value' in last && typeof last.value === 'string') {
      return last.value;
    }
  }
  return null;
}

function checkStatementShape(statements: readonly unknown[], kind: string, tableList: readonly string[]): Violation[] {
  const violations: Violation[] = [];

  if (statements.length > 1) {
    violations.push({
      kind: 'NOT_READ_ONLY',
      detail: `Multiple statements detected (${statements.length}). Only single statements are allowed.`,
    });
  }

  if (kind !== 'select') {
    violations.push({
      kind: 'NOT_READ_ONLY',
      detail: `Statement type "${kind.toUpperCase()}" is not a read-only query.`,
    });
    return violations;
  }

  const nested = new Set<string>();
  for (const entry of parseTableList(tableList)) {
    if (entry.action !== 'select') nested.add(entry.action);
  }
  const functions = new Set<string>();
  walkAst(statements, (node) => {
    if (typeof node.type !== 'string') return;
    if (node !== statements[0] && WRITE_NODE_TYPES.has(node.type)) nested.add(node.type);
    if (node.type === 'function' || node.type === 'aggr_func') {
      const name = functionName(node.name);
      if (name && DANGEROUS_FUNCTIONS.has(name.toLowerCase())) functions.add(name.toLowerCase());
    }
  });

  for (const action of nested) {
    violations.push({ kind: 'NOT_READ_ONLY', detail: `Nested ${action.toUpperCase()} is not allowed.` });
  }
  for (const fn of functions) {
    violations.push({ kind: 'NOT_READ_ONLY', detail: `Function "${fn}" is not allowed.` });
  }
  return violations;
}

function checkTables(tables: readonly string[], snapshot: SchemaSnapshot, policy: Policy): Violation[] {
  if (tables.length === 0) {
    return [{ kind: 'TABLE_NOT_ALLOWED', detail: 'Query does not read from any table in scope.' }];
  }

  const violations: Violation[] = [];
  for (const table of tables) {
    if (findTable(snapshot, table)) continue;
    if (tableAccess(policy, table) === 'restricted') {
      violations.push({ kind: 'TABLE_RESTRICTED', detail: `Table "${table}" is restricted.` });
    } else {
      violations.push({ kind: 'TABLE_NOT_ALLOWED', detail: `Table "${table}" is not in scope.` });
    }
  }
  return violations;
}

function checkColumns(statements: readonly unknown[], snapshot: SchemaSnapshot, policy: Policy): Violation[] {
  const refs = collectColumnRefs(statements);
  const excluded = new Set<string>();
  for (const ref of refs) {
    if (isExcludedColumn(policy, ref.column)) excluded.add(ref.column.toLowerCase());
  }
  const violations: Violation[] = [...excluded].map((column) => ({
    kind: 'COLUMN_EXCLUDED' as const,
    detail: `Column "${column}" is excluded by policy.`,
  }));

  if (policy.excludedColumns.size > 0) {
    for (const name of wholeRowReferences(statements, refs, snapshot)) {
      violations.push({
        kind: 'COLUMN_EXCLUDED',
        detail: `Whole-row reference "${name}" can expose excluded columns; select columns by name.`,
      });
    }
  }
  return violations;
}

/**
 * Unqualified references that name a FROM table or alias rather than a
 * column, as in `row_to_json(c)` or `c::text`. Postgres turns them into the
 * whole row, excluded columns included.
 */
function wholeRowReferences(
  statements: readonly unknown[],
  refs: readonly ColumnReference[],
  snapshot: SchemaSnapshot,
): string[] {
  const rowNames = new Set<string>();
  const columns = new Set<string>();
  for (const scope of collectSelectScopes(statements)) {
    for (const entry of scope.tables) {
      rowNames.add(entry.table.toLowerCase());
      if (entry.alias) rowNames.add(entry.alias.toLowerCase());
      for (const col of findTable(snapshot, entry.table)?.columns ?? []) {
        columns.add(col.name.toLowerCase());
      }
    }
  }

  const found = new Set<string>();
  for (const ref of refs) {
    const name = ref.column.toLowerCase();
    if (ref.qualifier === null && rowNames.has(name) && !columns.has(name)) found.add(name);
  }
  return [...found];
}

function checkLimit(statement: unknown, policy: Policy): Violation[] {
  const limit = outerLimit(statement);
  switch (limit.kind) {
    case 'none':
      return [{ kind: 'MISSING_LIMIT', detail: `Add LIMIT ${policy.maxRows} (or lower) to the outer query.` }];
    case 'expression':
      return [{ kind: 'MISSING_LIMIT', detail: 'LIMIT must be a literal integer.' }];
    case 'literal':
      if (limit.value > policy.maxRows) {
        return [
          {
            kind: 'LIMIT_TOO_LARGE',
            detail: `LIMIT ${limit.value} exceeds the maximum of ${policy.maxRows} rows.`,
          },
        ];
      }
      return [];
  }
}

function dedupe(violations: Violation[]): Violation[] {
  const seen = new Set<string>();
  return violations.filter((v) => {
    const key = `${v.kind}\u0000${v.detail}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Validate a candidate query. Accepted only when no violation is found.
 */
export function validate(candidate: CandidateQuery, snapshot: SchemaSnapshot, policy: Policy): ValidationResult {
  const violations: Violation[] = scanText(candidate.text);

  const parsed = parseSql(candidate.text, snapshot.dialect);
  if (!parsed.ok) {
    violations.push({ kind: 'MALFORMED', detail: parsed.error });
    return { accepted: false, violations: dedupe(violations) };
  }

  violations.push(...checkStatementShape(parsed.statements, parsed.kind, parsed.tableList));
  violations.push(...checkTables(referencedTables(parsed), snapshot, policy));
  violations.push(...checkColumns(parsed.statements, snapshot, policy));

  if (parsed.kind === 'select') {
    violations.push(...checkLimit(parsed.statements[0], policy));
    violations.push(...checkSoftDelete(parsed.statements, snapshot, policy));
  }

  const unique = dedupe(violations);
  return { accepted: unique.length === 0, violations: unique };
}

/** Render violations for the generator's retry prompt. */
export function formatViolations(violations: readonly Violation[]): string {
  return violations.map((v) => `- ${v.kind}: ${v.detail}`).join('\n');
}
