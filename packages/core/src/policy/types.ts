/**
 * Policy and guard types for askwarden.
 *
 * The Guard evaluates every generated SQL statement against the Policy and
 * the filtered schema snapshot before anything reaches the database.
 */

/**
 * Accepted shapes of a soft-delete filter on the configured column.
 * - `is-null`:  `deleted_at IS NULL`
 * - `is-false`: `deleted_at = false`, `deleted_at IS FALSE`, `deleted_at = 0`
 */
export type SoftDeletePredicate = 'is-null' | 'is-false';

export const SOFT_DELETE_PREDICATES: readonly SoftDeletePredicate[] = ['is-null', 'is-false'];

/** Immutable access rules, built once per process by `createPolicy`. */
export interface Policy {
  /** Lowercased table names, or 'all' when no allow-list is configured */
  readonly allowedTables: ReadonlySet<string> | 'all';
  /** Lowercased table names; restriction wins over the allow-list */
  readonly restrictedTables: ReadonlySet<string>;
  /** Lowercased column names hidden from the generator and the end user */
  readonly excludedColumns: ReadonlySet<string>;
  /** Maximum rows a query may return. Default: 100 */
  readonly maxRows: number;
  readonly readOnly: true;
  /** Column marking logically deleted rows. Default: deleted_at */
  readonly softDeleteColumn: string;
  readonly softDeletePredicates: readonly SoftDeletePredicate[];
}

export interface PolicyInput {
  allowedTables?: Iterable<string> | 'all';
  restrictedTables?: Iterable<string>;
  excludedColumns?: Iterable<string>;
  maxRows?: number;
  softDeleteColumn?: string;
  softDeletePredicates?: readonly SoftDeletePredicate[];
}

export type ViolationKind =
  | 'NOT_READ_ONLY'
  | 'TABLE_NOT_ALLOWED'
  | 'TABLE_RESTRICTED'
  | 'COLUMN_EXCLUDED'
  | 'MISSING_LIMIT'
  | 'LIMIT_TOO_LARGE'
  | 'MISSING_SOFT_DELETE_FILTER'
  | 'MALFORMED';

export interface Violation {
  kind: ViolationKind;
  detail: string;
}

export interface ValidationResult {
  accepted: boolean;
  violations: Violation[];
}

export type CandidateStatus = 'OK' | 'OUT_OF_SCOPE';

/** One generated, not-yet-validated query. Never persisted. */
export interface CandidateQuery {
  text: string;
  /** Lowercased table names found in the text (empty when unparseable) */
  targetTables: ReadonlySet<string>;
  limitClause: number | null;
  status: CandidateStatus;
  scopeReason: string | null;
}
