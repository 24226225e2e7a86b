import type { Violation } from '../policy/types.js';

export type Outcome = 'ANSWERED' | 'OUT_OF_SCOPE' | 'REJECTED' | 'EXECUTION_FAILED' | 'GENERATION_FAILED';

export const OUTCOMES: readonly Outcome[] = [
  'ANSWERED',
  'OUT_OF_SCOPE',
  'REJECTED',
  'EXECUTION_FAILED',
  'GENERATION_FAILED',
];

/**
 * One finished turn. Produced exactly once per question and handed to the
 * audit sink; result rows are never part of it.
 */
export interface QueryRecord {
  id: string;
  userId: string;
  question: string;
  /** Last SQL the Guard accepted, null when none was */
  finalSql: string | null;
  attemptCount: number;
  outcome: Outcome;
  /** User-visible text; never contains SQL or internal error detail */
  answer: string;
  rowCount: number | null;
  truncated: boolean;
  scopeReason: string | null;
  /** Violations of the last rejected candidate */
  violations: Violation[];
  /** Internal error text, audit only */
  errorDetail: string | null;
  startedAt: Date;
  finishedAt: Date;
}

export interface AuditSink {
  record(record: QueryRecord): Promise<void>;
}

export interface AuditListOptions {
  limit?: number;
  userId?: string;
}
