/**
 * Per-turn orchestration: question → generated SQL → Guard → read-only
 * execution → redaction → bounded answer. An off-topic question gets a
 * model-phrased reply instead.
 *
 * A turn is a state machine over a tagged union. `step` handles one active
 * state and returns the next; the loop ends on a terminal state, which is
 * turned into exactly one QueryRecord.
 */

import { randomUUID } from 'node:crypto';
import type { AuditSink, QueryRecord } from '../audit/types.js';
import type { DatabaseClient, FetchedRows, Row } from '../db/types.js';
import {
  ExecutionError,
  GenerationError,
  ScopeError,
  ValidationRejection,
  errorMessage,
} from '../errors.js';
import type { GeneratorAdapter } from '../llm/types.js';
import { createChildLogger, sqlPreview } from '../logging/logger.js';
import { validate } from '../policy/guard.js';
import { toCandidate } from '../policy/inspect.js';
import { isExcludedColumn } from '../policy/policy.js';
import type { CandidateQuery, Policy, Violation } from '../policy/types.js';
import type { SchemaSnapshot } from '../schema/types.js';
import { MESSAGES, tooManyItemsMessage } from './messages.js';
import { isListingRequest, sanitizeQuestion, truncateToWords, countWords } from './text.js';
import { isTimeoutReason, raceSignal, withDeadline } from './timeout.js';

const log = createChildLogger('orchestrator');

export interface OrchestratorOptions {
  /** Shared budget of generator calls per turn */
  maxRetries: number;
  responseMaxWords: number;
  currencySymbol: string;
  /** Deadline for each generator call */
  llmTimeoutMs: number;
  /** Server-side statement timeout */
  statementTimeoutMs: number;
  /** Deadline for the whole execution step, connection included */
  executionTimeoutMs: number;
  /** Rows shown to the answer prompt for non-listing questions */
  previewRows: number;
}

export const DEFAULT_ORCHESTRATOR_OPTIONS: OrchestratorOptions = {
  maxRetries: 3,
  responseMaxWords: 30,
  currencySymbol: '$',
  llmTimeoutMs: 30_000,
  statementTimeoutMs: 15_000,
  executionTimeoutMs: 20_000,
  previewRows: 10,
};

export interface SnapshotSource {
  snapshot(): Promise<SchemaSnapshot>;
}

export interface OrchestratorDeps {
  catalog: SnapshotSource;
  generator: GeneratorAdapter;
  db: Pick<DatabaseClient, 'executeReadOnly'>;
  policy: Policy;
  auditSink?: AuditSink;
  options?: Partial<OrchestratorOptions>;
}

export interface ExecutionResult {
  columns: string[];
  rows: Row[];
  rowCount: number;
  truncated: boolean;
}

// ── States ───────────────────────────────────────────────────────────

type ActiveState =
  | { tag: 'RECEIVED' }
  | { tag: 'GENERATING'; priorViolations: readonly Violation[] | null }
  | { tag: 'VALIDATING'; candidate: CandidateQuery }
  | { tag: 'REJECTED'; candidate: CandidateQuery; violations: Violation[] }
  | { tag: 'ACCEPTED'; candidate: CandidateQuery }
  | { tag: 'EXECUTING'; sql: string }
  | { tag: 'REDACTING'; sql: string; fetched: FetchedRows }
  | { tag: 'ANSWERING'; sql: string; result: ExecutionResult }
  | { tag: 'CONSTRAINING'; answer: string }
  | { tag: 'REPLYING'; failure: ScopeError };

type TerminalState =
  | { tag: 'DONE'; answer: string }
  | { tag: 'REFUSED'; reason: 'empty' | 'too_long' }
  | { tag: 'OUT_OF_SCOPE'; failure: ScopeError; reply?: string }
  | { tag: 'GENERATION_FAILED'; failure: GenerationError | ValidationRejection }
  | { tag: 'EXEC_FAILED'; failure: ExecutionError };

type State = ActiveState | TerminalState;

function isTerminal(state: State): state is TerminalState {
  switch (state.tag) {
    case 'DONE':
    case 'REFUSED':
    case 'OUT_OF_SCOPE':
    case 'GENERATION_FAILED':
    case 'EXEC_FAILED':
      return true;
    default:
      return false;
  }
}

/** Mutable facts gathered along one turn. */
interface Turn {
  id: string;
  userId: string;
  question: string;
  startedAt: Date;
  signal?: AbortSignal;
  snapshot: SchemaSnapshot | null;
  attempts: number;
  lastFailure: GenerationError | ValidationRejection | null;
  lastViolations: Violation[];
  finalSql: string | null;
  rowCount: number | null;
  truncated: boolean;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled state: ${JSON.stringify(value)}`);
}

/** Turn any thrown value from a generator call into a GenerationError. */
function asGenerationError(err: unknown, deadline: AbortSignal, caller: AbortSignal | undefined): GenerationError {
  if (err instanceof GenerationError) return err;
  if (caller?.aborted) return new GenerationError('aborted', 'Turn aborted by caller.');
  if (deadline.aborted && isTimeoutReason(deadline.reason)) {
    return new GenerationError('timeout', 'Model call timed out.');
  }
  return new GenerationError('transport', errorMessage(err));
}

export class Orchestrator {
  private readonly options: OrchestratorOptions;

  constructor(private readonly deps: OrchestratorDeps) {
    this.options = { ...DEFAULT_ORCHESTRATOR_OPTIONS, ...deps.options };
  }

  /** Run one turn to completion. Never rejects for pipeline failures. */
  async run(userId: string, question: string, opts: { signal?: AbortSignal } = {}): Promise<QueryRecord> {
    const turn: Turn = {
      id: randomUUID(),
      userId,
      question,
      startedAt: new Date(),
      signal: opts.signal,
      snapshot: null,
      attempts: 0,
      lastFailure: null,
      lastViolations: [],
      finalSql: null,
      rowCount: null,
      truncated: false,
    };

    let state: State = { tag: 'RECEIVED' };
    while (!isTerminal(state)) {
      const next: State = await this.step(state, turn);
      log.debug('Transition', { turn: turn.id, from: state.tag, to: next.tag });
      state = next;
    }

    const record = this.finish(state, turn);
    await this.audit(record);
    return record;
  }

  private async step(state: ActiveState, turn: Turn): Promise<State> {
    switch (state.tag) {
      case 'RECEIVED':
        return this.receive(turn);

      case 'GENERATING':
        return this.generate(turn, state.priorViolations);

      case 'VALIDATING': {
        if (!turn.snapshot) {
          return { tag: 'OUT_OF_SCOPE', failure: new ScopeError('database_unavailable') };
        }
        const result = validate(state.candidate, turn.snapshot, this.deps.policy);
        return result.accepted
          ? { tag: 'ACCEPTED', candidate: state.candidate }
          : { tag: 'REJECTED', candidate: state.candidate, violations: result.violations };
      }

      case 'REJECTED':
        log.warn('Guard rejected candidate', {
          turn: turn.id,
          attempt: turn.attempts,
          violations: state.violations.map((v) => v.kind),
          sql: sqlPreview(state.candidate.text),
        });
        turn.lastViolations = state.violations;
        turn.lastFailure = new ValidationRejection(state.violations);
        return { tag: 'GENERATING', priorViolations: state.violations };

      case 'ACCEPTED':
        turn.finalSql = state.candidate.text;
        turn.lastViolations = [];
        return { tag: 'EXECUTING', sql: state.candidate.text };

      case 'EXECUTING':
        return this.execute(turn, state.sql);

      case 'REDACTING': {
        const result = this.redact(state.fetched);
        turn.rowCount = result.rowCount;
        turn.truncated = result.truncated;
        return { tag: 'ANSWERING', sql: state.sql, result };
      }

      case 'ANSWERING':
        return this.answer(turn, state.sql, state.result);

      case 'CONSTRAINING':
        return { tag: 'DONE', answer: this.constrain(turn.question, state.answer) };

      case 'REPLYING':
        return this.replyOffTopic(turn, state.failure);

      default:
        return assertNever(state);
    }
  }

  private async receive(turn: Turn): Promise<State> {
    const sanitized = sanitizeQuestion(turn.question);
    turn.question = sanitized.question;
    if (!sanitized.ok) {
      return { tag: 'REFUSED', reason: sanitized.reason };
    }

    const snapshot = await this.deps.catalog.snapshot();
    turn.snapshot = snapshot;
    if (snapshot.connectionError) {
      return { tag: 'OUT_OF_SCOPE', failure: new ScopeError('database_unavailable') };
    }
    if (snapshot.tables.length === 0) {
      return { tag: 'OUT_OF_SCOPE', failure: new ScopeError('no_tables_in_scope') };
    }
    return { tag: 'GENERATING', priorViolations: null };
  }

  private async generate(turn: Turn, priorViolations: readonly Violation[] | null): Promise<State> {
    const snapshot = turn.snapshot;
    if (!snapshot) {
      return { tag: 'OUT_OF_SCOPE', failure: new ScopeError('database_unavailable') };
    }
    if (turn.attempts >= this.options.maxRetries) {
      return {
        tag: 'GENERATION_FAILED',
        failure: turn.lastFailure ?? new GenerationError('transport', 'Retry budget exhausted.'),
      };
    }
    turn.attempts += 1;

    const deadline = withDeadline(turn.signal, this.options.llmTimeoutMs);
    try {
      const generation = await raceSignal(
        this.deps.generator.generate({ question: turn.question, snapshot, priorViolations, signal: deadline }),
        deadline,
      );

      if (generation.status === 'OUT_OF_SCOPE') {
        const failure = new ScopeError(generation.scopeReason);
        return failure.reason === 'off_topic' ? { tag: 'REPLYING', failure } : { tag: 'OUT_OF_SCOPE', failure };
      }

      const candidate = toCandidate(generation.sql, snapshot.dialect);
      log.debug('Candidate generated', { turn: turn.id, attempt: turn.attempts, sql: sqlPreview(candidate.text) });
      return { tag: 'VALIDATING', candidate };
    } catch (err: unknown) {
      const failure = asGenerationError(err, deadline, turn.signal);
      log.warn('Generation failed', { turn: turn.id, attempt: turn.attempts, reason: failure.reason });
      turn.lastFailure = failure;
      if (failure.reason === 'aborted') {
        return { tag: 'GENERATION_FAILED', failure };
      }
      // a failed call carries no useful violations into the next attempt
      return { tag: 'GENERATING', priorViolations: null };
    }
  }

  private async execute(turn: Turn, sql: string): Promise<State> {
    const deadline = withDeadline(turn.signal, this.options.executionTimeoutMs);
    try {
      const fetched = await raceSignal(
        this.deps.db.executeReadOnly(sql, {
          fetchLimit: this.deps.policy.maxRows + 1,
          statementTimeoutMs: this.options.statementTimeoutMs,
          signal: deadline,
        }),
        deadline,
      );
      return { tag: 'REDACTING', sql, fetched };
    } catch (err: unknown) {
      const detail = deadline.aborted && isTimeoutReason(deadline.reason) ? 'Execution timed out.' : errorMessage(err);
      log.error('Execution failed', { turn: turn.id, error: detail, sql: sqlPreview(sql) });
      return { tag: 'EXEC_FAILED', failure: new ExecutionError(detail) };
    }
  }

  /** Drop excluded columns from every row, then the extra row past maxRows. */
  private redact(fetched: FetchedRows): ExecutionResult {
    const policy = this.deps.policy;
    const columns = fetched.columns.filter((c) => !isExcludedColumn(policy, c));
    const redacted = fetched.rows.map((row) =>
      Object.fromEntries(Object.entries(row).filter(([key]) => !isExcludedColumn(policy, key))),
    );
    const truncated = redacted.length > policy.maxRows;
    const rows = truncated ? redacted.slice(0, policy.maxRows) : redacted;
    return { columns, rows, rowCount: rows.length, truncated };
  }

  private async answer(turn: Turn, sql: string, result: ExecutionResult): Promise<State> {
    if (result.rowCount === 0) {
      return { tag: 'CONSTRAINING', answer: MESSAGES.noResults };
    }

    const listing = isListingRequest(turn.question);
    const deadline = withDeadline(turn.signal, this.options.llmTimeoutMs);
    try {
      const { answer } = await raceSignal(
        this.deps.generator.summarize({
          question: turn.question,
          sql,
          preview: {
            columns: result.columns,
            rows: listing ? result.rows : result.rows.slice(0, this.options.previewRows),
            rowCount: result.rowCount,
            truncated: result.truncated,
          },
          constraints: {
            maxWords: this.options.responseMaxWords,
            listing,
            currencySymbol: this.options.currencySymbol,
          },
          signal: deadline,
        }),
        deadline,
      );
      return { tag: 'CONSTRAINING', answer };
    } catch (err: unknown) {
      const failure = asGenerationError(err, deadline, turn.signal);
      log.error('Answer synthesis failed', { turn: turn.id, reason: failure.reason, error: failure.message });
      return { tag: 'GENERATION_FAILED', failure };
    }
  }

  /** Falls back to the fixed off-topic message when the model gives no reply. */
  private async replyOffTopic(turn: Turn, failure: ScopeError): Promise<State> {
    const maxWords = this.options.responseMaxWords;
    const deadline = withDeadline(turn.signal, this.options.llmTimeoutMs);
    try {
      const { answer } = await raceSignal(
        this.deps.generator.replyOffTopic({ question: turn.question, maxWords, signal: deadline }),
        deadline,
      );
      const reply = answer.trim();
      if (reply) {
        return { tag: 'OUT_OF_SCOPE', failure, reply: countWords(reply) > maxWords ? truncateToWords(reply, maxWords) : reply };
      }
    } catch (err: unknown) {
      const reason = asGenerationError(err, deadline, turn.signal).reason;
      log.warn('Off-topic reply failed', { turn: turn.id, reason });
    }
    return { tag: 'OUT_OF_SCOPE', failure };
  }

  private constrain(question: string, answer: string): string {
    const text = answer.trim();
    if (!text) return MESSAGES.generationFailed;
    if (isListingRequest(question)) return text;
    const max = this.options.responseMaxWords;
    return countWords(text) > max ? truncateToWords(text, max) : text;
  }

  private finish(state: TerminalState, turn: Turn): QueryRecord {
    const base = {
      id: turn.id,
      userId: turn.userId,
      question: turn.question,
      finalSql: turn.finalSql,
      attemptCount: turn.attempts,
      rowCount: turn.rowCount,
      truncated: turn.truncated,
      violations: turn.lastViolations,
      startedAt: turn.startedAt,
      finishedAt: new Date(),
    };

    switch (state.tag) {
      case 'DONE':
        return { ...base, outcome: 'ANSWERED', answer: state.answer, scopeReason: null, errorDetail: null };
      case 'REFUSED':
        return {
          ...base,
          outcome: 'REJECTED',
          answer: state.reason === 'empty' ? MESSAGES.emptyQuestion : MESSAGES.questionTooLong,
          scopeReason: null,
          errorDetail: `question_${state.reason}`,
        };
      case 'OUT_OF_SCOPE':
        return {
          ...base,
          outcome: 'OUT_OF_SCOPE',
          answer: state.reply ?? this.scopeMessage(state.failure.reason),
          scopeReason: state.failure.reason,
          errorDetail: null,
        };
      case 'GENERATION_FAILED':
        return {
          ...base,
          outcome: 'GENERATION_FAILED',
          answer: MESSAGES.generationFailed,
          scopeReason: null,
          errorDetail: state.failure.message,
        };
      case 'EXEC_FAILED':
        return {
          ...base,
          outcome: 'EXECUTION_FAILED',
          answer: MESSAGES.executionFailed,
          scopeReason: null,
          errorDetail: state.failure.message,
        };
      default:
        return assertNever(state);
    }
  }

  private scopeMessage(reason: string): string {
    switch (reason) {
      case 'database_unavailable':
        return MESSAGES.databaseUnavailable;
      case 'too_many_items':
        return tooManyItemsMessage(this.deps.policy.maxRows);
      case 'off_topic':
        return MESSAGES.offTopic;
      default:
        return MESSAGES.outOfScope;
    }
  }

  private async audit(record: QueryRecord): Promise<void> {
    log.info('Turn finished', {
      turn: record.id,
      outcome: record.outcome,
      attempts: record.attemptCount,
      rows: record.rowCount,
    });
    if (!this.deps.auditSink) return;
    try {
      await this.deps.auditSink.record(record);
    } catch (err: unknown) {
      log.error('Audit sink failed', { turn: record.id, error: errorMessage(err) });
    }
  }
}
