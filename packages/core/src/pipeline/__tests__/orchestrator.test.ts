import { describe, it, before } from 'node:test';
import assert from 'node:assert/strict';
import type { AuditSink, QueryRecord } from '../../audit/types.js';
import type { FetchedRows, ReadOnlyQueryOptions } from '../../db/types.js';
import { GenerationError } from '../../errors.js';
import type {
  GenerateRequest,
  Generation,
  GeneratorAdapter,
  OffTopicRequest,
  SummarizeRequest,
} from '../../llm/types.js';
import { configureLogging } from '../../logging/logger.js';
import { createPolicy } from '../../policy/policy.js';
import type { Policy } from '../../policy/types.js';
import { buildSnapshot, filterSchema } from '../../schema/catalog.js';
import type { SchemaSnapshot } from '../../schema/types.js';
import { MESSAGES, tooManyItemsMessage } from '../messages.js';
import { Orchestrator, type OrchestratorOptions } from '../orchestrator.js';

// ── Fakes ────────────────────────────────────────────────────────────

type GenerateStep = (req: GenerateRequest) => Promise<Generation>;

const ok = (sql: string): GenerateStep => async () => ({ status: 'OK', sql });
const outOfScope = (scopeReason: string): GenerateStep => async () => ({ status: 'OUT_OF_SCOPE', scopeReason });
const fail = (err: Error): GenerateStep => async () => {
  throw err;
};

class ScriptedGenerator implements GeneratorAdapter {
  readonly generateCalls: GenerateRequest[] = [];
  readonly summarizeCalls: SummarizeRequest[] = [];
  readonly offTopicCalls: OffTopicRequest[] = [];

  constructor(
    private readonly steps: GenerateStep[],
    private readonly summarizer: (req: SummarizeRequest) => Promise<{ answer: string }> = async () => ({
      answer: 'Here is your answer.',
    }),
    private readonly replier: (req: OffTopicRequest) => Promise<{ answer: string }> = async () => {
      throw new Error('no reply scripted');
    },
  ) {}

  generate(req: GenerateRequest): Promise<Generation> {
    const step = this.steps[Math.min(this.generateCalls.length, this.steps.length - 1)];
    this.generateCalls.push(req);
    return step(req);
  }

  summarize(req: SummarizeRequest): Promise<{ answer: string }> {
    this.summarizeCalls.push(req);
    return this.summarizer(req);
  }

  replyOffTopic(req: OffTopicRequest): Promise<{ answer: string }> {
    this.offTopicCalls.push(req);
    return this.replier(req);
  }
}

class FakeDb {
  readonly calls: Array<{ sql: string; options: ReadOnlyQueryOptions }> = [];

  constructor(private readonly result: FetchedRows | Error = { columns: ['id'], rows: [{ id: 1 }] }) {}

  async executeReadOnly(sql: string, options: ReadOnlyQueryOptions): Promise<FetchedRows> {
    this.calls.push({ sql, options });
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

class MemorySink implements AuditSink {
  readonly records: QueryRecord[] = [];

  async record(record: QueryRecord): Promise<void> {
    this.records.push(record);
  }
}

const col = (name: string) => ({ name, dataType: 'TEXT', nullable: true, isPrimaryKey: name === 'id' });

const TABLES = [
  { name: 'orders', columns: [col('id'), col('total'), col('status')] },
  { name: 'customers', columns: [col('id'), col('name'), col('deleted_at')] },
];

interface Harness {
  orchestrator: Orchestrator;
  generator: ScriptedGenerator;
  db: FakeDb;
  sink: MemorySink;
  snapshotCalls: () => number;
}

function harness(opts: {
  steps: GenerateStep[];
  summarizer?: (req: SummarizeRequest) => Promise<{ answer: string }>;
  replier?: (req: OffTopicRequest) => Promise<{ answer: string }>;
  db?: FakeDb;
  policy?: Policy;
  snapshot?: SchemaSnapshot;
  options?: Partial<OrchestratorOptions>;
  sink?: AuditSink;
}): Harness {
  const policy = opts.policy ?? createPolicy();
  const snapshot = opts.snapshot ?? buildSnapshot('sqlite', filterSchema(TABLES, policy));
  const generator = new ScriptedGenerator(opts.steps, opts.summarizer, opts.replier);
  const db = opts.db ?? new FakeDb();
  const sink = new MemorySink();
  let snapshots = 0;
  const orchestrator = new Orchestrator({
    catalog: {
      snapshot: async () => {
        snapshots += 1;
        return snapshot;
      },
    },
    generator,
    db,
    policy,
    auditSink: opts.sink ?? sink,
    options: opts.options,
  });
  return { orchestrator, generator, db, sink, snapshotCalls: () => snapshots };
}

const ORDERS_SQL = 'SELECT id, total FROM orders LIMIT 10';

before(() => {
  configureLogging({ level: 'silent', format: 'pretty' });
});

// ── Happy path ───────────────────────────────────────────────────────

describe('Orchestrator happy path', () => {
  it('answers, records once and hands bounded options to the database', async () => {
    const db = new FakeDb({ columns: ['id', 'total'], rows: [{ id: 1, total: 10 }, { id: 2, total: 20 }] });
    const h = harness({
      steps: [ok(ORDERS_SQL)],
      db,
      summarizer: async () => ({ answer: 'You have 2 orders worth $30.' }),
    });

    const record = await h.orchestrator.run('alice', '  How much did we sell? ');

    assert.equal(record.outcome, 'ANSWERED');
    assert.equal(record.answer, 'You have 2 orders worth $30.');
    assert.equal(record.userId, 'alice');
    assert.equal(record.question, 'How much did we sell?');
    assert.equal(record.finalSql, ORDERS_SQL);
    assert.equal(record.attemptCount, 1);
    assert.equal(record.rowCount, 2);
    assert.equal(record.truncated, false);
    assert.deepEqual(record.violations, []);
    assert.equal(record.scopeReason, null);
    assert.equal(record.errorDetail, null);
    assert.ok(record.finishedAt.getTime() >= record.startedAt.getTime());

    assert.deepEqual(h.sink.records, [record]);
    assert.equal(db.calls.length, 1);
    assert.equal(db.calls[0].sql, ORDERS_SQL);
    assert.equal(db.calls[0].options.fetchLimit, 101);
    assert.equal(db.calls[0].options.statementTimeoutMs, 15_000);
    assert.ok(db.calls[0].options.signal);

    assert.equal(h.generator.generateCalls[0].priorViolations, null);
    const summary = h.generator.summarizeCalls[0];
    assert.equal(summary.sql, ORDERS_SQL);
    assert.deepEqual(summary.preview, {
      columns: ['id', 'total'],
      rows: [{ id: 1, total: 10 }, { id: 2, total: 20 }],
      rowCount: 2,
      truncated: false,
    });
    assert.deepEqual(summary.constraints, { maxWords: 30, listing: false, currencySymbol: '$' });
  });

  it('gives every turn its own id', async () => {
    const h = harness({ steps: [ok(ORDERS_SQL)] });
    const a = await h.orchestrator.run('alice', 'orders?');
    const b = await h.orchestrator.run('alice', 'orders?');
    assert.notEqual(a.id, b.id);
  });
});

// ── Retry budget ─────────────────────────────────────────────────────

describe('Orchestrator retries', () => {
  it('retries a rejected candidate with its violations', async () => {
    const h = harness({ steps: [ok('SELECT id FROM orders'), ok('SELECT id FROM orders LIMIT 5')] });

    const record = await h.orchestrator.run('alice', 'Which orders?');

    assert.equal(record.outcome, 'ANSWERED');
    assert.equal(record.attemptCount, 2);
    assert.equal(record.finalSql, 'SELECT id FROM orders LIMIT 5');
    assert.deepEqual(record.violations, []);
    assert.equal(h.generator.generateCalls[0].priorViolations, null);
    assert.deepEqual(h.generator.generateCalls[1].priorViolations, [
      { kind: 'MISSING_LIMIT', detail: 'Add LIMIT 100 (or lower) to the outer query.' },
    ]);
  });

  it('fails after the budget is spent on rejections and never executes', async () => {
    const h = harness({ steps: [ok('DELETE FROM orders')] });

    const record = await h.orchestrator.run('alice', 'Delete all orders');

    assert.equal(record.outcome, 'GENERATION_FAILED');
    assert.equal(record.answer, MESSAGES.generationFailed);
    assert.equal(record.attemptCount, 3);
    assert.equal(record.finalSql, null);
    assert.equal(h.generator.generateCalls.length, 3);
    assert.equal(h.db.calls.length, 0);
    assert.ok(record.violations.length > 0);
    assert.ok(record.violations.every((v) => v.kind === 'NOT_READ_ONLY'));
    assert.match(record.errorDetail ?? '', /^Query rejected: NOT_READ_ONLY/);
    assert.notEqual(h.generator.generateCalls[2].priorViolations, null);
  });

  it('retries generator failures without prior violations', async () => {
    const h = harness({
      steps: [fail(new GenerationError('malformed_response', 'Invalid JSON: nope')), ok(ORDERS_SQL)],
    });

    const record = await h.orchestrator.run('alice', 'orders?');

    assert.equal(record.outcome, 'ANSWERED');
    assert.equal(record.attemptCount, 2);
    assert.equal(h.generator.generateCalls[1].priorViolations, null);
  });

  it('shares one budget between generator failures and rejections', async () => {
    const h = harness({
      steps: [fail(new Error('boom1')), ok('SELECT id FROM orders'), fail(new Error('boom2')), ok(ORDERS_SQL)],
    });

    const record = await h.orchestrator.run('alice', 'Which orders?');

    assert.equal(record.outcome, 'GENERATION_FAILED');
    assert.equal(record.attemptCount, 3);
    assert.equal(record.errorDetail, 'boom2');
    assert.equal(h.generator.generateCalls.length, 3);
    assert.equal(h.db.calls.length, 0);
    assert.equal(h.generator.generateCalls[1].priorViolations, null);
    assert.deepEqual(h.generator.generateCalls[2].priorViolations, [
      { kind: 'MISSING_LIMIT', detail: 'Add LIMIT 100 (or lower) to the outer query.' },
    ]);
    assert.deepEqual(
      record.violations.map((v) => v.kind),
      ['MISSING_LIMIT'],
    );
  });

  it('honours a configured budget', async () => {
    const h = harness({
      steps: [fail(new Error('socket hang up'))],
      options: { maxRetries: 2 },
    });

    const record = await h.orchestrator.run('alice', 'orders?');

    assert.equal(record.outcome, 'GENERATION_FAILED');
    assert.equal(record.attemptCount, 2);
    assert.equal(record.errorDetail, 'socket hang up');
    assert.equal(h.generator.generateCalls.length, 2);
  });

  it('counts a timed-out call against the budget and retries', async () => {
    const h = harness({
      steps: [() => new Promise<Generation>(() => {}), ok(ORDERS_SQL)],
      options: { llmTimeoutMs: 20 },
    });

    const record = await h.orchestrator.run('alice', 'orders?');

    assert.equal(record.outcome, 'ANSWERED');
    assert.equal(record.attemptCount, 2);
  });

  it('stops at once when the caller aborts', async () => {
    const controller = new AbortController();
    const h = harness({
      steps: [
        () => {
          controller.abort(new Error('user left'));
          return new Promise<Generation>(() => {});
        },
      ],
    });

    const record = await h.orchestrator.run('alice', 'orders?', { signal: controller.signal });

    assert.equal(record.outcome, 'GENERATION_FAILED');
    assert.equal(record.attemptCount, 1);
    assert.equal(record.errorDetail, 'Turn aborted by caller.');
    assert.equal(h.generator.generateCalls.length, 1);
  });
});

// ── Scope ────────────────────────────────────────────────────────────

describe('Orchestrator scope', () => {
  it('maps too_many_items to a message naming the row cap', async () => {
    const h = harness({ steps: [outOfScope('too_many_items')], policy: createPolicy({ maxRows: 50 }) });

    const record = await h.orchestrator.run('alice', 'list 5000 orders');

    assert.equal(record.outcome, 'OUT_OF_SCOPE');
    assert.equal(record.scopeReason, 'too_many_items');
    assert.equal(record.answer, tooManyItemsMessage(50));
    assert.equal(record.attemptCount, 1);
    assert.equal(h.db.calls.length, 0);
    assert.equal(h.generator.summarizeCalls.length, 0);
  });

  it('phrases an off-topic reply through the model', async () => {
    const h = harness({
      steps: [outOfScope('off_topic')],
      replier: async () => ({ answer: '  Jokes are not my thing, but your orders are.  ' }),
    });

    const record = await h.orchestrator.run('alice', 'tell me a joke');

    assert.equal(record.outcome, 'OUT_OF_SCOPE');
    assert.equal(record.scopeReason, 'off_topic');
    assert.equal(record.answer, 'Jokes are not my thing, but your orders are.');
    assert.equal(record.attemptCount, 1);
    assert.equal(h.generator.offTopicCalls.length, 1);
    assert.equal(h.generator.offTopicCalls[0].question, 'tell me a joke');
    assert.equal(h.generator.offTopicCalls[0].maxWords, 30);
    assert.equal(h.generator.summarizeCalls.length, 0);
    assert.equal(h.sink.records.length, 1);
  });

  it('caps the off-topic reply length', async () => {
    const h = harness({
      steps: [outOfScope('off_topic')],
      options: { responseMaxWords: 3 },
      replier: async () => ({ answer: 'one two three four five' }),
    });

    const record = await h.orchestrator.run('alice', 'tell me a joke');

    assert.equal(record.answer, 'one two three...');
  });

  it('falls back to the fixed off-topic message without a reply', async () => {
    const empty = await harness({
      steps: [outOfScope('off_topic')],
      replier: async () => ({ answer: '   ' }),
    }).orchestrator.run('alice', 'tell me a joke');
    assert.equal(empty.answer, MESSAGES.offTopic);
    assert.equal(empty.outcome, 'OUT_OF_SCOPE');

    const failed = await harness({
      steps: [outOfScope('off_topic')],
      replier: async () => {
        throw new GenerationError('transport', 'gateway down');
      },
    }).orchestrator.run('alice', 'tell me a joke');
    assert.equal(failed.answer, MESSAGES.offTopic);
    assert.equal(failed.scopeReason, 'off_topic');
  });

  it('does not ask for a reply on other scope reasons', async () => {
    const h = harness({ steps: [outOfScope('not_in_schema')] });
    await h.orchestrator.run('alice', 'payroll?');
    assert.equal(h.generator.offTopicCalls.length, 0);
  });

  it('uses the off-topic and generic messages for other reasons', async () => {
    const offTopic = await harness({ steps: [outOfScope('off_topic')] }).orchestrator.run('alice', 'tell me a joke');
    assert.equal(offTopic.answer, MESSAGES.offTopic);

    const missing = await harness({ steps: [outOfScope('not_in_schema')] }).orchestrator.run('alice', 'payroll?');
    assert.equal(missing.answer, MESSAGES.outOfScope);
    assert.equal(missing.scopeReason, 'not_in_schema');
  });

  it('does not call the generator when the database is unavailable', async () => {
    const unavailable: SchemaSnapshot = { dialect: 'sqlite', tables: [], capturedAt: new Date(), connectionError: true };
    const h = harness({ steps: [ok(ORDERS_SQL)], snapshot: unavailable });

    const record = await h.orchestrator.run('alice', 'orders?');

    assert.equal(record.outcome, 'OUT_OF_SCOPE');
    assert.equal(record.scopeReason, 'database_unavailable');
    assert.equal(record.answer, MESSAGES.databaseUnavailable);
    assert.equal(record.attemptCount, 0);
    assert.equal(h.generator.generateCalls.length, 0);
  });

  it('does not call the generator when no table is in scope', async () => {
    const empty = buildSnapshot('sqlite', []);
    const h = harness({ steps: [ok(ORDERS_SQL)], snapshot: empty });

    const record = await h.orchestrator.run('alice', 'orders?');

    assert.equal(record.outcome, 'OUT_OF_SCOPE');
    assert.equal(record.answer, MESSAGES.outOfScope);
    assert.equal(h.generator.generateCalls.length, 0);
  });
});

// ── Refusal ──────────────────────────────────────────────────────────

describe('Orchestrator question checks', () => {
  it('rejects a blank question before reading the schema', async () => {
    const h = harness({ steps: [ok(ORDERS_SQL)] });

    const record = await h.orchestrator.run('alice', ' \u0000 ');

    assert.equal(record.outcome, 'REJECTED');
    assert.equal(record.answer, MESSAGES.emptyQuestion);
    assert.equal(record.errorDetail, 'question_empty');
    assert.equal(record.attemptCount, 0);
    assert.equal(h.snapshotCalls(), 0);
    assert.equal(h.sink.records.length, 1);
  });

  it('rejects an overlong question', async () => {
    const h = harness({ steps: [ok(ORDERS_SQL)] });
    const record = await h.orchestrator.run('alice', 'why '.repeat(600));
    assert.equal(record.outcome, 'REJECTED');
    assert.equal(record.answer, MESSAGES.questionTooLong);
  });
});

// ── Execution and answers ────────────────────────────────────────────

describe('Orchestrator execution', () => {
  it('ends on a database error without retrying', async () => {
    const h = harness({ steps: [ok(ORDERS_SQL)], db: new FakeDb(new Error('relation "orders" does not exist')) });

    const record = await h.orchestrator.run('alice', 'orders?');

    assert.equal(record.outcome, 'EXECUTION_FAILED');
    assert.equal(record.answer, MESSAGES.executionFailed);
    assert.equal(record.errorDetail, 'relation "orders" does not exist');
    assert.equal(record.finalSql, ORDERS_SQL);
    assert.equal(record.rowCount, null);
    assert.equal(h.generator.generateCalls.length, 1);
    assert.doesNotMatch(record.answer, /orders/);
  });

  it('drops excluded columns and the row past the cap', async () => {
    const policy = createPolicy({ maxRows: 2, excludedColumns: ['internal_note'] });
    const db = new FakeDb({
      columns: ['id', 'Internal_Note', 'total'],
      rows: [
        { id: 1, Internal_Note: 'vip', total: 10 },
        { id: 2, Internal_Note: 'late', total: 20 },
        { id: 3, Internal_Note: 'x', total: 30 },
      ],
    });
    const h = harness({ steps: [ok('SELECT * FROM orders LIMIT 2')], db, policy });

    const record = await h.orchestrator.run('alice', 'What are the totals?');

    assert.equal(record.outcome, 'ANSWERED');
    assert.equal(record.rowCount, 2);
    assert.equal(record.truncated, true);
    assert.equal(db.calls[0].options.fetchLimit, 3);
    assert.deepEqual(h.generator.summarizeCalls[0].preview, {
      columns: ['id', 'total'],
      rows: [
        { id: 1, total: 10 },
        { id: 2, total: 20 },
      ],
      rowCount: 2,
      truncated: true,
    });
  });

  it('answers an empty result without the generator', async () => {
    const h = harness({ steps: [ok(ORDERS_SQL)], db: new FakeDb({ columns: ['id', 'total'], rows: [] }) });

    const record = await h.orchestrator.run('alice', 'orders from 1999?');

    assert.equal(record.outcome, 'ANSWERED');
    assert.equal(record.answer, MESSAGES.noResults);
    assert.equal(record.rowCount, 0);
    assert.equal(h.generator.summarizeCalls.length, 0);
  });

  it('caps the answer length for ordinary questions', async () => {
    const h = harness({
      steps: [ok(ORDERS_SQL)],
      options: { responseMaxWords: 5 },
      summarizer: async () => ({ answer: 'one two three four five six seven' }),
    });

    const record = await h.orchestrator.run('alice', 'What is the revenue?');

    assert.equal(record.answer, 'one two three four five...');
  });

  it('leaves listings uncapped and shows them every row', async () => {
    const rows = Array.from({ length: 12 }, (_, i) => ({ id: i + 1 }));
    const long = Array.from({ length: 12 }, (_, i) => `order ${i + 1}`).join(', ');
    const h = harness({
      steps: [ok(ORDERS_SQL)],
      db: new FakeDb({ columns: ['id'], rows }),
      options: { responseMaxWords: 5 },
      summarizer: async () => ({ answer: long }),
    });

    const record = await h.orchestrator.run('alice', 'List all orders');

    assert.equal(record.answer, long);
    const request = h.generator.summarizeCalls[0];
    assert.equal(request.constraints.listing, true);
    assert.equal(request.preview.rows.length, 12);
  });

  it('shows ten preview rows for other questions', async () => {
    const rows = Array.from({ length: 12 }, (_, i) => ({ id: i + 1 }));
    const h = harness({ steps: [ok(ORDERS_SQL)], db: new FakeDb({ columns: ['id'], rows }) });

    await h.orchestrator.run('alice', 'Which order is newest?');

    const request = h.generator.summarizeCalls[0];
    assert.equal(request.preview.rows.length, 10);
    assert.equal(request.preview.rowCount, 12);
  });

  it('redacts a listing of recent products and skips the word cap', async () => {
    const policy = createPolicy({ excludedColumns: ['password_hash'] });
    const products = buildSnapshot(
      'sqlite',
      filterSchema([{ name: 'products', columns: [col('id'), col('name'), col('password_hash')] }], policy),
    );
    const rows = Array.from({ length: 10 }, (_, i) => ({ id: i + 1, name: `Product ${i + 1}`, password_hash: 'x' }));
    const answer = Array.from({ length: 10 }, (_, i) => `Product ${i + 1} costs ${i + 1} dollars`).join('; ');
    const h = harness({
      steps: [ok('SELECT id, name FROM products ORDER BY id DESC LIMIT 10')],
      db: new FakeDb({ columns: ['id', 'name', 'password_hash'], rows }),
      policy,
      snapshot: products,
      summarizer: async () => ({ answer }),
    });

    const record = await h.orchestrator.run('alice', 'List 10 recent products');

    assert.equal(record.outcome, 'ANSWERED');
    assert.equal(record.answer, answer);
    assert.equal(record.rowCount, 10);
    assert.equal(record.truncated, false);
    const preview = h.generator.summarizeCalls[0].preview;
    assert.deepEqual(preview.columns, ['id', 'name']);
    assert.ok(preview.rows.every((row) => !('password_hash' in row)));
    assert.equal(preview.rows.length, 10);
  });

  it('keeps the executed SQL when the summary fails', async () => {
    const h = harness({
      steps: [ok(ORDERS_SQL)],
      summarizer: async () => {
        throw new GenerationError('transport', 'Model call failed: 502');
      },
    });

    const record = await h.orchestrator.run('alice', 'orders?');

    assert.equal(record.outcome, 'GENERATION_FAILED');
    assert.equal(record.answer, MESSAGES.generationFailed);
    assert.equal(record.finalSql, ORDERS_SQL);
    assert.equal(record.rowCount, 1);
    assert.equal(record.errorDetail, 'Model call failed: 502');
  });

  it('falls back when the summary is blank', async () => {
    const h = harness({ steps: [ok(ORDERS_SQL)], summarizer: async () => ({ answer: '   ' }) });
    const record = await h.orchestrator.run('alice', 'orders?');
    assert.equal(record.answer, MESSAGES.generationFailed);
  });
});

// ── Audit ────────────────────────────────────────────────────────────

describe('Orchestrator audit', () => {
  it('returns the record even when the sink fails', async () => {
    const h = harness({
      steps: [ok(ORDERS_SQL)],
      sink: {
        record: async () => {
          throw new Error('disk full');
        },
      },
    });

    const record = await h.orchestrator.run('alice', 'orders?');

    assert.equal(record.outcome, 'ANSWERED');
  });

  it('records failed turns too', async () => {
    const h = harness({ steps: [ok(ORDERS_SQL)], db: new FakeDb(new Error('boom')) });
    const record = await h.orchestrator.run('alice', 'orders?');
    assert.deepEqual(h.sink.records, [record]);
  });
});
