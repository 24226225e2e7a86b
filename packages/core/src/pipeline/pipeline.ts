/**
 * Inbound surface: one QueryPipeline per process.
 */

import { SqliteAuditStore } from '../audit/sqlite-store.js';
import type { AuditSink, QueryRecord } from '../audit/types.js';
import { policyFromConfig, type AppConfig } from '../config/config.js';
import { createDatabaseClient, parseDatabaseUrl } from '../db/connect.js';
import type { DatabaseClient } from '../db/types.js';
import { OpenAIGenerator } from '../llm/openai.js';
import type { GeneratorAdapter } from '../llm/types.js';
import type { Policy } from '../policy/types.js';
import { SchemaCatalog } from '../schema/catalog.js';
import { Orchestrator, type OrchestratorOptions, type SnapshotSource } from './orchestrator.js';

export interface QueryPipelineDeps {
  catalog: SnapshotSource;
  generator: GeneratorAdapter;
  db: Pick<DatabaseClient, 'executeReadOnly'>;
  policy: Policy;
  auditSink?: AuditSink;
  options?: Partial<OrchestratorOptions>;
}

/**
 * Runs turns through the Orchestrator. Turns of the same user are queued
 * behind each other; different users proceed concurrently.
 */
export class QueryPipeline {
  private readonly orchestrator: Orchestrator;
  private readonly tails = new Map<string, Promise<unknown>>();

  constructor(deps: QueryPipelineDeps) {
    this.orchestrator = new Orchestrator(deps);
  }

  handleQuestion(userId: string, question: string, opts: { signal?: AbortSignal } = {}): Promise<QueryRecord> {
    const previous = this.tails.get(userId) ?? Promise.resolve();
    // the previous turn's outcome does not matter, only its completion
    const turn = previous.then(
      () => this.orchestrator.run(userId, question, opts),
      () => this.orchestrator.run(userId, question, opts),
    );
    this.tails.set(userId, turn);

    const cleanup = (): void => {
      if (this.tails.get(userId) === turn) this.tails.delete(userId);
    };
    turn.then(cleanup, cleanup);
    return turn;
  }

  /** Users with a turn queued or running. */
  get activeUsers(): number {
    return this.tails.size;
  }
}

export interface BuiltPipeline {
  pipeline: QueryPipeline;
  catalog: SchemaCatalog;
  db: DatabaseClient;
  policy: Policy;
  audit: SqliteAuditStore;
  close(): void;
}

/** Wire the production pipeline from loaded configuration. */
export function buildPipeline(config: AppConfig): BuiltPipeline {
  const policy = policyFromConfig(config);
  const db = createDatabaseClient(parseDatabaseUrl(config.databaseUrl, { ssl: config.databaseSsl }));
  const catalog = new SchemaCatalog(db, policy);
  const generator = new OpenAIGenerator({ ...config.openai, policy });
  const audit = new SqliteAuditStore(config.auditDbPath);

  const pipeline = new QueryPipeline({
    catalog,
    generator,
    db,
    policy,
    auditSink: audit,
    options: {
      maxRetries: config.maxRetries,
      responseMaxWords: config.responseMaxWords,
      currencySymbol: config.currencySymbol,
      llmTimeoutMs: config.openai.timeoutMs,
      statementTimeoutMs: config.statementTimeoutMs,
    },
  });

  return { pipeline, catalog, db, policy, audit, close: () => audit.close() };
}
