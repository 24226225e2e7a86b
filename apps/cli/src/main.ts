#!/usr/bin/env -S node --import tsx

/**
 * askwarden CLI entrypoint.
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import {
  SchemaCatalog,
  SqliteAuditStore,
  buildPipeline,
  configureLogging,
  createDatabaseClient,
  describeConnection,
  formatViolations,
  inspireFrom,
  loadConfig,
  parseDatabaseUrl,
  policyFromConfig,
  toCandidate,
  validate,
  type AppConfig,
  type QueryRecord,
} from '@askwarden/core';
import {
  EXIT_CODE_POLICY,
  EXIT_CODE_SUCCESS,
  exitCodeForOutcome,
  runtimeError,
  toExitCode,
  usageError,
} from './errors.js';
import {
  outputOptionsFromCommand,
  printCommandSuccess,
  printError,
  printHuman,
  printHumanTable,
  printJson,
  printResult,
  type OutputOptions,
} from './output.js';

const VERSION = '0.1.0';
const DEFAULT_USER = 'local';

// ── Helpers ──────────────────────────────────────────────────────────

async function runCommand(command: Command, fn: (output: OutputOptions) => Promise<void> | void): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

/** Load the environment config and point the logger at the right level. */
function loadCliConfig(output: OutputOptions): AppConfig {
  const config = loadConfig();
  configureLogging({
    level: output.debug ? 'debug' : output.quiet ? 'silent' : output.verbose ? 'info' : config.logLevel,
    format: config.logFormat,
  });
  return config;
}

function openCatalog(config: AppConfig) {
  const policy = policyFromConfig(config);
  const connection = parseDatabaseUrl(config.databaseUrl, { ssl: config.databaseSsl });
  const db = createDatabaseClient(connection);
  return { policy, connection, catalog: new SchemaCatalog(db, policy) };
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

function recordToJson(record: QueryRecord): Record<string, unknown> {
  return {
    ...record,
    startedAt: record.startedAt.toISOString(),
    finishedAt: record.finishedAt.toISOString(),
  };
}

function shorten(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('askwarden')
  .description('askwarden: answers questions about a SQL database through a policy-checked, read-only pipeline')
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Suppress non-essential output and logs', false)
  .option('--verbose', 'Show additional context', false)
  .option('--debug', 'Show debug logs and internal error details', false)
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();

// ── ask ──────────────────────────────────────────────────────────────

withExamples(
  program
    .command('ask')
    .description('Answer a natural language question from the database')
    .argument('<question>', 'Natural language question')
    .option('--user <id>', 'User the turn is recorded under', DEFAULT_USER)
    .action(async function (this: Command, question: string, opts: { user: string }) {
      await runCommand(this, async (output) => {
        const config = loadCliConfig(output);
        const built = buildPipeline(config);
        const controller = new AbortController();
        const onSigint = (): void => controller.abort(new Error('Interrupted'));
        process.once('SIGINT', onSigint);
        try {
          const record = await built.pipeline.handleQuestion(opts.user, question, { signal: controller.signal });
          process.exitCode = exitCodeForOutcome(record.outcome);

          if (output.json) {
            printCommandSuccess(recordToJson(record), output);
            return;
          }
          printResult(record.answer);
          if (output.verbose) {
            printHuman('', output);
            printHuman(`Outcome:  ${record.outcome}`, output);
            printHuman(`Attempts: ${record.attemptCount}`, output);
            if (record.finalSql) printHuman(`SQL:      ${record.finalSql}`, output);
            if (record.rowCount !== null) {
              printHuman(`Rows:     ${record.rowCount}${record.truncated ? ' (truncated)' : ''}`, output);
            }
            if (record.violations.length > 0) printHuman(`Last rejection:\n${formatViolations(record.violations)}`, output);
            printHuman(`Record:   ${record.id}`, output);
          }
        } finally {
          process.off('SIGINT', onSigint);
          built.close();
        }
      });
    }),
  [
    'askwarden ask "How many active customers do we have?"',
    'askwarden ask "list all products" --user alice --verbose',
    'askwarden --json ask "total revenue this month"',
  ],
);

// ── check ────────────────────────────────────────────────────────────

withExamples(
  program
    .command('check')
    .description('Run the policy guard against a SQL statement without executing it')
    .argument('<sql>', 'SQL statement to check')
    .action(async function (this: Command, sql: string) {
      await runCommand(this, async (output) => {
        const config = loadCliConfig(output);
        const { policy, catalog } = openCatalog(config);
        const snapshot = await catalog.snapshot();
        if (snapshot.connectionError) {
          throw runtimeError('Database is unavailable.', 'DB_CONN_FAILED');
        }

        const result = validate(toCandidate(sql, snapshot.dialect), snapshot, policy);
        if (!result.accepted) process.exitCode = EXIT_CODE_POLICY;

        if (output.json) {
          printJson({ ok: result.accepted, data: result });
          return;
        }
        if (result.accepted) {
          printResult('Accepted.');
          return;
        }
        printResult(`Rejected:\n${formatViolations(result.violations)}`);
      });
    }),
  ['askwarden check "SELECT id, name FROM customers WHERE deleted_at IS NULL LIMIT 10"'],
);

// ── schema ───────────────────────────────────────────────────────────

withExamples(
  program
    .command('schema')
    .description('Show the tables and columns in scope after policy filtering')
    .action(async function (this: Command) {
      await runCommand(this, async (output) => {
        const config = loadCliConfig(output);
        const { connection, catalog } = openCatalog(config);
        const snapshot = await catalog.snapshot();
        if (snapshot.connectionError) {
          throw runtimeError(`Could not read the schema of ${describeConnection(connection)}.`, 'DB_CONN_FAILED');
        }

        if (output.json) {
          printCommandSuccess(snapshot, output);
          return;
        }
        printHuman(`${describeConnection(connection)} (${snapshot.dialect})`, output);
        if (snapshot.tables.length === 0) {
          printResult('No tables in scope.');
          return;
        }
        for (const table of snapshot.tables) {
          const name = table.schema ? `${table.schema}.${table.name}` : table.name;
          printResult(`\n${name}${table.hasSoftDelete ? ' (soft-delete)' : ''}`);
          printHumanTable(
            ['column', 'type', 'nullable', 'pk'],
            table.columns.map((col) => ({
              column: col.name,
              type: col.dataType,
              nullable: col.nullable ? 'yes' : 'no',
              pk: col.isPrimaryKey ? 'yes' : '',
            })),
            output,
          );
        }
      });
    }),
  ['askwarden schema', 'askwarden --json schema'],
);

// ── inspire ──────────────────────────────────────────────────────────

withExamples(
  program
    .command('inspire')
    .description('Suggest a sample question about the tables in scope')
    .action(async function (this: Command) {
      await runCommand(this, async (output) => {
        const config = loadCliConfig(output);
        const { catalog } = openCatalog(config);
        const question = await inspireFrom(catalog);
        if (question === null) {
          throw runtimeError('No tables in scope to suggest a question about.', 'DB_CONN_FAILED');
        }

        if (output.json) {
          printCommandSuccess({ question }, output);
          return;
        }
        printResult(question);
      });
    }),
  ['askwarden inspire', 'askwarden ask "$(askwarden --quiet inspire)"'],
);

// ── history ──────────────────────────────────────────────────────────

withExamples(
  program
    .command('history')
    .description('List audit records, or show one by id')
    .argument('[id]', 'Record id (a unique prefix is enough)')
    .option('--limit <n>', 'Number of records', parsePositiveInt, 20)
    .option('--user <id>', 'Only records of this user')
    .action(async function (this: Command, id: string | undefined, opts: { limit: number; user?: string }) {
      await runCommand(this, async (output) => {
        const config = loadCliConfig(output);
        const store = new SqliteAuditStore(config.auditDbPath);
        try {
          if (id !== undefined) {
            const record = store.get(id) ?? findByPrefix(store.list({ limit: 1000 }), id);
            if (!record) throw usageError(`No record matches "${id}".`, 'NOT_FOUND');
            if (output.json) {
              printCommandSuccess(recordToJson(record), output);
              return;
            }
            printRecord(record);
            return;
          }

          const records = store.list({ limit: opts.limit, userId: opts.user });
          if (output.json) {
            printCommandSuccess(records.map(recordToJson), output);
            return;
          }
          if (records.length === 0) {
            printHuman('No records yet. Use "askwarden ask" to ask a question.', output);
            return;
          }
          printHumanTable(
            ['id', 'started_at', 'user', 'outcome', 'attempts', 'question'],
            records.map((r) => ({
              id: r.id.slice(0, 8),
              started_at: r.startedAt.toISOString(),
              user: r.userId,
              outcome: r.outcome,
              attempts: r.attemptCount,
              question: shorten(r.question, 50),
            })),
            output,
          );
        } finally {
          store.close();
        }
      });
    }),
  ['askwarden history --limit 10', 'askwarden history --user alice --json', 'askwarden history 3f2a9c1e'],
);

function findByPrefix(records: QueryRecord[], prefix: string): QueryRecord | null {
  const matches = records.filter((r) => r.id.startsWith(prefix));
  if (matches.length > 1) throw usageError(`Record id "${prefix}" is ambiguous.`);
  return matches[0] ?? null;
}

function printRecord(record: QueryRecord): void {
  printResult(
    [
      `Id:        ${record.id}`,
      `User:      ${record.userId}`,
      `Started:   ${record.startedAt.toISOString()}`,
      `Finished:  ${record.finishedAt.toISOString()}`,
      `Question:  ${record.question}`,
      `Outcome:   ${record.outcome}${record.scopeReason ? ` (${record.scopeReason})` : ''}`,
      `Attempts:  ${record.attemptCount}`,
      `SQL:       ${record.finalSql ?? '-'}`,
      `Rows:      ${record.rowCount ?? '-'}${record.truncated ? ' (truncated)' : ''}`,
      `Answer:    ${record.answer}`,
      ...(record.errorDetail ? [`Error:     ${record.errorDetail}`] : []),
      ...(record.violations.length > 0 ? [`Violations:\n${formatViolations(record.violations)}`] : []),
    ].join('\n'),
  );
}

// ── parse ────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    const output = outputOptionsFromCommand(program);
    if (error instanceof CommanderError) {
      // help and version end through exitOverride as well
      if (error.exitCode === 0) {
        process.exitCode = EXIT_CODE_SUCCESS;
        return;
      }
      // commander has already printed its own message unless --json
      if (output.json) printError(usageError(error.message), output);
      process.exitCode = toExitCode(usageError(error.message));
      return;
    }
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

void main();
