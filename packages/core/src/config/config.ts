/**
 * Environment configuration.
 *
 * Raw variables are collected into an object keyed by variable name, then
 * coerced, defaulted and checked by one ajv schema. Every invalid field is
 * reported in a single ConfigError.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { Ajv } from 'ajv';
import { ConfigError } from '../errors.js';
import type { LogFormat, LogLevel } from '../logging/logger.js';
import { createPolicy } from '../policy/policy.js';
import type { Policy, SoftDeletePredicate } from '../policy/types.js';

export interface AppConfig {
  databaseUrl: string;
  databaseSsl: boolean;
  allowedTables: string[];
  restrictedTables: string[];
  excludedColumns: string[];
  maxRows: number;
  maxRetries: number;
  softDeleteColumn: string;
  softDeletePredicates: SoftDeletePredicate[];
  responseMaxWords: number;
  currencySymbol: string;
  openai: {
    apiKey?: string;
    baseURL?: string;
    model: string;
    timeoutMs: number;
  };
  statementTimeoutMs: number;
  auditDbPath: string;
  logLevel: LogLevel;
  logFormat: LogFormat;
}

interface RawConfig {
  DATABASE_URL: string;
  DATABASE_SSL: boolean;
  DATABASE_ALLOWED_TABLES: string[];
  DATABASE_RESTRICTED_TABLES: string[];
  DATABASE_EXCLUDED_COLUMNS: string[];
  QUERY_MAX_ROWS: number;
  LLM_MAX_RETRIES: number;
  SOFT_DELETE_COLUMN: string;
  SOFT_DELETE_PREDICATES: SoftDeletePredicate[];
  RESPONSE_MAX_WORDS: number;
  CURRENCY_SYMBOL: string;
  OPENAI_API_KEY?: string;
  OPENAI_BASE_URL?: string;
  ASKWARDEN_MODEL: string;
  LLM_TIMEOUT_MS: number;
  STATEMENT_TIMEOUT_MS: number;
  AUDIT_DB_PATH?: string;
  LOG_LEVEL: LogLevel;
  LOG_FORMAT: LogFormat;
}

const CSV_KEYS = new Set([
  'DATABASE_ALLOWED_TABLES',
  'DATABASE_RESTRICTED_TABLES',
  'DATABASE_EXCLUDED_COLUMNS',
  'SOFT_DELETE_PREDICATES',
]);

const LOWERCASE_KEYS = new Set(['LOG_LEVEL', 'LOG_FORMAT', 'SOFT_DELETE_PREDICATES', 'DATABASE_SSL']);

const nameList = { type: 'array' as const, items: { type: 'string' as const }, default: [] };

export const configSchema = {
  type: 'object' as const,
  properties: {
    DATABASE_URL: { type: 'string' as const, minLength: 1, default: 'sqlite:./data/database.db' },
    DATABASE_SSL: { type: 'boolean' as const, default: false },
    DATABASE_ALLOWED_TABLES: nameList,
    DATABASE_RESTRICTED_TABLES: nameList,
    DATABASE_EXCLUDED_COLUMNS: nameList,
    QUERY_MAX_ROWS: { type: 'integer' as const, minimum: 1, maximum: 10000, default: 100 },
    LLM_MAX_RETRIES: { type: 'integer' as const, minimum: 1, maximum: 10, default: 3 },
    SOFT_DELETE_COLUMN: { type: 'string' as const, minLength: 1, default: 'deleted_at' },
    SOFT_DELETE_PREDICATES: {
      type: 'array' as const,
      items: { type: 'string' as const, enum: ['is-null', 'is-false'] },
      minItems: 1,
      default: ['is-null'],
    },
    RESPONSE_MAX_WORDS: { type: 'integer' as const, minimum: 1, default: 30 },
    CURRENCY_SYMBOL: { type: 'string' as const, minLength: 1, default: '$' },
    OPENAI_API_KEY: { type: 'string' as const },
    OPENAI_BASE_URL: { type: 'string' as const, pattern: '^https?://' },
    ASKWARDEN_MODEL: { type: 'string' as const, minLength: 1, default: 'gpt-4o-mini' },
    LLM_TIMEOUT_MS: { type: 'integer' as const, minimum: 1000, default: 30000 },
    STATEMENT_TIMEOUT_MS: { type: 'integer' as const, minimum: 100, default: 15000 },
    AUDIT_DB_PATH: { type: 'string' as const, minLength: 1 },
    LOG_LEVEL: { type: 'string' as const, enum: ['error', 'warn', 'info', 'debug', 'silent'], default: 'info' },
    LOG_FORMAT: { type: 'string' as const, enum: ['json', 'pretty'], default: 'pretty' },
  },
  required: [] as const,
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true, coerceTypes: true, useDefaults: true });
const validateRaw = ajv.compile<RawConfig>(configSchema);

export function defaultAuditDbPath(): string {
  return join(homedir(), '.askwarden', 'audit.db');
}

function expandHome(path: string): string {
  return path === '~' || path.startsWith('~/') ? join(homedir(), path.slice(1)) : path;
}

function splitCsv(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/** Pick the known variables out of the environment; blank values count as unset. */
function collectRaw(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const raw: Record<string, unknown> = {};
  for (const key of Object.keys(configSchema.properties)) {
    let value = env[key]?.trim();
    if (!value) continue;
    if (LOWERCASE_KEYS.has(key)) value = value.toLowerCase();
    raw[key] = CSV_KEYS.has(key) ? splitCsv(value) : value;
  }
  return raw;
}

/**
 * Load and validate configuration from environment variables.
 * The OpenAI key is not required here; the generator checks it on construction.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw = collectRaw(env);
  if (!validateRaw(raw)) {
    const problems = (validateRaw.errors ?? []).map(
      (e) => `${e.instancePath.replace(/^\//, '') || '(root)'} ${e.message ?? 'is invalid'}`,
    );
    throw new ConfigError(`Invalid configuration:\n- ${problems.join('\n- ')}`, problems);
  }

  return {
    databaseUrl: raw.DATABASE_URL,
    databaseSsl: raw.DATABASE_SSL,
    allowedTables: raw.DATABASE_ALLOWED_TABLES,
    restrictedTables: raw.DATABASE_RESTRICTED_TABLES,
    excludedColumns: raw.DATABASE_EXCLUDED_COLUMNS,
    maxRows: raw.QUERY_MAX_ROWS,
    maxRetries: raw.LLM_MAX_RETRIES,
    softDeleteColumn: raw.SOFT_DELETE_COLUMN,
    softDeletePredicates: [...new Set(raw.SOFT_DELETE_PREDICATES)],
    responseMaxWords: raw.RESPONSE_MAX_WORDS,
    currencySymbol: raw.CURRENCY_SYMBOL,
    openai: {
      apiKey: raw.OPENAI_API_KEY,
      baseURL: raw.OPENAI_BASE_URL,
      model: raw.ASKWARDEN_MODEL,
      timeoutMs: raw.LLM_TIMEOUT_MS,
    },
    statementTimeoutMs: raw.STATEMENT_TIMEOUT_MS,
    auditDbPath: expandHome(raw.AUDIT_DB_PATH ?? defaultAuditDbPath()),
    logLevel: raw.LOG_LEVEL,
    logFormat: raw.LOG_FORMAT,
  };
}

export function policyFromConfig(config: AppConfig): Policy {
  return createPolicy({
    allowedTables: config.allowedTables,
    restrictedTables: config.restrictedTables,
    excludedColumns: config.excludedColumns,
    maxRows: config.maxRows,
    softDeleteColumn: config.softDeleteColumn,
    softDeletePredicates: config.softDeletePredicates,
  });
}
