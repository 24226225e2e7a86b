/**
 * @askwarden/core barrel export
 *
 * Core logic shared by the CLI and any embedding host.
 */

// Errors
export {
  AskwardenError,
  ConfigError,
  GenerationError,
  ExecutionError,
  ValidationRejection,
  ScopeError,
  errorMessage,
} from './errors.js';
export type { AskwardenErrorCode, GenerationFailureReason, TurnFailure } from './errors.js';

// Logging
export { configureLogging, createChildLogger, parseLogLevel, sqlPreview } from './logging/logger.js';
export type { LogFormat, LogLevel, Logger } from './logging/logger.js';

// Configuration
export { loadConfig, policyFromConfig, defaultAuditDbPath, configSchema } from './config/config.js';
export type { AppConfig } from './config/config.js';

// Database
export type {
  SqlDialect,
  Row,
  DatabaseConnection,
  DatabaseClient,
  IntrospectedTable,
  IntrospectedColumn,
  ReadOnlyQueryOptions,
  FetchedRows,
} from './db/types.js';
export { parseDatabaseUrl, createDatabaseClient, describeConnection } from './db/connect.js';

// Policy and Guard
export type {
  Policy,
  PolicyInput,
  SoftDeletePredicate,
  Violation,
  ViolationKind,
  ValidationResult,
  CandidateQuery,
  CandidateStatus,
} from './policy/types.js';
export { SOFT_DELETE_PREDICATES } from './policy/types.js';
export { createPolicy, tableAccess, isExcludedColumn, DEFAULT_MAX_ROWS } from './policy/policy.js';
export type { TableAccess } from './policy/policy.js';
export { validate, formatViolations } from './policy/guard.js';
export { describeSql, toCandidate } from './policy/inspect.js';
export type { SqlShape } from './policy/inspect.js';
export { parseSql } from './policy/parse.js';
export type { ParseResult, ParseOutcome, SqlKind } from './policy/parse.js';
export { describeSoftDeleteFilter } from './policy/soft-delete.js';

// Schema catalog
export type { SchemaSnapshot, TableInfo, ColumnInfo } from './schema/types.js';
export { findTable } from './schema/types.js';
export { SchemaCatalog, filterSchema, buildSnapshot } from './schema/catalog.js';
export { inspire, inspireFrom, randomChoice, pluralize, humanize } from './schema/inspire.js';
export type { Chooser, InspireOptions } from './schema/inspire.js';

// Generator
export * from './llm/index.js';

// Audit
export type { AuditSink, AuditListOptions, Outcome, QueryRecord } from './audit/types.js';
export { OUTCOMES } from './audit/types.js';
export { SqliteAuditStore } from './audit/sqlite-store.js';

// Pipeline
export { Orchestrator, DEFAULT_ORCHESTRATOR_OPTIONS } from './pipeline/orchestrator.js';
export type { OrchestratorDeps, OrchestratorOptions, SnapshotSource, ExecutionResult } from './pipeline/orchestrator.js';
export { QueryPipeline, buildPipeline } from './pipeline/pipeline.js';
export type { QueryPipelineDeps, BuiltPipeline } from './pipeline/pipeline.js';
export { MESSAGES, tooManyItemsMessage } from './pipeline/messages.js';
export { sanitizeQuestion, isListingRequest, countWords, truncateToWords, MAX_QUESTION_LENGTH } from './pipeline/text.js';
