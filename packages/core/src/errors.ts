/**
 * Error taxonomy for the query pipeline.
 *
 * Thrown errors (config, generation, execution) carry a machine-readable
 * code; the state machine turns them into audit detail and never shows
 * their message to the end user.
 */

import type { Violation } from './policy/types.js';

export type AskwardenErrorCode =
  | 'CONFIG_INVALID'
  | 'GENERATION_FAILED'
  | 'EXECUTION_FAILED';

export class AskwardenError extends Error {
  readonly code: AskwardenErrorCode;
  readonly details?: unknown;

  constructor(code: AskwardenErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class ConfigError extends AskwardenError {
  constructor(message: string, details?: unknown) {
    super('CONFIG_INVALID', message, details);
  }
}

/** Why a generator call produced nothing usable. */
export type GenerationFailureReason = 'transport' | 'timeout' | 'malformed_response' | 'aborted';

export class GenerationError extends AskwardenError {
  readonly kind = 'generation' as const;
  readonly reason: GenerationFailureReason;

  constructor(reason: GenerationFailureReason, message: string, details?: unknown) {
    super('GENERATION_FAILED', message, details);
    this.reason = reason;
  }
}

export class ExecutionError extends AskwardenError {
  readonly kind = 'execution' as const;

  constructor(message: string, details?: unknown) {
    super('EXECUTION_FAILED', message, details);
  }
}

/** Render any thrown value as a single line for logs and audit records. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** The Guard refused a candidate. A value, not thrown. */
export class ValidationRejection {
  readonly kind = 'validation' as const;

  constructor(readonly violations: readonly Violation[]) {}

  get message(): string {
    return `Query rejected: ${this.violations.map((v) => v.kind).join(', ')}`;
  }
}

/** The question cannot be answered from the data in scope. A value, not thrown. */
export class ScopeError {
  readonly kind = 'scope' as const;

  constructor(readonly reason: string) {}
}

/** Every way a turn can fail short of an answer. */
export type TurnFailure = GenerationError | ValidationRejection | ExecutionError | ScopeError;
