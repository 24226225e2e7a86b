import { AskwardenError, ConfigError, type Outcome } from '@askwarden/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;
export const EXIT_CODE_POLICY = 3;

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'NOT_FOUND'
  | 'DB_CONN_FAILED'
  | 'POLICY_BLOCKED'
  | 'INTERNAL_ERROR';

export type CliErrorKind = 'usage' | 'runtime' | 'policy';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  readonly details?: unknown;

  constructor(kind: CliErrorKind, code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export function usageError(message: string, code: CliErrorCode = 'INVALID_ARGS', details?: unknown): CliError {
  return new CliError('usage', code, message, details);
}

export function runtimeError(message: string, code: CliErrorCode = 'INTERNAL_ERROR', details?: unknown): CliError {
  return new CliError('runtime', code, message, details);
}

export function policyError(message: string, details?: unknown): CliError {
  return new CliError('policy', 'POLICY_BLOCKED', message, details);
}

/** Machine-readable code for any thrown value. */
export function errorCode(error: unknown): string {
  if (error instanceof CliError) return error.code;
  if (error instanceof AskwardenError) return error.code;
  return 'INTERNAL_ERROR';
}

export function toExitCode(error: unknown): number {
  if (error instanceof CliError) {
    if (error.kind === 'usage') return EXIT_CODE_USAGE;
    if (error.kind === 'policy') return EXIT_CODE_POLICY;
    return EXIT_CODE_RUNTIME;
  }
  // a bad environment is fixed the same way as bad flags
  if (error instanceof ConfigError) return EXIT_CODE_USAGE;
  return EXIT_CODE_RUNTIME;
}

/** Exit status of `ask` for a finished turn. */
export function exitCodeForOutcome(outcome: Outcome): number {
  switch (outcome) {
    case 'ANSWERED':
    case 'OUT_OF_SCOPE':
      return EXIT_CODE_SUCCESS;
    case 'REJECTED':
      return EXIT_CODE_POLICY;
    case 'EXECUTION_FAILED':
    case 'GENERATION_FAILED':
      return EXIT_CODE_RUNTIME;
  }
}
