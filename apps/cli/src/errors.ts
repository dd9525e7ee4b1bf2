import { isConfigError, type RunResult } from '@verisql/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;
export const EXIT_CODE_UNVERIFIED = 3;

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'INVALID_CONFIG'
  | 'INVALID_INPUT'
  | 'RUN_NOT_FOUND'
  | 'NO_BACKEND'
  | 'NOT_VERIFIED'
  | 'CANCELLED'
  | 'INTERNAL_ERROR';

export type CliErrorKind = 'usage' | 'runtime' | 'verification';

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

/** The request ran but no candidate was accepted. */
export function verificationError(message: string, code: CliErrorCode = 'NOT_VERIFIED', details?: unknown): CliError {
  return new CliError('verification', code, message, details);
}

/** What an unaccepted run leaves the CLI with; null for an accepted run. */
export function runOutcomeError(result: RunResult): CliError | null {
  switch (result.outcome) {
    case 'accepted':
      return null;
    case 'failed':
      return verificationError(result.failure.reason, 'NOT_VERIFIED', { kind: result.failure.kind });
    case 'cancelled':
      return runtimeError(`Cancelled: ${result.reason}`, 'CANCELLED');
  }
}

export function toExitCode(error: unknown): number {
  if (error instanceof CliError) {
    if (error.kind === 'usage') return EXIT_CODE_USAGE;
    if (error.kind === 'verification') return EXIT_CODE_UNVERIFIED;
    return EXIT_CODE_RUNTIME;
  }
  if (isConfigError(error)) return EXIT_CODE_USAGE;
  return EXIT_CODE_RUNTIME;
}

/** Stable code for JSON error payloads. */
export function errorCode(error: unknown): CliErrorCode {
  if (error instanceof CliError) return error.code;
  if (isConfigError(error)) return 'INVALID_CONFIG';
  return 'INTERNAL_ERROR';
}
