/**
 * Typed errors for the verisql core.
 *
 * Backend faults are translated into these classes inside the pool, the
 * generator and the critic. The orchestrator only sees this taxonomy and
 * turns it into RunResult outcomes.
 */

import type { ComplexityTier } from './routing/types.js';

export type BackendErrorKind = 'timeout' | 'rate-limited' | 'provider-error';

/** Reason attached to a REJECT synthesized from an unusable critic reply. */
export const UNPARSEABLE_CRITIC_REASON = 'unparseable-critic-response';

/** Reason attached when an ACCEPT falls below the configured confidence floor. */
export const LOW_CONFIDENCE_REASON = 'low-confidence-accept';

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * The only failure a ModelBackend may surface.
 * `providerCode` carries the HTTP status or adapter code for `provider-error`.
 */
export class BackendError extends Error {
  readonly code = 'BACKEND_ERROR' as const;
  readonly kind: BackendErrorKind;
  readonly providerCode?: string;

  constructor(kind: BackendErrorKind, message: string, providerCode?: string) {
    super(message);
    this.name = 'BackendError';
    this.kind = kind;
    this.providerCode = providerCode;
  }
}

export class GenerationFailedError extends Error {
  readonly code = 'GENERATION_FAILED' as const;
  readonly profileId: string;
  readonly cause: unknown;

  constructor(profileId: string, cause: unknown) {
    super(`Generation with "${profileId}" failed: ${describeCause(cause)}`);
    this.name = 'GenerationFailedError';
    this.profileId = profileId;
    this.cause = cause;
  }
}

export class NoAvailableBackendError extends Error {
  readonly code = 'NO_AVAILABLE_BACKEND' as const;
  readonly tier: ComplexityTier;
  readonly role: 'generator' | 'critic';

  constructor(tier: ComplexityTier, role: 'generator' | 'critic', detail?: string) {
    super(
      `No ${role} backend available for tier "${tier}"` + (detail ? `: ${detail}` : '.'),
    );
    this.name = 'NoAvailableBackendError';
    this.tier = tier;
    this.role = role;
  }
}

export class BackendSaturatedError extends Error {
  readonly code = 'BACKEND_SATURATED' as const;
  readonly profileId: string;
  readonly waitedMs: number;

  constructor(profileId: string, waitedMs: number) {
    super(`Backend "${profileId}" is saturated (waited ${waitedMs}ms for a permit).`);
    this.name = 'BackendSaturatedError';
    this.profileId = profileId;
    this.waitedMs = waitedMs;
  }
}

/** A broken internal contract. Never caught by the orchestrator. */
export class InvariantViolationError extends Error {
  readonly code = 'INVARIANT_VIOLATION' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

export class ConfigError extends Error {
  readonly code = 'CONFIG_ERROR' as const;
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration:\n${problems.map((p) => `  - ${p}`).join('\n')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

// ── Type guards ──────────────────────────────────────────────────────

export function isBackendError(error: unknown): error is BackendError {
  return error instanceof BackendError;
}

export function isGenerationFailedError(error: unknown): error is GenerationFailedError {
  return error instanceof GenerationFailedError;
}

export function isNoAvailableBackendError(error: unknown): error is NoAvailableBackendError {
  return error instanceof NoAvailableBackendError;
}

export function isBackendSaturatedError(error: unknown): error is BackendSaturatedError {
  return error instanceof BackendSaturatedError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Fold any thrown value into a BackendError. Used at the pool boundary so
 * that raw transport faults never travel further up.
 */
export function toBackendError(error: unknown): BackendError | BackendSaturatedError {
  if (error instanceof BackendError || error instanceof BackendSaturatedError) return error;
  return new BackendError('provider-error', describeCause(error), 'unknown');
}
