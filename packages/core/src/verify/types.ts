/**
 * Data model for one task resolution: task, candidates, verdicts and the
 * terminal RunResult.
 */

import type { ContextItem } from '../context/supplier.js';
import type { RunMetrics } from '../metrics.js';
import type { ClassificationResult } from '../routing/classify.js';
import type { ComplexityTier } from '../routing/types.js';

export interface TaskContext {
  /** Fitted items, most relevant first */
  readonly items: readonly ContextItem[];
  /** Sources dropped while fitting to contextMaxSize */
  readonly dropped: readonly string[];
  readonly dialect: string | null;
}

/** Immutable once created. */
export interface Task {
  readonly id: string;
  readonly text: string;
  readonly context: TaskContext;
  /** ISO timestamp */
  readonly createdAt: string;
}

export interface Candidate {
  readonly id: string;
  readonly taskId: string;
  readonly profileId: string;
  readonly tier: ComplexityTier;
  /** 1-based attempt number within the task */
  readonly attempt: number;
  /** Raw model output */
  readonly text: string;
  readonly sql: string;
  readonly explanation: string;
  readonly assumptions: readonly string[];
  /** False when the model ignored the JSON answer format */
  readonly structured: boolean;
  readonly createdAt: string;
}

export type VerdictDecision = 'accept' | 'reject';

export interface Verdict {
  readonly candidateId: string;
  readonly criticProfileId: string;
  readonly decision: VerdictDecision;
  /** Always set for rejections */
  readonly reason: string | null;
  readonly issues: readonly string[];
  readonly confidence: number | null;
  /** True when the reply did not follow the verdict grammar or the call failed */
  readonly unparseable: boolean;
  /** Parse problem or backend fault behind an unparseable verdict */
  readonly detail: string | null;
}

/** What the generator is told after a rejection. */
export interface PriorFeedback {
  readonly reason: string;
  readonly issues: readonly string[];
  readonly previousSql: string;
}

export type RunState =
  | 'classifying'
  | 'generating'
  | 'critiquing'
  | 'regenerating'
  | 'accepted'
  | 'failed'
  | 'cancelled';

export interface Transition {
  from: RunState;
  to: RunState;
  attempt: number;
}

export interface GenerationFailure {
  profileId: string;
  reason: string;
  saturated: boolean;
}

export interface AttemptRecord {
  attempt: number;
  tier: ComplexityTier;
  generationFailures: GenerationFailure[];
  candidate: Candidate | null;
  verdict: Verdict | null;
}

export type FailureKind =
  | 'no-available-backend'
  | 'attempts-exhausted'
  | 'backend-saturated'
  | 'cost-budget-exceeded';

export interface RunFailure {
  kind: FailureKind;
  /** Human-readable summary of the last rejection or error */
  reason: string;
}

interface RunResultBase {
  taskId: string;
  /** The task's natural-language text */
  request: string;
  /** Tier in force when the run ended */
  tier: ComplexityTier;
  /** Tier used by each attempt, in order */
  tierHistory: ComplexityTier[];
  classification: ClassificationResult;
  attempts: AttemptRecord[];
  transitions: Transition[];
  metrics: RunMetrics;
}

export interface AcceptedRun extends RunResultBase {
  outcome: 'accepted';
  candidate: Candidate;
  /** null only when verification is disabled */
  verdict: Verdict | null;
  verified: boolean;
}

export interface FailedRun extends RunResultBase {
  outcome: 'failed';
  failure: RunFailure;
  lastVerdict: Verdict | null;
}

export interface CancelledRun extends RunResultBase {
  outcome: 'cancelled';
  reason: string;
}

export type RunResult = AcceptedRun | FailedRun | CancelledRun;
