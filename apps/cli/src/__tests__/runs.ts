/**
 * Hand-built run results shared by the CLI tests.
 */

import type {
  AcceptedRun,
  CancelledRun,
  Candidate,
  ClassificationResult,
  FailedRun,
  RunMetrics,
  Verdict,
} from '@verisql/core';

const classification: ClassificationResult = { tier: 'simple', score: 0.25, signals: [], defaulted: false };

const metrics: RunMetrics = {
  generatorCalls: 1,
  generations: 1,
  criticCalls: 1,
  costUnits: 4,
  latencyMs: 12,
  elapsedMs: 15.4,
  calls: [],
};

export const candidate: Candidate = {
  id: 'c1',
  taskId: 'task-1',
  profileId: 'cheap',
  tier: 'simple',
  attempt: 1,
  text: '',
  sql: 'SELECT id FROM users',
  explanation: 'Lists users.',
  assumptions: ['active only'],
  structured: true,
  createdAt: '2026-01-01T00:00:00.000Z',
};

export const accept: Verdict = {
  candidateId: 'c1',
  criticProfileId: 'judge',
  decision: 'accept',
  reason: null,
  issues: [],
  confidence: 0.9,
  unparseable: false,
  detail: null,
};

const base = {
  taskId: 'task-1',
  request: 'list users',
  tier: 'simple' as const,
  tierHistory: ['simple' as const],
  classification,
  transitions: [],
  metrics,
};

export function acceptedRun(overrides: Partial<AcceptedRun> = {}): AcceptedRun {
  return {
    ...base,
    outcome: 'accepted',
    attempts: [{ attempt: 1, tier: 'simple', generationFailures: [], candidate, verdict: accept }],
    candidate,
    verdict: accept,
    verified: true,
    ...overrides,
  };
}

export function failedRun(overrides: Partial<FailedRun> = {}): FailedRun {
  const reject: Verdict = { ...accept, decision: 'reject', reason: 'wrong table', confidence: null };
  return {
    ...base,
    outcome: 'failed',
    tier: 'complex',
    tierHistory: ['simple', 'complex'],
    attempts: [
      {
        attempt: 1,
        tier: 'simple',
        generationFailures: [{ profileId: 'fast', reason: 'timed out', saturated: false }],
        candidate,
        verdict: reject,
      },
      { attempt: 2, tier: 'complex', generationFailures: [], candidate: null, verdict: null },
    ],
    failure: { kind: 'no-available-backend', reason: 'no generator backend left for tier "complex"' },
    lastVerdict: reject,
    ...overrides,
  };
}

export function cancelledRun(): CancelledRun {
  return { ...base, outcome: 'cancelled', attempts: [], reason: 'interrupted' };
}
