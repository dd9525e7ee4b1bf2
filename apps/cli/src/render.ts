/**
 * Human-readable summaries of run results and classifications.
 */

import type { AttemptRecord, ClassificationResult, RunResult } from '@verisql/core';

function describeAttempt(attempt: AttemptRecord): string[] {
  const lines = attempt.generationFailures.map(
    (f) => `  #${attempt.attempt} ${attempt.tier} ${f.profileId}: ${f.saturated ? 'saturated' : 'failed'} (${f.reason})`,
  );
  if (!attempt.candidate) return lines;

  const producer = `  #${attempt.attempt} ${attempt.tier} ${attempt.candidate.profileId}`;
  if (!attempt.verdict) {
    lines.push(`${producer}: unverified`);
    return lines;
  }
  const why = attempt.verdict.reason ? ` (${attempt.verdict.reason})` : '';
  lines.push(`${producer} -> ${attempt.verdict.criticProfileId}: ${attempt.verdict.decision}${why}`);
  return lines;
}

export function describeRun(result: RunResult, verbose: boolean): string[] {
  const lines: string[] = [];

  switch (result.outcome) {
    case 'accepted': {
      const { candidate, verdict } = result;
      lines.push(
        result.verified && verdict
          ? `Verified SQL (generator: ${candidate.profileId}, critic: ${verdict.criticProfileId}):`
          : `SQL (generator: ${candidate.profileId}, not verified):`,
      );
      lines.push(`  ${candidate.sql}`);
      if (candidate.explanation) lines.push(`  Explanation: ${candidate.explanation}`);
      if (candidate.assumptions.length > 0) lines.push(`  Assumptions: ${candidate.assumptions.join('; ')}`);
      if (verdict?.confidence !== null && verdict?.confidence !== undefined) {
        lines.push(`  Confidence: ${(verdict.confidence * 100).toFixed(0)}%`);
      }
      break;
    }
    case 'failed':
      lines.push(`No verified SQL (${result.failure.kind}).`);
      break;
    case 'cancelled':
      lines.push(`Cancelled (${result.reason}).`);
      break;
  }

  if (verbose && result.attempts.length > 0) {
    lines.push('', 'Attempts:');
    for (const attempt of result.attempts) lines.push(...describeAttempt(attempt));
  }

  lines.push('');
  lines.push(
    `Tier: ${result.tier}, attempts: ${result.attempts.length}, ` +
      `cost: ${result.metrics.costUnits.toFixed(3)} units, ${Math.round(result.metrics.elapsedMs)}ms`,
  );
  lines.push(`Task ID: ${result.taskId}`);
  return lines;
}

export function describeClassification(result: ClassificationResult): string[] {
  const lines = [`Tier: ${result.tier}${result.defaulted ? ' (defaulted)' : ''}`, `Score: ${result.score.toFixed(2)}`];
  const fired = result.signals.filter((s) => s.detail !== null);
  if (fired.length > 0) {
    lines.push('Signals:');
    for (const signal of fired) {
      lines.push(`  ${signal.name}: ${signal.detail ?? ''} (strength ${signal.strength})`);
    }
  }
  return lines;
}
