/**
 * Cost and latency bookkeeping, and the hand-off point to whatever
 * collects run metrics outside the core.
 */

import type { CallRole } from './routing/types.js';
import type { RunResult } from './verify/types.js';

export interface CallRecord {
  profileId: string;
  role: CallRole;
  latencyMs: number;
  costUnits: number;
  ok: boolean;
  /** BackendError kind for failed calls */
  errorKind: string | null;
}

export interface RunMetrics {
  /** Generator invocations, failed ones included */
  generatorCalls: number;
  /** Candidates produced; never more than maxAttempts */
  generations: number;
  /** Critic invocations; equals generations when verification is on */
  criticCalls: number;
  costUnits: number;
  /** Sum of backend call latencies */
  latencyMs: number;
  /** Wall time of the whole resolution */
  elapsedMs: number;
  calls: CallRecord[];
}

export interface MetricsCollector {
  record(result: RunResult): void | Promise<void>;
}

/** Cost of one call: weight per 1k tokens when usage is known, else the flat weight. */
export function costUnits(costWeight: number, totalTokens: number | undefined): number {
  if (totalTokens === undefined) return costWeight;
  return (costWeight * totalTokens) / 1000;
}

export interface CallCounts {
  generatorCalls: number;
  generations: number;
  criticCalls: number;
}

export function summarizeCalls(
  calls: readonly CallRecord[],
  counts: CallCounts,
  elapsedMs: number,
): RunMetrics {
  let total = 0;
  let latencyMs = 0;
  for (const call of calls) {
    total += call.costUnits;
    latencyMs += call.latencyMs;
  }
  return { ...counts, costUnits: total, latencyMs, elapsedMs, calls: [...calls] };
}

export interface MetricsSummary {
  runs: number;
  accepted: number;
  failed: number;
  cancelled: number;
  costUnits: number;
}

export class InMemoryMetricsCollector implements MetricsCollector {
  readonly results: RunResult[] = [];

  record(result: RunResult): void {
    this.results.push(result);
  }

  summary(): MetricsSummary {
    return {
      runs: this.results.length,
      accepted: this.results.filter((r) => r.outcome === 'accepted').length,
      failed: this.results.filter((r) => r.outcome === 'failed').length,
      cancelled: this.results.filter((r) => r.outcome === 'cancelled').length,
      costUnits: this.results.reduce((sum, r) => sum + r.metrics.costUnits, 0),
    };
  }
}
