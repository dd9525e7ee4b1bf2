/**
 * Orchestrator: the task resolution state machine.
 *
 *   classifying → generating → critiquing → accepted
 *                     ↑            │
 *                     └─ regenerating (REJECT, attempts left)
 *
 * `failed` is reachable from generating (no backend left, budget spent)
 * and from critiquing (REJECT at maxAttempts). `cancelled` is reachable
 * before any generator or critic call. Exactly one RunResult is produced
 * per resolve() call.
 */

import type { OrchestratorConfig, VerisqlConfig } from '../config/types.js';
import {
  BackendSaturatedError,
  isGenerationFailedError,
  isNoAvailableBackendError,
} from '../errors.js';
import { detectInjection } from '../llm/sanitize.js';
import { createTaskLogger, silentLogger, type Logger, type TaskLogger } from '../logger.js';
import { summarizeCalls, type CallRecord, type MetricsCollector } from '../metrics.js';
import { classifyTask, type ClassificationResult } from '../routing/classify.js';
import type { ModelPool } from '../routing/pool.js';
import { getNextTier, maxTier, type ComplexityTier, type ModelProfile } from '../routing/types.js';
import { Critic } from './critic.js';
import { Generator } from './generator.js';
import { contextSize, schemaItemCount } from './task.js';
import type {
  AttemptRecord,
  Candidate,
  FailureKind,
  PriorFeedback,
  RunResult,
  RunState,
  Task,
  Transition,
  Verdict,
} from './types.js';

export interface ResolveOptions {
  /** Cooperative cancellation, checked before every backend call */
  signal?: AbortSignal;
  maxAttempts?: number;
  verificationEnabled?: boolean;
  tierEscalationThreshold?: number;
  maxCost?: number | null;
}

export interface OrchestratorDeps {
  config: VerisqlConfig;
  pool: ModelPool;
  logger?: Logger;
  metrics?: MetricsCollector;
  now?: () => number;
}

type RunSettings = Pick<
  OrchestratorConfig,
  'maxAttempts' | 'verificationEnabled' | 'tierEscalationThreshold' | 'maxCost'
>;

function cancelReason(signal: AbortSignal | undefined): string {
  const reason: unknown = signal?.reason;
  if (typeof reason === 'string' && reason) return reason;
  if (reason instanceof Error && reason.message) return reason.message;
  return 'cancelled by caller';
}

/** Mutable bookkeeping for one resolution. Never shared between tasks. */
class RunLog {
  state: RunState = 'classifying';
  readonly transitions: Transition[] = [];
  readonly attempts: AttemptRecord[] = [];
  readonly tierHistory: ComplexityTier[] = [];
  readonly calls: CallRecord[] = [];
  generatorCalls = 0;
  criticCalls = 0;

  readonly onCall = (record: CallRecord): void => {
    this.calls.push(record);
  };

  go(to: RunState): void {
    this.transitions.push({ from: this.state, to, attempt: this.attempts.length });
    this.state = to;
  }

  cost(): number {
    return this.calls.reduce((sum, call) => sum + call.costUnits, 0);
  }

  generations(): number {
    return this.attempts.filter((a) => a.candidate !== null).length;
  }
}

type GenerationOutcome =
  | { ok: true; candidate: Candidate }
  | { ok: false; result: 'cancelled' }
  | { ok: false; result: 'failed'; kind: FailureKind; reason: string };

export class Orchestrator {
  private readonly config: VerisqlConfig;
  private readonly pool: ModelPool;
  private readonly generator: Generator;
  private readonly critic: Critic;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector | null;
  private readonly now: () => number;

  constructor(deps: OrchestratorDeps) {
    this.config = deps.config;
    this.pool = deps.pool;
    this.logger = deps.logger ?? silentLogger();
    this.metrics = deps.metrics ?? null;
    this.now = deps.now ?? (() => performance.now());
    this.generator = new Generator(deps.pool, deps.config.generation);
    this.critic = new Critic(deps.pool, {
      critiqueMaxTokens: deps.config.generation.critiqueMaxTokens,
      maxRequestChars: deps.config.generation.maxRequestChars,
      minAcceptConfidence: deps.config.orchestrator.minAcceptConfidence,
    });
  }

  classify(task: Task): ClassificationResult {
    return classifyTask(
      { text: task.text, contextChars: contextSize(task), schemaItems: schemaItemCount(task) },
      this.config.classifier,
    );
  }

  async resolve(task: Task, opts: ResolveOptions = {}): Promise<RunResult> {
    const settings: RunSettings = {
      maxAttempts: Math.max(1, opts.maxAttempts ?? this.config.orchestrator.maxAttempts),
      verificationEnabled: opts.verificationEnabled ?? this.config.orchestrator.verificationEnabled,
      tierEscalationThreshold:
        opts.tierEscalationThreshold ?? this.config.orchestrator.tierEscalationThreshold,
      maxCost: opts.maxCost !== undefined ? opts.maxCost : this.config.orchestrator.maxCost,
    };
    const log = createTaskLogger(this.logger, task.id);
    const started = this.now();
    const run = new RunLog();

    log.info('task_created', {
      chars: task.text.length,
      contextItems: task.context.items.length,
      droppedContext: task.context.dropped.length,
    });
    if (detectInjection(task.text)) {
      log.warn('suspicious_input', { snippet: task.text.slice(0, 100) });
    }

    // ── classifying ──
    const classification = this.classify(task);
    let tier = classification.tier;
    log.info('classified', {
      tier,
      score: classification.score,
      defaulted: classification.defaulted,
      signals: classification.signals.map((s) => s.name),
    });

    const finish = (
      outcome:
        | { outcome: 'accepted'; candidate: Candidate; verdict: Verdict | null; verified: boolean }
        | { outcome: 'failed'; failure: { kind: FailureKind; reason: string }; lastVerdict: Verdict | null }
        | { outcome: 'cancelled'; reason: string },
    ): Promise<RunResult> => {
      const result: RunResult = {
        ...outcome,
        taskId: task.id,
        request: task.text,
        tier,
        tierHistory: [...run.tierHistory],
        classification,
        attempts: run.attempts,
        transitions: run.transitions,
        metrics: summarizeCalls(
          run.calls,
          {
            generatorCalls: run.generatorCalls,
            generations: run.generations(),
            criticCalls: run.criticCalls,
          },
          this.now() - started,
        ),
      };
      return this.emit(result, log);
    };

    run.go('generating');

    // Profiles whose candidate was rejected. They neither regenerate nor
    // critique for the rest of the task.
    const rejectedProducers = new Set<string>();
    let feedback: PriorFeedback | null = null;
    let lastVerdict: Verdict | null = null;
    let consecutiveRejections = 0;

    for (let attempt = 1; ; attempt++) {
      const record: AttemptRecord = {
        attempt,
        tier,
        generationFailures: [],
        candidate: null,
        verdict: null,
      };
      run.attempts.push(record);
      run.tierHistory.push(tier);

      // ── generating ──
      const generated = await this.generateWithFallback(
        task,
        tier,
        record,
        feedback,
        rejectedProducers,
        settings,
        run,
        log,
        opts.signal,
      );
      if (!generated.ok) {
        if (generated.result === 'cancelled') {
          run.go('cancelled');
          log.info('task_cancelled', { attempt });
          return finish({ outcome: 'cancelled', reason: cancelReason(opts.signal) });
        }
        run.go('failed');
        log.warn('task_failed', { attempt, kind: generated.kind, reason: generated.reason });
        return finish({
          outcome: 'failed',
          failure: { kind: generated.kind, reason: generated.reason },
          lastVerdict,
        });
      }
      const candidate = generated.candidate;
      record.candidate = candidate;
      log.info('candidate_ready', {
        attempt,
        tier,
        profileId: candidate.profileId,
        structured: candidate.structured,
      });

      if (!settings.verificationEnabled) {
        run.go('accepted');
        log.info('task_accepted', { attempt, profileId: candidate.profileId, verified: false });
        return finish({ outcome: 'accepted', candidate, verdict: null, verified: false });
      }

      // ── critiquing ──
      run.go('critiquing');
      if (opts.signal?.aborted) {
        run.go('cancelled');
        log.info('task_cancelled', { attempt });
        return finish({ outcome: 'cancelled', reason: cancelReason(opts.signal) });
      }

      let verdict: Verdict;
      try {
        run.criticCalls++;
        log.info('critique_start', { attempt, generatorId: candidate.profileId });
        verdict = await this.critic.critique(task, candidate, {
          tier,
          exclude: rejectedProducers,
          onCall: run.onCall,
        });
      } catch (err: unknown) {
        if (!isNoAvailableBackendError(err)) throw err;
        run.go('failed');
        log.warn('task_failed', { attempt, kind: 'no-available-backend', reason: err.message });
        return finish({
          outcome: 'failed',
          failure: { kind: 'no-available-backend', reason: err.message },
          lastVerdict,
        });
      }
      record.verdict = verdict;
      lastVerdict = verdict;
      log.info('verdict', {
        attempt,
        criticId: verdict.criticProfileId,
        decision: verdict.decision,
        reason: verdict.reason,
        confidence: verdict.confidence,
        unparseable: verdict.unparseable,
      });

      if (verdict.decision === 'accept') {
        run.go('accepted');
        log.info('task_accepted', { attempt, profileId: candidate.profileId, verified: true });
        return finish({ outcome: 'accepted', candidate, verdict, verified: true });
      }

      const reason = verdict.reason ?? 'rejected without a reason';
      if (attempt >= settings.maxAttempts) {
        run.go('failed');
        const summary = `rejected on all ${attempt} attempt(s); last reason: ${reason}`;
        log.warn('task_failed', { attempt, kind: 'attempts-exhausted', reason });
        return finish({
          outcome: 'failed',
          failure: { kind: 'attempts-exhausted', reason: summary },
          lastVerdict: verdict,
        });
      }

      // ── regenerating ──
      run.go('regenerating');
      rejectedProducers.add(candidate.profileId);
      feedback = { reason, issues: verdict.issues, previousSql: candidate.sql };
      consecutiveRejections++;

      // Re-classification may raise the tier, never lower it.
      let nextTier = maxTier(tier, this.classify(task).tier);
      if (consecutiveRejections >= settings.tierEscalationThreshold) {
        nextTier = maxTier(nextTier, getNextTier(tier) ?? tier);
      }
      if (nextTier !== tier) {
        log.info('escalation', { from: tier, to: nextTier, afterRejections: consecutiveRejections });
        tier = nextTier;
        consecutiveRejections = 0;
      }
      run.go('generating');
    }
  }

  /**
   * Try generators for `tier` in pool order until one yields a candidate.
   * A profile that fails is excluded for the rest of the task, as is one
   * whose candidate was rejected.
   */
  private async generateWithFallback(
    task: Task,
    tier: ComplexityTier,
    record: AttemptRecord,
    feedback: PriorFeedback | null,
    rejectedProducers: ReadonlySet<string>,
    settings: RunSettings,
    run: RunLog,
    log: TaskLogger,
    signal: AbortSignal | undefined,
  ): Promise<GenerationOutcome> {
    const exhausted = (detail: string): GenerationOutcome => {
      const failures = record.generationFailures;
      const saturated = failures.length > 0 && failures.every((f) => f.saturated);
      const tried = failures.map((f) => `${f.profileId}: ${f.reason}`).join('; ');
      return {
        ok: false,
        result: 'failed',
        kind: saturated ? 'backend-saturated' : 'no-available-backend',
        reason: tried ? `${detail} (${tried})` : detail,
      };
    };

    for (;;) {
      if (signal?.aborted) {
        return { ok: false, result: 'cancelled' };
      }
      if (settings.maxCost !== null && run.cost() >= settings.maxCost) {
        return {
          ok: false,
          result: 'failed',
          kind: 'cost-budget-exceeded',
          reason: `spent ${run.cost().toFixed(3)} of ${settings.maxCost} cost units`,
        };
      }

      const profile = this.nextGenerator(tier, run, rejectedProducers, settings);
      if (!profile) {
        return exhausted(`no generator backend left for tier "${tier}"`);
      }

      run.generatorCalls++;
      log.info('generation_start', { attempt: record.attempt, tier, profileId: profile.id });
      try {
        const candidate = await this.generator.generate(task, tier, profile, {
          priorFeedback: feedback,
          attempt: record.attempt,
          onCall: run.onCall,
        });
        return { ok: true, candidate };
      } catch (err: unknown) {
        if (!isGenerationFailedError(err)) throw err;
        const saturated = err.cause instanceof BackendSaturatedError;
        const reason = err.cause instanceof Error ? err.cause.message : String(err.cause);
        record.generationFailures.push({ profileId: profile.id, reason, saturated });
        log.warn('generation_failed', { attempt: record.attempt, profileId: profile.id, reason, saturated });
      }
    }
  }

  /**
   * Next generator for this attempt. Profiles that failed in this task and
   * producers of rejected candidates are excluded. With verification on,
   * only profiles that a not-yet-rejected profile may critique are eligible.
   */
  private nextGenerator(
    tier: ComplexityTier,
    run: RunLog,
    rejectedProducers: ReadonlySet<string>,
    settings: RunSettings,
  ): ModelProfile | null {
    const exclude = new Set(rejectedProducers);
    for (const attempt of run.attempts) {
      for (const failure of attempt.generationFailures) exclude.add(failure.profileId);
    }
    let eligible: ModelProfile[];
    try {
      eligible = this.pool.select(tier, exclude);
    } catch (err: unknown) {
      if (isNoAvailableBackendError(err)) return null;
      throw err;
    }
    if (settings.verificationEnabled) {
      eligible = eligible.filter((p) => this.pool.hasCritic(p.id, rejectedProducers));
    }
    return eligible[0] ?? null;
  }

  private async emit(result: RunResult, log: TaskLogger): Promise<RunResult> {
    if (this.metrics) {
      try {
        await this.metrics.record(result);
      } catch (err: unknown) {
        log.warn('metrics_failed', { error: err instanceof Error ? err.message : String(err) });
      }
    }
    return result;
  }
}
