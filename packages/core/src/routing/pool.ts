/**
 * ModelPool: maps tiers to configured backends, orders fallbacks, and
 * owns the per-backend concurrency accounting and the per-provider rate
 * budgets.
 *
 * This is the only mutable state shared between concurrently resolving
 * tasks. Every permit is taken and returned through a lease, and leases
 * are released in `finally` blocks.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { PoolConfig } from '../config/types.js';
import {
  BackendError,
  BackendSaturatedError,
  ConfigError,
  InvariantViolationError,
  NoAvailableBackendError,
  toBackendError,
} from '../errors.js';
import type { CompletionRequest, CompletionResult, ModelBackend } from '../llm/backend.js';
import { costUnits, type CallRecord } from '../metrics.js';
import { estimateRequestTokens, type RateLimiter } from './rate_limit.js';
import { Semaphore, SemaphoreTimeoutError, type SemaphoreStats } from './semaphore.js';
import { tierRank, type CallRole, type ComplexityTier, type ModelProfile } from './types.js';

export interface BackendLease {
  readonly profile: ModelProfile;
  readonly backend: ModelBackend;
  /** Return the permit. Calling it again is a no-op. */
  release(): void;
}

export type PoolRequest = Omit<CompletionRequest, 'timeoutMs' | 'signal'>;

interface PoolEntry {
  profile: ModelProfile;
  backend: ModelBackend;
  semaphore: Semaphore;
}

function byCost(a: ModelProfile, b: ModelProfile): number {
  return a.costWeight - b.costWeight;
}

function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

export class ModelPool {
  private readonly entries = new Map<string, PoolEntry>();
  private readonly order: ModelProfile[];
  private readonly config: PoolConfig;
  private readonly now: () => number;
  private readonly limiter: RateLimiter | null;

  constructor(
    profiles: readonly ModelProfile[],
    backends: ReadonlyMap<string, ModelBackend>,
    config: PoolConfig,
    opts: { now?: () => number; limiter?: RateLimiter } = {},
  ) {
    this.config = config;
    this.now = opts.now ?? (() => performance.now());
    this.limiter = opts.limiter ?? null;
    this.order = [...profiles];

    const missing = profiles.filter((p) => !backends.has(p.id)).map((p) => p.id);
    if (missing.length > 0) {
      throw new ConfigError(missing.map((id) => `no backend registered for profile "${id}"`));
    }
    for (const profile of profiles) {
      const backend = backends.get(profile.id);
      if (!backend) continue;
      this.entries.set(profile.id, {
        profile,
        backend,
        semaphore: new Semaphore(profile.maxConcurrency ?? config.perBackendConcurrency),
      });
    }
  }

  profiles(): readonly ModelProfile[] {
    return this.order;
  }

  getProfile(profileId: string): ModelProfile | undefined {
    return this.entries.get(profileId)?.profile;
  }

  // ── Selection ────────────────────────────────────────────────────

  /**
   * Generators eligible for `tier`, cheapest first. Profiles serving a
   * higher tier follow as fallbacks when tierFallback is on.
   */
  select(tier: ComplexityTier, exclude: ReadonlySet<string> = new Set()): ModelProfile[] {
    const available = this.order.filter((p) => !exclude.has(p.id));
    const primary = available.filter((p) => p.tiers.includes(tier)).sort(byCost);
    const fallbacks = this.config.tierFallback
      ? available
          .filter((p) => !p.tiers.includes(tier))
          .filter((p) => p.tiers.some((t) => tierRank(t) > tierRank(tier)))
          .sort(byCost)
      : [];

    const selected = [...primary, ...fallbacks];
    if (selected.length === 0) {
      throw new NoAvailableBackendError(
        tier,
        'generator',
        exclude.size > 0 ? `${exclude.size} profile(s) already excluded for this task` : undefined,
      );
    }
    return selected;
  }

  /**
   * Critics for a candidate produced by `generatorId`. The generator itself
   * and profiles that exclude it are never returned. A different provider
   * is preferred, then complex-tier profiles, then lower cost.
   */
  selectCritics(
    generatorId: string,
    tier: ComplexityTier,
    exclude: ReadonlySet<string> = new Set(),
  ): ModelProfile[] {
    const generator = this.getProfile(generatorId);
    const rank = (p: ModelProfile): number =>
      (generator && p.provider !== generator.provider ? 0 : 2) + (p.tiers.includes('complex') ? 0 : 1);

    const critics = this.order
      .filter((p) => p.canCritique && p.id !== generatorId)
      .filter((p) => !p.criticExcludes.includes(generatorId))
      .filter((p) => !exclude.has(p.id))
      .sort((a, b) => rank(a) - rank(b) || byCost(a, b));

    if (critics.length === 0) {
      throw new NoAvailableBackendError(tier, 'critic', `nothing may critique "${generatorId}"`);
    }
    return critics;
  }

  /** Whether at least one profile outside `exclude` may critique output from `generatorId`. */
  hasCritic(generatorId: string, exclude: ReadonlySet<string> = new Set()): boolean {
    return this.order.some(
      (p) =>
        p.canCritique &&
        p.id !== generatorId &&
        !p.criticExcludes.includes(generatorId) &&
        !exclude.has(p.id),
    );
  }

  // ── Permits ──────────────────────────────────────────────────────

  /**
   * Take a permit for `profileId`. Callers beyond the concurrency cap wait
   * in arrival order for at most queueTimeoutMs.
   */
  async acquire(profileId: string): Promise<BackendLease> {
    const entry = this.entries.get(profileId);
    if (!entry) {
      throw new InvariantViolationError(`acquire() for unknown profile "${profileId}"`);
    }

    try {
      await entry.semaphore.acquire(this.config.queueTimeoutMs);
    } catch (err: unknown) {
      if (err instanceof SemaphoreTimeoutError) {
        throw new BackendSaturatedError(profileId, err.waitedMs);
      }
      throw err;
    }

    let released = false;
    return {
      profile: entry.profile,
      backend: entry.backend,
      release: () => {
        if (released) return;
        released = true;
        entry.semaphore.release();
      },
    };
  }

  /**
   * One backend call under a lease, including the wait for the lease.
   * Latency and cost are reported through `onCall` for both outcomes.
   * A rate-limited answer is retried with exponential backoff up to
   * rateLimitRetries times. Failures leave as BackendError or
   * BackendSaturatedError only.
   */
  async complete(
    profileId: string,
    role: CallRole,
    request: PoolRequest,
    onCall?: (record: CallRecord) => void,
  ): Promise<CompletionResult> {
    const started = this.now();
    let lease: BackendLease | null = null;

    try {
      lease = await this.acquire(profileId);
      const result = await this.callWithRetry(lease, request);
      onCall?.({
        profileId,
        role,
        latencyMs: this.now() - started,
        costUnits: costUnits(lease.profile.costWeight, result.totalTokens),
        ok: true,
        errorKind: null,
      });
      return result;
    } catch (err: unknown) {
      if (err instanceof InvariantViolationError) throw err;
      const error = toBackendError(err);
      onCall?.({
        profileId,
        role,
        latencyMs: this.now() - started,
        costUnits: 0,
        ok: false,
        errorKind: error instanceof BackendError ? error.kind : 'saturated',
      });
      throw error;
    } finally {
      lease?.release();
    }
  }

  /** Backoff before retry `n` (0-based). */
  retryDelayMs(n: number): number {
    return Math.min(this.config.retryMaxDelayMs, this.config.retryBaseDelayMs * 2 ** n);
  }

  private async callWithRetry(lease: BackendLease, request: PoolRequest): Promise<CompletionResult> {
    for (let retry = 0; ; retry++) {
      try {
        return await this.callOnce(lease, request);
      } catch (err: unknown) {
        const error = toBackendError(err);
        const retryable = error instanceof BackendError && error.kind === 'rate-limited';
        if (!retryable || retry >= this.config.rateLimitRetries) throw error;
        await sleep(this.retryDelayMs(retry));
      }
    }
  }

  private async callOnce(lease: BackendLease, request: PoolRequest): Promise<CompletionResult> {
    const { profile, backend } = lease;
    const estimated = estimateRequestTokens(request);
    this.limiter?.take(profile.provider, estimated);

    const timeoutMs = this.config.backendTimeoutMs;
    const controller = new AbortController();
    const result = await withTimeout(
      backend.complete({ ...request, timeoutMs, signal: controller.signal }),
      timeoutMs,
      () => {
        controller.abort();
        return new BackendError('timeout', `"${profile.id}" did not answer within ${timeoutMs}ms`);
      },
    );
    if (result.totalTokens !== undefined) {
      this.limiter?.settle(profile.provider, estimated, result.totalTokens);
    }
    return result;
  }

  stats(profileId: string): SemaphoreStats {
    const entry = this.entries.get(profileId);
    if (!entry) {
      throw new InvariantViolationError(`stats() for unknown profile "${profileId}"`);
    }
    return entry.semaphore.stats();
  }
}
