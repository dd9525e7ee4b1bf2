/**
 * Per-provider request and token budgets, one token bucket of each kind
 * per provider. A bucket holds a minute's allowance and refills
 * continuously.
 */

import type { RateLimitConfig } from '../config/types.js';
import { BackendError } from '../errors.js';

export class TokenBucket {
  private tokens: number;
  private last: number;
  readonly capacity: number;
  /** Tokens added per millisecond */
  readonly refillRate: number;
  private readonly now: () => number;

  constructor(capacity: number, refillRate: number, now: () => number) {
    this.capacity = capacity;
    this.refillRate = refillRate;
    this.now = now;
    this.tokens = capacity;
    this.last = now();
  }

  private refill(): void {
    const t = this.now();
    this.tokens = Math.min(this.capacity, this.tokens + (t - this.last) * this.refillRate);
    this.last = t;
  }

  tryConsume(n: number): boolean {
    this.refill();
    if (this.tokens < n) return false;
    this.tokens -= n;
    return true;
  }

  /** Add (or, with a negative n, remove) tokens. The level may go below zero. */
  adjust(n: number): void {
    this.refill();
    this.tokens = Math.min(this.capacity, this.tokens + n);
  }

  msUntilAvailable(n: number): number {
    this.refill();
    if (this.tokens >= n) return 0;
    return (n - this.tokens) / this.refillRate;
  }

  available(): number {
    this.refill();
    return Math.max(0, this.tokens);
  }
}

export interface ProviderUsage {
  requests: number;
  tokens: number;
}

interface ProviderBuckets {
  requests: TokenBucket;
  tokens: TokenBucket;
  usage: ProviderUsage;
}

export class RateLimiter {
  private readonly config: RateLimitConfig;
  private readonly now: () => number;
  private readonly buckets = new Map<string, ProviderBuckets>();

  constructor(config: RateLimitConfig, opts: { now?: () => number } = {}) {
    this.config = config;
    this.now = opts.now ?? (() => performance.now());
  }

  limits(provider: string): { requestsPerMinute: number; tokensPerMinute: number } {
    const override = this.config.providers[provider];
    return {
      requestsPerMinute: override?.requestsPerMinute ?? this.config.requestsPerMinute,
      tokensPerMinute: override?.tokensPerMinute ?? this.config.tokensPerMinute,
    };
  }

  private bucketsFor(provider: string): ProviderBuckets {
    let entry = this.buckets.get(provider);
    if (!entry) {
      const { requestsPerMinute, tokensPerMinute } = this.limits(provider);
      entry = {
        requests: new TokenBucket(requestsPerMinute, requestsPerMinute / 60_000, this.now),
        tokens: new TokenBucket(tokensPerMinute, tokensPerMinute / 60_000, this.now),
        usage: { requests: 0, tokens: 0 },
      };
      this.buckets.set(provider, entry);
    }
    return entry;
  }

  /**
   * Spend one request and `estimatedTokens` from the provider's budget.
   * Throws BackendError('rate-limited') when either budget is short.
   */
  take(provider: string, estimatedTokens: number): void {
    if (!this.config.enabled) return;
    const { requests, tokens, usage } = this.bucketsFor(provider);

    if (!requests.tryConsume(1)) {
      const waitMs = requests.msUntilAvailable(1);
      throw new BackendError(
        'rate-limited',
        `Request rate limit reached for ${provider}; retry in ${(waitMs / 1000).toFixed(1)}s`,
        'local',
      );
    }
    if (!tokens.tryConsume(estimatedTokens)) {
      const waitMs = tokens.msUntilAvailable(estimatedTokens);
      requests.adjust(1);
      throw new BackendError(
        'rate-limited',
        `Token rate limit reached for ${provider}; retry in ${(waitMs / 1000).toFixed(1)}s`,
        'local',
      );
    }
    usage.requests++;
    usage.tokens += estimatedTokens;
  }

  /** Correct the token budget once the provider reports actual usage. */
  settle(provider: string, estimatedTokens: number, actualTokens: number): void {
    if (!this.config.enabled) return;
    const { tokens, usage } = this.bucketsFor(provider);
    const diff = actualTokens - estimatedTokens;
    if (diff === 0) return;
    tokens.adjust(-diff);
    usage.tokens += diff;
  }

  usage(provider: string): ProviderUsage {
    const entry = this.buckets.get(provider);
    return entry ? { ...entry.usage } : { requests: 0, tokens: 0 };
  }

  remaining(provider: string): ProviderUsage {
    const { requests, tokens } = this.bucketsFor(provider);
    return { requests: requests.available(), tokens: tokens.available() };
  }
}

/** Rough token count for a request: prompt characters / 4 plus the completion cap. */
export function estimateRequestTokens(request: { system?: string; prompt: string; maxTokens: number }): number {
  const chars = (request.system?.length ?? 0) + request.prompt.length;
  return Math.ceil(chars / 4) + request.maxTokens;
}
