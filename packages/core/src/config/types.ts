/**
 * Configuration types. A VerisqlConfig is frozen after loadConfig() and
 * never mutated afterwards.
 */

import type { ModelProfile } from '../routing/types.js';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface OrchestratorConfig {
  /** Upper bound on candidate/verdict pairs per task */
  readonly maxAttempts: number;
  readonly verificationEnabled: boolean;
  /** Consecutive rejections at one tier before escalating */
  readonly tierEscalationThreshold: number;
  /** ACCEPT verdicts reporting a lower confidence are treated as rejections; 0 disables */
  readonly minAcceptConfidence: number;
  /** Cost units a task may spend; null means unbounded */
  readonly maxCost: number | null;
}

export interface PoolConfig {
  readonly perBackendConcurrency: number;
  readonly queueTimeoutMs: number;
  readonly backendTimeoutMs: number;
  /** Offer higher-tier profiles when a tier has none left */
  readonly tierFallback: boolean;
  /** Extra tries for a call the provider answered with rate-limited */
  readonly rateLimitRetries: number;
  /** Backoff before retry n is min(retryMaxDelayMs, retryBaseDelayMs * 2^n) */
  readonly retryBaseDelayMs: number;
  readonly retryMaxDelayMs: number;
}

export interface ProviderRateLimit {
  readonly requestsPerMinute?: number;
  readonly tokensPerMinute?: number;
}

export interface RateLimitConfig {
  readonly enabled: boolean;
  readonly requestsPerMinute: number;
  readonly tokensPerMinute: number;
  /** Per-provider overrides of the two limits */
  readonly providers: Readonly<Record<string, ProviderRateLimit>>;
}

export interface ContextConfig {
  /** Maximum characters of context injected into prompts */
  readonly contextMaxSize: number;
}

export interface GenerationConfig {
  readonly maxTokens: number;
  readonly critiqueMaxTokens: number;
  readonly maxRequestChars: number;
}

export interface SignalWeights {
  readonly length: number;
  readonly aggregation: number;
  readonly join: number;
  readonly analytic: number;
  readonly write: number;
  readonly ambiguity: number;
  readonly context: number;
}

export interface ClassifierKeywords {
  readonly aggregation: readonly string[];
  readonly join: readonly string[];
  readonly analytic: readonly string[];
  readonly write: readonly string[];
  readonly ambiguity: readonly string[];
}

export interface ClassifierConfig {
  readonly weights: SignalWeights;
  readonly keywords: ClassifierKeywords;
  /** Score at or above which a task is complex */
  readonly complexThreshold: number;
  /** Estimated request tokens above which the length signal fires fully */
  readonly longRequestTokens: number;
  /** Context characters above which the context signal fires */
  readonly largeContextChars: number;
  /** Schema items above which the context signal fires */
  readonly manyTables: number;
}

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly pretty: boolean;
}

export interface VerisqlConfig {
  readonly orchestrator: OrchestratorConfig;
  readonly pool: PoolConfig;
  readonly rateLimit: RateLimitConfig;
  readonly context: ContextConfig;
  readonly generation: GenerationConfig;
  readonly classifier: ClassifierConfig;
  readonly logging: LoggingConfig;
  readonly profiles: readonly ModelProfile[];
}

/** Where and how to reach one profile's backend, resolved from the environment. */
export interface ResolvedEndpoint {
  readonly profileId: string;
  readonly baseURL: string;
  readonly apiKeyEnv: string | null;
  /** null when the provider needs a key and the variable is unset */
  readonly apiKey: string | null;
}

export interface LoadedConfig {
  readonly config: VerisqlConfig;
  readonly endpoints: readonly ResolvedEndpoint[];
  /** Path of the file that was merged over the defaults, if any */
  readonly source: string | null;
}
