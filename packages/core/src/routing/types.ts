/**
 * Routing types: complexity tiers and model profiles.
 */

export type ComplexityTier = 'simple' | 'complex';

export const TIER_ORDER: readonly ComplexityTier[] = ['simple', 'complex'];

export function tierRank(tier: ComplexityTier): number {
  return TIER_ORDER.indexOf(tier);
}

/** The higher of two tiers. Used to keep tier changes monotonic. */
export function maxTier(a: ComplexityTier, b: ComplexityTier): ComplexityTier {
  return tierRank(a) >= tierRank(b) ? a : b;
}

export function getNextTier(tier: ComplexityTier): ComplexityTier | null {
  const index = tierRank(tier);
  if (index === -1 || index >= TIER_ORDER.length - 1) {
    return null;
  }
  return TIER_ORDER[index + 1] ?? null;
}

export type ProviderName =
  | 'openrouter'
  | 'groq'
  | 'ollama'
  | 'openai'
  | 'anthropic'
  | 'together'
  | 'deepseek';

export interface ModelProfile {
  /** Unique identifier; also the backend instance key */
  readonly id: string;
  readonly provider: ProviderName;
  /** Model name sent to the provider */
  readonly model: string;
  /** Tiers this profile may serve as a generator */
  readonly tiers: readonly ComplexityTier[];
  /** Relative cost per 1k tokens (or per call when usage is unknown) */
  readonly costWeight: number;
  /** Whether this profile may act as a critic at all */
  readonly canCritique: boolean;
  /** Generator profile ids this profile must never critique */
  readonly criticExcludes: readonly string[];
  /** Overrides pool.perBackendConcurrency for this backend */
  readonly maxConcurrency?: number;
  /** Overrides the provider's default base URL */
  readonly baseURL?: string;
  /** Overrides the provider's default API key variable */
  readonly apiKeyEnv?: string;
}

export type CallRole = 'generator' | 'critic';
