/**
 * Default configuration. Every key a config file may set has a value here.
 */

import type { VerisqlConfig } from './types.js';

export function defaultConfig(): VerisqlConfig {
  return {
    orchestrator: {
      maxAttempts: 3,
      verificationEnabled: true,
      tierEscalationThreshold: 2,
      minAcceptConfidence: 0,
      maxCost: null,
    },
    pool: {
      perBackendConcurrency: 2,
      queueTimeoutMs: 10_000,
      backendTimeoutMs: 30_000,
      tierFallback: true,
      rateLimitRetries: 2,
      retryBaseDelayMs: 1_000,
      retryMaxDelayMs: 10_000,
    },
    rateLimit: {
      enabled: true,
      requestsPerMinute: 20,
      tokensPerMinute: 100_000,
      providers: {
        openai: { requestsPerMinute: 60, tokensPerMinute: 150_000 },
        groq: { requestsPerMinute: 30, tokensPerMinute: 100_000 },
        openrouter: { requestsPerMinute: 100, tokensPerMinute: 200_000 },
        anthropic: { requestsPerMinute: 50, tokensPerMinute: 100_000 },
        // Local; effectively unlimited.
        ollama: { requestsPerMinute: 1_000, tokensPerMinute: 10_000_000 },
      },
    },
    context: {
      contextMaxSize: 8_000,
    },
    generation: {
      maxTokens: 1024,
      critiqueMaxTokens: 512,
      maxRequestChars: 2_000,
    },
    classifier: {
      weights: {
        length: 0.2,
        aggregation: 0.25,
        join: 0.35,
        analytic: 0.4,
        write: 0.3,
        ambiguity: 0.15,
        context: 0.2,
      },
      keywords: {
        aggregation: [
          'count',
          'sum',
          'total',
          'average',
          'avg',
          'group by',
          'per',
          'maximum',
          'minimum',
          'aggregate',
        ],
        join: [
          'join',
          'across',
          'together with',
          'for each',
          'combined',
          'along with',
          'related',
          'relationship',
        ],
        analytic: [
          'rank',
          'running total',
          'cumulative',
          'year over year',
          'month over month',
          'percentile',
          'subquery',
          'window',
          'optimize',
        ],
        write: ['delete', 'update', 'insert', 'drop', 'alter', 'create', 'truncate'],
        ambiguity: ['maybe', 'roughly', 'something like', 'kind of', 'etc', 'somehow', 'stuff'],
      },
      complexThreshold: 0.5,
      longRequestTokens: 40,
      largeContextChars: 4_000,
      manyTables: 8,
    },
    logging: {
      level: 'info',
      pretty: false,
    },
    profiles: [],
  };
}
