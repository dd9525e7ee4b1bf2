/**
 * AJV JSON Schema for a fully merged VerisqlConfig.
 * Plain object schema (not JSONSchemaType) to keep the readonly types simple.
 */

import { PROVIDER_NAMES } from './providers.js';

const positiveInt = { type: 'integer' as const, minimum: 1 };
const nonNegative = { type: 'number' as const, minimum: 0 };
const stringList = { type: 'array' as const, items: { type: 'string' as const, minLength: 1 } };
const tierList = {
  type: 'array' as const,
  items: { type: 'string' as const, enum: ['simple', 'complex'] },
  minItems: 1,
  uniqueItems: true,
};

export const configSchema = {
  type: 'object' as const,
  properties: {
    orchestrator: {
      type: 'object' as const,
      properties: {
        maxAttempts: positiveInt,
        verificationEnabled: { type: 'boolean' as const },
        tierEscalationThreshold: positiveInt,
        minAcceptConfidence: { type: 'number' as const, minimum: 0, maximum: 1 },
        maxCost: { type: 'number' as const, minimum: 0, nullable: true },
      },
      required: [
        'maxAttempts',
        'verificationEnabled',
        'tierEscalationThreshold',
        'minAcceptConfidence',
        'maxCost',
      ] as const,
      additionalProperties: false,
    },
    pool: {
      type: 'object' as const,
      properties: {
        perBackendConcurrency: positiveInt,
        queueTimeoutMs: { type: 'integer' as const, minimum: 0 },
        backendTimeoutMs: positiveInt,
        tierFallback: { type: 'boolean' as const },
        rateLimitRetries: { type: 'integer' as const, minimum: 0 },
        retryBaseDelayMs: { type: 'integer' as const, minimum: 0 },
        retryMaxDelayMs: { type: 'integer' as const, minimum: 0 },
      },
      required: [
        'perBackendConcurrency',
        'queueTimeoutMs',
        'backendTimeoutMs',
        'tierFallback',
        'rateLimitRetries',
        'retryBaseDelayMs',
        'retryMaxDelayMs',
      ] as const,
      additionalProperties: false,
    },
    rateLimit: {
      type: 'object' as const,
      properties: {
        enabled: { type: 'boolean' as const },
        requestsPerMinute: positiveInt,
        tokensPerMinute: positiveInt,
        providers: {
          type: 'object' as const,
          propertyNames: { enum: PROVIDER_NAMES },
          additionalProperties: {
            type: 'object' as const,
            properties: {
              requestsPerMinute: positiveInt,
              tokensPerMinute: positiveInt,
            },
            additionalProperties: false,
          },
        },
      },
      required: ['enabled', 'requestsPerMinute', 'tokensPerMinute', 'providers'] as const,
      additionalProperties: false,
    },
    context: {
      type: 'object' as const,
      properties: {
        contextMaxSize: { type: 'integer' as const, minimum: 0 },
      },
      required: ['contextMaxSize'] as const,
      additionalProperties: false,
    },
    generation: {
      type: 'object' as const,
      properties: {
        maxTokens: positiveInt,
        critiqueMaxTokens: positiveInt,
        maxRequestChars: positiveInt,
      },
      required: ['maxTokens', 'critiqueMaxTokens', 'maxRequestChars'] as const,
      additionalProperties: false,
    },
    classifier: {
      type: 'object' as const,
      properties: {
        weights: {
          type: 'object' as const,
          properties: {
            length: nonNegative,
            aggregation: nonNegative,
            join: nonNegative,
            analytic: nonNegative,
            write: nonNegative,
            ambiguity: nonNegative,
            context: nonNegative,
          },
          required: ['length', 'aggregation', 'join', 'analytic', 'write', 'ambiguity', 'context'] as const,
          additionalProperties: false,
        },
        keywords: {
          type: 'object' as const,
          properties: {
            aggregation: stringList,
            join: stringList,
            analytic: stringList,
            write: stringList,
            ambiguity: stringList,
          },
          required: ['aggregation', 'join', 'analytic', 'write', 'ambiguity'] as const,
          additionalProperties: false,
        },
        complexThreshold: nonNegative,
        longRequestTokens: positiveInt,
        largeContextChars: positiveInt,
        manyTables: positiveInt,
      },
      required: [
        'weights',
        'keywords',
        'complexThreshold',
        'longRequestTokens',
        'largeContextChars',
        'manyTables',
      ] as const,
      additionalProperties: false,
    },
    logging: {
      type: 'object' as const,
      properties: {
        level: {
          type: 'string' as const,
          enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
        },
        pretty: { type: 'boolean' as const },
      },
      required: ['level', 'pretty'] as const,
      additionalProperties: false,
    },
    profiles: {
      type: 'array' as const,
      items: {
        type: 'object' as const,
        properties: {
          id: { type: 'string' as const, minLength: 1 },
          provider: { type: 'string' as const, enum: PROVIDER_NAMES },
          model: { type: 'string' as const, minLength: 1 },
          tiers: tierList,
          costWeight: nonNegative,
          canCritique: { type: 'boolean' as const },
          criticExcludes: stringList,
          maxConcurrency: positiveInt,
          baseURL: { type: 'string' as const, minLength: 1 },
          apiKeyEnv: { type: 'string' as const, minLength: 1 },
        },
        required: ['id', 'provider', 'model', 'tiers', 'costWeight', 'canCritique', 'criticExcludes'] as const,
        additionalProperties: false,
      },
    },
  },
  required: [
    'orchestrator',
    'pool',
    'rateLimit',
    'context',
    'generation',
    'classifier',
    'logging',
    'profiles',
  ] as const,
  additionalProperties: false,
};
