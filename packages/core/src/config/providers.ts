/**
 * Known OpenAI-compatible providers: default base URL and the environment
 * variable holding the API key. A profile may override either.
 */

import type { ProviderName } from '../routing/types.js';

export interface ProviderInfo {
  readonly baseURL: string;
  /** null for providers that run locally without a key */
  readonly apiKeyEnv: string | null;
}

export const PROVIDERS: Readonly<Record<ProviderName, ProviderInfo>> = {
  openrouter: { baseURL: 'https://openrouter.ai/api/v1', apiKeyEnv: 'OPENROUTER_API_KEY' },
  groq: { baseURL: 'https://api.groq.com/openai/v1', apiKeyEnv: 'GROQ_API_KEY' },
  ollama: { baseURL: 'http://localhost:11434/v1', apiKeyEnv: null },
  openai: { baseURL: 'https://api.openai.com/v1', apiKeyEnv: 'OPENAI_API_KEY' },
  anthropic: { baseURL: 'https://api.anthropic.com/v1', apiKeyEnv: 'ANTHROPIC_API_KEY' },
  together: { baseURL: 'https://api.together.xyz/v1', apiKeyEnv: 'TOGETHER_API_KEY' },
  deepseek: { baseURL: 'https://api.deepseek.com/v1', apiKeyEnv: 'DEEPSEEK_API_KEY' },
};

export const PROVIDER_NAMES = Object.keys(PROVIDERS);

export function isProviderName(value: string): value is ProviderName {
  return Object.prototype.hasOwnProperty.call(PROVIDERS, value);
}
