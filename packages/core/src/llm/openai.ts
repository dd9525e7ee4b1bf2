/**
 * ModelBackend for any provider exposing the OpenAI chat completions shape
 * (OpenAI, OpenRouter, Groq, Together, DeepSeek, Anthropic's compatible
 * endpoint, local Ollama).
 */

import OpenAI, {
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
  RateLimitError,
} from 'openai';
import type { LoadedConfig } from '../config/types.js';
import { BackendError, ConfigError } from '../errors.js';
import type { CompletionRequest, CompletionResult, ModelBackend } from './backend.js';

export type ChatMessage = { role: 'system'; content: string } | { role: 'user'; content: string };

export interface ChatCompletionBody {
  model: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature: number;
}

export interface ChatCompletionReply {
  choices: Array<{ message: { content: string | null } }>;
  usage?: { total_tokens: number } | null;
}

/** The single SDK call the adapter needs; tests pass a scripted one. */
export type ChatClient = (
  body: ChatCompletionBody,
  options: { timeout: number; signal?: AbortSignal },
) => Promise<ChatCompletionReply>;

export interface OpenAICompatibleOptions {
  model: string;
  baseURL?: string;
  /** null for providers that need no key */
  apiKey?: string | null;
  temperature?: number;
  client?: ChatClient;
}

const DEFAULT_TEMPERATURE = 0.1;

/** Map SDK and transport failures into the backend error taxonomy. */
export function mapProviderError(err: unknown): BackendError {
  if (err instanceof BackendError) return err;
  if (err instanceof APIConnectionTimeoutError || err instanceof APIUserAbortError) {
    return new BackendError('timeout', err.message);
  }
  if (err instanceof RateLimitError || (err instanceof APIError && err.status === 429)) {
    return new BackendError('rate-limited', err.message, '429');
  }
  if (err instanceof APIError) {
    return new BackendError(
      'provider-error',
      err.message,
      err.status === undefined ? 'connection' : String(err.status),
    );
  }
  const msg = err instanceof Error ? err.message : String(err);
  return new BackendError('provider-error', msg, 'unknown');
}

export class OpenAICompatibleBackend implements ModelBackend {
  private readonly client: ChatClient;
  private readonly model: string;
  private readonly temperature: number;

  constructor(opts: OpenAICompatibleOptions) {
    this.model = opts.model;
    this.temperature = opts.temperature ?? DEFAULT_TEMPERATURE;
    if (opts.client) {
      this.client = opts.client;
    } else {
      const sdk = new OpenAI({
        apiKey: opts.apiKey ?? 'not-needed',
        baseURL: opts.baseURL,
        // The pool retries rate-limited calls; other faults go to the orchestrator.
        maxRetries: 0,
      });
      this.client = (body, options) => sdk.chat.completions.create(body, options);
    }
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    const messages: ChatMessage[] = [];
    if (request.system) {
      messages.push({ role: 'system', content: request.system });
    }
    messages.push({ role: 'user', content: request.prompt });

    let reply: ChatCompletionReply;
    try {
      reply = await this.client(
        {
          model: this.model,
          messages,
          max_tokens: request.maxTokens,
          temperature: this.temperature,
        },
        { timeout: request.timeoutMs, signal: request.signal },
      );
    } catch (err: unknown) {
      throw mapProviderError(err);
    }

    const content = reply.choices[0]?.message.content;
    if (!content || content.trim() === '') {
      throw new BackendError('provider-error', `${this.model} returned an empty completion`, 'empty-response');
    }
    return { text: content, totalTokens: reply.usage?.total_tokens };
  }
}

/**
 * Build one backend per configured profile. A profile whose provider needs
 * a key that is not set is a configuration error.
 */
export function createBackends(loaded: LoadedConfig): Map<string, ModelBackend> {
  const problems: string[] = [];
  const backends = new Map<string, ModelBackend>();
  for (const profile of loaded.config.profiles) {
    const endpoint = loaded.endpoints.find((e) => e.profileId === profile.id);
    if (!endpoint) {
      problems.push(`profile "${profile.id}" has no resolved endpoint`);
      continue;
    }
    if (endpoint.apiKeyEnv && !endpoint.apiKey) {
      problems.push(`profile "${profile.id}" needs ${endpoint.apiKeyEnv} to be set`);
      continue;
    }
    backends.set(
      profile.id,
      new OpenAICompatibleBackend({
        model: profile.model,
        baseURL: endpoint.baseURL,
        apiKey: endpoint.apiKey,
      }),
    );
  }
  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return backends;
}
