/**
 * Provider-agnostic text completion capability.
 *
 * Implementations must fail only with BackendError (timeout, rate-limited
 * or provider-error). Anything else that escapes is folded into a
 * provider-error by the pool.
 */

export interface CompletionRequest {
  prompt: string;
  /** Optional system message; adapters without roles prepend it to the prompt */
  system?: string;
  maxTokens: number;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface CompletionResult {
  text: string;
  /** Prompt plus completion tokens, when the provider reports usage */
  totalTokens?: number;
}

export interface ModelBackend {
  complete(request: CompletionRequest): Promise<CompletionResult>;
}
