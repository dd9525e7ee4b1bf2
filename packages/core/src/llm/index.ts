/**
 * LLM module barrel export.
 */

export type { GeneratedAnswer, ParsedAnswer, PromptPair } from './types.js';
export type { CompletionRequest, CompletionResult, ModelBackend } from './backend.js';
export { OpenAICompatibleBackend, createBackends, mapProviderError } from './openai.js';
export type {
  ChatClient,
  ChatCompletionBody,
  ChatCompletionReply,
  ChatMessage,
  OpenAICompatibleOptions,
} from './openai.js';
export { extractJson, parseAnswer } from './answer.js';
export { buildCriticPrompt, buildGeneratorPrompt, VERDICT_FORMAT_INSTRUCTIONS } from './prompt.js';
export type { CriticPromptInput, GeneratorPromptInput } from './prompt.js';
export { detectInjection, sanitizeForPrompt, wrapUserInput, TRUNCATION_MARKER } from './sanitize.js';
export { generatedAnswerSchema } from './schema_json.js';
