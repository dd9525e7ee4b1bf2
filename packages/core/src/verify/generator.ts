/**
 * Generator: one backend call that turns a task into a Candidate.
 */

import { randomUUID } from 'node:crypto';
import type { GenerationConfig } from '../config/types.js';
import { BackendError, GenerationFailedError } from '../errors.js';
import { parseAnswer } from '../llm/answer.js';
import { buildGeneratorPrompt } from '../llm/prompt.js';
import type { CallRecord } from '../metrics.js';
import type { ModelPool } from '../routing/pool.js';
import type { ComplexityTier, ModelProfile } from '../routing/types.js';
import type { Candidate, PriorFeedback, Task } from './types.js';

export interface GenerateOptions {
  priorFeedback?: PriorFeedback | null;
  /** 1-based attempt number recorded on the candidate */
  attempt: number;
  onCall?: (record: CallRecord) => void;
}

export class Generator {
  private readonly pool: ModelPool;
  private readonly config: GenerationConfig;

  constructor(pool: ModelPool, config: GenerationConfig) {
    this.pool = pool;
    this.config = config;
  }

  /**
   * Render the tier's prompt (with the previous rejection, if any), call
   * `profile` once and parse the reply. Every failure, including an empty
   * reply, leaves as GenerationFailedError.
   */
  async generate(
    task: Task,
    tier: ComplexityTier,
    profile: ModelProfile,
    opts: GenerateOptions,
  ): Promise<Candidate> {
    const { system, prompt } = buildGeneratorPrompt({
      task,
      tier,
      feedback: opts.priorFeedback,
      maxRequestChars: this.config.maxRequestChars,
    });

    let text: string;
    try {
      const result = await this.pool.complete(
        profile.id,
        'generator',
        { system, prompt, maxTokens: this.config.maxTokens },
        opts.onCall,
      );
      text = result.text;
    } catch (err: unknown) {
      throw new GenerationFailedError(profile.id, err);
    }

    const answer = parseAnswer(text);
    if (!answer.sql) {
      throw new GenerationFailedError(
        profile.id,
        new BackendError('provider-error', 'reply contained no SQL', 'empty-response'),
      );
    }

    return {
      id: randomUUID(),
      taskId: task.id,
      profileId: profile.id,
      tier,
      attempt: opts.attempt,
      text,
      sql: answer.sql,
      explanation: answer.explanation,
      assumptions: answer.assumptions,
      structured: answer.structured,
      createdAt: new Date().toISOString(),
    };
  }
}
