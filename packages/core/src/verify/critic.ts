/**
 * Critic: a second, different model judges a candidate.
 *
 * The critic never fails the run on its own. Backend faults and replies
 * outside the verdict grammar both become a REJECT with the
 * unparseable-critic-response reason.
 */

import type { GenerationConfig, OrchestratorConfig } from '../config/types.js';
import {
  InvariantViolationError,
  LOW_CONFIDENCE_REASON,
  NoAvailableBackendError,
  UNPARSEABLE_CRITIC_REASON,
} from '../errors.js';
import { buildCriticPrompt } from '../llm/prompt.js';
import type { CallRecord } from '../metrics.js';
import { inspectSql } from '../policy/inspect.js';
import type { ModelPool } from '../routing/pool.js';
import type { ComplexityTier, ModelProfile } from '../routing/types.js';
import type { Candidate, Task, Verdict } from './types.js';
import { parseVerdict } from './verdict.js';

export interface CritiqueOptions {
  /** Tier in force, used for error reporting */
  tier: ComplexityTier;
  /** Profiles that must not be chosen as critic */
  exclude?: ReadonlySet<string>;
  onCall?: (record: CallRecord) => void;
}

export type CriticConfig = Pick<GenerationConfig, 'critiqueMaxTokens' | 'maxRequestChars'> &
  Pick<OrchestratorConfig, 'minAcceptConfidence'>;

export class Critic {
  private readonly pool: ModelPool;
  private readonly config: CriticConfig;

  constructor(pool: ModelPool, config: CriticConfig) {
    this.pool = pool;
    this.config = config;
  }

  /** First eligible critic for the candidate's producer. Throws NoAvailableBackendError. */
  selectCritic(candidate: Candidate, tier: ComplexityTier, exclude?: ReadonlySet<string>): ModelProfile {
    const [critic] = this.pool.selectCritics(candidate.profileId, tier, exclude);
    if (!critic) {
      throw new NoAvailableBackendError(tier, 'critic');
    }
    if (critic.id === candidate.profileId) {
      throw new InvariantViolationError(
        `critic selection returned the producer "${candidate.profileId}" of candidate ${candidate.id}`,
      );
    }
    return critic;
  }

  async critique(task: Task, candidate: Candidate, opts: CritiqueOptions): Promise<Verdict> {
    const critic = this.selectCritic(candidate, opts.tier, opts.exclude);
    const { findings } = inspectSql(candidate.sql, task.context.dialect);
    const { system, prompt } = buildCriticPrompt({
      task,
      candidate,
      findings,
      maxRequestChars: this.config.maxRequestChars,
    });

    const base = { candidateId: candidate.id, criticProfileId: critic.id };
    const unparseable = (detail: string): Verdict => ({
      ...base,
      decision: 'reject',
      reason: UNPARSEABLE_CRITIC_REASON,
      issues: [],
      confidence: null,
      unparseable: true,
      detail,
    });

    let text: string;
    try {
      const result = await this.pool.complete(
        critic.id,
        'critic',
        { system, prompt, maxTokens: this.config.critiqueMaxTokens },
        opts.onCall,
      );
      text = result.text;
    } catch (err: unknown) {
      return unparseable(err instanceof Error ? err.message : String(err));
    }

    const parsed = parseVerdict(text);
    if (!parsed.ok) {
      return unparseable(parsed.error);
    }

    const { decision, reason, confidence, issues } = parsed.verdict;
    const floor = this.config.minAcceptConfidence;
    if (decision === 'accept' && floor > 0 && (confidence === null || confidence < floor)) {
      return {
        ...base,
        decision: 'reject',
        reason: LOW_CONFIDENCE_REASON,
        issues: [
          ...issues,
          `critic confidence ${confidence ?? 'missing'} is below the required ${floor}`,
        ],
        confidence,
        unparseable: false,
        detail: null,
      };
    }

    return { ...base, decision, reason, issues, confidence, unparseable: false, detail: null };
  }
}
