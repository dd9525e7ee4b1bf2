import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { BackendError, InvariantViolationError } from '../../errors.js';
import { ModelPool } from '../../routing/pool.js';
import type { ModelProfile } from '../../routing/types.js';
import { poolFor, profile, ScriptedBackend, TEST_POOL, testConfig } from '../../__tests__/fakes.js';
import { Critic, type CriticConfig } from '../critic.js';
import { createTask } from '../task.js';
import type { Candidate } from '../types.js';

const CRITIC_CONFIG: CriticConfig = {
  critiqueMaxTokens: 512,
  maxRequestChars: 2000,
  minAcceptConfidence: 0,
};

const task = createTask('remove old sessions', {}, 8000);

function candidate(sql: string, profileId = 'gen'): Candidate {
  return {
    id: 'cand-1',
    taskId: task.id,
    profileId,
    tier: 'simple',
    attempt: 1,
    text: sql,
    sql,
    explanation: 'Removes sessions.',
    assumptions: [],
    structured: false,
    createdAt: '2026-01-01T00:00:00.000Z',
  };
}

function setup(
  reviewer: ScriptedBackend,
  config: Partial<CriticConfig> = {},
): Critic {
  const testCfg = testConfig([profile('gen'), profile('reviewer')]);
  const pool = poolFor(testCfg, { gen: new ScriptedBackend([]), reviewer });
  return new Critic(pool, { ...CRITIC_CONFIG, ...config });
}

describe('Critic.critique', () => {
  it('returns the parsed verdict from a different profile', async () => {
    const reviewer = new ScriptedBackend(['ACCEPT\nREASON: fine\nCONFIDENCE: 0.7']);
    const critic = setup(reviewer);

    const verdict = await critic.critique(task, candidate('SELECT 1'), { tier: 'simple' });

    assert.deepEqual(verdict, {
      candidateId: 'cand-1',
      criticProfileId: 'reviewer',
      decision: 'accept',
      reason: 'fine',
      issues: [],
      confidence: 0.7,
      unparseable: false,
      detail: null,
    });
    assert.equal(reviewer.requests[0]?.maxTokens, 512);
  });

  it('shows the static findings to the reviewer', async () => {
    const reviewer = new ScriptedBackend(['REJECT\nREASON: missing WHERE clause']);
    const critic = setup(reviewer);

    await critic.critique(task, candidate('DELETE FROM sessions'), { tier: 'simple' });

    const prompt = reviewer.requests[0]?.prompt ?? '';
    assert.ok(prompt.includes('- [warning] write_statement: DELETE modifies data'));
    assert.ok(prompt.includes('- [danger] missing_where: DELETE'));
    assert.ok(prompt.includes('CANDIDATE EXPLANATION:\nRemoves sessions.'));
  });

  it('turns a backend failure into an unparseable rejection', async () => {
    const critic = setup(new ScriptedBackend([new BackendError('timeout', 'reviewer timed out')]));

    const verdict = await critic.critique(task, candidate('SELECT 1'), { tier: 'simple' });

    assert.equal(verdict.decision, 'reject');
    assert.equal(verdict.reason, 'unparseable-critic-response');
    assert.equal(verdict.unparseable, true);
    assert.equal(verdict.detail, 'reviewer timed out');
    assert.equal(verdict.criticProfileId, 'reviewer');
  });

  it('turns an off-grammar reply into an unparseable rejection', async () => {
    const critic = setup(new ScriptedBackend(['REJECT']));

    const verdict = await critic.critique(task, candidate('SELECT 1'), { tier: 'simple' });

    assert.equal(verdict.reason, 'unparseable-critic-response');
    assert.equal(verdict.detail, 'REJECT without a REASON line');
  });

  it('downgrades an acceptance below the confidence floor', async () => {
    const critic = setup(new ScriptedBackend(['ACCEPT\nCONFIDENCE: 0.5', 'ACCEPT']), {
      minAcceptConfidence: 0.7,
    });

    const low = await critic.critique(task, candidate('SELECT 1'), { tier: 'simple' });
    assert.equal(low.decision, 'reject');
    assert.equal(low.reason, 'low-confidence-accept');
    assert.deepEqual(low.issues, ['critic confidence 0.5 is below the required 0.7']);
    assert.equal(low.unparseable, false);

    const missing = await critic.critique(task, candidate('SELECT 1'), { tier: 'simple' });
    assert.deepEqual(missing.issues, ['critic confidence missing is below the required 0.7']);
  });

  it('keeps an acceptance at the confidence floor', async () => {
    const critic = setup(new ScriptedBackend(['ACCEPT\nCONFIDENCE: 0.7']), { minAcceptConfidence: 0.7 });
    const verdict = await critic.critique(task, candidate('SELECT 1'), { tier: 'simple' });
    assert.equal(verdict.decision, 'accept');
  });
});

describe('Critic.selectCritic', () => {
  /** A pool whose critic ordering is broken on purpose. */
  class SelfReviewPool extends ModelPool {
    selectCritics(generatorId: string): ModelProfile[] {
      const self = this.getProfile(generatorId);
      return self ? [self] : [];
    }
  }

  it('refuses to let a profile review its own candidate', () => {
    const profiles = [profile('gen'), profile('reviewer')];
    const backends = new Map([
      ['gen', new ScriptedBackend([])],
      ['reviewer', new ScriptedBackend([])],
    ]);
    const critic = new Critic(new SelfReviewPool(profiles, backends, TEST_POOL), CRITIC_CONFIG);

    assert.throws(() => critic.selectCritic(candidate('SELECT 1'), 'simple'), InvariantViolationError);
  });

  it('honours extra exclusions', () => {
    const config = testConfig([profile('gen'), profile('a'), profile('b')]);
    const pool = poolFor(config, {
      gen: new ScriptedBackend([]),
      a: new ScriptedBackend([]),
      b: new ScriptedBackend([]),
    });
    const critic = new Critic(pool, CRITIC_CONFIG);

    assert.equal(critic.selectCritic(candidate('SELECT 1'), 'simple', new Set(['a'])).id, 'b');
  });
});
