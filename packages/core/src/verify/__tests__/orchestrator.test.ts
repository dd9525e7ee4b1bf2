/**
 * Orchestrator tests: the resolution state machine end to end against
 * scripted backends.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { setTimeout as delay } from 'node:timers/promises';
import { pino, type Logger } from 'pino';
import { BackendError } from '../../errors.js';
import { isRecord } from '../../guards.js';
import { InMemoryMetricsCollector, type MetricsCollector } from '../../metrics.js';
import { tierRank } from '../../routing/types.js';
import type { VerisqlConfig } from '../../config/types.js';
import type { ModelPool } from '../../routing/pool.js';
import {
  answer,
  poolFor,
  profile,
  ScriptedBackend,
  testConfig,
  type ScriptedReply,
} from '../../__tests__/fakes.js';
import { Orchestrator } from '../orchestrator.js';
import { createTask } from '../task.js';
import type { RunResult } from '../types.js';

// ── Helpers ──────────────────────────────────────────────────────────

function captureLogs(): { logger: Logger; records: () => Record<string, unknown>[]; events: () => string[] } {
  const lines: string[] = [];
  const logger = pino({ level: 'info' }, { write: (line: string) => lines.push(line) });
  const records = (): Record<string, unknown>[] =>
    lines.flatMap((line) => {
      const parsed: unknown = JSON.parse(line);
      return isRecord(parsed) ? [parsed] : [];
    });
  return {
    logger,
    records,
    events: () => records().map((r) => (typeof r.event === 'string' ? r.event : '')),
  };
}

/** Properties every finished (not cancelled) run must satisfy. */
function assertRunInvariants(result: RunResult, maxAttempts: number): void {
  assert.ok(result.metrics.generations <= maxAttempts, 'generations bounded by maxAttempts');
  assert.ok(result.attempts.length <= maxAttempts, 'attempts bounded by maxAttempts');
  const rejected = new Set<string>();
  for (const attempt of result.attempts) {
    if (attempt.candidate) {
      assert.ok(!rejected.has(attempt.candidate.profileId), 'rejected producer generated again');
    }
    if (attempt.candidate && attempt.verdict) {
      assert.notEqual(attempt.candidate.profileId, attempt.verdict.criticProfileId);
      assert.ok(!rejected.has(attempt.verdict.criticProfileId), 'rejected producer critiqued');
      if (attempt.verdict.decision === 'reject') rejected.add(attempt.candidate.profileId);
    }
  }
  for (let i = 1; i < result.tierHistory.length; i++) {
    const prev = result.tierHistory[i - 1];
    const next = result.tierHistory[i];
    assert.ok(prev !== undefined && next !== undefined);
    assert.ok(tierRank(next) >= tierRank(prev), 'tier never decreases');
  }
}

/** A simple-tier generator and a complex-tier critic from another provider. */
function twoModelSetup(
  cheapScript: ScriptedReply[],
  judgeScript: ScriptedReply[],
  overrides: Parameters<typeof testConfig>[1] = {},
): { config: VerisqlConfig; pool: ModelPool; cheap: ScriptedBackend; judge: ScriptedBackend } {
  const config = testConfig(
    [
      profile('cheap', { provider: 'groq', tiers: ['simple'], costWeight: 1 }),
      profile('judge', { provider: 'openai', tiers: ['complex'], costWeight: 3 }),
    ],
    overrides,
  );
  const cheap = new ScriptedBackend(cheapScript);
  const judge = new ScriptedBackend(judgeScript);
  return { config, pool: poolFor(config, { cheap, judge }), cheap, judge };
}

/** Two simple-tier generators from different providers and a complex-tier critic. */
function threeModelSetup(
  cheapScript: ScriptedReply[],
  backupScript: ScriptedReply[],
  judgeScript: ScriptedReply[],
  overrides: Parameters<typeof testConfig>[1] = {},
): {
  config: VerisqlConfig;
  pool: ModelPool;
  cheap: ScriptedBackend;
  backup: ScriptedBackend;
  judge: ScriptedBackend;
} {
  const config = testConfig(
    [
      profile('cheap', { provider: 'groq', tiers: ['simple'], costWeight: 1 }),
      profile('backup', { provider: 'together', tiers: ['simple'], costWeight: 2 }),
      profile('judge', { provider: 'openai', tiers: ['complex'], costWeight: 3 }),
    ],
    overrides,
  );
  const cheap = new ScriptedBackend(cheapScript);
  const backup = new ScriptedBackend(backupScript);
  const judge = new ScriptedBackend(judgeScript);
  return { config, pool: poolFor(config, { cheap, backup, judge }), cheap, backup, judge };
}

// ── Scenarios ────────────────────────────────────────────────────────

describe('Orchestrator.resolve', () => {
  it('accepts a simple request on the first attempt', async () => {
    const { config, pool } = twoModelSetup(
      [answer('SELECT id, name FROM customers')],
      ['ACCEPT\nREASON: looks right\nCONFIDENCE: 0.9'],
    );
    const orchestrator = new Orchestrator({ config, pool });
    const task = createTask('list all customers', {}, config.context.contextMaxSize);

    const result = await orchestrator.resolve(task);

    assert.equal(result.outcome, 'accepted');
    if (result.outcome !== 'accepted') return;
    assert.equal(result.tier, 'simple');
    assert.deepEqual(result.tierHistory, ['simple']);
    assert.equal(result.attempts.length, 1);
    assert.equal(result.candidate.sql, 'SELECT id, name FROM customers');
    assert.equal(result.candidate.profileId, 'cheap');
    assert.equal(result.candidate.attempt, 1);
    assert.equal(result.verdict?.criticProfileId, 'judge');
    assert.equal(result.verdict?.confidence, 0.9);
    assert.equal(result.verified, true);
    assert.equal(result.request, 'list all customers');
    assert.deepEqual(
      result.transitions.map((t) => t.to),
      ['generating', 'critiquing', 'accepted'],
    );
    assert.equal(result.metrics.generatorCalls, 1);
    assert.equal(result.metrics.generations, 1);
    assert.equal(result.metrics.criticCalls, 1);
    assert.equal(result.metrics.costUnits, 4);
    assertRunInvariants(result, 3);
  });

  it('hands the rejection to a different generator for the second attempt', async () => {
    const { config, pool, cheap, backup } = threeModelSetup(
      [answer('DELETE FROM sessions')],
      [answer('DELETE FROM sessions WHERE expires_at < now()')],
      ['REJECT\nREASON: missing WHERE clause\n- deletes every session', 'ACCEPT\nCONFIDENCE: 0.8'],
    );
    const orchestrator = new Orchestrator({ config, pool });
    const task = createTask('remove expired sessions', {}, config.context.contextMaxSize);

    const result = await orchestrator.resolve(task);

    assert.equal(result.outcome, 'accepted');
    if (result.outcome !== 'accepted') return;
    assert.equal(result.attempts.length, 2);
    assert.equal(result.candidate.attempt, 2);
    assert.equal(result.candidate.profileId, 'backup');
    assert.equal(result.candidate.sql, 'DELETE FROM sessions WHERE expires_at < now()');
    assert.equal(result.verdict?.criticProfileId, 'judge');
    assert.deepEqual(result.tierHistory, ['simple', 'simple']);
    assert.equal(result.tier, 'simple');

    assert.equal(cheap.requests.length, 1);
    assert.ok(!cheap.requests[0]?.prompt.includes('PREVIOUS ATTEMPT REJECTED'));
    const retry = backup.requests[0];
    assert.ok(retry);
    assert.ok(
      retry.prompt.includes('A reviewer rejected the previous query for this reason: missing WHERE clause'),
    );
    assert.ok(retry.prompt.includes('- deletes every session'));
    assert.ok(retry.prompt.includes('DELETE FROM sessions\n--- END REJECTED_SQL ---'));

    assert.deepEqual(
      result.transitions.map((t) => t.to),
      ['generating', 'critiquing', 'regenerating', 'generating', 'critiquing', 'accepted'],
    );
    assert.equal(result.metrics.generations, 2);
    assert.equal(result.metrics.criticCalls, 2);
    assertRunInvariants(result, 3);
  });

  it('never asks a rejected producer to regenerate', async () => {
    const { config, pool, cheap, judge } = twoModelSetup(
      [answer('SELECT * FROM customers')],
      ['REJECT\nREASON: wrong table'],
    );
    const orchestrator = new Orchestrator({ config, pool });
    const task = createTask('list accounts', {}, config.context.contextMaxSize);

    const result = await orchestrator.resolve(task);

    assert.equal(result.outcome, 'failed');
    if (result.outcome !== 'failed') return;
    assert.equal(result.failure.kind, 'no-available-backend');
    assert.equal(result.failure.reason, 'no generator backend left for tier "simple"');
    assert.equal(result.lastVerdict?.reason, 'wrong table');
    assert.equal(cheap.requests.length, 1);
    assert.equal(judge.requests.length, 1);
    assert.deepEqual(
      result.transitions.map((t) => t.to),
      ['generating', 'critiquing', 'regenerating', 'generating', 'failed'],
    );
  });

  it('skips a fallback generator whose only critic was rejected', async () => {
    const { config, pool, cheap, judge } = twoModelSetup(
      [answer('SELECT * FROM customers')],
      ['REJECT\nREASON: wrong table'],
      { pool: { tierFallback: true } },
    );
    const orchestrator = new Orchestrator({ config, pool });
    const task = createTask('list accounts', {}, config.context.contextMaxSize);

    const result = await orchestrator.resolve(task);

    assert.equal(result.outcome, 'failed');
    if (result.outcome !== 'failed') return;
    assert.equal(result.failure.kind, 'no-available-backend');
    assert.equal(cheap.requests.length, 1);
    assert.equal(judge.requests.length, 1);
    assert.equal(result.metrics.generations, 1);
  });

  it('escalates to the complex tier after two consecutive rejections', async () => {
    const { logger, events } = captureLogs();
    const config = testConfig(
      [
        profile('cheap', { provider: 'groq', tiers: ['simple'], costWeight: 1 }),
        profile('backup', { provider: 'together', tiers: ['simple'], costWeight: 2 }),
        profile('judge', { provider: 'openai', tiers: ['complex'], costWeight: 3 }),
        profile('senior', { provider: 'openai', tiers: ['complex'], costWeight: 5 }),
      ],
      { orchestrator: { maxAttempts: 3, tierEscalationThreshold: 2 } },
    );
    const cheap = new ScriptedBackend([answer('SELECT * FROM orders JOIN items ON orders.id = items.id')]);
    const backup = new ScriptedBackend([answer('SELECT * FROM orders JOIN items ON orders.id = items.sku')]);
    const judge = new ScriptedBackend([
      'REJECT\nREASON: wrong join key',
      'REJECT\nREASON: still the wrong join key',
      answer('SELECT o.id, i.sku FROM orders o JOIN items i ON i.order_id = o.id'),
    ]);
    const senior = new ScriptedBackend(['ACCEPT\nREASON: correct join\nCONFIDENCE: 0.95']);
    const pool = poolFor(config, { cheap, backup, judge, senior });
    const orchestrator = new Orchestrator({ config, pool, logger });
    const task = createTask('list orders', {}, config.context.contextMaxSize);

    const result = await orchestrator.resolve(task);

    assert.equal(result.outcome, 'accepted');
    if (result.outcome !== 'accepted') return;
    assert.deepEqual(result.tierHistory, ['simple', 'simple', 'complex']);
    assert.equal(result.tier, 'complex');
    assert.deepEqual(
      result.attempts.map((a) => a.candidate?.profileId),
      ['cheap', 'backup', 'judge'],
    );
    assert.equal(result.candidate.tier, 'complex');
    // cheap would outrank senior as critic of judge; it is out because it was rejected.
    assert.equal(result.verdict?.criticProfileId, 'senior');
    assert.ok(judge.requests[2]?.system?.includes('Plan before writing'));
    assert.ok(events().includes('escalation'));
    assert.equal(result.metrics.generations, 3);
    assert.equal(result.metrics.criticCalls, 3);
    assertRunInvariants(result, 3);
  });

  it('fails with no-available-backend when every generator for the tier fails', async () => {
    const config = testConfig([
      profile('a', { tiers: ['simple'], costWeight: 1 }),
      profile('b', { tiers: ['simple'], costWeight: 2 }),
      profile('c', { tiers: ['complex'], costWeight: 3 }),
    ]);
    const a = new ScriptedBackend([new BackendError('timeout', 'a timed out')]);
    const b = new ScriptedBackend([new BackendError('provider-error', 'boom', '500')]);
    const c = new ScriptedBackend([]);
    const orchestrator = new Orchestrator({ config, pool: poolFor(config, { a, b, c }) });
    const task = createTask('list orders', {}, config.context.contextMaxSize);

    const result = await orchestrator.resolve(task);

    assert.equal(result.outcome, 'failed');
    if (result.outcome !== 'failed') return;
    assert.equal(result.failure.kind, 'no-available-backend');
    assert.equal(
      result.failure.reason,
      'no generator backend left for tier "simple" (a: a timed out; b: boom)',
    );
    assert.equal(result.lastVerdict, null);
    assert.deepEqual(
      result.attempts[0]?.generationFailures.map((f) => f.profileId),
      ['a', 'b'],
    );
    assert.equal(c.requests.length, 0);
    assert.equal(result.metrics.generatorCalls, 2);
    assert.equal(result.metrics.generations, 0);
    assert.equal(result.metrics.criticCalls, 0);
    assert.equal(result.metrics.costUnits, 0);
    assert.deepEqual(
      result.transitions.map((t) => t.to),
      ['generating', 'failed'],
    );
  });

  it('treats an unparseable critic reply as a rejection and retries', async () => {
    const { config, pool, backup } = threeModelSetup(
      [answer('SELECT name FROM products')],
      [answer('SELECT name FROM products ORDER BY name')],
      ['Looks fine to me', 'ACCEPT'],
    );
    const orchestrator = new Orchestrator({ config, pool });
    const task = createTask('list product names', {}, config.context.contextMaxSize);

    const result = await orchestrator.resolve(task);

    assert.equal(result.outcome, 'accepted');
    if (result.outcome !== 'accepted') return;
    const firstVerdict = result.attempts[0]?.verdict;
    assert.equal(firstVerdict?.decision, 'reject');
    assert.equal(firstVerdict?.reason, 'unparseable-critic-response');
    assert.equal(firstVerdict?.unparseable, true);
    assert.equal(firstVerdict?.detail, 'first line is not ACCEPT or REJECT: "Looks fine to me"');
    assert.ok(
      backup.requests[0]?.prompt.includes(
        'A reviewer rejected the previous query for this reason: unparseable-critic-response',
      ),
    );
    assert.equal(result.attempts.length, 2);
    assertRunInvariants(result, 3);
  });

  it('fails with attempts-exhausted carrying the last rejection reason', async () => {
    const { config, pool } = threeModelSetup(
      [answer('SELECT * FROM users')],
      [answer('SELECT * FROM users')],
      ['REJECT\nREASON: wrong table', 'REJECT\nREASON: wrong table again'],
      { orchestrator: { maxAttempts: 2, tierEscalationThreshold: 5 } },
    );
    const orchestrator = new Orchestrator({ config, pool });
    const task = createTask('list accounts', {}, config.context.contextMaxSize);

    const result = await orchestrator.resolve(task);

    assert.equal(result.outcome, 'failed');
    if (result.outcome !== 'failed') return;
    assert.equal(result.failure.kind, 'attempts-exhausted');
    assert.equal(result.failure.reason, 'rejected on all 2 attempt(s); last reason: wrong table again');
    assert.equal(result.lastVerdict?.reason, 'wrong table again');
    assert.equal(result.metrics.generations, 2);
    assert.equal(result.metrics.criticCalls, 2);
    assertRunInvariants(result, 2);
  });

  it('clamps maxAttempts below one to a single attempt', async () => {
    const { config, pool } = twoModelSetup([answer('SELECT 1')], ['REJECT\nREASON: no']);
    const orchestrator = new Orchestrator({ config, pool });
    const task = createTask('list orders', {}, config.context.contextMaxSize);

    const result = await orchestrator.resolve(task, { maxAttempts: 0 });

    assert.equal(result.outcome, 'failed');
    if (result.outcome !== 'failed') return;
    assert.equal(result.failure.reason, 'rejected on all 1 attempt(s); last reason: no');
  });

  it('accepts the first candidate unverified when verification is disabled', async () => {
    const config = testConfig([profile('solo', { tiers: ['simple', 'complex'] })]);
    const solo = new ScriptedBackend([answer('SELECT count(*) FROM orders')]);
    const orchestrator = new Orchestrator({ config, pool: poolFor(config, { solo }) });
    const task = createTask('how many orders', {}, config.context.contextMaxSize);

    const result = await orchestrator.resolve(task, { verificationEnabled: false });

    assert.equal(result.outcome, 'accepted');
    if (result.outcome !== 'accepted') return;
    assert.equal(result.verdict, null);
    assert.equal(result.verified, false);
    assert.equal(result.metrics.criticCalls, 0);
    assert.equal(solo.requests.length, 1);
    assert.deepEqual(
      result.transitions.map((t) => t.to),
      ['generating', 'accepted'],
    );
  });

  it('fails when no generator has an eligible critic', async () => {
    const config = testConfig([profile('solo')]);
    const solo = new ScriptedBackend([]);
    const orchestrator = new Orchestrator({ config, pool: poolFor(config, { solo }) });
    const task = createTask('list orders', {}, config.context.contextMaxSize);

    const result = await orchestrator.resolve(task);

    assert.equal(result.outcome, 'failed');
    if (result.outcome !== 'failed') return;
    assert.equal(result.failure.kind, 'no-available-backend');
    assert.equal(result.failure.reason, 'no generator backend left for tier "simple"');
    assert.equal(solo.requests.length, 0);
  });

  it('reports backend-saturated when every generator is at its concurrency cap', async () => {
    const { config, pool, cheap } = twoModelSetup([], [], {
      pool: { perBackendConcurrency: 1, queueTimeoutMs: 20 },
    });
    const orchestrator = new Orchestrator({ config, pool });
    const task = createTask('list orders', {}, config.context.contextMaxSize);

    const held = await pool.acquire('cheap');
    try {
      const result = await orchestrator.resolve(task);
      assert.equal(result.outcome, 'failed');
      if (result.outcome !== 'failed') return;
      assert.equal(result.failure.kind, 'backend-saturated');
      assert.equal(result.attempts[0]?.generationFailures[0]?.saturated, true);
    } finally {
      held.release();
    }
    assert.equal(cheap.requests.length, 0);
    assert.equal(pool.stats('cheap').inFlight, 0);
  });

  it('stops before spending past the cost budget', async () => {
    const { config, pool, cheap } = twoModelSetup(
      [answer('SELECT 1'), answer('SELECT 2')],
      ['REJECT\nREASON: not it'],
    );
    const orchestrator = new Orchestrator({ config, pool });
    const task = createTask('list orders', {}, config.context.contextMaxSize);

    const result = await orchestrator.resolve(task, { maxCost: 1 });

    assert.equal(result.outcome, 'failed');
    if (result.outcome !== 'failed') return;
    assert.equal(result.failure.kind, 'cost-budget-exceeded');
    assert.equal(result.failure.reason, 'spent 4.000 of 1 cost units');
    assert.equal(cheap.requests.length, 1);
  });
});

// ── Cancellation ─────────────────────────────────────────────────────

describe('Orchestrator cancellation', () => {
  it('returns cancelled without calling any backend when already aborted', async () => {
    const { config, pool, cheap, judge } = twoModelSetup([], []);
    const orchestrator = new Orchestrator({ config, pool });
    const task = createTask('list orders', {}, config.context.contextMaxSize);
    const controller = new AbortController();
    controller.abort('user pressed ctrl-c');

    const result = await orchestrator.resolve(task, { signal: controller.signal });

    assert.equal(result.outcome, 'cancelled');
    if (result.outcome !== 'cancelled') return;
    assert.equal(result.reason, 'user pressed ctrl-c');
    assert.equal(cheap.requests.length, 0);
    assert.equal(judge.requests.length, 0);
  });

  it('cancels at the step boundary between generation and critique', async () => {
    const controller = new AbortController();
    const { config, pool, judge } = twoModelSetup(
      [
        () => {
          controller.abort('stop requested');
          return { text: answer('SELECT 1') };
        },
      ],
      [],
    );
    const orchestrator = new Orchestrator({ config, pool });
    const task = createTask('list orders', {}, config.context.contextMaxSize);

    const result = await orchestrator.resolve(task, { signal: controller.signal });

    assert.equal(result.outcome, 'cancelled');
    if (result.outcome !== 'cancelled') return;
    assert.equal(result.reason, 'stop requested');
    assert.equal(result.attempts[0]?.candidate?.sql, 'SELECT 1');
    assert.equal(judge.requests.length, 0);
    assert.deepEqual(
      result.transitions.map((t) => t.to),
      ['generating', 'critiquing', 'cancelled'],
    );
  });
});

// ── Metrics hand-off ─────────────────────────────────────────────────

describe('Orchestrator metrics', () => {
  it('hands every result to the collector', async () => {
    const { config, pool } = twoModelSetup([answer('SELECT 1')], ['ACCEPT']);
    const metrics = new InMemoryMetricsCollector();
    const orchestrator = new Orchestrator({ config, pool, metrics });

    const result = await orchestrator.resolve(createTask('list orders', {}, 8000));

    assert.equal(metrics.results.length, 1);
    assert.equal(metrics.results[0], result);
    assert.deepEqual(metrics.summary(), {
      runs: 1,
      accepted: 1,
      failed: 0,
      cancelled: 0,
      costUnits: 4,
    });
  });

  it('logs a collector failure as a warning and still returns the result', async () => {
    const { logger, records } = captureLogs();
    const { config, pool } = twoModelSetup([answer('SELECT 1')], ['ACCEPT']);
    const failing: MetricsCollector = {
      record: () => Promise.reject(new Error('collector down')),
    };
    const orchestrator = new Orchestrator({ config, pool, logger, metrics: failing });

    const result = await orchestrator.resolve(createTask('list orders', {}, 8000));

    assert.equal(result.outcome, 'accepted');
    const failure = records().find((r) => r.event === 'metrics_failed');
    assert.equal(failure?.level, 40);
    assert.equal(failure?.error, 'collector down');
    assert.equal(failure?.taskId, result.taskId);
  });

  it('logs the lifecycle events of an accepted run in order', async () => {
    const { logger, events } = captureLogs();
    const { config, pool } = twoModelSetup([answer('SELECT 1')], ['ACCEPT']);
    const orchestrator = new Orchestrator({ config, pool, logger });

    await orchestrator.resolve(createTask('list orders', {}, 8000));

    assert.deepEqual(events(), [
      'task_created',
      'classified',
      'generation_start',
      'candidate_ready',
      'critique_start',
      'verdict',
      'task_accepted',
    ]);
  });
});

// ── Properties ───────────────────────────────────────────────────────

describe('Orchestrator properties', () => {
  it('classifies the same task identically every time', () => {
    const { config, pool } = twoModelSetup([], []);
    const orchestrator = new Orchestrator({ config, pool });
    const task = createTask('rank customers by cumulative revenue', {}, 8000);

    assert.deepEqual(orchestrator.classify(task), orchestrator.classify(task));
  });

  it('releases every permit under fault-injected backends', async () => {
    let genCalls = 0;
    let criticCalls = 0;
    const flakyGenerator = async (): Promise<{ text: string }> => {
      genCalls++;
      await delay(1);
      if (genCalls % 3 === 0) throw new BackendError('rate-limited', 'slow down', '429');
      if (genCalls % 5 === 0) throw new Error('socket hang up');
      return { text: answer(`SELECT ${genCalls}`) };
    };
    const flakyCritic = async (): Promise<{ text: string }> => {
      criticCalls++;
      await delay(1);
      if (criticCalls % 4 === 0) throw new BackendError('timeout', 'too slow');
      return { text: criticCalls % 2 === 0 ? 'ACCEPT' : 'REJECT\nREASON: try again' };
    };

    const config = testConfig(
      [
        profile('g1', { provider: 'groq', tiers: ['simple'], costWeight: 1 }),
        profile('g2', { provider: 'together', tiers: ['simple'], costWeight: 2 }),
        profile('critic', { provider: 'openai', tiers: ['complex'], costWeight: 3 }),
      ],
      { pool: { perBackendConcurrency: 2, queueTimeoutMs: 1_000 } },
    );
    const backends = {
      g1: new ScriptedBackend([], flakyGenerator),
      g2: new ScriptedBackend([], flakyGenerator),
      critic: new ScriptedBackend([], flakyCritic),
    };
    const pool = poolFor(config, backends);
    const orchestrator = new Orchestrator({ config, pool });

    const results = await Promise.all(
      Array.from({ length: 8 }, (_, i) =>
        orchestrator.resolve(createTask(`list orders for region ${i}`, {}, 8000)),
      ),
    );

    for (const result of results) {
      assert.notEqual(result.outcome, 'cancelled');
      assertRunInvariants(result, config.orchestrator.maxAttempts);
    }
    for (const id of ['g1', 'g2', 'critic']) {
      const stats = pool.stats(id);
      assert.equal(stats.inFlight, 0, `${id} leaked a permit`);
      assert.equal(stats.queued, 0);
      assert.equal(stats.acquired, stats.released);
    }
  });
});
