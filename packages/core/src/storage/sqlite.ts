/**
 * Run history store using better-sqlite3.
 * Records every RunResult and its attempts; doubles as a MetricsCollector.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import type { MetricsCollector } from '../metrics.js';
import type { RunResult } from '../verify/types.js';

// ── Schema migrations ────────────────────────────────────────────────

const MIGRATIONS: string[] = [
  // 0: migrations table (always runs first)
  `CREATE TABLE IF NOT EXISTS migrations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    version INTEGER NOT NULL UNIQUE,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  )`,

  // 1: runs
  `CREATE TABLE IF NOT EXISTS runs (
    task_id TEXT PRIMARY KEY,
    recorded_at TEXT NOT NULL DEFAULT (datetime('now')),
    request TEXT NOT NULL,
    outcome TEXT NOT NULL,
    tier TEXT NOT NULL,
    failure_kind TEXT,
    reason TEXT,
    final_sql TEXT,
    generator_id TEXT,
    critic_id TEXT,
    attempt_count INTEGER NOT NULL,
    cost_units REAL NOT NULL,
    latency_ms REAL NOT NULL,
    result_json TEXT NOT NULL
  )`,

  // 2: attempts
  `CREATE TABLE IF NOT EXISTS attempts (
    task_id TEXT NOT NULL,
    attempt INTEGER NOT NULL,
    tier TEXT NOT NULL,
    generator_id TEXT,
    sql TEXT,
    critic_id TEXT,
    decision TEXT,
    reason TEXT,
    PRIMARY KEY (task_id, attempt),
    FOREIGN KEY (task_id) REFERENCES runs(task_id)
  )`,

  // 3: listing index
  `CREATE INDEX IF NOT EXISTS idx_runs_recorded_at ON runs (recorded_at)`,
];

// ── Row types ────────────────────────────────────────────────────────

export interface StoredRun {
  task_id: string;
  recorded_at: string;
  request: string;
  outcome: RunResult['outcome'];
  tier: string;
  failure_kind: string | null;
  reason: string | null;
  final_sql: string | null;
  generator_id: string | null;
  critic_id: string | null;
  attempt_count: number;
  cost_units: number;
  latency_ms: number;
}

export interface StoredAttempt {
  task_id: string;
  attempt: number;
  tier: string;
  generator_id: string | null;
  sql: string | null;
  critic_id: string | null;
  decision: string | null;
  reason: string | null;
}

// ── Default DB path ──────────────────────────────────────────────────

export function defaultDbPath(): string {
  return join(homedir(), '.verisql', 'verisql.db');
}

function reasonOf(result: RunResult): string | null {
  switch (result.outcome) {
    case 'accepted':
      return result.verdict?.reason ?? null;
    case 'failed':
      return result.failure.reason;
    case 'cancelled':
      return result.reason;
  }
}

// ── RunStore ─────────────────────────────────────────────────────────

export class RunStore implements MetricsCollector {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
  }

  /** Run all pending migrations */
  migrate(): void {
    this.db.exec(MIGRATIONS[0] ?? '');

    const applied = this.db
      .prepare<[], { version: number }>('SELECT version FROM migrations ORDER BY version')
      .all();
    const appliedSet = new Set(applied.map((r) => r.version));

    const insert = this.db.prepare<[number]>('INSERT INTO migrations (version) VALUES (?)');

    MIGRATIONS.forEach((sql, version) => {
      if (version > 0 && !appliedSet.has(version)) {
        this.db.exec(sql);
        insert.run(version);
      }
    });
  }

  // ── MetricsCollector ─────────────────────────────────────────────

  record(result: RunResult): void {
    const accepted = result.outcome === 'accepted' ? result : null;
    const insertRun = this.db.prepare(
      `INSERT OR REPLACE INTO runs
         (task_id, request, outcome, tier, failure_kind, reason, final_sql, generator_id,
          critic_id, attempt_count, cost_units, latency_ms, result_json)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    const insertAttempt = this.db.prepare(
      `INSERT OR REPLACE INTO attempts
         (task_id, attempt, tier, generator_id, sql, critic_id, decision, reason)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    );

    const write = this.db.transaction(() => {
      insertRun.run(
        result.taskId,
        result.request,
        result.outcome,
        result.tier,
        result.outcome === 'failed' ? result.failure.kind : null,
        reasonOf(result),
        accepted?.candidate.sql ?? null,
        accepted?.candidate.profileId ?? null,
        accepted?.verdict?.criticProfileId ?? null,
        result.attempts.length,
        result.metrics.costUnits,
        result.metrics.latencyMs,
        JSON.stringify(result),
      );
      for (const a of result.attempts) {
        insertAttempt.run(
          result.taskId,
          a.attempt,
          a.tier,
          a.candidate?.profileId ?? null,
          a.candidate?.sql ?? null,
          a.verdict?.criticProfileId ?? null,
          a.verdict?.decision ?? null,
          a.verdict?.reason ?? null,
        );
      }
    });
    write();
  }

  // ── Queries ──────────────────────────────────────────────────────

  listRuns(limit = 20): StoredRun[] {
    return this.db
      .prepare<[number], StoredRun>(
        `SELECT task_id, recorded_at, request, outcome, tier, failure_kind, reason, final_sql,
                generator_id, critic_id, attempt_count, cost_units, latency_ms
         FROM runs ORDER BY recorded_at DESC, rowid DESC LIMIT ?`,
      )
      .all(limit);
  }

  getRun(taskId: string): { run: StoredRun; attempts: StoredAttempt[] } | undefined {
    const run = this.db
      .prepare<[string], StoredRun>(
        `SELECT task_id, recorded_at, request, outcome, tier, failure_kind, reason, final_sql,
                generator_id, critic_id, attempt_count, cost_units, latency_ms
         FROM runs WHERE task_id = ?`,
      )
      .get(taskId);
    if (!run) return undefined;
    const attempts = this.db
      .prepare<[string], StoredAttempt>('SELECT * FROM attempts WHERE task_id = ? ORDER BY attempt')
      .all(taskId);
    return { run, attempts };
  }

  /** Full task id for a unique prefix, as printed by `history list`. */
  resolveTaskId(prefix: string): string | undefined {
    const matches = this.db
      .prepare<[string], { task_id: string }>("SELECT task_id FROM runs WHERE task_id LIKE ? || '%' LIMIT 2")
      .all(prefix);
    return matches.length === 1 ? matches[0]?.task_id : undefined;
  }

  // ── Lifecycle ────────────────────────────────────────────────────

  close(): void {
    this.db.close();
  }
}
