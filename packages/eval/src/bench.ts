import { performance } from 'node:perf_hooks';
import { pathToFileURL } from 'node:url';
import {
  classifyTask,
  defaultConfig,
  fitContext,
  inspectSql,
  parseAnswer,
  parseVerdict,
  type ContextItem,
} from '@verisql/core';

export interface BenchSummary {
  name: string;
  p50: number;
  p95: number;
  n: number;
}

export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const idx = Math.min(sorted.length - 1, Math.floor((p / 100) * sorted.length));
  return sorted[idx] ?? 0;
}

export function summarize(name: string, samples: readonly number[]): BenchSummary {
  return { name, p50: percentile(samples, 50), p95: percentile(samples, 95), n: samples.length };
}

export function formatSummary(s: BenchSummary): string {
  return `${s.name}: p50=${s.p50.toFixed(3)}ms p95=${s.p95.toFixed(3)}ms n=${s.n}`;
}

/** Time `fn` once per input, cycling through the inputs. */
export function sample<T>(inputs: readonly T[], iterations: number, fn: (input: T) => unknown): number[] {
  const samples: number[] = [];
  for (let i = 0; i < iterations; i++) {
    const input = inputs[i % inputs.length];
    if (input === undefined) break;
    const start = performance.now();
    fn(input);
    samples.push(performance.now() - start);
  }
  return samples;
}

// ── Workloads ────────────────────────────────────────────────────────

const REQUESTS = [
  'list all active users',
  'total revenue per region for the last quarter',
  'rank customers by cumulative revenue and join orders with payments',
  'delete sessions that expired more than 30 days ago',
];

const CANDIDATES = [
  'SELECT id, email FROM users WHERE is_active = true ORDER BY id',
  "SELECT u.email, SUM(o.total_cents) AS total_spent FROM users u JOIN orders o ON o.user_id = u.id WHERE o.status = 'paid' GROUP BY u.email ORDER BY total_spent DESC LIMIT 10",
  "DELETE FROM sessions WHERE expires_at < now() - interval '30 days'",
];

const VERDICTS = [
  'ACCEPT\nREASON: matches the request\nCONFIDENCE: 0.9',
  'REJECT\nREASON: joins on the wrong key\n- orders.id is compared with payments.id\n- totals double count refunds',
  'Looks fine to me.',
];

const ANSWERS = [
  JSON.stringify({ sql: CANDIDATES[0], explanation: 'Active users.', assumptions: [] }),
  '```sql\nSELECT 1;\n```',
];

function contextItems(count: number): ContextItem[] {
  return Array.from({ length: count }, (_, i) => ({
    kind: 'schema' as const,
    source: `table:t${i}`,
    content: `TABLE t${i}\n  id integer NOT NULL PK\n  name text NULL`.repeat(1 + (i % 4)),
    relevance: (i * 7) % 13,
  }));
}

export function runBenchmarks(): BenchSummary[] {
  const config = defaultConfig();
  const items = contextItems(200);
  return [
    summarize(
      'classify',
      sample(REQUESTS, 2000, (text) =>
        classifyTask({ text, contextChars: 0, schemaItems: 0 }, config.classifier),
      ),
    ),
    summarize('verdict parse', sample(VERDICTS, 2000, parseVerdict)),
    summarize('answer parse', sample(ANSWERS, 2000, parseAnswer)),
    summarize('static inspection', sample(CANDIDATES, 400, (sql) => inspectSql(sql))),
    summarize(
      'context fit (200 items)',
      sample([items], 200, (all) => fitContext(all, config.context.contextMaxSize)),
    ),
  ];
}

function main(): void {
  console.log('verisql benchmark suite');
  console.log('All timings are local-process latency; no model is called.');
  for (const summary of runBenchmarks()) {
    console.log(formatSummary(summary));
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main();
}
