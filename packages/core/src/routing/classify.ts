/**
 * Task complexity classifier (weighted signals).
 *
 * Scores a request across a handful of cheap lexical and size signals and
 * maps the weighted sum to a tier. No model call is made: the point of
 * classifying is to avoid spending the expensive tier on easy requests.
 */

import type { ClassifierConfig } from '../config/types.js';
import type { ComplexityTier } from './types.js';

export type SignalName =
  | 'length'
  | 'aggregation'
  | 'join'
  | 'analytic'
  | 'write'
  | 'ambiguity'
  | 'context';

export interface SignalScore {
  name: SignalName;
  /** Strength in [0, 1] before weighting */
  strength: number;
  /** Human-readable trigger, null when the signal did not fire */
  detail: string | null;
}

export interface ClassificationResult {
  tier: ComplexityTier;
  score: number;
  signals: SignalScore[];
  /** True when the input could not be classified and the fail-safe tier was used */
  defaulted: boolean;
}

/** The parts of a task the classifier looks at. */
export interface ClassifierInput {
  text: string;
  contextChars: number;
  schemaItems: number;
}

// ── Signal scorers ───────────────────────────────────────────────────

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function matchKeywords(text: string, keywords: readonly string[]): string[] {
  return keywords.filter((kw) => new RegExp(`\\b${escapeRegExp(kw.toLowerCase())}\\b`).test(text));
}

function scoreKeywords(
  name: SignalName,
  text: string,
  keywords: readonly string[],
  thresholds: { low: number; high: number },
  strengths: { low: number; high: number },
): SignalScore {
  const matches = matchKeywords(text, keywords);
  const detail = `${name} (${matches.slice(0, 3).join(', ')})`;
  if (matches.length >= thresholds.high) {
    return { name, strength: strengths.high, detail };
  }
  if (matches.length >= thresholds.low) {
    return { name, strength: strengths.low, detail };
  }
  return { name, strength: 0, detail: null };
}

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

function scoreLength(text: string, longRequestTokens: number): SignalScore {
  const tokens = estimateTokens(text);
  if (tokens > longRequestTokens) {
    return { name: 'length', strength: 1, detail: `long (${tokens} tokens)` };
  }
  if (tokens > longRequestTokens / 2) {
    return { name: 'length', strength: 0.5, detail: `medium (${tokens} tokens)` };
  }
  return { name: 'length', strength: 0, detail: null };
}

function scoreContext(input: ClassifierInput, config: ClassifierConfig): SignalScore {
  if (input.contextChars > config.largeContextChars) {
    return { name: 'context', strength: 1, detail: `large context (${input.contextChars} chars)` };
  }
  if (input.schemaItems > config.manyTables) {
    return { name: 'context', strength: 1, detail: `many tables (${input.schemaItems})` };
  }
  return { name: 'context', strength: 0, detail: null };
}

// ── Main classifier ──────────────────────────────────────────────────

/** True when the text carries nothing the signals could read. */
export function isUnclassifiable(text: string): boolean {
  return !/[\p{L}\p{N}]/u.test(text);
}

export function classifyTask(input: ClassifierInput, config: ClassifierConfig): ClassificationResult {
  if (isUnclassifiable(input.text)) {
    return { tier: 'complex', score: 0, signals: [], defaulted: true };
  }

  const text = input.text.toLowerCase();
  const { keywords, weights } = config;

  const signals: SignalScore[] = [
    scoreLength(input.text, config.longRequestTokens),
    scoreKeywords('aggregation', text, keywords.aggregation, { low: 1, high: 2 }, { low: 0.5, high: 1 }),
    scoreKeywords('join', text, keywords.join, { low: 1, high: 2 }, { low: 0.6, high: 1 }),
    scoreKeywords('analytic', text, keywords.analytic, { low: 1, high: 1 }, { low: 1, high: 1 }),
    scoreKeywords('write', text, keywords.write, { low: 1, high: 1 }, { low: 1, high: 1 }),
    scoreKeywords('ambiguity', text, keywords.ambiguity, { low: 1, high: 2 }, { low: 0.5, high: 1 }),
    scoreContext(input, config),
  ];

  const raw = signals.reduce((sum, s) => sum + weights[s.name] * s.strength, 0);
  // Round away float noise so the same input always lands on the same side of the boundary.
  const score = Math.round(raw * 1000) / 1000;
  const tier: ComplexityTier = score >= config.complexThreshold ? 'complex' : 'simple';

  return { tier, score, signals: signals.filter((s) => s.strength > 0), defaulted: false };
}
