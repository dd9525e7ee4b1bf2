/**
 * Context supplier contract and deterministic context fitting.
 */

import { sanitizeForPrompt } from '../llm/sanitize.js';

export type ContextKind = 'schema' | 'doc' | 'turn';

export interface ContextItem {
  readonly kind: ContextKind;
  /** Where the item came from, e.g. `table:public.orders` */
  readonly source: string;
  readonly content: string;
  /** Higher is more relevant */
  readonly relevance: number;
}

/** Supplies ranked context for a request. Implemented outside the core. */
export interface ContextSupplier {
  supply(text: string): ContextItem[] | Promise<ContextItem[]>;
}

export interface FittedContext {
  /** Kept items, most relevant first */
  items: ContextItem[];
  /** Sources of items that did not fit */
  dropped: string[];
  /** Characters of content kept */
  size: number;
}

/**
 * Keep items in descending relevance (ties keep input order) while they
 * fit into `maxChars`. An item too large for the remaining budget is
 * dropped and smaller, less relevant ones may still be kept.
 */
export function fitContext(items: readonly ContextItem[], maxChars: number): FittedContext {
  const ranked = items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => b.item.relevance - a.item.relevance || a.index - b.index);

  const kept: ContextItem[] = [];
  const dropped: string[] = [];
  let size = 0;
  for (const { item } of ranked) {
    if (size + item.content.length <= maxChars) {
      kept.push(item);
      size += item.content.length;
    } else {
      dropped.push(item.source);
    }
  }
  return { items: kept, dropped, size };
}

const SECTION_TITLES: Record<ContextKind, string> = {
  schema: '-- Database Schema (relevant subset)',
  doc: '-- Documentation',
  turn: '-- Conversation so far',
};

/** Render fitted items as prompt text, one section per kind. */
export function renderContext(items: readonly ContextItem[]): string {
  const sections: string[] = [];
  for (const kind of ['schema', 'doc', 'turn'] as const) {
    const ofKind = items.filter((item) => item.kind === kind);
    if (ofKind.length === 0) continue;
    const body = ofKind.map((item) =>
      kind === 'schema' ? item.content : `[${item.source}]\n${sanitizeForPrompt(item.content)}`,
    );
    sections.push([SECTION_TITLES[kind], '', ...body].join('\n'));
  }
  return sections.join('\n\n');
}
