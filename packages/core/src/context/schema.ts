/**
 * Schema retrieval heuristic: turns a schema snapshot (plus optional docs
 * and conversation turns) into ranked context items for one request.
 */

import _Ajv from 'ajv';
import type { ContextItem, ContextSupplier } from './supplier.js';

const Ajv = _Ajv.default;

export interface ColumnInfo {
  name: string;
  dataType: string;
  nullable?: boolean;
  isPrimaryKey?: boolean;
}

export interface TableInfo {
  name: string;
  schema?: string;
  columns: ColumnInfo[];
  rowCountEstimate?: number;
}

export interface SchemaSnapshot {
  tables: TableInfo[];
}

export interface DocumentSnippet {
  source: string;
  content: string;
  relevance?: number;
}

export interface SchemaSupplierOpts {
  maxColumnsPerTable?: number;
  docs?: DocumentSnippet[];
  turns?: string[];
}

// ── Input validation ─────────────────────────────────────────────────

const snapshotSchema = {
  type: 'object' as const,
  properties: {
    tables: {
      type: 'array' as const,
      items: {
        type: 'object' as const,
        properties: {
          name: { type: 'string' as const, minLength: 1 },
          schema: { type: 'string' as const },
          columns: {
            type: 'array' as const,
            items: {
              type: 'object' as const,
              properties: {
                name: { type: 'string' as const, minLength: 1 },
                dataType: { type: 'string' as const },
                nullable: { type: 'boolean' as const },
                isPrimaryKey: { type: 'boolean' as const },
              },
              required: ['name', 'dataType'] as const,
            },
          },
          rowCountEstimate: { type: 'number' as const },
        },
        required: ['name', 'columns'] as const,
      },
    },
  },
  required: ['tables'] as const,
};

const docsSchema = {
  type: 'array' as const,
  items: {
    type: 'object' as const,
    properties: {
      source: { type: 'string' as const, minLength: 1 },
      content: { type: 'string' as const },
      relevance: { type: 'number' as const },
    },
    required: ['source', 'content'] as const,
  },
};

const ajv = new Ajv({ allErrors: true });
const validateSnapshot = ajv.compile<SchemaSnapshot>(snapshotSchema);
const validateDocs = ajv.compile<DocumentSnippet[]>(docsSchema);

function formatErrors(errors: typeof validateSnapshot.errors): string {
  return (errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`).join('; ');
}

export function parseSchemaSnapshot(raw: unknown): SchemaSnapshot {
  if (!validateSnapshot(raw)) {
    throw new Error(`Invalid schema snapshot: ${formatErrors(validateSnapshot.errors)}`);
  }
  return raw;
}

export function parseDocuments(raw: unknown): DocumentSnippet[] {
  if (!validateDocs(raw)) {
    throw new Error(`Invalid documents: ${formatErrors(validateDocs.errors)}`);
  }
  return raw;
}

// ── Scoring ──────────────────────────────────────────────────────────

/**
 * Tokenize a string: lowercase, split on non-alphanumeric (keeping underscores).
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9_]+/)
    .filter((t) => t.length > 1);
}

/**
 * Score how well a name matches the question tokens.
 * Supports matching against underscore-separated parts too.
 */
export function scoreMatch(name: string, tokens: string[]): number {
  const lower = name.toLowerCase();
  const parts = lower.split('_').filter((p) => p.length > 0);
  let score = 0;
  for (const token of tokens) {
    if (lower === token) {
      score += 10;
    } else if (lower.includes(token)) {
      score += 5;
    } else if (parts.some((p) => p === token)) {
      score += 7;
    } else if (parts.some((p) => p.includes(token) || token.includes(p))) {
      score += 3;
    }
  }
  return score;
}

function tableName(t: TableInfo): string {
  return t.schema ? `${t.schema}.${t.name}` : t.name;
}

function scoreTable(table: TableInfo, tokens: string[]): { score: number; columnScores: number[] } {
  let score = scoreMatch(tableName(table), tokens);
  if (table.schema) {
    score += scoreMatch(table.schema, tokens);
  }
  const columnScores = table.columns.map((col) => scoreMatch(col.name, tokens));
  // Boost by the best three column matches
  const boost = [...columnScores]
    .sort((a, b) => b - a)
    .slice(0, 3)
    .reduce((sum, s) => sum + s, 0);
  return { score: score + boost, columnScores };
}

function renderTable(table: TableInfo, columnScores: number[], maxCols: number): string {
  const lines = [`TABLE ${tableName(table)}`];
  const cols = table.columns
    .map((col, i) => ({ col, score: columnScores[i] ?? 0 }))
    .sort((a, b) => {
      const aPk = a.col.isPrimaryKey ?? false;
      const bPk = b.col.isPrimaryKey ?? false;
      if (aPk !== bPk) return aPk ? -1 : 1;
      if (b.score !== a.score) return b.score - a.score;
      return a.col.name.localeCompare(b.col.name);
    })
    .slice(0, maxCols);

  for (const { col } of cols) {
    const pk = col.isPrimaryKey ? ' PK' : '';
    const nullable = col.nullable === false ? ' NOT NULL' : ' NULL';
    lines.push(`  ${col.name} ${col.dataType}${nullable}${pk}`);
  }
  if (table.rowCountEstimate !== undefined) {
    lines.push(`  -- ~${table.rowCountEstimate} rows`);
  }
  return lines.join('\n');
}

/**
 * One context item per table, ranked by token overlap with the request.
 */
export function schemaContextItems(
  text: string,
  snapshot: SchemaSnapshot,
  maxColumnsPerTable = 20,
): ContextItem[] {
  const tokens = tokenize(text);
  return snapshot.tables.map((table) => {
    const { score, columnScores } = scoreTable(table, tokens);
    return {
      kind: 'schema' as const,
      source: `table:${tableName(table)}`,
      content: renderTable(table, columnScores, maxColumnsPerTable),
      relevance: score,
    };
  });
}

export class SchemaSnapshotSupplier implements ContextSupplier {
  private readonly snapshot: SchemaSnapshot;
  private readonly opts: SchemaSupplierOpts;

  constructor(snapshot: SchemaSnapshot, opts: SchemaSupplierOpts = {}) {
    this.snapshot = snapshot;
    this.opts = opts;
  }

  supply(text: string): ContextItem[] {
    const tokens = tokenize(text);
    const items = schemaContextItems(text, this.snapshot, this.opts.maxColumnsPerTable);

    for (const doc of this.opts.docs ?? []) {
      const docTokens = new Set(tokenize(doc.content));
      items.push({
        kind: 'doc',
        source: doc.source,
        content: doc.content,
        relevance: doc.relevance ?? tokens.filter((t) => docTokens.has(t)).length,
      });
    }

    const turns = this.opts.turns ?? [];
    turns.forEach((turn, index) => {
      // Later turns rank higher
      items.push({ kind: 'turn', source: `turn:${index + 1}`, content: turn, relevance: index + 1 });
    });

    return items;
  }
}
