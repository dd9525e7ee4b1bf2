/**
 * Statement classifier: read / write / dangerous, impacted tables and
 * WHERE clause presence for a candidate query.
 */

import { isRecord } from '../guards.js';
import { parseSql, type SqlKind } from './parse.js';

export type StatementClassification = 'read' | 'write' | 'dangerous';

export interface StatementInfo {
  classification: StatementClassification;
  kind: SqlKind;
  impactedTables: string[];
  hasWhereClause: boolean;
  summary: string;
}

const WRITE_KINDS: SqlKind[] = ['insert', 'replace', 'update', 'delete', 'create', 'alter'];
const DANGEROUS_KINDS: SqlKind[] = ['drop', 'truncate'];

// GRANT/REVOKE may not parse via node-sql-parser; detect via text
const PRIVILEGE_KEYWORDS_RE = /^\s*(GRANT|REVOKE)\b/i;

export function classifyStatement(sql: string, dialect?: string | null): StatementInfo {
  const privilege = PRIVILEGE_KEYWORDS_RE.exec(sql);
  if (privilege) {
    const keyword = (privilege[1] ?? 'GRANT').toUpperCase();
    return {
      classification: 'dangerous',
      kind: 'unknown',
      impactedTables: [],
      hasWhereClause: false,
      summary: `${keyword} statement (privilege change)`,
    };
  }

  const parsed = parseSql(sql, dialect);
  if (!parsed.ok) {
    return {
      classification: 'read',
      kind: 'unknown',
      impactedTables: [],
      hasWhereClause: false,
      summary: 'Unparseable statement',
    };
  }

  const { kind, ast } = parsed;
  let classification: StatementClassification = 'read';
  if (DANGEROUS_KINDS.includes(kind)) {
    classification = 'dangerous';
  } else if (WRITE_KINDS.includes(kind)) {
    classification = 'write';
  }

  const impactedTables = extractTables(ast, kind);
  const hasWhereClause = detectWhereClause(ast, kind);
  const summary = buildSummary(kind, classification, impactedTables, hasWhereClause);
  return { classification, kind, impactedTables, hasWhereClause, summary };
}

// ── AST helpers ──────────────────────────────────────────────────────

function tableRef(node: unknown): string | null {
  if (typeof node === 'string') return node;
  if (!isRecord(node) || typeof node.table !== 'string') return null;
  return typeof node.db === 'string' && node.db ? `${node.db}.${node.table}` : node.table;
}

function collectRefs(value: unknown): string[] {
  const list = Array.isArray(value) ? value : [value];
  return list.map(tableRef).filter((t): t is string => t !== null);
}

function extractTables(ast: Record<string, unknown>, kind: SqlKind): string[] {
  const tables: string[] = [];
  switch (kind) {
    case 'select':
      tables.push(...collectRefs(ast.from));
      break;
    case 'delete':
      tables.push(...collectRefs(ast.from), ...collectRefs(ast.table));
      break;
    case 'insert':
    case 'replace':
    case 'update':
      tables.push(...collectRefs(ast.table));
      break;
    case 'create':
    case 'alter':
    case 'drop':
    case 'truncate':
      // DDL shapes put the table under `table` or `name`
      tables.push(...collectRefs(ast.table), ...collectRefs(ast.name));
      break;
    case 'unknown':
      break;
  }
  return [...new Set(tables)];
}

function detectWhereClause(ast: Record<string, unknown>, kind: SqlKind): boolean {
  if (kind !== 'update' && kind !== 'delete') return true;
  return ast.where !== null && ast.where !== undefined;
}

function buildSummary(
  kind: SqlKind,
  classification: StatementClassification,
  tables: string[],
  hasWhere: boolean,
): string {
  const tableStr = tables.length > 0 ? ` on ${tables.join(', ')}` : '';
  const kindUpper = kind.toUpperCase();

  if (classification === 'dangerous') {
    return `${kindUpper}${tableStr} (destructive: may cause irreversible data loss)`;
  }
  if ((kind === 'update' || kind === 'delete') && !hasWhere) {
    return `${kindUpper}${tableStr} (no WHERE clause: affects all rows)`;
  }
  return `${kindUpper}${tableStr}`;
}
