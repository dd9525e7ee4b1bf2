/**
 * Static inspection of a candidate query. Findings are evidence for the
 * critic model; they do not decide the verdict on their own.
 */

import { isRecord } from '../guards.js';
import { classifyStatement, type StatementInfo } from './classify.js';
import { parseSql } from './parse.js';

export type FindingSeverity = 'info' | 'warning' | 'danger';

export type FindingRule =
  | 'parse_error'
  | 'multiple_statements'
  | 'write_statement'
  | 'destructive_statement'
  | 'missing_where'
  | 'dangerous_function';

export interface Finding {
  rule: FindingRule;
  severity: FindingSeverity;
  message: string;
}

export interface Inspection {
  statement: StatementInfo;
  findings: Finding[];
}

export const DANGEROUS_FUNCTIONS = new Set([
  'pg_sleep',
  'pg_terminate_backend',
  'pg_cancel_backend',
  'lo_import',
  'lo_export',
  'lo_unlink',
  'dblink',
  'dblink_exec',
  'pg_read_file',
  'pg_read_binary_file',
  'pg_write_file',
  'pg_ls_dir',
  'pg_stat_file',
  'sleep',
  'benchmark',
  'load_file',
]);

export function inspectSql(sql: string, dialect?: string | null): Inspection {
  const statement = classifyStatement(sql, dialect);
  const findings: Finding[] = [];

  if (statement.classification === 'dangerous') {
    findings.push({
      rule: 'destructive_statement',
      severity: 'danger',
      message: statement.summary,
    });
    return { statement, findings };
  }

  const parsed = parseSql(sql, dialect);
  if (!parsed.ok) {
    findings.push({ rule: 'parse_error', severity: 'warning', message: parsed.error });
    return { statement, findings };
  }

  if (parsed.statementCount > 1) {
    findings.push({
      rule: 'multiple_statements',
      severity: 'danger',
      message: `${parsed.statementCount} statements found; a single statement is expected`,
    });
  }

  if (statement.classification === 'write') {
    findings.push({
      rule: 'write_statement',
      severity: 'warning',
      message: `${statement.kind.toUpperCase()} modifies data`,
    });
  }

  if (!statement.hasWhereClause) {
    findings.push({ rule: 'missing_where', severity: 'danger', message: statement.summary });
  }

  for (const fn of findDangerousFunctions(parsed.ast)) {
    findings.push({
      rule: 'dangerous_function',
      severity: 'danger',
      message: `function "${fn}" is not expected in a generated query`,
    });
  }

  return { statement, findings };
}

export function formatFindings(findings: readonly Finding[]): string {
  if (findings.length === 0) return '(none)';
  return findings.map((f) => `- [${f.severity}] ${f.rule}: ${f.message}`).join('\n');
}

// ── AST walking ──────────────────────────────────────────────────────

/** Function name from either node-sql-parser shape: a string or `{ name: [{ value }] }`. */
function functionName(node: Record<string, unknown>): string | null {
  const name = node.name;
  if (typeof name === 'string') return name;
  if (isRecord(name) && Array.isArray(name.name)) {
    const parts = name.name
      .map((part: unknown) => (isRecord(part) && typeof part.value === 'string' ? part.value : null))
      .filter((p): p is string => p !== null);
    return parts.length > 0 ? parts.join('.') : null;
  }
  return null;
}

function walkAst(node: unknown, visitor: (n: Record<string, unknown>) => void): void {
  if (Array.isArray(node)) {
    for (const item of node) walkAst(item, visitor);
    return;
  }
  if (!isRecord(node)) return;
  visitor(node);
  for (const value of Object.values(node)) {
    walkAst(value, visitor);
  }
}

function findDangerousFunctions(ast: Record<string, unknown>): string[] {
  const found: string[] = [];
  walkAst(ast, (node) => {
    if (node.type !== 'function' && node.type !== 'aggr_func') return;
    const name = functionName(node);
    if (name && DANGEROUS_FUNCTIONS.has(name.toLowerCase())) {
      found.push(name);
    }
  });
  return found;
}
