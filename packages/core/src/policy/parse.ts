/**
 * AST-based SQL parsing for candidate inspection.
 * Uses node-sql-parser; the dialect follows the task's dialect when known.
 */

import pkg from 'node-sql-parser';
import { isRecord } from '../guards.js';

const { Parser } = pkg;

const parser = new Parser();

export type SqlKind =
  | 'select'
  | 'insert'
  | 'replace'
  | 'update'
  | 'delete'
  | 'create'
  | 'alter'
  | 'drop'
  | 'truncate'
  | 'unknown';

const KNOWN_KINDS: readonly SqlKind[] = [
  'select',
  'insert',
  'replace',
  'update',
  'delete',
  'create',
  'alter',
  'drop',
  'truncate',
];

const PARSER_DATABASES: Record<string, string> = {
  postgres: 'PostgresQL',
  postgresql: 'PostgresQL',
  mysql: 'MySQL',
  mariadb: 'MariaDB',
  sqlite: 'Sqlite',
  bigquery: 'BigQuery',
  snowflake: 'Snowflake',
  redshift: 'Redshift',
  transactsql: 'TransactSQL',
  mssql: 'TransactSQL',
};

export interface ParseResult {
  /** First statement's AST */
  ast: Record<string, unknown>;
  statementCount: number;
  kind: SqlKind;
  /** Input with trailing semicolons stripped */
  normalizedSql: string;
}

export type ParseOutcome = ({ ok: true } & ParseResult) | { ok: false; error: string };

export function parserDatabase(dialect: string | null | undefined): string {
  return PARSER_DATABASES[(dialect ?? '').toLowerCase()] ?? 'PostgresQL';
}

function isKnownKind(s: string): s is SqlKind {
  return KNOWN_KINDS.some((k) => k === s);
}

/**
 * Parse a SQL string into an AST. Returns a structured result or a parse error.
 */
export function parseSql(sql: string, dialect?: string | null): ParseOutcome {
  const normalizedSql = sql.trim().replace(/;+\s*$/, '');

  if (!normalizedSql) {
    return { ok: false, error: 'Empty SQL statement' };
  }

  try {
    const astResult: unknown = parser.astify(normalizedSql, { database: parserDatabase(dialect) });
    const statements = (Array.isArray(astResult) ? astResult : [astResult]).filter(isRecord);

    const first = statements[0];
    if (!first) {
      return { ok: false, error: 'No statements found' };
    }

    const rawKind = typeof first.type === 'string' ? first.type.toLowerCase() : '';
    return {
      ok: true,
      ast: first,
      statementCount: statements.length,
      kind: isKnownKind(rawKind) ? rawKind : 'unknown',
      normalizedSql,
    };
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `SQL parse error: ${msg}` };
  }
}
