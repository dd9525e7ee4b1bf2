/**
 * Static inspection tests: statement classification and the findings
 * handed to the critic.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { classifyStatement } from '../classify.js';
import { formatFindings, inspectSql } from '../inspect.js';
import { parseSql, parserDatabase } from '../parse.js';

// ── Parsing ──────────────────────────────────────────────────────────

describe('parseSql', () => {
  it('parses a CTE as a select', () => {
    const result = parseSql('WITH cte AS (SELECT 1) SELECT * FROM cte;');
    assert.equal(result.ok, true);
    if (result.ok) {
      assert.equal(result.kind, 'select');
      assert.equal(result.statementCount, 1);
      assert.equal(result.normalizedSql, 'WITH cte AS (SELECT 1) SELECT * FROM cte');
    }
  });

  it('returns an error for empty SQL', () => {
    assert.deepEqual(parseSql('  ;  '), { ok: false, error: 'Empty SQL statement' });
  });

  it('maps dialect names to parser databases', () => {
    assert.equal(parserDatabase('MySQL'), 'MySQL');
    assert.equal(parserDatabase('sqlite'), 'Sqlite');
    assert.equal(parserDatabase(null), 'PostgresQL');
    assert.equal(parserDatabase('cobol'), 'PostgresQL');
  });
});

// ── Classification ───────────────────────────────────────────────────

describe('classifyStatement', () => {
  it('classifies a SELECT as a read on its tables', () => {
    const info = classifyStatement('SELECT id, name FROM users WHERE id = 1');
    assert.equal(info.classification, 'read');
    assert.deepEqual(info.impactedTables, ['users']);
    assert.equal(info.summary, 'SELECT on users');
  });

  it('classifies a DELETE with WHERE as a write', () => {
    const info = classifyStatement('DELETE FROM users WHERE id = 1');
    assert.equal(info.classification, 'write');
    assert.equal(info.hasWhereClause, true);
  });

  it('detects privilege changes from the leading keyword', () => {
    const info = classifyStatement('revoke select on users from analyst');
    assert.equal(info.classification, 'dangerous');
    assert.equal(info.summary, 'REVOKE statement (privilege change)');
  });
});

// ── Findings ─────────────────────────────────────────────────────────

describe('inspectSql', () => {
  it('has no findings for a plain SELECT', () => {
    assert.deepEqual(inspectSql('SELECT id, name FROM users WHERE id = 1').findings, []);
  });

  it('flags more than one statement', () => {
    assert.deepEqual(inspectSql('SELECT 1; SELECT 2').findings, [
      {
        rule: 'multiple_statements',
        severity: 'danger',
        message: '2 statements found; a single statement is expected',
      },
    ]);
  });

  it('flags destructive statements', () => {
    const { findings } = inspectSql('DROP TABLE users');
    assert.equal(findings.length, 1);
    assert.equal(findings[0]?.rule, 'destructive_statement');
    assert.match(findings[0]?.message ?? '', /^DROP.*destructive/);
  });

  it('flags an UPDATE without WHERE as a write touching every row', () => {
    const { findings } = inspectSql("UPDATE users SET name = 'x'");
    assert.deepEqual(findings, [
      { rule: 'write_statement', severity: 'warning', message: 'UPDATE modifies data' },
      {
        rule: 'missing_where',
        severity: 'danger',
        message: 'UPDATE on users (no WHERE clause: affects all rows)',
      },
    ]);
  });

  it('flags functions that reach outside the query', () => {
    const { findings } = inspectSql('SELECT pg_sleep(5)');
    assert.equal(findings.length, 1);
    assert.equal(findings[0]?.rule, 'dangerous_function');
    assert.equal(findings[0]?.message, 'function "pg_sleep" is not expected in a generated query');
  });

  it('reports privilege changes without parsing them', () => {
    assert.deepEqual(inspectSql('GRANT ALL ON users TO analyst').findings, [
      { rule: 'destructive_statement', severity: 'danger', message: 'GRANT statement (privilege change)' },
    ]);
  });

  it('turns a parse failure into a warning', () => {
    const { findings } = inspectSql('SELEC id FROM');
    assert.equal(findings.length, 1);
    assert.equal(findings[0]?.rule, 'parse_error');
    assert.equal(findings[0]?.severity, 'warning');
    assert.ok(findings[0]?.message.startsWith('SQL parse error:'));
  });
});

describe('formatFindings', () => {
  it('renders one line per finding', () => {
    assert.equal(formatFindings([]), '(none)');
    assert.equal(
      formatFindings([
        { rule: 'write_statement', severity: 'warning', message: 'UPDATE modifies data' },
        { rule: 'missing_where', severity: 'danger', message: 'UPDATE on users' },
      ]),
      '- [warning] write_statement: UPDATE modifies data\n- [danger] missing_where: UPDATE on users',
    );
  });
});
