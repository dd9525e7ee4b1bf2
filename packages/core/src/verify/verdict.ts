/**
 * Critic reply grammar.
 *
 *   verdict         = token-line *( reason-line / confidence-line / issue-line / other-line )
 *   token-line      = *WSP ( "ACCEPT" / "REJECT" ) *WSP     ; first non-blank line
 *   reason-line     = "REASON:" text                        ; required for REJECT
 *   confidence-line = "CONFIDENCE:" number                  ; 0.0 .. 1.0, optional
 *   issue-line      = "-" text
 *
 * Tokens and labels are case-sensitive. Other lines are ignored. Anything
 * that does not fit is unparseable and must be treated as a rejection.
 */

import type { VerdictDecision } from './types.js';

export interface ParsedVerdict {
  decision: VerdictDecision;
  reason: string | null;
  confidence: number | null;
  issues: string[];
}

export type VerdictParse = { ok: true; verdict: ParsedVerdict } | { ok: false; error: string };

const TOKEN_RE = /^(ACCEPT|REJECT)$/;
const REASON_RE = /^REASON:\s*(.*)$/;
const CONFIDENCE_RE = /^CONFIDENCE:\s*(.*)$/;
const ISSUE_RE = /^-\s*(.*)$/;
const NUMBER_RE = /^\d+(\.\d+)?$|^\.\d+$/;

export function parseVerdict(text: string): VerdictParse {
  const lines = text.split(/\r?\n/).map((line) => line.trim());
  const first = lines.findIndex((line) => line.length > 0);
  if (first === -1) {
    return { ok: false, error: 'empty reply' };
  }

  const tokenLine = lines[first] ?? '';
  const token = TOKEN_RE.exec(tokenLine);
  if (!token) {
    return { ok: false, error: `first line is not ACCEPT or REJECT: "${tokenLine.slice(0, 80)}"` };
  }
  const decision: VerdictDecision = token[1] === 'ACCEPT' ? 'accept' : 'reject';

  let reason: string | null = null;
  let confidence: number | null = null;
  const issues: string[] = [];

  for (const line of lines.slice(first + 1)) {
    const reasonMatch = REASON_RE.exec(line);
    if (reasonMatch) {
      if (reason !== null) {
        return { ok: false, error: 'more than one REASON line' };
      }
      reason = (reasonMatch[1] ?? '').trim() || null;
      continue;
    }
    const confidenceMatch = CONFIDENCE_RE.exec(line);
    if (confidenceMatch) {
      if (confidence !== null) {
        return { ok: false, error: 'more than one CONFIDENCE line' };
      }
      const raw = (confidenceMatch[1] ?? '').trim();
      const value = NUMBER_RE.test(raw) ? Number(raw) : NaN;
      if (!(value >= 0 && value <= 1)) {
        return { ok: false, error: `confidence out of range: "${raw}"` };
      }
      confidence = value;
      continue;
    }
    const issueMatch = ISSUE_RE.exec(line);
    if (issueMatch) {
      const issue = (issueMatch[1] ?? '').trim();
      if (issue) issues.push(issue);
    }
  }

  if (decision === 'reject' && reason === null) {
    return { ok: false, error: 'REJECT without a REASON line' };
  }

  return { ok: true, verdict: { decision, reason, confidence, issues } };
}
