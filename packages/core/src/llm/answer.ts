/**
 * Parse a generator reply into SQL plus rationale.
 *
 * The JSON answer format is preferred. Models that ignore it still yield a
 * candidate: SQL is taken from a ```sql fence, or the whole reply is used.
 */

import _Ajv from 'ajv';
import { generatedAnswerSchema } from './schema_json.js';
import type { GeneratedAnswer, ParsedAnswer } from './types.js';

const Ajv = _Ajv.default;
const ajv = new Ajv({ allErrors: true });
const validateAnswer = ajv.compile<GeneratedAnswer>(generatedAnswerSchema);

/**
 * Extract JSON from a string that may contain markdown fences or extra text.
 */
export function extractJson(text: string): string | null {
  const fenceMatch = text.match(/```(?:json)?[ \t]*\n([\s\S]*?)```/);
  if (fenceMatch?.[1] !== undefined && fenceMatch[1].trim().startsWith('{')) {
    return fenceMatch[1].trim();
  }
  const braceStart = text.indexOf('{');
  const braceEnd = text.lastIndexOf('}');
  if (braceStart !== -1 && braceEnd > braceStart) {
    return text.slice(braceStart, braceEnd + 1);
  }
  return null;
}

function tryStructured(text: string): ParsedAnswer | null {
  const json = extractJson(text);
  if (json === null) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return null;
  }
  if (!validateAnswer(parsed)) return null;
  return {
    sql: parsed.sql.trim(),
    explanation: parsed.explanation?.trim() ?? '',
    assumptions: parsed.assumptions ?? [],
    structured: true,
  };
}

export function parseAnswer(text: string): ParsedAnswer {
  const structured = tryStructured(text);
  if (structured) return structured;

  const fence = text.match(/```sql[ \t]*\n([\s\S]*?)```/i);
  if (fence?.[1] !== undefined) {
    const sql = fence[1].trim();
    const rest = text.replace(fence[0], '').trim();
    return { sql, explanation: rest, assumptions: [], structured: false };
  }

  return { sql: text.trim(), explanation: '', assumptions: [], structured: false };
}
