/**
 * Prompt-input hygiene: flag instruction-like text in user requests and
 * fence user-provided text so the model can tell data from instructions.
 */

const INJECTION_PATTERNS = [
  /ignore\s+(previous|above|all)\s+(instructions?|prompts?)/i,
  /disregard\s+(previous|above|all)/i,
  /forget\s+(everything|all|previous)/i,
  /new\s+instructions?:/i,
  /system\s*:/i,
  /<\/?(system|user|assistant)>/i,
  /<\|.*?\|>/,
];

const ROLE_TAG_RE = /<(\/?)(system|user|assistant|s|im_start|im_end)/gi;

export const TRUNCATION_MARKER = '...[truncated]';

/** True when the text contains a known prompt-injection pattern. */
export function detectInjection(text: string): boolean {
  return INJECTION_PATTERNS.some((re) => re.test(text));
}

export function sanitizeForPrompt(text: string, maxLength = 10_000): string {
  if (!text) return '';
  let out = text.length > maxLength ? text.slice(0, maxLength) + TRUNCATION_MARKER : text;
  out = out.replace(ROLE_TAG_RE, '&lt;$1$2');
  out = out.replaceAll('```', "'''");
  return out;
}

export function wrapUserInput(text: string, label = 'USER_INPUT', maxLength?: number): string {
  return `--- START ${label} ---\n${sanitizeForPrompt(text, maxLength)}\n--- END ${label} ---`;
}
