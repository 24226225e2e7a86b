/**
 * Question and answer text helpers.
 */

export const MAX_QUESTION_LENGTH = 2000;

const WORD_RE = /[\p{L}\p{N}_]+/gu;

// C0 controls except tab and newline, plus DEL
const CONTROL_RE = /[\u0000-\u0008\u000B-\u001F\u007F]/g;

export type SanitizedQuestion =
  | { ok: true; question: string }
  | { ok: false; reason: 'empty' | 'too_long'; question: string };

export function sanitizeQuestion(raw: string): SanitizedQuestion {
  const question = raw.replace(CONTROL_RE, '').trim();
  if (!question) return { ok: false, reason: 'empty', question };
  if (question.length > MAX_QUESTION_LENGTH) {
    return { ok: false, reason: 'too_long', question: question.slice(0, MAX_QUESTION_LENGTH) };
  }
  return { ok: true, question };
}

export function countWords(text: string): number {
  return text.match(WORD_RE)?.length ?? 0;
}

/**
 * Keep the first `maxWords` words, cutting the original text right after the
 * last kept word so punctuation inside the kept part survives.
 */
export function truncateToWords(text: string, maxWords: number): string {
  if (maxWords <= 0) return '';
  const words = [...text.matchAll(WORD_RE)];
  if (words.length <= maxWords) return text;
  const last = words[maxWords - 1];
  const end = (last.index ?? 0) + last[0].length;
  return `${text.slice(0, end)}...`;
}

const AGGREGATE_RE = /\b(how many|count|total|sum|average|avg|maximum|max|minimum|min|statistics|stats?)\b/;

const LISTING_PATTERNS = [
  /\b(list|show|display|get|fetch|give me|tell me)\s+(all|the|me|every)\b/,
  /\b(list|show|display)\s+\d+/,
  /\ball\s+(the\s+)?\w+/,
];

/**
 * True for record listings ("list all", "show 10 products", "all the orders"),
 * false for aggregates ("how many", "total", "average").
 */
export function isListingRequest(question: string): boolean {
  const lower = question.toLowerCase();
  if (AGGREGATE_RE.test(lower)) return false;
  return LISTING_PATTERNS.some((pattern) => pattern.test(lower));
}
