/**
 * Prompt construction for SQL generation and answer synthesis.
 */

import type { SqlDialect } from '../db/types.js';
import { formatViolations } from '../policy/guard.js';
import type { Violation } from '../policy/types.js';
import type { AnswerConstraints, ResultPreview } from './types.js';

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface GenerationPromptInput {
  dialect: SqlDialect;
  question: string;
  schemaContext: string;
  maxRows: number;
  softDeleteFilter: string;
  priorViolations: readonly Violation[] | null;
}

const JSON_FORMAT_INSTRUCTIONS = `You must respond with ONLY a JSON object matching this exact schema:
{"status": "ok" | "out_of_scope", "sql": "<single SELECT statement>" | null, "notes": "<short reason>" | null}

Rules:
- Do NOT wrap in markdown code fences.
- Do NOT include any text before or after the JSON.`;

const DIALECT_NAMES: Record<SqlDialect, string> = {
  postgres: 'PostgreSQL',
  sqlite: 'SQLite',
};

export function buildGenerationMessages(input: GenerationPromptInput): ChatMessage[] {
  const systemPrompt = `You are a SQL query generator for ${DIALECT_NAMES[input.dialect]} databases.

CONSTRAINTS:
- Generate a SINGLE read-only SELECT statement (CTEs allowed). Never INSERT, UPDATE, DELETE or DDL.
- Never include SQL comments or more than one statement.
- Always end the outer query with a literal LIMIT no greater than ${input.maxRows}.
- For "all" or "list all" requests use LIMIT ${input.maxRows}; for a requested number N use LIMIT N.
- If the user asks for more than ${input.maxRows} items, return status "out_of_scope" with notes "too_many_items".
- Tables marked soft-delete must be filtered with ${input.softDeleteFilter} in every SELECT that reads them (qualify the column when joining).
- Copy table and column names exactly as shown; keep the double quotes on quoted names.
- Use only the tables and columns listed in the schema.

SCOPE:
- If the question is not about the data, return status "out_of_scope" with notes "off_topic".
- If the schema cannot answer it, return status "out_of_scope" with notes "not_in_schema".

${JSON_FORMAT_INSTRUCTIONS}`;

  const retryNote =
    input.priorViolations && input.priorViolations.length > 0
      ? `\n\nYour previous query was rejected for these reasons:\n${formatViolations(input.priorViolations)}\nReturn a corrected query.`
      : '';

  const userPrompt = `${input.schemaContext}

Question: ${input.question}${retryNote}`;

  return [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: userPrompt },
  ];
}

/** Serialize a result preview for the answer prompt. */
export function formatPreview(preview: ResultPreview): string {
  const header = `${preview.rowCount} row(s)${preview.truncated ? ' (more rows exist beyond the limit)' : ''}`;
  const body = preview.rows.map((row) => JSON.stringify(row, jsonSafe)).join('\n');
  return `${header}\n${body}`;
}

function jsonSafe(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export function buildAnswerMessages(input: {
  question: string;
  sql: string;
  preview: ResultPreview;
  constraints: AnswerConstraints;
}): ChatMessage[] {
  const { constraints } = input;
  const length = constraints.listing
    ? 'List every row from the results, one per line, with a one-line introduction.'
    : `Use 1-3 sentences and at most ${constraints.maxWords} words.`;

  const systemPrompt = [
    'You write short, helpful answers based on SQL results.',
    'Reply in the same language as the user question.',
    length,
    'Include numbers from the results.',
    'Never mention SQL, table names, column names or internal errors; paraphrase them into plain wording.',
    `Format monetary values with the currency symbol '${constraints.currencySymbol}' (e.g., ${constraints.currencySymbol}1,234.56).`,
  ].join('\n');

  const userPrompt = `Question:\n${input.question}\n\nSQL:\n${input.sql}\n\nResults:\n${formatPreview(input.preview)}`;

  return [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: userPrompt },
  ];
}

export function buildOffTopicMessages(input: { question: string; maxWords: number }): ChatMessage[] {
  const systemPrompt = [
    'You are a friendly assistant that answers questions about a database.',
    'The user asked something unrelated to the data.',
    `Reply in one or two short sentences and at most ${input.maxWords} words.`,
    'Keep it light and respectful, and make clear you are here for questions about the data.',
    'Reply in the same language as the user question.',
  ].join('\n');

  return [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: `Off-topic question:\n${input.question}` },
  ];
}
