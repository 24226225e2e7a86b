/**
 * Schema retrieval heuristic: selects relevant tables/columns
 * for the generation prompt based on the user's question.
 */

import type { ColumnInfo, SchemaSnapshot, TableInfo } from '../schema/types.js';

export interface SchemaContextOpts {
  maxTables?: number;
  maxColumnsPerTable?: number;
  /** Filter to show beside soft-delete tables, e.g. `deleted_at IS NULL` */
  softDeleteFilter?: string;
}

interface ScoredTable {
  table: TableInfo;
  score: number;
  scoredColumns: Array<{ col: ColumnInfo; score: number }>;
}

/**
 * Lowercase and split on anything that is not a letter, digit or underscore.
 */
function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}_]+/u)
    .filter((t) => t.length > 1);
}

/**
 * Score how well a name matches the question tokens, including its
 * underscore-separated parts and naive plural forms.
 */
function scoreMatch(name: string, tokens: string[]): number {
  const lower = name.toLowerCase();
  const parts = lower.split('_').filter((p) => p.length > 0);
  let score = 0;
  for (const token of tokens) {
    const singular = token.endsWith('s') ? token.slice(0, -1) : token;
    if (lower === token || lower === singular) {
      score += 10;
    } else if (parts.some((p) => p === token || p === singular)) {
      score += 7;
    } else if (lower.includes(token)) {
      score += 5;
    } else if (parts.some((p) => p.length > 2 && token.includes(p))) {
      score += 3;
    }
  }
  return score;
}

/** Quote a name when it would not survive case folding unquoted. */
export function quoteIfNeeded(name: string): string {
  return /^[a-z_][a-z0-9_]*$/.test(name) ? name : `"${name.replace(/"/g, '""')}"`;
}

/**
 * Build a text schema context for the generation prompt.
 * Tables are ranked by token overlap with the question; ties keep
 * snapshot order, so vague questions still see the first tables.
 */
export function buildSchemaContext(
  question: string,
  schema: SchemaSnapshot,
  opts: SchemaContextOpts = {},
): string {
  const maxTables = opts.maxTables ?? 8;
  const maxCols = opts.maxColumnsPerTable ?? 30;
  const tokens = tokenize(question);

  const scored: ScoredTable[] = schema.tables.map((table) => {
    const scoredColumns = table.columns.map((col) => ({
      col,
      score: scoreMatch(col.name, tokens),
    }));

    // Boost table score by its best column matches
    const colBoost = scoredColumns
      .map((sc) => sc.score)
      .sort((a, b) => b - a)
      .slice(0, 3)
      .reduce((sum, s) => sum + s, 0);

    return {
      table,
      score: scoreMatch(table.name, tokens) * 2 + colBoost,
      scoredColumns,
    };
  });

  const selected = [...scored].sort((a, b) => b.score - a.score).slice(0, maxTables);

  const lines: string[] = ['-- Database Schema (relevant subset)', ''];

  for (const entry of selected) {
    const t = entry.table;
    const marker = t.hasSoftDelete && opts.softDeleteFilter ? `  -- soft-delete: always filter ${opts.softDeleteFilter}` : '';
    lines.push(`TABLE ${quoteIfNeeded(t.name)}${marker}`);

    // PK first, then by score, then alphabetical
    const cols = [...entry.scoredColumns]
      .sort((a, b) => {
        if (a.col.isPrimaryKey !== b.col.isPrimaryKey) return a.col.isPrimaryKey ? -1 : 1;
        if (b.score !== a.score) return b.score - a.score;
        return a.col.name.localeCompare(b.col.name);
      })
      .slice(0, maxCols);

    for (const { col } of cols) {
      const pk = col.isPrimaryKey ? ' PK' : '';
      const nullable = col.nullable ? ' NULL' : ' NOT NULL';
      lines.push(`  ${quoteIfNeeded(col.name)} ${col.dataType}${nullable}${pk}`);
    }

    lines.push('');
  }

  if (selected.length < schema.tables.length) {
    const rest = scored
      .filter((s) => !selected.includes(s))
      .map((s) => quoteIfNeeded(s.table.name));
    lines.push(`-- Other tables: ${rest.join(', ')}`);
  }

  return lines.join('\n');
}
