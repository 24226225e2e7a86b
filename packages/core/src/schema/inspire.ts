/**
 * Sample questions built from the tables and columns in scope, for users who
 * do not know what to ask.
 */

import { errorMessage } from '../errors.js';
import { createChildLogger } from '../logging/logger.js';
import type { SchemaSnapshot, TableInfo } from './types.js';

const log = createChildLogger('inspire');

/** `{tables}` is the plural table name, `{table}` the name as it is. */
const TABLE_TEMPLATES = [
  'How many {tables} are there?',
  'What is the total count of {tables}?',
  'How many {tables} were created this month?',
  'Which are the most recent {tables}?',
] as const;

const COLUMN_TEMPLATES = [
  'What {column} values appear in {table}?',
  'What are the distinct {column} values in {table}?',
  'What is the average {column} in {table}?',
  'What are the top {column} values in {table}?',
  'How does {column} compare across {tables}?',
  'Can you summarize {table} by {column}?',
  'Which {tables} have the highest {column}?',
  'What is the total {column} in {table}?',
] as const;

export type Chooser = <T>(items: readonly T[]) => T;

export const randomChoice: Chooser = (items) => items[Math.floor(Math.random() * items.length)];

export interface InspireOptions {
  /** Picks a template, a table and a column. Defaults to `randomChoice`. */
  choose?: Chooser;
}

export function humanize(name: string): string {
  return name.replace(/[_\s]+/g, ' ').trim();
}

export function pluralize(word: string): string {
  const lower = word.toLowerCase();
  if (lower.endsWith('s')) return word;
  if (/(x|z|ch|sh)$/.test(lower)) return `${word}es`;
  if (/[^aeiou]y$/.test(lower)) return `${word.slice(0, -1)}ies`;
  return `${word}s`;
}

function describableColumns(table: TableInfo): string[] {
  return table.columns.filter((col) => !col.isPrimaryKey).map((col) => col.name);
}

/**
 * A sample question over a random table of the snapshot, or null when the
 * snapshot is unavailable or has no tables in scope.
 */
export function inspire(snapshot: SchemaSnapshot, options: InspireOptions = {}): string | null {
  if (snapshot.connectionError || snapshot.tables.length === 0) return null;
  const choose = options.choose ?? randomChoice;

  const table = choose(snapshot.tables);
  const columns = describableColumns(table);
  const templates: readonly string[] =
    columns.length > 0 ? [...TABLE_TEMPLATES, ...COLUMN_TEMPLATES] : TABLE_TEMPLATES;
  const template = choose(templates);
  const column = template.includes('{column}') ? choose(columns) : '';

  const name = humanize(table.name);
  return template
    .replace('{tables}', pluralize(name))
    .replace('{table}', name)
    .replace('{column}', humanize(column));
}

/** Like `inspire`, reading the snapshot from a catalog; a failed read gives null. */
export async function inspireFrom(
  catalog: { snapshot(): Promise<SchemaSnapshot> },
  options: InspireOptions = {},
): Promise<string | null> {
  try {
    return inspire(await catalog.snapshot(), options);
  } catch (error: unknown) {
    log.warn('Could not build a sample question', { error: errorMessage(error) });
    return null;
  }
}
