/**
 * Generator Adapter contract: the only way the pipeline talks to a model.
 */

import type { Row } from '../db/types.js';
import type { Violation } from '../policy/types.js';
import type { SchemaSnapshot } from '../schema/types.js';

export type Generation =
  | { status: 'OK'; sql: string }
  | { status: 'OUT_OF_SCOPE'; scopeReason: string };

export interface GenerateRequest {
  question: string;
  snapshot: SchemaSnapshot;
  /** Violations of the previous candidate; null on a first attempt or after a generator failure */
  priorViolations: readonly Violation[] | null;
  signal?: AbortSignal;
}

/** What the answer prompt sees of a result set. */
export interface ResultPreview {
  columns: readonly string[];
  /** First rows only */
  rows: readonly Row[];
  rowCount: number;
  truncated: boolean;
}

export interface AnswerConstraints {
  maxWords: number;
  /** Listing requests are not held to the word limit */
  listing: boolean;
  currencySymbol: string;
}

export interface SummarizeRequest {
  question: string;
  sql: string;
  preview: ResultPreview;
  constraints: AnswerConstraints;
  signal?: AbortSignal;
}

export interface OffTopicRequest {
  question: string;
  maxWords: number;
  signal?: AbortSignal;
}

export interface GeneratorAdapter {
  generate(req: GenerateRequest): Promise<Generation>;
  summarize(req: SummarizeRequest): Promise<{ answer: string }>;
  /** A short reply steering an off-topic question back to the data. */
  replyOffTopic(req: OffTopicRequest): Promise<{ answer: string }>;
}
