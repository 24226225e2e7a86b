/**
 * AJV JSON Schema for the generator's SQL payload.
 * Plain object schema; the status/sql combination is checked after validation.
 */

export interface GenerationPayload {
  status: 'ok' | 'out_of_scope';
  sql?: string | null;
  notes?: string | null;
}

export const generationPayloadSchema = {
  type: 'object' as const,
  properties: {
    status: { type: 'string' as const, enum: ['ok', 'out_of_scope'] },
    sql: { type: ['string', 'null'] as const },
    notes: { type: ['string', 'null'] as const },
  },
  required: ['status'] as const,
  additionalProperties: true,
};
