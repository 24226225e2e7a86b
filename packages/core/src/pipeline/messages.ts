/**
 * Fixed user-facing texts. None of them carries SQL, schema names or error
 * detail; those go to the audit record only.
 */

export const MESSAGES = {
  emptyQuestion: 'Please ask a question about the data.',
  questionTooLong: 'That question is too long. Please shorten it and try again.',
  databaseUnavailable: 'The database is unavailable right now. Please try again later.',
  outOfScope:
    "I can't help with that question. Either relevant information wasn't found or I'm not allowed to access it.",
  offTopic: "I'm here for questions about the data. Try asking about your records.",
  noResults: "I couldn't find any matching records.",
  generationFailed: "Sorry, I couldn't process that right now. Please try again.",
  executionFailed: 'Something went wrong while looking that up. Please try again later.',
} as const;

export function tooManyItemsMessage(maxRows: number): string {
  return `I can only list up to ${maxRows} items at a time. Please ask for a smaller number of records.`;
}
