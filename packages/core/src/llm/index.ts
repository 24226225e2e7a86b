/**
 * LLM module barrel export.
 */

export type {
  AnswerConstraints,
  GenerateRequest,
  Generation,
  GeneratorAdapter,
  OffTopicRequest,
  ResultPreview,
  SummarizeRequest,
} from './types.js';
export { OpenAIGenerator, createOpenAICompletionClient, extractJson } from './openai.js';
export type { CompletionClient, OpenAIClientOptions, OpenAIGeneratorOptions } from './openai.js';
export { buildSchemaContext, quoteIfNeeded } from './schema.js';
export type { SchemaContextOpts } from './schema.js';
export { buildAnswerMessages, buildGenerationMessages, buildOffTopicMessages, formatPreview } from './prompt.js';
export type { ChatMessage } from './prompt.js';
export { generationPayloadSchema } from './schema_json.js';
export type { GenerationPayload } from './schema_json.js';
