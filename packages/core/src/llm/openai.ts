/**
 * OpenAI-compatible generator. Works against api.openai.com or any
 * compatible endpoint (OpenRouter, a local gateway) through `baseURL`.
 */

import OpenAI from 'openai';
import { Ajv, type ValidateFunction } from 'ajv';
import { ConfigError, GenerationError, errorMessage } from '../errors.js';
import { createChildLogger } from '../logging/logger.js';
import { describeSoftDeleteFilter } from '../policy/soft-delete.js';
import type { Policy } from '../policy/types.js';
import { buildAnswerMessages, buildGenerationMessages, buildOffTopicMessages, type ChatMessage } from './prompt.js';
import { buildSchemaContext, type SchemaContextOpts } from './schema.js';
import { generationPayloadSchema, type GenerationPayload } from './schema_json.js';
import type { GenerateRequest, Generation, GeneratorAdapter, OffTopicRequest, SummarizeRequest } from './types.js';

const DEFAULT_MODEL = 'gpt-4o-mini';

const log = createChildLogger('llm');

/** Minimal chat-completion surface, so tests can run without a network. */
export interface CompletionClient {
  complete(messages: ChatMessage[], options: { maxTokens: number; signal?: AbortSignal }): Promise<string>;
}

export interface OpenAIClientOptions {
  apiKey?: string;
  baseURL?: string;
  model?: string;
  timeoutMs?: number;
}

function requireApiKey(apiKey: string | undefined): string {
  if (!apiKey) {
    throw new ConfigError('OpenAI API key is not configured. Set OPENAI_API_KEY in your shell.');
  }
  return apiKey;
}

export function createOpenAICompletionClient(options: OpenAIClientOptions): CompletionClient {
  const model = options.model || DEFAULT_MODEL;
  const client = new OpenAI({
    apiKey: requireApiKey(options.apiKey),
    baseURL: options.baseURL || undefined,
    timeout: options.timeoutMs,
    // retries are budgeted by the orchestrator
    maxRetries: 0,
  });

  return {
    async complete(messages, { maxTokens, signal }) {
      const response = await client.chat.completions.create(
        {
          model,
          messages: messages.map(
            (m): OpenAI.ChatCompletionMessageParam =>
              m.role === 'system' ? { role: 'system', content: m.content } : { role: 'user', content: m.content },
          ),
          temperature: 0.1,
          max_tokens: maxTokens,
        },
        { signal },
      );

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new GenerationError('malformed_response', 'OpenAI returned empty response.');
      }
      return content;
    },
  };
}

/**
 * Extract JSON from a string that may contain markdown fences or extra text.
 */
export function extractJson(text: string): string {
  const fenceMatch = text.match(/```(?:json)?\s*\n?([\s\S]*?)```/);
  if (fenceMatch) {
    return fenceMatch[1].trim();
  }
  const braceStart = text.indexOf('{');
  const braceEnd = text.lastIndexOf('}');
  if (braceStart !== -1 && braceEnd > braceStart) {
    return text.slice(braceStart, braceEnd + 1);
  }
  return text.trim();
}

function toGenerationError(err: unknown, signal: AbortSignal | undefined): GenerationError {
  if (err instanceof GenerationError) return err;
  if (signal?.aborted) {
    const reason: unknown = signal.reason;
    const timedOut = reason instanceof Error && reason.name === 'TimeoutError';
    return new GenerationError(timedOut ? 'timeout' : 'aborted', timedOut ? 'Model call timed out.' : 'Model call aborted.');
  }
  if (err instanceof OpenAI.APIConnectionTimeoutError) {
    return new GenerationError('timeout', 'Model call timed out.');
  }
  if (err instanceof OpenAI.APIUserAbortError) {
    return new GenerationError('aborted', 'Model call aborted.');
  }
  return new GenerationError('transport', `Model call failed: ${errorMessage(err)}`);
}

export interface OpenAIGeneratorOptions extends OpenAIClientOptions {
  policy: Policy;
  schemaOpts?: SchemaContextOpts;
  /** Injected transport; defaults to the OpenAI SDK */
  client?: CompletionClient;
}

export class OpenAIGenerator implements GeneratorAdapter {
  private readonly client: CompletionClient;
  private readonly policy: Policy;
  private readonly schemaOpts: SchemaContextOpts;
  private readonly softDeleteFilter: string;
  private readonly validatePayload: ValidateFunction<GenerationPayload>;

  constructor(options: OpenAIGeneratorOptions) {
    this.client = options.client ?? createOpenAICompletionClient(options);
    this.policy = options.policy;
    this.softDeleteFilter = describeSoftDeleteFilter(options.policy);
    this.schemaOpts = { ...options.schemaOpts, softDeleteFilter: this.softDeleteFilter };
    const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });
    this.validatePayload = ajv.compile<GenerationPayload>(generationPayloadSchema);
  }

  async generate(req: GenerateRequest): Promise<Generation> {
    const messages = buildGenerationMessages({
      dialect: req.snapshot.dialect,
      question: req.question,
      schemaContext: buildSchemaContext(req.question, req.snapshot, this.schemaOpts),
      maxRows: this.policy.maxRows,
      softDeleteFilter: this.softDeleteFilter,
      priorViolations: req.priorViolations,
    });

    const raw = await this.call(messages, 800, req.signal);
    const payload = this.parsePayload(raw);

    if (payload.status === 'out_of_scope') {
      const scopeReason = payload.notes?.trim() || 'out_of_scope';
      log.info('Model declined the question', { scopeReason });
      return { status: 'OUT_OF_SCOPE', scopeReason };
    }

    const sql = payload.sql?.trim();
    if (!sql) {
      throw new GenerationError('malformed_response', 'Model returned status "ok" without SQL.');
    }
    return { status: 'OK', sql };
  }

  async summarize(req: SummarizeRequest): Promise<{ answer: string }> {
    const messages = buildAnswerMessages(req);
    const maxTokens = req.constraints.listing ? 1500 : 300;
    const answer = (await this.call(messages, maxTokens, req.signal)).trim();
    if (!answer) {
      throw new GenerationError('malformed_response', 'Model returned an empty answer.');
    }
    return { answer };
  }

  async replyOffTopic(req: OffTopicRequest): Promise<{ answer: string }> {
    const messages = buildOffTopicMessages(req);
    const answer = (await this.call(messages, 120, req.signal)).trim();
    if (!answer) {
      throw new GenerationError('malformed_response', 'Model returned an empty reply.');
    }
    return { answer };
  }

  private async call(messages: ChatMessage[], maxTokens: number, signal: AbortSignal | undefined): Promise<string> {
    try {
      return await this.client.complete(messages, { maxTokens, signal });
    } catch (err: unknown) {
      throw toGenerationError(err, signal);
    }
  }

  private parsePayload(raw: string): GenerationPayload {
    const jsonStr = extractJson(raw);
    let parsed: unknown;
    try {
      parsed = JSON.parse(jsonStr);
    } catch {
      throw new GenerationError('malformed_response', `Invalid JSON: ${jsonStr.slice(0, 100)}`);
    }

    if (this.validatePayload(parsed)) {
      return parsed;
    }

    const errors = this.validatePayload.errors
      ?.map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`)
      .join('; ');
    throw new GenerationError('malformed_response', `Payload failed schema validation: ${errors ?? 'unknown error'}`);
  }
}
