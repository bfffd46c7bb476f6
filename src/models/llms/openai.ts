/**
 * OpenAILLM: OpenAI implementation of BaseLLM
 * Wraps the OpenAI SDK; structured replies use JSON mode plus a JSON schema
 * description of the expected shape.
 */

import type z from 'zod';
import OpenAI from 'openai';
import type { CompletionUsage } from 'openai/resources/completions';
import { zodToJsonSchema } from 'zod-to-json-schema';
import BaseLLM from '../base/llm';
import type {
  GenerateObjectInput,
  GenerateObjectOutput,
  GenerateOptions,
  GenerateTextInput,
  GenerateTextOutput,
  Message,
  TokenUsage,
} from '../types';
import { CollaboratorUnavailableError, MalformedReplyError } from '../../utils/errors';
import { safeParseJson } from '../../utils/safe-parse-json';

/**
 * Configuration for OpenAI LLM
 */
export interface OpenAILLMConfig {
  model?: string; // e.g. 'gpt-4o-mini', 'gpt-4.1-mini'
  apiKey?: string; // falls back to OPENAI_API_KEY
  temperature?: number;
  maxTokens?: number;
  topP?: number;
}

type ResolvedConfig = Required<Pick<OpenAILLMConfig, 'model' | 'temperature' | 'maxTokens'>> &
  Pick<OpenAILLMConfig, 'topP'>;

function toUsage(usage: CompletionUsage | undefined): TokenUsage | undefined {
  if (!usage) return undefined;
  return {
    promptTokens: usage.prompt_tokens,
    completionTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens,
  };
}

/** Appends the grounding URLs to the last user message. */
export function applyGrounding(messages: Message[], options?: GenerateOptions): Message[] {
  const urls = options?.groundingUrls ?? [];
  if (urls.length === 0) return messages;

  const reference = `\n\nReference sources (anchor your answer to these):\n${urls.map((u) => `- ${u}`).join('\n')}`;
  const lastUser = messages.map((m) => m.role).lastIndexOf('user');
  if (lastUser === -1) return [...messages, { role: 'user', content: reference.trim() }];
  return messages.map((m, i) => (i === lastUser ? { ...m, content: m.content + reference } : m));
}

class OpenAILLM extends BaseLLM<ResolvedConfig> {
  private client: OpenAI;

  constructor(config: OpenAILLMConfig = {}) {
    super({
      model: config.model || 'gpt-4o-mini',
      temperature: config.temperature ?? 0.3,
      maxTokens: config.maxTokens ?? 2048,
      topP: config.topP,
    });

    const apiKey = config.apiKey || process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new CollaboratorUnavailableError(
        'openai',
        'Missing OpenAI API key. Set OPENAI_API_KEY in .env or pass apiKey.',
      );
    }

    // retries are owned by RetryPolicy
    this.client = new OpenAI({ apiKey, maxRetries: 0 });
  }

  get modelName(): string {
    return this.config.model;
  }

  async generateText(input: GenerateTextInput): Promise<GenerateTextOutput> {
    const response = await this.client.chat.completions.create({
      model: this.config.model,
      messages: applyGrounding(input.messages, input.options),
      temperature: input.options?.temperature ?? this.config.temperature,
      max_tokens: input.options?.maxTokens ?? this.config.maxTokens,
      top_p: input.options?.topP ?? this.config.topP,
      stop: input.options?.stopSequences,
    });

    const choice = response.choices[0];
    return {
      content: choice?.message?.content ?? '',
      model: this.config.model,
      usage: toUsage(response.usage),
      finishReason: choice?.finish_reason,
    };
  }

  async generateObject<T extends z.ZodTypeAny>(
    input: GenerateObjectInput<T>,
  ): Promise<GenerateObjectOutput<z.infer<T>>> {
    const jsonSchema = zodToJsonSchema(input.schema, {
      target: 'openApi3',
      $refStrategy: 'none',
    });

    const messages: Message[] = [
      {
        role: 'system',
        content: `Respond with a single JSON object (${input.schemaName}) matching this JSON schema:\n${JSON.stringify(jsonSchema)}`,
      },
      ...applyGrounding(input.messages, input.options),
    ];

    const response = await this.client.chat.completions.create({
      model: this.config.model,
      messages,
      response_format: { type: 'json_object' },
      temperature: input.options?.temperature ?? this.config.temperature,
      max_tokens: input.options?.maxTokens ?? this.config.maxTokens,
      top_p: input.options?.topP ?? this.config.topP,
      stop: input.options?.stopSequences,
    });

    const choice = response.choices[0];
    const content = choice?.message?.content ?? '';
    const usage = toUsage(response.usage);

    let parsed: unknown;
    try {
      parsed = safeParseJson(content, input.schemaName);
    } catch (error) {
      if (error instanceof MalformedReplyError) throw new MalformedReplyError(error.message, error.raw, usage);
      throw error;
    }

    const result = input.schema.safeParse(parsed);
    if (!result.success) {
      throw new MalformedReplyError(
        `${input.schemaName}: reply did not match schema (${result.error.issues
          .map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`)
          .join('; ')})`,
        content.slice(0, 300),
        usage,
      );
    }

    return {
      object: result.data,
      model: this.config.model,
      usage,
      finishReason: choice?.finish_reason,
    };
  }
}

export default OpenAILLM;
