// src/services/model-router.ts: central routing per task type

import type z from 'zod';
import type BaseLLM from '../models/base/llm';
import type { GenerateOptions, Message, TokenUsage } from '../models/types';
import type { RetryPolicy } from '../stability/retryPolicy';
import { MalformedReplyError } from '../utils/errors';
import type { CostLedger } from './cost-ledger';

export type FanOutTask = 'expansion' | 'routing' | 'profiling';

const TASK_OPTIONS: Record<FanOutTask, GenerateOptions> = {
  expansion: { temperature: 0.7, maxTokens: 2048 },
  routing: { temperature: 0, maxTokens: 4096 },
  profiling: { temperature: 0.3, maxTokens: 2048 },
};

const TASK_SYSTEM: Record<FanOutTask, string> = {
  expansion: 'You are a search query analyst. You reply in JSON only.',
  routing: 'You are an expert in information retrieval and search algorithms. You reply in JSON only.',
  profiling:
    'You are a content strategist specializing in Generative Engine Optimization. You reply in JSON only.',
};

export interface JsonRequest<T extends z.ZodTypeAny> {
  prompt: string;
  schema: T;
  schemaName: string;
  options?: GenerateOptions;
}

/**
 * The one entry point stages use to reach the text-generation collaborator.
 * Every call goes through the retry policy and is recorded on the ledger,
 * including replies rejected as malformed.
 */
export class FanOutModelRouter {
  constructor(
    private readonly llm: BaseLLM,
    private readonly retry: RetryPolicy,
    private readonly ledger: CostLedger,
  ) {}

  async generateJson<T extends z.ZodTypeAny>(task: FanOutTask, request: JsonRequest<T>): Promise<z.infer<T>> {
    const output = await this.retry.execute(`llm:${task}`, async () => {
      try {
        return await this.llm.generateObject({
          schema: request.schema,
          schemaName: request.schemaName,
          messages: this.messages(task, request.prompt),
          options: { ...TASK_OPTIONS[task], ...request.options },
        });
      } catch (error) {
        if (error instanceof MalformedReplyError && error.usage) this.record(error.usage);
        throw error;
      }
    });
    this.record(output.usage);
    return output.object;
  }

  async generateText(task: FanOutTask, prompt: string, options?: GenerateOptions): Promise<string> {
    const output = await this.retry.execute(`llm:${task}`, () =>
      this.llm.generateText({
        messages: this.messages(task, prompt),
        options: { ...TASK_OPTIONS[task], ...options },
      }),
    );
    this.record(output.usage);
    return output.content;
  }

  private messages(task: FanOutTask, prompt: string): Message[] {
    return [
      { role: 'system', content: TASK_SYSTEM[task] },
      { role: 'user', content: prompt },
    ];
  }

  private record(usage: TokenUsage | undefined): void {
    this.ledger.trackUsage(this.llm.modelName, usage?.promptTokens ?? 0, usage?.completionTokens ?? 0);
  }
}
