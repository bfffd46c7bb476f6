/**
 * LLM Types: inputs and outputs of BaseLLM
 */

import type z from 'zod';

/**
 * Message format for LLM conversations
 */
export type Message = {
  role: 'user' | 'assistant' | 'system';
  content: string;
};

/**
 * Options for a single generation call
 */
export type GenerateOptions = {
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  stopSequences?: string[];
  /** Reference URLs the reply should be anchored to. */
  groundingUrls?: string[];
};

export type TokenUsage = {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
};

export type GenerateTextInput = {
  messages: Message[];
  options?: GenerateOptions;
};

export type GenerateTextOutput = {
  content: string;
  model: string;
  usage?: TokenUsage;
  finishReason?: string;
};

/**
 * Input for structured object generation. `schemaName` labels the shape in the
 * instruction and in logs.
 */
export type GenerateObjectInput<T extends z.ZodTypeAny = z.ZodTypeAny> = {
  schema: T;
  schemaName: string;
  messages: Message[];
  options?: GenerateOptions;
};

export type GenerateObjectOutput<T> = {
  object: T;
  model: string;
  usage?: TokenUsage;
  finishReason?: string;
};
