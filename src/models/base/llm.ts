import type z from 'zod';
import type {
  GenerateObjectInput,
  GenerateObjectOutput,
  GenerateTextInput,
  GenerateTextOutput,
} from '../types';

abstract class BaseLLM<CONFIG = Record<string, unknown>> {
  constructor(protected config: CONFIG) {}

  /** Model identifier reported to the cost ledger. */
  abstract get modelName(): string;

  /**
   * Generate plain text from messages
   */
  abstract generateText(input: GenerateTextInput): Promise<GenerateTextOutput>;

  /**
   * Generate a structured object validated against a Zod schema.
   * Implementations throw MalformedReplyError when the reply is not valid JSON
   * or does not match the schema.
   */
  abstract generateObject<T extends z.ZodTypeAny>(
    input: GenerateObjectInput<T>,
  ): Promise<GenerateObjectOutput<z.infer<T>>>;
}

export default BaseLLM;
