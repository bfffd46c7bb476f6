// Retry with exponential backoff, applied to every collaborator call

import { logger } from '../services/logger';
import { CallTimeoutError, RetryExhaustedError, errorMessage } from '../utils/errors';

export interface RetryOptions {
  /** Total attempts, including the first one. */
  maxRetries?: number;
  initialDelayMs?: number;
  exponentialBase?: number;
  /** Per-attempt timeout; 0 disables it. */
  timeoutMs?: number;
  isRetryable?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

const RATE_LIMIT_PATTERN = /rate.?limit|too many requests|\b429\b/i;

function readStatus(value: unknown): number | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  if ('status' in value && typeof value.status === 'number') return value.status;
  if ('response' in value) return readStatus(value.response);
  return undefined;
}

/**
 * True for HTTP 429 (on the error or on its `response`) or a message that
 * reads like a rate limit. Covers both axios and openai SDK errors.
 * Errors raised by the policy itself carry the call label (a sub-query or
 * URL) in their message and never count.
 */
export function isRateLimitError(error: unknown): boolean {
  if (error instanceof RetryExhaustedError || error instanceof CallTimeoutError) return false;
  if (readStatus(error) === 429) return true;
  return RATE_LIMIT_PATTERN.test(errorMessage(error));
}

export const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class RetryPolicy {
  readonly maxRetries: number;
  readonly initialDelayMs: number;
  private readonly exponentialBase: number;
  private readonly timeoutMs: number;
  private readonly isRetryable: (error: unknown) => boolean;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RetryOptions = {}) {
    this.maxRetries = Math.max(1, options.maxRetries ?? 4);
    this.initialDelayMs = options.initialDelayMs ?? 5000;
    this.exponentialBase = options.exponentialBase ?? 2;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.isRetryable = options.isRetryable ?? isRateLimitError;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Runs `fn` until it succeeds, a non-retryable error is thrown, or
   * `maxRetries` attempts have failed (then RetryExhaustedError).
   */
  async execute<T>(label: string, fn: () => Promise<T>): Promise<T> {
    let delay = this.initialDelayMs;

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.withTimeout(label, fn);
      } catch (error) {
        if (!this.isRetryable(error)) throw error;

        if (attempt >= this.maxRetries) {
          logger.error('retry:exhausted', { label, attempts: attempt, error: errorMessage(error) });
          throw new RetryExhaustedError(label, attempt, error);
        }

        logger.warn('retry:rate_limited', {
          label,
          attempt,
          maxRetries: this.maxRetries,
          delayMs: delay,
        });
        await this.sleep(delay);
        delay *= this.exponentialBase;
      }
    }
  }

  private async withTimeout<T>(label: string, fn: () => Promise<T>): Promise<T> {
    if (this.timeoutMs <= 0) return fn();

    let timer: NodeJS.Timeout | undefined;
    try {
      return await Promise.race([
        fn(),
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new CallTimeoutError(label, this.timeoutMs)), this.timeoutMs);
        }),
      ]);
    } finally {
      if (timer) clearTimeout(timer);
    }
  }
}
