/**
 * Error taxonomy for the fan-out pipeline.
 *
 * Only ConfigError and CollaboratorUnavailableError are fatal; the stages turn
 * everything else into an `error` field on the affected item.
 */
import type { TokenUsage } from '../models/types';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: Array<{ path: string; message: string }> = [],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** A collaborator cannot be constructed (missing key, unknown provider). */
export class CollaboratorUnavailableError extends Error {
  constructor(
    public readonly collaborator: string,
    message: string,
  ) {
    super(message);
    this.name = 'CollaboratorUnavailableError';
  }
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly label: string,
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    super(`${label} failed after ${attempts} attempts: ${errorMessage(lastError)}`);
    this.name = 'RetryExhaustedError';
  }
}

export class CallTimeoutError extends Error {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'CallTimeoutError';
  }
}

/**
 * The model replied, but not with the shape that was asked for. `usage` is the
 * token count of the rejected reply, which was still billed.
 */
export class MalformedReplyError extends Error {
  constructor(
    message: string,
    public readonly raw?: string,
    public readonly usage?: TokenUsage,
  ) {
    super(message);
    this.name = 'MalformedReplyError';
  }
}

export class SearchReplyShapeError extends Error {
  constructor(public readonly reason: string) {
    super(`unexpected search reply shape: ${reason}`);
    this.name = 'SearchReplyShapeError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
