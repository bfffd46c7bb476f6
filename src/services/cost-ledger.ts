// src/services/cost-ledger.ts: token and credit accounting for one run
import { DEFAULT_PRICING, priceCall, type PricingTable } from '../config/modelPricing';
import { errorMessage } from '../utils/errors';
import { logger } from './logger';

/** Anything that can report how many provider credits are left. */
export interface CreditSource {
  readonly name: string;
  getRemainingCredits(): Promise<number | null>;
}

export interface CostLedgerSnapshot {
  token_usage: { input: number; output: number };
  total_cost: number;
  calls_by_model: Record<string, number>;
  external_credit_source: string | null;
  external_credit_start: number | null;
  external_credit_end: number | null;
}

/**
 * Process-wide accumulator shared by reference through every delegated call.
 * All mutations are synchronous, so concurrent profiling workers on the one
 * event loop never interleave inside an update.
 */
export class CostLedger {
  private inputTokens = 0;
  private outputTokens = 0;
  private totalCost = 0;
  private readonly callsByModel = new Map<string, number>();
  private creditStart: number | null = null;
  private creditEnd: number | null = null;

  constructor(
    private readonly creditSource: CreditSource | null = null,
    private readonly pricing: PricingTable = DEFAULT_PRICING,
  ) {}

  trackUsage(modelName: string, inputTokens: number, outputTokens: number): void {
    this.inputTokens += inputTokens;
    this.outputTokens += outputTokens;
    this.callsByModel.set(modelName, (this.callsByModel.get(modelName) ?? 0) + 1);

    const price = this.pricing[modelName];
    if (!price) {
      logger.warn('cost-ledger:unknown_model', { model: modelName });
      return;
    }

    const cost = priceCall(price, inputTokens, outputTokens);
    this.totalCost += cost;
    logger.debug('cost-ledger:call', {
      model: modelName,
      cost: cost.toFixed(6),
      inputTokens,
      outputTokens,
    });
  }

  async startRun(): Promise<void> {
    this.creditStart = await this.readCredits();
    if (this.creditStart !== null) {
      logger.info('cost-ledger:credits_start', { source: this.creditSource?.name, credits: this.creditStart });
    }
  }

  async endRun(): Promise<void> {
    this.creditEnd = await this.readCredits();
    if (this.creditEnd !== null) {
      logger.info('cost-ledger:credits_end', { source: this.creditSource?.name, credits: this.creditEnd });
    }
  }

  creditsUsed(): number | null {
    if (this.creditStart === null || this.creditEnd === null) return null;
    return this.creditStart - this.creditEnd;
  }

  summary(): string {
    const used = this.creditsUsed();
    return [
      '--- Cost and Usage Summary ---',
      `Total Input Tokens: ${this.inputTokens}`,
      `Total Output Tokens: ${this.outputTokens}`,
      `Estimated Model Cost: $${this.totalCost.toFixed(6)}`,
      `External Credits Used: ${used === null ? 'unknown' : used}`,
      '------------------------------',
    ].join('\n');
  }

  toJSON(): CostLedgerSnapshot {
    return {
      token_usage: { input: this.inputTokens, output: this.outputTokens },
      total_cost: this.totalCost,
      calls_by_model: Object.fromEntries(this.callsByModel),
      external_credit_source: this.creditSource?.name ?? null,
      external_credit_start: this.creditStart,
      external_credit_end: this.creditEnd,
    };
  }

  private async readCredits(): Promise<number | null> {
    if (!this.creditSource) return null;
    try {
      return await this.creditSource.getRemainingCredits();
    } catch (error) {
      logger.warn('cost-ledger:credit_check_failed', {
        source: this.creditSource.name,
        error: errorMessage(error),
      });
      return null;
    }
  }
}
