import { describe, expect, it } from 'vitest';
import { CostLedger, type CreditSource } from '../src/services/cost-ledger';

function creditsFrom(values: Array<number | null | Error>): CreditSource {
  let call = 0;
  return {
    name: 'test-credits',
    async getRemainingCredits() {
      const value = values[Math.min(call++, values.length - 1)];
      if (value instanceof Error) throw value;
      return value;
    },
  };
}

describe('CostLedger', () => {
  it('accumulates tokens and cost per call', () => {
    const ledger = new CostLedger();
    ledger.trackUsage('gpt-4o-mini', 1000, 500);
    ledger.trackUsage('gpt-4o-mini', 2000, 0);

    const snapshot = ledger.toJSON();
    expect(snapshot.token_usage).toEqual({ input: 3000, output: 500 });
    expect(snapshot.total_cost).toBeCloseTo(0.00075, 10);
    expect(snapshot.calls_by_model).toEqual({ 'gpt-4o-mini': 2 });
  });

  it('counts tokens but no cost for a model missing from the pricing table', () => {
    const ledger = new CostLedger();
    ledger.trackUsage('mystery-model', 10, 20);

    expect(ledger.toJSON()).toEqual({
      token_usage: { input: 10, output: 20 },
      total_cost: 0,
      calls_by_model: { 'mystery-model': 1 },
      external_credit_source: null,
      external_credit_start: null,
      external_credit_end: null,
    });
  });

  it('picks the price tier from the input tokens of each call', () => {
    const ledger = new CostLedger(null, {
      tiered: { cutoff: 1000, inputShort: 1, inputLong: 2, outputShort: 10, outputLong: 20 },
    });
    ledger.trackUsage('tiered', 1000, 1);
    ledger.trackUsage('tiered', 1001, 1);

    expect(ledger.toJSON().total_cost).toBe(1010 + 2022);
  });

  it('reports credits used between start and end of the run', async () => {
    const ledger = new CostLedger(creditsFrom([500, 480]));
    ledger.trackUsage('gpt-4o-mini', 1000, 500);

    await ledger.startRun();
    await ledger.endRun();

    expect(ledger.creditsUsed()).toBe(20);
    expect(ledger.summary()).toBe(
      [
        '--- Cost and Usage Summary ---',
        'Total Input Tokens: 1000',
        'Total Output Tokens: 500',
        'Estimated Model Cost: $0.000450',
        'External Credits Used: 20',
        '------------------------------',
      ].join('\n'),
    );
    expect(ledger.toJSON()).toMatchObject({
      external_credit_source: 'test-credits',
      external_credit_start: 500,
      external_credit_end: 480,
    });
  });

  it('reports unknown credits when a balance read fails', async () => {
    const ledger = new CostLedger(creditsFrom([500, new Error('credit endpoint down')]));

    await ledger.startRun();
    await ledger.endRun();

    expect(ledger.creditsUsed()).toBeNull();
    expect(ledger.summary()).toContain('External Credits Used: unknown');
  });

  it('reports unknown credits without a credit source', async () => {
    const ledger = new CostLedger();
    await ledger.startRun();
    await ledger.endRun();

    expect(ledger.summary()).toBe(
      [
        '--- Cost and Usage Summary ---',
        'Total Input Tokens: 0',
        'Total Output Tokens: 0',
        'Estimated Model Cost: $0.000000',
        'External Credits Used: unknown',
        '------------------------------',
      ].join('\n'),
    );
  });
});
