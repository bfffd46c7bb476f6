/** USD per token. Tiered entries pick the tier from the call's input tokens. */
export type FlatPrice = { input: number; output: number };

export type TieredPrice = {
  cutoff: number;
  inputShort: number;
  inputLong: number;
  outputShort: number;
  outputLong: number;
};

export type ModelPrice = FlatPrice | TieredPrice;

export type PricingTable = Record<string, ModelPrice>;

const PER_MILLION = 1 / 1_000_000;

export const DEFAULT_PRICING: PricingTable = {
  'gpt-4o-mini': { input: 0.15 * PER_MILLION, output: 0.6 * PER_MILLION },
  'gpt-4o': { input: 2.5 * PER_MILLION, output: 10 * PER_MILLION },
  'gpt-4.1-mini': { input: 0.4 * PER_MILLION, output: 1.6 * PER_MILLION },
  'gpt-4.1': { input: 2 * PER_MILLION, output: 8 * PER_MILLION },
};

export function isTiered(price: ModelPrice): price is TieredPrice {
  return 'cutoff' in price;
}

export function priceCall(price: ModelPrice, inputTokens: number, outputTokens: number): number {
  if (isTiered(price)) {
    const short = inputTokens <= price.cutoff;
    return (
      inputTokens * (short ? price.inputShort : price.inputLong) +
      outputTokens * (short ? price.outputShort : price.outputLong)
    );
  }
  return inputTokens * price.input + outputTokens * price.output;
}
