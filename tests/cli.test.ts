import { describe, expect, it, vi } from 'vitest';
import { parseCliArgs, resolveLocation } from '../src/cli';

const GAZETTEER = [
  'Portland,Oregon,United States',
  'Portland,Maine,United States',
  'Boston,Massachusetts,United States',
];

describe('parseCliArgs', () => {
  it('joins positionals into the query and reads the location flag', () => {
    expect(parseCliArgs(['best', 'half', 'marathon', '-l', ' Boston '])).toEqual({
      query: 'best half marathon',
      location: 'Boston',
      help: false,
    });
  });

  it('leaves missing values undefined', () => {
    expect(parseCliArgs([])).toEqual({ query: undefined, location: undefined, help: false });
  });

  it('reads the help flag', () => {
    expect(parseCliArgs(['--help']).help).toBe(true);
  });
});

describe('resolveLocation', () => {
  it('reports input that matches nothing', async () => {
    const ask = vi.fn(async (_question: string) => '1');
    await expect(resolveLocation('Atlantis', GAZETTEER, ask)).resolves.toEqual({ status: 'unmatched', input: 'Atlantis' });
    expect(ask).not.toHaveBeenCalled();
  });

  it('resolves a single match without asking', async () => {
    const ask = vi.fn(async (_question: string) => '1');
    const resolution = await resolveLocation('boston', GAZETTEER, ask);
    expect(resolution).toEqual({
      status: 'resolved',
      location: 'Boston,Massachusetts,United States',
      match: { location: 'Boston,Massachusetts,United States', kind: 'exact', score: 1 },
    });
    expect(ask).not.toHaveBeenCalled();
  });

  it('asks the user to choose between several matches', async () => {
    const ask = vi.fn(async (_question: string) => '2');
    const resolution = await resolveLocation('Portland', GAZETTEER, ask);

    expect(ask).toHaveBeenCalledWith(
      '"Portland" matches several locations:\n  1. Portland,Oregon,United States\n  2. Portland,Maine,United States\nChoose 1-2 [1]: ',
    );
    expect(resolution.status === 'resolved' && resolution.location).toBe('Portland,Maine,United States');
  });

  it('takes the first match for an invalid answer or without a prompt', async () => {
    const invalid = await resolveLocation('Portland', GAZETTEER, async () => '7');
    const silent = await resolveLocation('Portland', GAZETTEER, null);

    expect(invalid.status === 'resolved' && invalid.location).toBe('Portland,Oregon,United States');
    expect(silent.status === 'resolved' && silent.location).toBe('Portland,Oregon,United States');
  });
});
