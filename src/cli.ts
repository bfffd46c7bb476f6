// src/cli.ts: argument parsing and interactive prompts
import readline from 'readline/promises';
import { parseArgs } from 'util';
import { matchLocations, type LocationMatch } from './services/location-gazetteer';

export interface CliArgs {
  query?: string;
  location?: string;
  help: boolean;
}

export const USAGE = `Usage: query-fanout [query] [--location <place>]

Expands the query into sub-queries, routes them, profiles top-ranking content
for each and writes the run record, content plan and cost summary to OUTPUT_DIR.

Options:
  -l, --location <place>  scope searches to a location (validated against the gazetteer)
  -h, --help              show this message`;

export function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      location: { type: 'string', short: 'l' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });
  const query = positionals.join(' ').trim();
  return {
    query: query || undefined,
    location: values.location?.trim() || undefined,
    help: values.help ?? false,
  };
}

export type Ask = (question: string) => Promise<string>;

export function createAsk(): { ask: Ask; close: () => void } {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return { ask: (question) => rl.question(question), close: () => rl.close() };
}

export type LocationResolution =
  | { status: 'resolved'; location: string; match: LocationMatch }
  | { status: 'unmatched'; input: string };

/**
 * Resolves free text to one gazetteer entry; asks the user to choose when
 * several match. A non-numeric or out-of-range answer picks the best match.
 */
export async function resolveLocation(
  input: string,
  gazetteer: readonly string[],
  ask: Ask | null,
): Promise<LocationResolution> {
  const matches = matchLocations(input, gazetteer);
  if (matches.length === 0) return { status: 'unmatched', input };
  if (matches.length === 1 || !ask) return { status: 'resolved', location: matches[0].location, match: matches[0] };

  const options = matches.slice(0, 9);
  const menu = options.map((m, i) => `  ${i + 1}. ${m.location}`).join('\n');
  const answer = await ask(`"${input}" matches several locations:\n${menu}\nChoose 1-${options.length} [1]: `);
  const choice = Number.parseInt(answer.trim(), 10);
  const picked = choice >= 1 && choice <= options.length ? options[choice - 1] : options[0];
  return { status: 'resolved', location: picked.location, match: picked };
}
