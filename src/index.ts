#!/usr/bin/env node
// Load environment variables FIRST
import dotenv from 'dotenv';
import path from 'path';
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

import { USAGE, createAsk, parseCliArgs, resolveLocation, type Ask } from './cli';
import { loadConfig } from './config/appConfig';
import { generateContentPlan } from './services/content-plan';
import { runFanOut } from './services/fanout-pipeline';
import { loadGazetteer } from './services/location-gazetteer';
import { attachRunLogFile, logger } from './services/logger';
import { createPipelineDeps } from './services/pipeline-deps';
import { RunStore, runStamp } from './services/run-store';
import { installProcessHandlers } from './stability/errorHandlers';
import { errorMessage } from './utils/errors';

async function promptIfMissing(value: string | undefined, ask: Ask | null, question: string): Promise<string> {
  if (value !== undefined || !ask) return value ?? '';
  return (await ask(question)).trim();
}

async function main(): Promise<number> {
  installProcessHandlers();

  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const config = loadConfig();
  const stamp = runStamp();
  const logFile = attachRunLogFile(config.logDir, stamp);
  logger.info('cli:start', { logFile });

  const interactive = process.stdin.isTTY === true;
  const prompt = interactive ? createAsk() : null;
  const ask = prompt?.ask ?? null;

  let query: string;
  let location: string | undefined;
  try {
    query = await promptIfMissing(args.query, ask, 'Enter your query: ');
    if (!query) {
      logger.error('cli:missing_query');
      process.stderr.write(`${USAGE}\n`);
      return 2;
    }

    const locationInput = await promptIfMissing(
      args.location ?? (args.query ? '' : undefined),
      ask,
      'Enter a location (leave blank for global): ',
    );
    if (locationInput) {
      const resolution = await resolveLocation(locationInput, await loadGazetteer(), ask);
      if (resolution.status === 'resolved') {
        location = resolution.location;
        logger.info('cli:location', { input: locationInput, location, match: resolution.match.kind });
      } else {
        logger.warn('cli:location_unmatched', { input: locationInput, fallback: 'Global' });
      }
    }
  } finally {
    prompt?.close();
  }

  const deps = createPipelineDeps(config);
  const store = new RunStore(config.outputDir, stamp);

  await deps.ledger.startRun();
  const record = await runFanOut({ query, location }, deps);
  await deps.ledger.endRun();

  const dataFile = await store.saveRecord(record, deps.ledger.toJSON());
  logger.info('cli:saved_record', { file: dataFile });

  const planFile = await store.savePlan(generateContentPlan(record));
  logger.info('cli:saved_plan', { file: planFile });

  const summary = deps.ledger.summary();
  const costFile = await store.saveCostSummary(summary);
  logger.info('cli:saved_costs', { file: costFile });
  process.stdout.write(`${summary}\n`);

  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.fatal('cli:failed', { error: errorMessage(error) });
    process.exitCode = 1;
  });
