// src/services/fanout-pipeline.ts: Expansion -> Routing -> Competitive Profiling
import { randomUUID } from 'crypto';
import type { FanOutRunRecord } from '../types/fanout';
import type { CostLedger } from './cost-ledger';
import { profileContentCompetitively, type ProfilingDeps } from './competitive-profiler';
import { logger } from './logger';
import { expandQuery } from './query-expansion';
import { routeSubQueries } from './subquery-router';

export interface FanOutDeps extends ProfilingDeps {
  ledger: CostLedger;
}

export interface FanOutInput {
  query: string;
  location?: string | null;
}

/**
 * Runs stages 1-3 for one query. Per-item failures end up as `error` fields
 * in the record; nothing here throws for them.
 */
export async function runFanOut(input: FanOutInput, deps: FanOutDeps): Promise<FanOutRunRecord> {
  const query = input.query.trim();
  const location = input.location?.trim() || undefined;
  const runId = randomUUID();
  const startedAt = new Date().toISOString();

  logger.info('pipeline:start', { runId, query, location: location ?? 'Global' });

  logger.info('pipeline:stage', { stage: 1, name: 'query expansion and latent intent mining' });
  const expansion = await expandQuery(query, deps);

  logger.info('pipeline:stage', { stage: 2, name: 'sub-query routing and fan-out mapping' });
  const routed = await routeSubQueries(expansion, deps);

  logger.info('pipeline:stage', { stage: 3, name: 'competitive content profiling' });
  const profiled = await profileContentCompetitively(routed, deps, location);

  const failed = profiled.filter((p) => p.ideal_content_profile && 'error' in p.ideal_content_profile).length;
  logger.info('pipeline:done', { runId, subQueries: profiled.length, unprofiled: failed });

  return {
    run_id: runId,
    started_at: startedAt,
    original_query: query,
    location: location ?? null,
    expansion,
    routed_and_profiled: profiled,
  };
}
