// src/services/subquery-router.ts
// Stage 2: map every unique sub-query to source types and one modality
// with a single batched model call.
import z from 'zod';
import { MODALITY_TYPES, SOURCE_TYPES, UNKNOWN_LABEL, canonicalize } from '../config/vocabulary';
import type { ExpansionResult, RoutedSubQuery } from '../types/fanout';
import { errorMessage } from '../utils/errors';
import { logger } from './logger';
import type { FanOutModelRouter } from './model-router';

const routeEntrySchema = z.object({
  sub_query: z.string(),
  predicted_source_types: z
    .union([z.array(z.unknown()), z.string()])
    .catch([])
    .transform((value) => (typeof value === 'string' ? [value] : value))
    .transform((items) => items.filter((item): item is string => typeof item === 'string')),
  predicted_modality: z.string().catch(UNKNOWN_LABEL),
});

// JSON mode replies are objects; a bare list is accepted as well.
export const routingReplySchema = z
  .union([z.array(z.unknown()), z.object({ routes: z.array(z.unknown()) })])
  .transform((reply) => (Array.isArray(reply) ? reply : reply.routes))
  .transform((entries) =>
    entries.flatMap((entry) => {
      const parsed = routeEntrySchema.safeParse(entry);
      return parsed.success ? [parsed.data] : [];
    }),
  );

type RouteEntry = z.infer<typeof routeEntrySchema>;

export interface RoutingDeps {
  models: FanOutModelRouter;
}

/**
 * Deduplicated union of rewrites, speculative questions and latent intents,
 * in that order; first occurrence wins.
 */
export function collectSubQueries(expansion: ExpansionResult): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  const all = [
    ...expansion.rewrites_and_diversifications,
    ...expansion.speculative_sub_questions,
    ...expansion.projected_latent_intents,
  ];
  for (const raw of all) {
    const subQuery = raw.trim();
    if (!subQuery || seen.has(subQuery)) continue;
    seen.add(subQuery);
    out.push(subQuery);
  }
  return out;
}

export function fallbackRoute(subQuery: string, error: string): RoutedSubQuery {
  return {
    sub_query: subQuery,
    predicted_source_types: [UNKNOWN_LABEL],
    predicted_modality: UNKNOWN_LABEL,
    error,
  };
}

function toRoutedSubQuery(subQuery: string, entry: RouteEntry): RoutedSubQuery {
  const sourceTypes: string[] = [];
  for (const candidate of entry.predicted_source_types) {
    const canonical = canonicalize(candidate, SOURCE_TYPES);
    if (canonical && !sourceTypes.includes(canonical)) sourceTypes.push(canonical);
  }
  return {
    sub_query: subQuery,
    predicted_source_types: sourceTypes.length > 0 ? sourceTypes : [UNKNOWN_LABEL],
    predicted_modality: canonicalize(entry.predicted_modality, MODALITY_TYPES) ?? UNKNOWN_LABEL,
  };
}

export function buildRoutingPrompt(subQueries: string[]): string {
  return `Analyze the list of sub-queries and determine the most appropriate source types and content modalities for finding the best answers.

Rules:
1. For each sub-query, select one or more source types from this list: ${JSON.stringify(SOURCE_TYPES)}
2. For each sub-query, select the single most appropriate modality from this list: ${JSON.stringify(MODALITY_TYPES)}
3. Copy every sub-query verbatim into "sub_query". Return exactly one entry per sub-query.
4. Return a JSON object with a single key "routes" whose value is the list of entries.

Sub-queries:
${JSON.stringify(subQueries, null, 2)}

Example output:
{
  "routes": [
    {
      "sub_query": "16-week beginner half marathon training plan",
      "predicted_source_types": ["Coaching blogs", "training websites"],
      "predicted_modality": "structured schedules"
    },
    {
      "sub_query": "Half marathon gear checklist",
      "predicted_source_types": ["E-commerce sites", "product review sites"],
      "predicted_modality": "Listicles"
    }
  ]
}`;
}

/**
 * Stage 2. The output always has one entry per unique sub-query, in input
 * order, whatever the model returns.
 */
export async function routeSubQueries(expansion: ExpansionResult, deps: RoutingDeps): Promise<RoutedSubQuery[]> {
  const subQueries = collectSubQueries(expansion);
  if (subQueries.length === 0) {
    logger.warn('routing:no_sub_queries', { query: expansion.original_query });
    return [];
  }

  logger.info('routing:start', { subQueries: subQueries.length });

  let entries: RouteEntry[];
  try {
    entries = await deps.models.generateJson('routing', {
      prompt: buildRoutingPrompt(subQueries),
      schema: routingReplySchema,
      schemaName: 'sub_query_routes',
    });
  } catch (error) {
    logger.error('routing:failed', { error: errorMessage(error) });
    return subQueries.map((subQuery) => fallbackRoute(subQuery, errorMessage(error)));
  }

  const bySubQuery = new Map<string, RouteEntry>();
  for (const entry of entries) {
    const key = entry.sub_query.trim();
    if (!bySubQuery.has(key)) bySubQuery.set(key, entry);
  }

  const routed = subQueries.map((subQuery) => {
    const entry = bySubQuery.get(subQuery);
    return entry ? toRoutedSubQuery(subQuery, entry) : fallbackRoute(subQuery, 'missing from routing reply');
  });

  const missing = routed.filter((r) => r.error).length;
  if (missing > 0) logger.warn('routing:missing_entries', { missing });
  logger.info('routing:done', { routed: routed.length - missing, missing });
  return routed;
}
