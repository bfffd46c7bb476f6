// src/services/query-expansion.ts
// Stage 1: deconstruct the query into intent, slots, latent intents, rewrites
// and speculative sub-questions with one structured model call.
import z from 'zod';
import expansionExample from '../data/expansion-example.json';
import type { ExpansionResult } from '../types/fanout';
import { errorMessage } from '../utils/errors';
import { logger } from './logger';
import type { FanOutModelRouter } from './model-router';

const label = (fallback: string) => z.string().trim().min(1).catch(fallback);

const stringList = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items
      .filter((item): item is string => typeof item === 'string')
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  );

const slotMap = z
  .record(z.unknown())
  .catch({})
  .transform((slots) => {
    const out: Record<string, string> = {};
    for (const [key, value] of Object.entries(slots)) {
      if (value === null || value === undefined) continue;
      out[key] = typeof value === 'string' ? value : JSON.stringify(value);
    }
    return out;
  });

export const expansionReplySchema = z.object({
  classified_intent: label('unknown'),
  domain: label('unknown'),
  subdomain: label('unknown'),
  risk_profile: label('low'),
  identified_slots: z
    .object({
      explicit: slotMap,
      implicit: slotMap,
    })
    .catch({ explicit: {}, implicit: {} }),
  projected_latent_intents: stringList,
  rewrites_and_diversifications: stringList,
  speculative_sub_questions: stringList,
});

export type ExpansionReply = z.infer<typeof expansionReplySchema>;

export interface ExpansionDeps {
  models: FanOutModelRouter;
}

/** An ExpansionResult with every sequence empty; used when the model call fails. */
export function emptyExpansion(query: string, error?: string): ExpansionResult {
  return {
    original_query: query,
    classified_intent: 'unknown',
    domain: 'unknown',
    subdomain: 'unknown',
    risk_profile: 'low',
    identified_slots: { explicit: {}, implicit: {} },
    projected_latent_intents: [],
    rewrites_and_diversifications: [],
    speculative_sub_questions: [],
    ...(error !== undefined ? { error } : {}),
  };
}

export function buildExpansionPrompt(query: string): string {
  return `Deconstruct and expand the user's search query the way a generative search engine does before it fans out retrieval.

Do the following:
1. Classify the query: task type (classified_intent), domain, subdomain and risk profile (mention YMYL or safety concerns when present).
2. Identify slots: "explicit" slots stated in the query and "implicit" slots the user left open (use "unknown" as the value when it cannot be inferred).
3. Project latent intents: 5-8 related needs the user is likely to have next.
4. Write 3-6 rewrites and diversifications: alternative phrasings and narrower variants.
5. Write 3-6 speculative sub-questions the user would plausibly ask as follow-ups.

Every list item must be a standalone search string. Do not repeat the same idea in different words.

Worked example for the query "${expansionExample.original_query}":
${JSON.stringify(expansionExample, null, 2)}

User query: "${query}"`;
}

/**
 * Stage 1. Never throws: any collaborator failure degrades to an empty
 * expansion carrying `error`, which routing treats as "no sub-queries".
 */
export async function expandQuery(query: string, deps: ExpansionDeps): Promise<ExpansionResult> {
  logger.info('expansion:start', { query });

  try {
    const reply = await deps.models.generateJson('expansion', {
      prompt: buildExpansionPrompt(query),
      schema: expansionReplySchema,
      schemaName: 'query_expansion',
    });

    const result: ExpansionResult = { original_query: query, ...reply };
    logger.info('expansion:done', {
      intent: result.classified_intent,
      latentIntents: result.projected_latent_intents.length,
      rewrites: result.rewrites_and_diversifications.length,
      speculativeQuestions: result.speculative_sub_questions.length,
    });
    return result;
  } catch (error) {
    logger.error('expansion:failed', { query, error: errorMessage(error) });
    return emptyExpansion(query, errorMessage(error));
  }
}
