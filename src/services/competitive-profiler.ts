// src/services/competitive-profiler.ts
// Stage 3: for every routed sub-query, search, scrape top results until enough
// usable pages are in hand, then have the model synthesize the ideal content
// profile from them. Each item is its own failure boundary.
import z from 'zod';
import type { ScrapeSettings } from '../config/appConfig';
import type { RetryPolicy } from '../stability/retryPolicy';
import type { ContentProfile, IdealContentProfile, RoutedSubQuery } from '../types/fanout';
import { mapWithConcurrency } from '../utils/concurrency';
import { RetryExhaustedError, errorMessage } from '../utils/errors';
import { logger } from './logger';
import type { FanOutModelRouter } from './model-router';
import { searchReplyToHits } from './providers/web/search-reply';
import type { ScrapedPage, SearchHit, WebResearchClient } from './providers/web/types';

export const NO_SEARCH_RESULTS_ERROR = 'no search results found to analyze';
export const NOTHING_SCRAPED_ERROR = 'could not scrape top search results';
const GLOBAL_LOCATION = 'Global';

const profileText = z.string().trim().min(1).catch('N/A');

const idealContentProfileSchema = z.object({
  extractability: profileText,
  evidence_density: profileText,
  scope_clarity: profileText,
  authority_signals: profileText,
  freshness: profileText,
  target_keywords_and_phrasings: z
    .array(z.unknown())
    .catch([])
    .transform((items) =>
      items.filter((item): item is string => typeof item === 'string' && item.trim().length > 0),
    ),
});

export const profileReplySchema = z.object({
  ideal_content_profile: idealContentProfileSchema,
});

export interface ProfilingDeps {
  models: FanOutModelRouter;
  web: WebResearchClient;
  retry: RetryPolicy;
  settings: ScrapeSettings;
  concurrency?: number;
}

export interface ScrapeOutcome {
  pages: ScrapedPage[];
  attemptedUrls: string[];
  passes: number;
}

export type ScrapeFn = (url: string) => Promise<ScrapedPage | null>;

// counts code points so a surrogate pair is never split
export function truncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return Array.from(text).slice(0, maxChars).join('');
}

/**
 * Bounded-widening scrape. Each pass looks at the first `count` hits, scrapes
 * the ones not yet attempted and stops as soon as `minScrapableResults` pages
 * are in hand; an unmet pass widens `count` by one, up to `maxSearchResults`.
 *
 * Per-URL failures are skipped. RetryExhaustedError (the provider kept rate
 * limiting) is rethrown to the caller's item boundary.
 */
export async function scrapeToThreshold(
  hits: readonly SearchHit[],
  scrape: ScrapeFn,
  settings: ScrapeSettings,
): Promise<ScrapeOutcome> {
  const pages: ScrapedPage[] = [];
  const attempted = new Set<string>();
  const enough = () => pages.length >= settings.minScrapableResults;

  let count = settings.initialScrapeAttempts;
  let passes = 0;

  while (!enough() && count <= settings.maxSearchResults) {
    passes++;
    const batch = hits.slice(0, count).filter((hit) => !attempted.has(hit.url));

    for (const hit of batch) {
      attempted.add(hit.url);
      let page: ScrapedPage | null = null;
      try {
        page = await scrape(hit.url);
      } catch (error) {
        if (error instanceof RetryExhaustedError) throw error;
        logger.warn('profiling:scrape_failed', { url: hit.url, error: errorMessage(error) });
      }

      if (page && page.content.trim() !== '') {
        pages.push({ url: page.url, content: truncate(page.content, settings.maxPageContentChars) });
      } else if (page) {
        logger.warn('profiling:scrape_empty', { url: hit.url });
      }
      if (enough()) break;
    }

    if (enough() || attempted.size >= hits.length) break;
    count++;
  }

  return { pages, attemptedUrls: [...attempted], passes };
}

export function buildProfilePrompt(subQuery: string, location: string | undefined, pages: ScrapedPage[]): string {
  return `Analyze the content of the top-ranking web pages for a search query and synthesize an "ideal content profile" for a new piece of content intended to outperform them.

Search Query: "${subQuery}"
Location: ${location ?? GLOBAL_LOCATION}

Analysis context (content from the top ${pages.length} ranking pages):
\`\`\`json
${JSON.stringify(pages, null, 2)}
\`\`\`

Based only on the provided context, identify the pages' common strengths and describe the ideal profile using these criteria:
1. extractability: the best structure and format (e.g. "H2/H3 sections for key questions, a comparison table, a summary checklist").
2. evidence_density: the kind of specific, fact-rich information the pages provide.
3. scope_clarity: how the pages define their audience and applicability.
4. authority_signals: the sources, experts or data they reference to build trust.
5. freshness: how recent the information needs to be.
6. target_keywords_and_phrasings: the keywords and phrasings the pages share, as a list of strings.

Return a JSON object with a single key "ideal_content_profile" whose value is an object with the six keys above.`;
}

async function profileItem(
  item: RoutedSubQuery,
  deps: ProfilingDeps,
  location: string | undefined,
): Promise<ContentProfile> {
  const subQuery = item.sub_query;
  const { settings } = deps;

  const reply = await deps.retry.execute(`search:${subQuery}`, () =>
    deps.web.search(subQuery, { limit: settings.maxSearchResults, location }),
  );
  const hits = searchReplyToHits(reply).slice(0, settings.maxSearchResults);
  if (hits.length === 0) {
    logger.warn('profiling:no_search_results', { subQuery });
    return { error: NO_SEARCH_RESULTS_ERROR };
  }

  const outcome = await scrapeToThreshold(
    hits,
    (url) => deps.retry.execute(`scrape:${url}`, () => deps.web.scrape(url)),
    settings,
  );
  logger.info('profiling:scraped', {
    subQuery,
    pages: outcome.pages.length,
    attempted: outcome.attemptedUrls.length,
    passes: outcome.passes,
  });

  if (outcome.pages.length === 0) {
    return { error: NOTHING_SCRAPED_ERROR };
  }

  const analysis = await deps.models.generateJson('profiling', {
    prompt: buildProfilePrompt(subQuery, location, outcome.pages),
    schema: profileReplySchema,
    schemaName: 'ideal_content_profile',
  });
  const profile: IdealContentProfile = analysis.ideal_content_profile;
  return profile;
}

/**
 * Stage 3. Returns the routed items augmented with `ideal_content_profile`,
 * in input order. Never throws for a single item's failure.
 */
export async function profileContentCompetitively(
  routed: readonly RoutedSubQuery[],
  deps: ProfilingDeps,
  location?: string,
): Promise<RoutedSubQuery[]> {
  if (routed.length === 0) {
    logger.warn('profiling:nothing_to_profile');
    return [];
  }

  logger.info('profiling:start', { items: routed.length, location: location ?? GLOBAL_LOCATION });

  const results = await mapWithConcurrency(routed, deps.concurrency ?? 1, async (item, index) => {
    if (!item.sub_query.trim()) return item;

    logger.info('profiling:item_start', { index: index + 1, of: routed.length, subQuery: item.sub_query });
    try {
      const profile = await profileItem(item, deps, location);
      if ('error' in profile) {
        logger.warn('profiling:item_unprofiled', { subQuery: item.sub_query, error: profile.error });
      }
      return { ...item, ideal_content_profile: profile };
    } catch (error) {
      logger.error('profiling:item_failed', { subQuery: item.sub_query, error: errorMessage(error) });
      return { ...item, ideal_content_profile: { error: errorMessage(error) } };
    }
  });

  logger.info('profiling:done', { items: results.length });
  return results;
}
