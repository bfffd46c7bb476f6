import { describe, expect, it } from 'vitest';
import type { ScrapeSettings } from '../src/config/appConfig';
import {
  NOTHING_SCRAPED_ERROR,
  NO_SEARCH_RESULTS_ERROR,
  profileContentCompetitively,
  scrapeToThreshold,
  truncate,
  type ProfilingDeps,
} from '../src/services/competitive-profiler';
import type { SearchReply, ScrapedPage } from '../src/services/providers/web/types';
import type { RoutedSubQuery } from '../src/types/fanout';
import { RetryExhaustedError } from '../src/utils/errors';
import {
  FakeWebClient,
  IDEAL_PROFILE,
  RateLimitError,
  StubLLM,
  instantRetry,
  listReply,
  pageFor,
  routerWith,
  urlsFor,
  type ScrapeBehavior,
} from './helpers/fakes';

const SETTINGS: ScrapeSettings = {
  maxSearchResults: 10,
  minScrapableResults: 2,
  initialScrapeAttempts: 3,
  maxPageContentChars: 12_000,
};

function hitsFor(urls: string[]) {
  return urls.map((url) => ({ url }));
}

function routed(subQuery: string): RoutedSubQuery {
  return { sub_query: subQuery, predicted_source_types: ['Coaching blogs'], predicted_modality: 'Listicles' };
}

function setup(
  search: (query: string) => Promise<SearchReply>,
  scrape: ScrapeBehavior,
  settings: ScrapeSettings = SETTINGS,
) {
  const llm = new StubLLM({ ideal_content_profile: () => ({ ideal_content_profile: IDEAL_PROFILE }) });
  const web = new FakeWebClient(search, scrape);
  const { models, ledger } = routerWith(llm);
  const deps: ProfilingDeps = { models, web, retry: instantRetry(), settings };
  return { llm, web, ledger, deps };
}

describe('scrapeToThreshold', () => {
  const succeed = async (url: string): Promise<ScrapedPage> => pageFor(url);

  it('stops as soon as the minimum number of pages is reached', async () => {
    const urls = urlsFor('ok', 10);
    const outcome = await scrapeToThreshold(hitsFor(urls), succeed, SETTINGS);

    expect(outcome.pages).toEqual([pageFor(urls[0]), pageFor(urls[1])]);
    expect(outcome.attemptedUrls).toEqual([urls[0], urls[1]]);
    expect(outcome.passes).toBe(1);
  });

  it('widens one hit at a time and never re-attempts a url', async () => {
    const urls = urlsFor('sparse', 10);
    const calls: string[] = [];
    const outcome = await scrapeToThreshold(
      hitsFor(urls),
      async (url) => {
        calls.push(url);
        return url === urls[4] ? pageFor(url) : null;
      },
      { ...SETTINGS, minScrapableResults: 1 },
    );

    expect(calls).toEqual(urls.slice(0, 5));
    expect(outcome.pages).toEqual([pageFor(urls[4])]);
    expect(outcome.passes).toBe(3);
  });

  it('gives up after every hit has been attempted', async () => {
    const urls = urlsFor('dead', 2);
    const outcome = await scrapeToThreshold(hitsFor(urls), async () => null, SETTINGS);

    expect(outcome.pages).toEqual([]);
    expect(outcome.attemptedUrls).toEqual(urls);
    expect(outcome.passes).toBe(1);
  });

  it('never looks past maxSearchResults hits', async () => {
    const urls = urlsFor('capped', 8);
    const calls: string[] = [];
    const outcome = await scrapeToThreshold(
      hitsFor(urls),
      async (url) => {
        calls.push(url);
        return null;
      },
      { ...SETTINGS, maxSearchResults: 5 },
    );

    expect(calls).toEqual(urls.slice(0, 5));
    expect(outcome.passes).toBe(3);
  });

  it('skips pages that fail or come back empty', async () => {
    const urls = urlsFor('mixed', 4);
    const outcome = await scrapeToThreshold(
      hitsFor(urls),
      async (url) => {
        if (url === urls[0]) throw new Error('Request failed with status code 403');
        if (url === urls[1]) return { url, content: '   ' };
        return pageFor(url);
      },
      SETTINGS,
    );

    expect(outcome.pages.map((p) => p.url)).toEqual([urls[2], urls[3]]);
    expect(outcome.attemptedUrls).toEqual(urls);
    expect(outcome.passes).toBe(2);
  });

  it('truncates page content', async () => {
    const urls = urlsFor('long', 1);
    const outcome = await scrapeToThreshold(hitsFor(urls), succeed, {
      ...SETTINGS,
      minScrapableResults: 1,
      maxPageContentChars: 10,
    });

    expect(outcome.pages).toEqual([{ url: urls[0], content: 'Content of' }]);
  });

  it('never splits a surrogate pair when truncating', async () => {
    const urls = urlsFor('emoji', 1);
    const outcome = await scrapeToThreshold(
      hitsFor(urls),
      async (url) => ({ url, content: 'ab\u{1F3C3}cd' }),
      { ...SETTINGS, minScrapableResults: 1, maxPageContentChars: 3 },
    );

    expect(outcome.pages).toEqual([{ url: urls[0], content: 'ab\u{1F3C3}' }]);
    expect(truncate('ab\u{1F3C3}', 2)).toBe('ab');
    expect(truncate('short', 10)).toBe('short');
  });

  it('rethrows RetryExhaustedError', async () => {
    const urls = urlsFor('limited', 3);
    const exhausted = new RetryExhaustedError(`scrape:${urls[0]}`, 4, new RateLimitError());
    await expect(
      scrapeToThreshold(
        hitsFor(urls),
        async () => {
          throw exhausted;
        },
        SETTINGS,
      ),
    ).rejects.toBe(exhausted);
  });
});

describe('profileContentCompetitively', () => {
  it('returns an empty list for empty input', async () => {
    const { deps, web, llm } = setup(async () => listReply([]), async () => null);
    await expect(profileContentCompetitively([], deps)).resolves.toEqual([]);
    expect(web.searches).toEqual([]);
    expect(llm.objectCalls).toEqual([]);
  });

  it('searches, scrapes two pages and synthesizes one profile per item', async () => {
    const urls = urlsFor('plans', 10);
    const { deps, web, llm, ledger } = setup(async () => listReply(urls), async (url) => pageFor(url));
    const input = [routed('beginner half marathon plan')];

    const [result] = await profileContentCompetitively(input, deps, 'Boston,Massachusetts,United States');

    expect(result).toEqual({ ...input[0], ideal_content_profile: IDEAL_PROFILE });
    expect(input[0].ideal_content_profile).toBeUndefined();
    expect(web.searches).toEqual([
      { query: 'beginner half marathon plan', options: { limit: 10, location: 'Boston,Massachusetts,United States' } },
    ]);
    expect(web.scrapes).toEqual([urls[0], urls[1]]);

    const prompt = llm.callsFor('ideal_content_profile')[0].messages[1].content;
    expect(prompt).toContain('Search Query: "beginner half marathon plan"');
    expect(prompt).toContain('Location: Boston,Massachusetts,United States');
    expect(prompt).toContain(`"content": "Content of ${urls[1]}"`);
    expect(ledger.toJSON().calls_by_model).toEqual({ 'stub-model': 1 });
  });

  it('uses Global when no location is given', async () => {
    const urls = urlsFor('global', 3);
    const { deps, llm } = setup(async () => listReply(urls), async (url) => pageFor(url));

    await profileContentCompetitively([routed('easy plan')], deps);

    expect(llm.objectCalls[0].messages[1].content).toContain('Location: Global');
  });

  it('records an error when search finds nothing', async () => {
    const { deps, web, llm } = setup(async () => listReply([]), async (url) => pageFor(url));

    const [result] = await profileContentCompetitively([routed('obscure query')], deps);

    expect(result.ideal_content_profile).toEqual({ error: NO_SEARCH_RESULTS_ERROR });
    expect(web.scrapes).toEqual([]);
    expect(llm.objectCalls).toEqual([]);
  });

  it('records an error when nothing could be scraped', async () => {
    const urls = urlsFor('blocked', 10);
    const { deps, web, llm } = setup(async () => listReply(urls), async () => null);

    const [result] = await profileContentCompetitively([routed('paywalled')], deps);

    expect(result.ideal_content_profile).toEqual({ error: NOTHING_SCRAPED_ERROR });
    expect(web.scrapes).toEqual(urls);
    expect(llm.objectCalls).toEqual([]);
  });

  it('records the reason for an unexpected search reply shape', async () => {
    const { deps } = setup(async () => ({ kind: 'invalid', reason: 'string' }), async (url) => pageFor(url));

    const [result] = await profileContentCompetitively([routed('weird provider')], deps);

    expect(result.ideal_content_profile).toEqual({ error: 'unexpected search reply shape: string' });
  });

  it('fails the item without synthesis when scraping stays rate limited', async () => {
    const urls = urlsFor('throttled', 5);
    const { deps, web, llm } = setup(
      async () => listReply(urls),
      async () => {
        throw new RateLimitError();
      },
    );

    const [result] = await profileContentCompetitively([routed('throttled query')], deps);

    expect(result.ideal_content_profile).toEqual({
      error: `scrape:${urls[0]} failed after 4 attempts: Rate limit exceeded`,
    });
    expect(web.scrapes).toEqual([urls[0], urls[0], urls[0], urls[0]]);
    expect(llm.objectCalls).toEqual([]);
  });

  it('retries a rate-limited search and carries on', async () => {
    const urls = urlsFor('retry', 3);
    let searches = 0;
    const { deps } = setup(
      async () => {
        searches++;
        if (searches === 1) throw new RateLimitError();
        return listReply(urls);
      },
      async (url) => pageFor(url),
    );

    const [result] = await profileContentCompetitively([routed('retry me')], deps);

    expect(searches).toBe(2);
    expect(result.ideal_content_profile).toEqual(IDEAL_PROFILE);
  });

  it('records a malformed synthesis reply as the item error', async () => {
    const urls = urlsFor('garbled', 3);
    const web = new FakeWebClient(async () => listReply(urls), async (url) => pageFor(url));
    const llm = new StubLLM({ ideal_content_profile: () => 'not an object' });
    const { models } = routerWith(llm);

    const [result] = await profileContentCompetitively([routed('garbled')], {
      models,
      web,
      retry: instantRetry(),
      settings: SETTINGS,
    });

    expect(result.ideal_content_profile).toEqual({ error: 'ideal_content_profile: reply did not match schema' });
  });

  it('keeps going after one item fails and preserves order', async () => {
    const urls = urlsFor('fine', 3);
    const { deps } = setup(
      async (query) => {
        if (query === 'broken') throw new Error('search backend unavailable');
        return listReply(urls);
      },
      async (url) => pageFor(url),
      { ...SETTINGS },
    );
    const input = [routed('first'), routed('broken'), routed('last')];

    const results = await profileContentCompetitively(input, { ...deps, concurrency: 2 });

    expect(results.map((r) => r.sub_query)).toEqual(['first', 'broken', 'last']);
    expect(results[0].ideal_content_profile).toEqual(IDEAL_PROFILE);
    expect(results[1].ideal_content_profile).toEqual({ error: 'search backend unavailable' });
    expect(results[2].ideal_content_profile).toEqual(IDEAL_PROFILE);
  });

  it('passes through items with an empty sub-query', async () => {
    const { deps, web } = setup(async () => listReply([]), async () => null);
    const blank = routed('  ');

    const [result] = await profileContentCompetitively([blank], deps);

    expect(result).toBe(blank);
    expect(web.searches).toEqual([]);
  });

  it('fills missing profile fields with N/A', async () => {
    const urls = urlsFor('partial', 3);
    const web = new FakeWebClient(async () => listReply(urls), async (url) => pageFor(url));
    const llm = new StubLLM({
      ideal_content_profile: () => ({
        ideal_content_profile: { extractability: 'Checklists', target_keywords_and_phrasings: ['plan', 3, ''] },
      }),
    });
    const { models } = routerWith(llm);

    const [result] = await profileContentCompetitively([routed('partial')], {
      models,
      web,
      retry: instantRetry(),
      settings: SETTINGS,
    });

    expect(result.ideal_content_profile).toEqual({
      extractability: 'Checklists',
      evidence_density: 'N/A',
      scope_clarity: 'N/A',
      authority_signals: 'N/A',
      freshness: 'N/A',
      target_keywords_and_phrasings: ['plan'],
    });
  });
});
