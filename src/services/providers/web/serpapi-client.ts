/**
 * SerpAPI search + direct page fetch. Pages are converted from HTML to
 * markdown with turndown after dropping page chrome.
 */
import axios, { type AxiosInstance } from 'axios';
import TurnDown from 'turndown';
import z from 'zod';
import { CollaboratorUnavailableError } from '../../../utils/errors';
import type { ScrapedPage, SearchReply, WebResearchClient, WebSearchOptions } from './types';

const SERPAPI_URL = 'https://serpapi.com/search.json';

const USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36';

const organicSchema = z.object({
  organic_results: z.array(
    z.object({
      link: z.string(),
      title: z.string().optional(),
    }),
  ),
});

export function createTurndown(): TurnDown {
  const turndown = new TurnDown({ headingStyle: 'atx', codeBlockStyle: 'fenced' });
  turndown.remove(['script', 'style', 'noscript', 'nav', 'footer', 'header', 'aside', 'form', 'iframe']);
  return turndown;
}

// most specific first
const CONTENT_ELEMENTS = [/<main[\s\S]*?<\/main>/i, /<article[\s\S]*?<\/article>/i, /<body[\s\S]*?<\/body>/i];

/** HTML body of a page reduced to its readable markdown. */
export function htmlToMarkdown(html: string, turndown: TurnDown = createTurndown()): string {
  const fragment = CONTENT_ELEMENTS.map((re) => html.match(re)?.[0]).find((m) => m !== undefined) ?? html;
  return turndown
    .turndown(fragment)
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export interface SerpApiClientConfig {
  apiKey?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
}

export class SerpApiWebClient implements WebResearchClient {
  readonly name = 'serpapi';
  private readonly apiKey: string;
  private readonly http: AxiosInstance;
  private readonly turndown = createTurndown();

  constructor(config: SerpApiClientConfig = {}) {
    const apiKey = config.apiKey || process.env.SERPAPI_KEY;
    if (!apiKey) {
      throw new CollaboratorUnavailableError('serpapi', 'Missing SERPAPI_KEY. Set it in .env.');
    }
    this.apiKey = apiKey;
    this.http = config.http ?? axios.create({ timeout: config.timeoutMs ?? 30_000 });
  }

  async search(query: string, options: WebSearchOptions): Promise<SearchReply> {
    const res = await this.http.get<unknown>(SERPAPI_URL, {
      params: {
        engine: 'google',
        q: query,
        api_key: this.apiKey,
        num: options.limit,
        hl: 'en',
        ...(options.location ? { location: options.location } : {}),
      },
    });

    const parsed = organicSchema.safeParse(res.data);
    if (!parsed.success) {
      return { kind: 'invalid', reason: 'no organic_results in SerpAPI reply' };
    }
    return {
      kind: 'typed',
      hits: parsed.data.organic_results.map((r) => (r.title ? { url: r.link, title: r.title } : { url: r.link })),
    };
  }

  async scrape(url: string): Promise<ScrapedPage | null> {
    const res = await this.http.get<string>(url, {
      headers: { 'User-Agent': USER_AGENT, Accept: 'text/html' },
      responseType: 'text',
    });
    if (typeof res.data !== 'string') return null;

    const markdown = htmlToMarkdown(res.data, this.turndown);
    return markdown ? { url, content: markdown } : null;
  }
}
