/**
 * Firecrawl web research client: search, main-content scrape as markdown, and
 * the team's remaining credits for the cost ledger.
 */
import axios, { type AxiosInstance } from 'axios';
import z from 'zod';
import type { CreditSource } from '../../cost-ledger';
import { CollaboratorUnavailableError } from '../../../utils/errors';
import { describeSearchReply } from './search-reply';
import type { ScrapedPage, SearchReply, WebResearchClient, WebSearchOptions } from './types';

const FIRECRAWL_BASE_URL = 'https://api.firecrawl.dev/v1';

const scrapeResponseSchema = z.object({
  data: z
    .object({
      markdown: z.string().nullish(),
    })
    .nullish(),
});

// v1 reports remaining_credits, v2 remainingCredits
const creditResponseSchema = z.object({
  data: z
    .object({
      remaining_credits: z.number().optional(),
      remainingCredits: z.number().optional(),
    })
    .optional(),
});

export interface FirecrawlClientConfig {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
}

export class FirecrawlClient implements WebResearchClient, CreditSource {
  readonly name = 'firecrawl';
  private readonly http: AxiosInstance;

  constructor(config: FirecrawlClientConfig = {}) {
    const apiKey = config.apiKey || process.env.FIRECRAWL_API_KEY;
    if (!apiKey) {
      throw new CollaboratorUnavailableError('firecrawl', 'Missing FIRECRAWL_API_KEY. Set it in .env.');
    }
    this.http =
      config.http ??
      axios.create({
        baseURL: config.baseUrl ?? FIRECRAWL_BASE_URL,
        timeout: config.timeoutMs ?? 60_000,
        headers: {
          Authorization: `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
        },
      });
  }

  async search(query: string, options: WebSearchOptions): Promise<SearchReply> {
    const body: Record<string, unknown> = { query, limit: options.limit };
    if (options.location) body.location = options.location;

    const res = await this.http.post<unknown>('/search', body);
    return describeSearchReply(res.data);
  }

  async scrape(url: string): Promise<ScrapedPage | null> {
    const res = await this.http.post<unknown>('/scrape', {
      url,
      formats: ['markdown'],
      onlyMainContent: true,
    });

    const parsed = scrapeResponseSchema.safeParse(res.data);
    const markdown = parsed.success ? parsed.data.data?.markdown : undefined;
    if (!markdown || markdown.trim() === '') return null;
    return { url, content: markdown };
  }

  async getRemainingCredits(): Promise<number | null> {
    const res = await this.http.get<unknown>('/team/credit-usage');
    const parsed = creditResponseSchema.safeParse(res.data);
    if (!parsed.success) return null;
    return parsed.data.data?.remaining_credits ?? parsed.data.data?.remainingCredits ?? null;
  }
}
