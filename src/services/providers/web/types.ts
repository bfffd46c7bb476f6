// Web research collaborator contract: search + scrape, normalized.

export interface SearchHit {
  url: string;
  title?: string;
}

export interface ScrapedPage {
  url: string;
  content: string;
}

/**
 * Every shape a search provider has been seen to reply with. Clients either
 * tag their raw body with describeSearchReply() or return typed hits.
 */
export type SearchReply =
  | { kind: 'list'; items: unknown[] }
  | { kind: 'wrapped'; key: string; items: unknown[] }
  | { kind: 'typed'; hits: SearchHit[] }
  | { kind: 'invalid'; reason: string };

export interface WebSearchOptions {
  limit: number;
  location?: string;
}

export interface WebResearchClient {
  readonly name: string;
  search(query: string, options: WebSearchOptions): Promise<SearchReply>;
  /** Main content of the page as markdown, or null when there is none. */
  scrape(url: string): Promise<ScrapedPage | null>;
}
