/** App configuration, read from the environment (see .env.example). */
import z from 'zod';
import { ConfigError } from '../utils/errors';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  MAX_SEARCH_RESULTS: positiveInt(10),
  MIN_SCRAPABLE_RESULTS: positiveInt(2),
  INITIAL_SCRAPE_ATTEMPTS: positiveInt(3),
  // seconds
  INITIAL_DELAY: z.coerce.number().int().nonnegative().default(5),
  MAX_RETRIES: positiveInt(4),
  CALL_TIMEOUT_MS: positiveInt(60_000),
  PROFILE_CONCURRENCY: positiveInt(1),
  MAX_PAGE_CONTENT_CHARS: positiveInt(12_000),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  OPENAI_API_KEY: z.string().optional(),
  WEB_PROVIDER: z.enum(['firecrawl', 'serpapi']).default('firecrawl'),
  FIRECRAWL_API_KEY: z.string().optional(),
  SERPAPI_KEY: z.string().optional(),
  OUTPUT_DIR: z.string().min(1).default('outputs'),
  LOG_DIR: z.string().min(1).default('logs'),
});

export type WebProvider = z.infer<typeof envSchema>['WEB_PROVIDER'];

export interface ScrapeSettings {
  maxSearchResults: number;
  minScrapableResults: number;
  initialScrapeAttempts: number;
  maxPageContentChars: number;
}

export interface RetrySettings {
  maxRetries: number;
  initialDelayMs: number;
  timeoutMs: number;
}

export interface AppConfig {
  scrape: ScrapeSettings;
  retry: RetrySettings;
  profileConcurrency: number;
  openai: { model: string; apiKey?: string };
  web: { provider: WebProvider; firecrawlApiKey?: string; serpApiKey?: string };
  outputDir: string;
  logDir: string;
}

/** Blank variables count as unset so an empty line in .env keeps the default. */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value.trim();
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigError(
      `Invalid configuration: ${issues.map((i) => `${i.path} (${i.message})`).join(', ')}`,
      issues,
    );
  }
  const e = parsed.data;
  if (e.INITIAL_SCRAPE_ATTEMPTS > e.MAX_SEARCH_RESULTS) {
    throw new ConfigError('Invalid configuration: INITIAL_SCRAPE_ATTEMPTS exceeds MAX_SEARCH_RESULTS', [
      { path: 'INITIAL_SCRAPE_ATTEMPTS', message: 'must not exceed MAX_SEARCH_RESULTS' },
    ]);
  }

  return {
    scrape: {
      maxSearchResults: e.MAX_SEARCH_RESULTS,
      minScrapableResults: e.MIN_SCRAPABLE_RESULTS,
      initialScrapeAttempts: e.INITIAL_SCRAPE_ATTEMPTS,
      maxPageContentChars: e.MAX_PAGE_CONTENT_CHARS,
    },
    retry: {
      maxRetries: e.MAX_RETRIES,
      initialDelayMs: e.INITIAL_DELAY * 1000,
      timeoutMs: e.CALL_TIMEOUT_MS,
    },
    profileConcurrency: e.PROFILE_CONCURRENCY,
    openai: { model: e.OPENAI_MODEL, apiKey: e.OPENAI_API_KEY },
    web: {
      provider: e.WEB_PROVIDER,
      firecrawlApiKey: e.FIRECRAWL_API_KEY,
      serpApiKey: e.SERPAPI_KEY,
    },
    outputDir: e.OUTPUT_DIR,
    logDir: e.LOG_DIR,
  };
}
