// src/services/pipeline-deps.ts: builds the collaborators for one run
import type { AppConfig } from '../config/appConfig';
import type BaseLLM from '../models/base/llm';
import OpenAILLM from '../models/llms/openai';
import { RetryPolicy } from '../stability/retryPolicy';
import { CostLedger, type CreditSource } from './cost-ledger';
import { FanOutModelRouter } from './model-router';
import { FirecrawlClient } from './providers/web/firecrawl-client';
import { SerpApiWebClient } from './providers/web/serpapi-client';
import type { WebResearchClient } from './providers/web/types';
import type { FanOutDeps } from './fanout-pipeline';

export interface PipelineOverrides {
  llm?: BaseLLM;
  web?: WebResearchClient;
  creditSource?: CreditSource | null;
  retry?: RetryPolicy;
}

function createWebClient(config: AppConfig): WebResearchClient & Partial<CreditSource> {
  const timeoutMs = config.retry.timeoutMs;
  switch (config.web.provider) {
    case 'firecrawl':
      return new FirecrawlClient({ apiKey: config.web.firecrawlApiKey, timeoutMs });
    case 'serpapi':
      return new SerpApiWebClient({ apiKey: config.web.serpApiKey, timeoutMs });
  }
}

function asCreditSource(web: WebResearchClient & Partial<CreditSource>): CreditSource | null {
  const read = web.getRemainingCredits;
  if (typeof read !== 'function') return null;
  return { name: web.name, getRemainingCredits: () => read.call(web) };
}

/**
 * One set of collaborators per run, passed explicitly into every stage.
 * Throws CollaboratorUnavailableError when a required key is missing.
 */
export function createPipelineDeps(config: AppConfig, overrides: PipelineOverrides = {}): FanOutDeps {
  const retry =
    overrides.retry ??
    new RetryPolicy({
      maxRetries: config.retry.maxRetries,
      initialDelayMs: config.retry.initialDelayMs,
      timeoutMs: config.retry.timeoutMs,
    });

  const llm = overrides.llm ?? new OpenAILLM({ model: config.openai.model, apiKey: config.openai.apiKey });
  const web = overrides.web ?? createWebClient(config);
  const creditSource =
    overrides.creditSource !== undefined ? overrides.creditSource : overrides.web ? null : asCreditSource(web);

  const ledger = new CostLedger(creditSource);
  const models = new FanOutModelRouter(llm, retry, ledger);

  return {
    models,
    web,
    retry,
    ledger,
    settings: config.scrape,
    concurrency: config.profileConcurrency,
  };
}
