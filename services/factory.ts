import type { AppConfig } from '../config/env.ts';
import type { FundamentalsProvider, NewsProvider } from '../types.ts';
import { createFmpProvider } from './api/fmp.ts';
import { createAlphaVantageProvider } from './api/alphavantage.ts';
import { createFinnhubNewsProvider } from './api/finnhub.ts';
import { createTavilyNewsProvider } from './api/tavily.ts';
import { createLlmClient, type LlmClient } from './ai/llm.ts';
import { createSentimentCollator } from './sentiment/collator.ts';
import { createStockRater } from './rating/rater.ts';
import { createHtmlFetcher, type HtmlFetcher } from './utils/http.ts';
import type { PipelineDeps } from './pipeline.ts';

export const createFundamentalsProvider = (config: Readonly<AppConfig>): FundamentalsProvider =>
  config.fundamentalsProvider === 'alphavantage'
    ? createAlphaVantageProvider({ apiKey: config.alphaVantage.apiKey, timeoutMs: config.httpTimeoutMs })
    : createFmpProvider({ apiKey: config.fmp.apiKey, baseUrl: config.fmp.baseUrl, timeoutMs: config.httpTimeoutMs });

export const createNewsProviders = (config: Readonly<AppConfig>): NewsProvider[] =>
  config.newsProviders.map(name =>
    name === 'tavily'
      ? createTavilyNewsProvider({ apiKey: config.tavily.apiKey, timeoutMs: config.httpTimeoutMs })
      : createFinnhubNewsProvider({ apiKey: config.finnhub.apiKey, timeoutMs: config.httpTimeoutMs })
  );

export interface Services extends PipelineDeps {
  llm: LlmClient;
  fetchHtml: HtmlFetcher;
}

/** Wires every client from one validated config. */
export function createServices(config: Readonly<AppConfig>): Services {
  const fundamentals = createFundamentalsProvider(config);
  const llm = createLlmClient(config.llm);
  const fetchHtml = createHtmlFetcher('Web', config.httpTimeoutMs);

  const collator = createSentimentCollator({
    newsProviders: createNewsProviders(config),
    llm,
    meta: fundamentals,
    options: config.news,
    fetchHtml
  });

  return {
    fundamentals,
    collator,
    rater: createStockRater({ llm }),
    llm,
    fetchHtml
  };
}
