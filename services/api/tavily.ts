/**
 * Tavily search client (news topic).
 * Docs: https://docs.tavily.com/documentation/api-reference/endpoint/search
 */

import type { NewsProvider, NewsQuery, NewsSearchHit } from '../../types.ts';
import { ApiError, apiErrorFromStatus, fetchWithRetry, type RetryOptions } from '../utils/retry.ts';
import { readJson, timedFetch } from '../utils/http.ts';
import { asRecords, isRecord, readString } from '../utils/financialUtils.ts';

export interface TavilyOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs: number;
  retry?: RetryOptions;
}

export const TAVILY_BASE = 'https://api.tavily.com';

const PROVIDER = 'Tavily';

const hostOf = (url: string): string => {
  try {
    return new URL(url).hostname.replace(/^www\./, '');
  } catch {
    return PROVIDER;
  }
};

export const createTavilyNewsProvider = (options: TavilyOptions): NewsProvider => {
  const { apiKey, timeoutMs } = options;
  const baseUrl = options.baseUrl ?? TAVILY_BASE;
  const retry: RetryOptions = { maxRetries: 2, delayMs: 1000, label: PROVIDER, ...options.retry };

  const search = async (text: string, query: NewsQuery): Promise<NewsSearchHit[]> => {
    if (!apiKey) {
      throw new ApiError('MISSING_KEY', 'TAVILY_API_KEY not configured', PROVIDER);
    }

    const data = await fetchWithRetry(async () => {
      const res = await timedFetch(PROVIDER, `${baseUrl}/search`, timeoutMs, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${apiKey}` },
        body: JSON.stringify({
          query: text,
          topic: 'news',
          days: query.lookbackDays,
          max_results: query.maxResults,
          include_raw_content: true
        })
      });
      if (!res.ok) throw apiErrorFromStatus(PROVIDER, res.status, '/search');
      return readJson(PROVIDER, res);
    }, retry);

    const results = isRecord(data) ? asRecords(data.results) : [];
    const hits: NewsSearchHit[] = [];
    for (const item of results) {
      const title = readString(item, 'title');
      const url = readString(item, 'url');
      if (!title || !url) continue;
      hits.push({
        title,
        url,
        publishedDate: readString(item, 'published_date'),
        source: hostOf(url),
        content: readString(item, 'raw_content'),
        snippet: readString(item, 'content')
      });
    }
    return hits.slice(0, query.maxResults);
  };

  return {
    name: 'tavily',
    searchCompany: query => search(query.text, query),
    searchSector: query => search(query.text, query)
  };
};
