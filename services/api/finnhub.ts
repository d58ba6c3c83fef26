/**
 * Finnhub API Client
 * Free tier: 60 calls/minute
 * Docs: https://finnhub.io/docs/api
 */

import type { NewsProvider, NewsQuery, NewsSearchHit } from '../../types.ts';
import { ApiError, apiErrorFromStatus, fetchWithRetry, type RetryOptions } from '../utils/retry.ts';
import { readJson, timedFetch } from '../utils/http.ts';
import { asRecords, readNumber, readString } from '../utils/financialUtils.ts';

export interface FinnhubOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs: number;
  retry?: RetryOptions;
  now?: () => Date;
}

export const FINNHUB_BASE = 'https://finnhub.io/api/v1';

const PROVIDER = 'Finnhub';
const DAY_MS = 86_400_000;

export const yyyyMmDd = (d: Date) => d.toISOString().slice(0, 10);

/**
 * Company news by ticker. Finnhub has no free-text news search, so sector
 * queries return nothing and are left to the other providers.
 */
export const createFinnhubNewsProvider = (options: FinnhubOptions): NewsProvider => {
  const { apiKey, timeoutMs } = options;
  const baseUrl = options.baseUrl ?? FINNHUB_BASE;
  const now = options.now ?? (() => new Date());
  const retry: RetryOptions = { maxRetries: 2, delayMs: 1000, label: PROVIDER, ...options.retry };

  return {
    name: 'finnhub',

    async searchCompany(query: NewsQuery): Promise<NewsSearchHit[]> {
      if (!apiKey) {
        throw new ApiError('MISSING_KEY', 'FINNHUB_API_KEY not configured', PROVIDER);
      }

      const to = now();
      const from = new Date(to.getTime() - query.lookbackDays * DAY_MS);
      const params = new URLSearchParams({
        symbol: query.ticker,
        from: yyyyMmDd(from),
        to: yyyyMmDd(to),
        token: apiKey
      });

      const data = await fetchWithRetry(async () => {
        const res = await timedFetch(PROVIDER, `${baseUrl}/company-news?${params.toString()}`, timeoutMs);
        if (!res.ok) throw apiErrorFromStatus(PROVIDER, res.status, '/company-news');
        return readJson(PROVIDER, res);
      }, retry);

      const items = asRecords(data)
        .sort((a, b) => (readNumber(b, 'datetime') ?? 0) - (readNumber(a, 'datetime') ?? 0));

      const hits: NewsSearchHit[] = [];
      for (const item of items) {
        const title = readString(item, 'headline');
        const url = readString(item, 'url');
        if (!title || !url) continue;
        const epoch = readNumber(item, 'datetime');
        hits.push({
          title,
          url,
          publishedDate: epoch ? new Date(epoch * 1000).toISOString() : null,
          source: readString(item, 'source') ?? PROVIDER,
          content: null,
          snippet: readString(item, 'summary')
        });
        if (hits.length >= query.maxResults) break;
      }
      return hits;
    },

    async searchSector(): Promise<NewsSearchHit[]> {
      return [];
    }
  };
};
