/**
 * Financial Modeling Prep API Client
 * Free tier: 250 requests/day
 * Docs: https://site.financialmodelingprep.com/developer/docs
 */

import type { CompanyMeta, FundamentalsProvider, StatementField, StatementPeriod } from '../../types.ts';
import { ApiError, apiErrorFromStatus, fetchWithRetry, type RetryOptions } from '../utils/retry.ts';
import { readJson, timedFetch } from '../utils/http.ts';
import { asRecords, isRecord, readNumber, readString, type JsonRecord } from '../utils/financialUtils.ts';

export interface FmpOptions {
  apiKey?: string;
  baseUrl: string;
  timeoutMs: number;
  retry?: RetryOptions;
}

/** Quarters requested per statement; YoY deltas need four beyond the four kept. */
export const FMP_PERIOD_LIMIT = 8;

const PROVIDER = 'FMP';

const INCOME_FIELDS: [StatementField, string][] = [
  ['reportedEPS', 'eps'],
  ['revenue', 'revenue'],
  ['netIncome', 'netIncome'],
  ['sharesOutstanding', 'weightedAverageShsOut']
];

const BALANCE_FIELDS: [StatementField, string][] = [
  ['totalAssets', 'totalAssets'],
  ['totalLiabilities', 'totalLiabilities'],
  ['totalCurrentAssets', 'totalCurrentAssets'],
  ['totalCurrentLiabilities', 'totalCurrentLiabilities'],
  ['inventory', 'inventory'],
  ['shareholderEquity', 'totalStockholdersEquity']
];

const CASH_FLOW_FIELDS: [StatementField, string][] = [
  ['operatingCashFlow', 'operatingCashFlow'],
  ['capitalExpenditure', 'capitalExpenditure'],
  ['freeCashFlow', 'freeCashFlow']
];

/**
 * FMP answers some failures with 200 OK and an "Error Message" body.
 */
const classifyErrorMessage = (message: string): ApiError => {
  if (message.includes('Limit') || message.includes('Premium')) {
    return new ApiError('RATE_LIMIT', `FMP limit/premium restriction: ${message}`, PROVIDER);
  }
  if (/invalid api key/i.test(message)) {
    return new ApiError('AUTH', `FMP rejected the API key: ${message}`, PROVIDER);
  }
  return new ApiError('NOT_FOUND', `FMP error: ${message}`, PROVIDER);
};

const pickFields = (row: JsonRecord | undefined, fields: [StatementField, string][], into: StatementPeriod['values']) => {
  for (const [field, key] of fields) {
    into[field] = row ? readNumber(row, key) : null;
  }
};

const byDate = (rows: JsonRecord[]) => {
  const map = new Map<string, JsonRecord>();
  for (const row of rows) {
    const date = readString(row, 'date');
    if (date && !map.has(date)) map.set(date, row);
  }
  return map;
};

export const createFmpProvider = (options: FmpOptions): FundamentalsProvider => {
  const { apiKey, baseUrl, timeoutMs } = options;
  const retry: RetryOptions = { maxRetries: 2, delayMs: 1000, backoffMultiplier: 2, label: PROVIDER, ...options.retry };

  const fetchData = async (endpoint: string, params: Record<string, string>): Promise<unknown> => {
    if (!apiKey) {
      console.error('[FMP] API key is missing or empty.');
      throw new ApiError('MISSING_KEY', 'FMP_API_KEY not configured', PROVIDER);
    }

    return fetchWithRetry(async () => {
      const query = new URLSearchParams({ ...params, apikey: apiKey });
      console.log(`[FMP] Fetching ${endpoint} (${params.symbol ?? ''})`);

      const res = await timedFetch(PROVIDER, `${baseUrl}${endpoint}?${query.toString()}`, timeoutMs);
      if (!res.ok) {
        throw apiErrorFromStatus(PROVIDER, res.status, endpoint);
      }

      const data = await readJson(PROVIDER, res);
      if (isRecord(data)) {
        const message = readString(data, 'Error Message');
        if (message) throw classifyErrorMessage(message);
      }
      return data;
    }, retry);
  };

  const fetchStatement = async (endpoint: string, ticker: string) =>
    asRecords(await fetchData(endpoint, { symbol: ticker, period: 'quarter', limit: String(FMP_PERIOD_LIMIT) }));

  return {
    name: 'fmp',

    async fetchFundamentals(ticker: string): Promise<StatementPeriod[]> {
      // Sequential: the free tier counts every call.
      const income = await fetchStatement('/income-statement', ticker);
      if (income.length === 0) {
        throw new ApiError('NOT_FOUND', `FMP has no quarterly statements for ${ticker}`, PROVIDER);
      }
      const balance = byDate(await fetchStatement('/balance-sheet-statement', ticker));
      const cashFlow = byDate(await fetchStatement('/cash-flow-statement', ticker));

      const periods: StatementPeriod[] = [];
      for (const [date, row] of byDate(income)) {
        const values: StatementPeriod['values'] = {};
        pickFields(row, INCOME_FIELDS, values);
        pickFields(balance.get(date), BALANCE_FIELDS, values);
        pickFields(cashFlow.get(date), CASH_FLOW_FIELDS, values);

        // FMP reports capex as a negative outflow
        const capex = values.capitalExpenditure;
        values.capitalExpenditure = capex == null ? null : Math.abs(capex);
        values.estimatedEPS = null;
        values.surprisePercentage = null;

        periods.push({ fiscalDateEnding: date, values });
      }

      return periods
        .sort((a, b) => b.fiscalDateEnding.localeCompare(a.fiscalDateEnding))
        .slice(0, FMP_PERIOD_LIMIT);
    },

    async fetchCompanyMeta(ticker: string): Promise<CompanyMeta> {
      const [profile] = asRecords(await fetchData('/profile', { symbol: ticker }));
      if (!profile) {
        throw new ApiError('NOT_FOUND', `FMP has no profile for ${ticker}`, PROVIDER);
      }
      return {
        symbol: readString(profile, 'symbol') ?? ticker,
        name: readString(profile, 'companyName'),
        sector: readString(profile, 'sector'),
        industry: readString(profile, 'industry'),
        exchange: readString(profile, 'exchange') ?? readString(profile, 'exchangeShortName'),
        currency: readString(profile, 'currency'),
        marketCap: readNumber(profile, 'marketCap') ?? readNumber(profile, 'mktCap')
      };
    }
  };
};
