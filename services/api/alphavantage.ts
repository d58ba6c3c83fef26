/**
 * Alpha Vantage API Client
 * Free tier: 25 requests/day, 5/minute
 * Docs: https://www.alphavantage.co/documentation/
 */

import type { CompanyMeta, FundamentalsProvider, StatementField, StatementPeriod } from '../../types.ts';
import { ApiError, apiErrorFromStatus, fetchWithRetry, type RetryOptions } from '../utils/retry.ts';
import { readJson, timedFetch } from '../utils/http.ts';
import { asRecords, isRecord, readNumber, readString, type JsonRecord } from '../utils/financialUtils.ts';

export interface AlphaVantageOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs: number;
  retry?: RetryOptions;
}

export const ALPHAVANTAGE_BASE = 'https://www.alphavantage.co/query';

const PROVIDER = 'AlphaVantage';
const PERIOD_LIMIT = 8;

type AvFunction = 'EARNINGS' | 'INCOME_STATEMENT' | 'BALANCE_SHEET' | 'CASH_FLOW' | 'OVERVIEW';

const EARNINGS_FIELDS: [StatementField, string][] = [
  ['reportedEPS', 'reportedEPS'],
  ['estimatedEPS', 'estimatedEPS'],
  ['surprisePercentage', 'surprisePercentage']
];

const INCOME_FIELDS: [StatementField, string][] = [
  ['revenue', 'totalRevenue'],
  ['netIncome', 'netIncome']
];

const BALANCE_FIELDS: [StatementField, string][] = [
  ['totalAssets', 'totalAssets'],
  ['totalLiabilities', 'totalLiabilities'],
  ['totalCurrentAssets', 'totalCurrentAssets'],
  ['totalCurrentLiabilities', 'totalCurrentLiabilities'],
  ['inventory', 'inventory'],
  ['shareholderEquity', 'totalShareholderEquity'],
  ['sharesOutstanding', 'commonStockSharesOutstanding']
];

const CASH_FLOW_FIELDS: [StatementField, string][] = [
  ['operatingCashFlow', 'operatingCashflow'],
  ['capitalExpenditure', 'capitalExpenditures']
];

/**
 * Alpha Vantage reports most failures as 200 OK with a message body.
 */
const classifyBody = (data: JsonRecord): ApiError | null => {
  const errorMessage = readString(data, 'Error Message');
  if (errorMessage) return new ApiError('NOT_FOUND', `Alpha Vantage error: ${errorMessage}`, PROVIDER);

  const note = readString(data, 'Note');
  if (note) return new ApiError('RATE_LIMIT', `Alpha Vantage rate limit: ${note}`, PROVIDER);

  const information = readString(data, 'Information');
  if (information) {
    return /api key/i.test(information) && /invalid|missing/i.test(information)
      ? new ApiError('AUTH', `Alpha Vantage rejected the API key: ${information}`, PROVIDER)
      : new ApiError('RATE_LIMIT', `Alpha Vantage rate limit: ${information}`, PROVIDER);
  }
  return null;
};

const indexByDate = (rows: JsonRecord[]) => {
  const map = new Map<string, JsonRecord>();
  for (const row of rows) {
    const date = readString(row, 'fiscalDateEnding');
    if (date && !map.has(date)) map.set(date, row);
  }
  return map;
};

const pickFields = (row: JsonRecord | undefined, fields: [StatementField, string][], into: StatementPeriod['values']) => {
  for (const [field, key] of fields) {
    into[field] = row ? readNumber(row, key) : null;
  }
};

export const createAlphaVantageProvider = (options: AlphaVantageOptions): FundamentalsProvider => {
  const { apiKey, timeoutMs } = options;
  const baseUrl = options.baseUrl ?? ALPHAVANTAGE_BASE;
  const retry: RetryOptions = { maxRetries: 2, delayMs: 1000, backoffMultiplier: 2, label: PROVIDER, ...options.retry };

  const fetchData = async (fn: AvFunction, ticker: string): Promise<JsonRecord> => {
    if (!apiKey) {
      console.error('[AlphaVantage] API key is missing or empty.');
      throw new ApiError('MISSING_KEY', 'ALPHAVANTAGE_API_KEY not configured', PROVIDER);
    }

    return fetchWithRetry(async () => {
      const query = new URLSearchParams({ function: fn, symbol: ticker, apikey: apiKey });
      console.log(`[AlphaVantage] Fetching ${fn} for ${ticker}`);

      const res = await timedFetch(PROVIDER, `${baseUrl}?${query.toString()}`, timeoutMs);
      if (!res.ok) {
        throw apiErrorFromStatus(PROVIDER, res.status, fn);
      }

      const data = await readJson(PROVIDER, res);
      if (!isRecord(data)) {
        throw new ApiError('TRANSIENT', `Alpha Vantage returned an unexpected ${fn} payload`, PROVIDER);
      }
      const failure = classifyBody(data);
      if (failure) throw failure;
      return data;
    }, retry);
  };

  return {
    name: 'alphavantage',

    async fetchFundamentals(ticker: string): Promise<StatementPeriod[]> {
      // Earnings drive the period list; quarters without a reported EPS are dropped.
      const earnings = asRecords((await fetchData('EARNINGS', ticker)).quarterlyEarnings)
        .filter(row => readNumber(row, 'reportedEPS') != null);
      if (earnings.length === 0) {
        throw new ApiError('NOT_FOUND', `Alpha Vantage has no quarterly earnings for ${ticker}`, PROVIDER);
      }

      const income = indexByDate(asRecords((await fetchData('INCOME_STATEMENT', ticker)).quarterlyReports));
      const balance = indexByDate(asRecords((await fetchData('BALANCE_SHEET', ticker)).quarterlyReports));
      const cashFlow = indexByDate(asRecords((await fetchData('CASH_FLOW', ticker)).quarterlyReports));

      const periods: StatementPeriod[] = [];
      for (const [date, row] of indexByDate(earnings)) {
        const values: StatementPeriod['values'] = {};
        pickFields(row, EARNINGS_FIELDS, values);
        pickFields(income.get(date), INCOME_FIELDS, values);
        pickFields(balance.get(date), BALANCE_FIELDS, values);
        pickFields(cashFlow.get(date), CASH_FLOW_FIELDS, values);
        values.freeCashFlow = null;
        periods.push({ fiscalDateEnding: date, values });
      }

      return periods
        .sort((a, b) => b.fiscalDateEnding.localeCompare(a.fiscalDateEnding))
        .slice(0, PERIOD_LIMIT);
    },

    async fetchCompanyMeta(ticker: string): Promise<CompanyMeta> {
      const overview = await fetchData('OVERVIEW', ticker);
      const symbol = readString(overview, 'Symbol');
      if (!symbol) {
        throw new ApiError('NOT_FOUND', `Alpha Vantage has no overview for ${ticker}`, PROVIDER);
      }
      return {
        symbol,
        name: readString(overview, 'Name'),
        sector: readString(overview, 'Sector'),
        industry: readString(overview, 'Industry'),
        exchange: readString(overview, 'Exchange'),
        currency: readString(overview, 'Currency'),
        marketCap: readNumber(overview, 'MarketCapitalization')
      };
    }
  };
};
