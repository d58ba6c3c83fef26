import { vi } from 'vitest';
import type {
    CompanyMeta,
    FundamentalsProvider,
    NewsProvider,
    NewsSearchHit,
    StatementPeriod
} from '../../types.ts';
import type { LlmClient, LlmRequest } from '../../services/ai/llm.ts';

export const jsonResponse = (body: unknown, status = 200) =>
    new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

/** Every quarter looks like this unless a test overrides a field. */
const BASE_VALUES: StatementPeriod['values'] = {
    reportedEPS: 1,
    estimatedEPS: 1.1,
    surprisePercentage: 1.82,
    revenue: 80_000_000_000,
    netIncome: 14_000_000_000,
    operatingCashFlow: 20_000_000_000,
    capitalExpenditure: 3_000_000_000,
    freeCashFlow: null,
    totalAssets: 300_000_000_000,
    totalLiabilities: 200_000_000_000,
    totalCurrentAssets: 120_000_000_000,
    totalCurrentLiabilities: 100_000_000_000,
    inventory: 10_000_000_000,
    shareholderEquity: 100_000_000_000,
    sharesOutstanding: 15_000_000_000
};

export const period = (fiscalDateEnding: string, overrides: StatementPeriod['values'] = {}): StatementPeriod => ({
    fiscalDateEnding,
    values: { ...BASE_VALUES, ...overrides }
});

/** Eight quarters, most recent first: EPS +12% QoQ and ROE 15.2% in the latest. */
export const AAPL_PERIODS: StatementPeriod[] = [
    period('2024-06-30', { reportedEPS: 1.12, revenue: 90_000_000_000, netIncome: 15_200_000_000 }),
    period('2024-03-31'),
    period('2023-12-31', { reportedEPS: 0.95 }),
    period('2023-09-30', { reportedEPS: 0.9 }),
    period('2023-06-30', { reportedEPS: 0.8, revenue: 75_000_000_000, netIncome: 12_000_000_000 }),
    period('2023-03-31'),
    period('2022-12-31'),
    period('2022-09-30')
];

export const companyMeta = (symbol: string, name: string | null, sector: string | null): CompanyMeta => ({
    symbol,
    name,
    sector,
    industry: null,
    exchange: 'NASDAQ',
    currency: 'USD',
    marketCap: null
});

export const fakeFundamentals = (
    periods: Record<string, StatementPeriod[]>,
    meta: Record<string, CompanyMeta> = {}
) => {
    const provider = {
        name: 'fake',
        fetchFundamentals: vi.fn(async (ticker: string) => {
            const found = periods[ticker];
            if (!found) throw new Error(`no data for ${ticker}`);
            return found;
        }),
        fetchCompanyMeta: vi.fn(async (ticker: string) => {
            const found = meta[ticker];
            if (!found) throw new Error(`no profile for ${ticker}`);
            return found;
        })
    };
    return provider satisfies FundamentalsProvider;
};

export const hit = (title: string, url: string, extra: Partial<NewsSearchHit> = {}): NewsSearchHit => ({
    title,
    url,
    publishedDate: '2024-07-01T12:00:00.000Z',
    source: 'example.com',
    content: null,
    snippet: `${title} snippet`,
    ...extra
});

export const fakeNews = (name: string, company: NewsSearchHit[], sector: NewsSearchHit[] = []) => {
    const provider = {
        name,
        searchCompany: vi.fn(async () => company),
        searchSector: vi.fn(async () => sector)
    };
    return provider satisfies NewsProvider;
};

/** An LLM whose replies are computed from each request; a thrown error becomes a rejection. */
export const fakeLlm = (reply: (request: LlmRequest) => string) => {
    const client = {
        name: 'fake',
        model: 'fake-model',
        generate: vi.fn(async (request: LlmRequest) => reply(request))
    };
    return client satisfies LlmClient;
};
