import { describe, it, expect, vi, beforeEach } from 'vitest';
import { analyzeBatch, analyzeStock, summarizeBatch, type PipelineDeps } from '../../services/pipeline.ts';
import { createSentimentCollator, neutralAggregate, type SentimentCollator } from '../../services/sentiment/collator.ts';
import { createStockRater, type StockRater } from '../../services/rating/rater.ts';
import { ApiError } from '../../services/utils/retry.ts';
import type { LlmRequest } from '../../services/ai/llm.ts';
import type { RatingOutcome, StockSentiment } from '../../types.ts';
import { AAPL_PERIODS, companyMeta, fakeFundamentals, fakeLlm, fakeNews, hit } from './helpers.ts';

const NOW = new Date('2024-07-08T10:00:00Z');

/**
 * Answers like a model would for the AAPL scenario: +3 sentiment for both
 * scopes, and a Buy only when the prompt carries the expected figures.
 */
const analystLlm = () =>
    fakeLlm((request: LlmRequest) => {
        const { prompt } = request;
        if (prompt.includes('senior equity analyst')) {
            const sawFigures =
                prompt.includes('<tr><td>EPS Change QoQ</td><td>%</td><td>12</td>') &&
                prompt.includes('<tr><td>Return on Equity</td><td>%</td><td>15.2</td>') &&
                prompt.includes('COMPANY NEWS SENTIMENT (scale -5 to +5):\nScore: +3 (Positive)') &&
                prompt.includes('SECTOR NEWS SENTIMENT (scale -5 to +5):\nScore: +3 (Positive)');
            return JSON.stringify(
                sawFigures
                    ? {
                        rating: 'Buy',
                        confidence: 0.78,
                        reasoning: 'EPS grew 12% QoQ and 40% YoY while ROE reached 15.2%, backed by positive news.',
                        key_factors: ['EPS growth', 'ROE 15.2%'],
                        risk_factors: ['Current ratio only 1.2'],
                        recommendation_summary: 'Buy on strong earnings momentum.'
                    }
                    : { rating: 'Hold', confidence: 0.3, reasoning: 'Figures missing.', key_factors: [], risk_factors: [], recommendation_summary: 'Wait.' }
            );
        }
        if (prompt.includes('Consolidate')) {
            return JSON.stringify({ score: 3, label: 'Positive', statement: 'News flow is clearly positive.' });
        }
        return '{"score": 3}';
    });

const appleProvider = () =>
    fakeFundamentals(
        { AAPL: AAPL_PERIODS },
        { AAPL: companyMeta('AAPL', 'Apple Inc.', 'Technology') }
    );

const realDeps = (llm = analystLlm(), news = fakeNews('alpha', [hit('Apple beats', 'https://n.test/1')], [hit('Chips rally', 'https://n.test/2')])) => {
    const fundamentals = appleProvider();
    const deps = {
        fundamentals,
        collator: createSentimentCollator({
            newsProviders: [news],
            llm,
            meta: fundamentals,
            options: { lookbackDays: 7, maxResults: 5, summaryThresholdChars: 1500 },
            retry: { delayMs: 0 },
            now: () => NOW
        }),
        rater: createStockRater({ llm }),
        now: () => NOW
    } satisfies PipelineDeps;
    return deps;
};

const stubSentiment = (ticker: string): StockSentiment => ({
    ticker,
    companyName: `${ticker} Corp`,
    sector: null,
    companySentiment: neutralAggregate('company', ticker, `No recent news found for ${ticker}.`),
    sectorSentiment: neutralAggregate('sector', 'Unknown', 'Sector unknown; no sector news searched.'),
    articles: []
});

const BUY: RatingOutcome = {
    status: 'ok',
    result: {
        rating: 'Buy',
        confidence: 0.7,
        reasoning: 'Solid.',
        keyFactors: [],
        riskFactors: [],
        recommendationSummary: 'Buy.'
    }
};

const stubCollator = () => {
    const collator = { getStockSentiment: vi.fn(async (ticker: string) => stubSentiment(ticker)) };
    return collator satisfies SentimentCollator;
};

const stubRater = () => {
    const rater = { rateStock: vi.fn(async () => BUY) };
    return rater satisfies StockRater;
};

describe('analysis pipeline', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('rates a healthy stock with good news as a buy', async () => {
        const result = await analyzeStock('aapl', realDeps());

        expect(result.success).toBe(true);
        expect(result.error).toBeNull();
        expect(result.ticker).toBe('AAPL');
        expect(result.companyName).toBe('Apple Inc.');
        expect(result.analysisDate).toBe('2024-07-08T10:00:00.000Z');
        expect(result.processingTimeMs).toBe(0);
        expect(result.fundamentals?.periods).toEqual(['2024-06-30', '2024-03-31', '2023-12-31', '2023-09-30']);
        expect(result.financialDataHtml.startsWith('<table class="fundamentals">')).toBe(true);

        expect(result.sentiment?.companySentiment).toMatchObject({ score: 3, label: 'Positive', articleCount: 1 });
        expect(result.sentiment?.sectorSentiment).toMatchObject({ target: 'Technology', score: 3, articleCount: 1 });

        expect(result.rating?.status).toBe('ok');
        expect(['Buy', 'Strong Buy']).toContain(result.rating?.result.rating);
        expect(result.rating?.result.confidence).toBeGreaterThan(0.5);
        expect(result.rating?.result.reasoning).toMatch(/EPS|ROE/);
    });

    it('stops after a not-found ticker without calling the rater', async () => {
        const fundamentals = appleProvider();
        fundamentals.fetchFundamentals.mockRejectedValueOnce(new ApiError('NOT_FOUND', 'FMP resource not found (404)'));
        const collator = stubCollator();
        const rater = stubRater();

        const result = await analyzeStock('ZZZZ', { fundamentals, collator, rater, now: () => NOW });

        expect(result).toEqual({
            ticker: 'ZZZZ',
            analysisDate: '2024-07-08T10:00:00.000Z',
            success: false,
            companyName: null,
            fundamentals: null,
            financialDataHtml: '',
            sentiment: null,
            rating: null,
            error: { kind: 'ProviderNotFoundError', message: 'FMP resource not found (404)' },
            processingTimeMs: 0
        });
        expect(collator.getStockSentiment).not.toHaveBeenCalled();
        expect(rater.rateStock).not.toHaveBeenCalled();
    });

    it('reports an invalid ticker as a failed result', async () => {
        const result = await analyzeStock('   ', { fundamentals: appleProvider(), collator: stubCollator(), rater: stubRater() });

        expect(result.success).toBe(false);
        expect(result.error?.kind).toBe('InvalidTickerError');
    });

    it('still rates a stock with no news at all', async () => {
        const llm = analystLlm();
        const result = await analyzeStock('AAPL', realDeps(llm, fakeNews('alpha', [])));

        expect(result.success).toBe(true);
        expect(result.sentiment?.companySentiment).toMatchObject({ score: 0, label: 'Neutral', placeholder: true });
        // neutral sentiment does not match the scripted Buy case
        expect(result.rating).toMatchObject({ status: 'ok', result: { rating: 'Hold' } });
        const ratingPrompt = llm.generate.mock.calls[0]?.[0].prompt ?? '';
        expect(ratingPrompt).toContain('Score: 0 (Neutral)\nNo recent news found for Apple Inc.');
    });

    it('counts a fallback rating as a successful analysis', async () => {
        const llm = fakeLlm(request => (request.prompt.includes('senior equity analyst') ? 'not json' : '{"score": 1, "statement": "Fine."}'));

        const result = await analyzeStock('AAPL', realDeps(llm));

        expect(result.success).toBe(true);
        expect(result.rating?.status).toBe('fallback');
        expect(result.rating?.result).toMatchObject({ rating: 'Hold', confidence: 0 });
    });

    it('classifies an unexpected stage failure', async () => {
        const collator = stubCollator();
        collator.getStockSentiment.mockRejectedValueOnce(new Error('boom'));

        const result = await analyzeStock('AAPL', { fundamentals: appleProvider(), collator, rater: stubRater() });

        expect(result.success).toBe(false);
        expect(result.error).toEqual({ kind: 'ProviderTransientError', message: 'boom' });
        expect(result.fundamentals).not.toBeNull();
    });

    describe('analyzeBatch', () => {
        it('keeps input order and isolates failures', async () => {
            const fundamentals = fakeFundamentals({ AAPL: AAPL_PERIODS, MSFT: AAPL_PERIODS });
            const rater = stubRater();

            const results = await analyzeBatch(['AAPL', 'BAD', 'msft'], { fundamentals, collator: stubCollator(), rater }, { concurrency: 2 });

            expect(results.map(r => r.ticker)).toEqual(['AAPL', 'BAD', 'MSFT']);
            expect(results.map(r => r.success)).toEqual([true, false, true]);
            expect(results[1]?.error?.kind).toBe('ProviderTransientError');
            expect(rater.rateStock).toHaveBeenCalledTimes(2);

            expect(summarizeBatch(results)).toEqual({ total: 3, succeeded: 2, failed: 1, ratings: { Buy: 2 } });
        });

        it('never runs more tickers at once than the concurrency limit', async () => {
            let active = 0;
            let maxActive = 0;
            const collator = {
                getStockSentiment: vi.fn(async (ticker: string) => {
                    active++;
                    maxActive = Math.max(maxActive, active);
                    await new Promise(resolve => setTimeout(resolve, 5));
                    active--;
                    return stubSentiment(ticker);
                })
            };
            const fundamentals = fakeFundamentals({ A: AAPL_PERIODS, B: AAPL_PERIODS, C: AAPL_PERIODS, D: AAPL_PERIODS });

            await analyzeBatch(['A', 'B', 'C', 'D'], { fundamentals, collator, rater: stubRater() }, { concurrency: 2 });

            expect(maxActive).toBe(2);
        });
    });
});
