import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
    buildFundamentals,
    gatherFundamentals,
    normalizeTicker,
    toFundamentalsTable
} from '../../services/fundamentals/gatherer.ts';
import { renderFundamentalsHtml, renderFundamentalsText } from '../../services/fundamentals/table.ts';
import { ApiError, InvalidTickerError } from '../../services/utils/retry.ts';
import { AAPL_PERIODS, fakeFundamentals, period } from './helpers.ts';

describe('fundamentals gatherer', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    describe('normalizeTicker', () => {
        it('trims and upper-cases', () => {
            expect(normalizeTicker('  brk.b ')).toBe('BRK.B');
        });

        it('rejects empty and malformed symbols', () => {
            expect(() => normalizeTicker('   ')).toThrow('Ticker symbol must not be empty');
            expect(() => normalizeTicker('AA PL')).toThrow(InvalidTickerError);
            expect(() => normalizeTicker('TOOLONGTICKER')).toThrow(InvalidTickerError);
        });
    });

    describe('buildFundamentals', () => {
        it('derives ratios and deltas for the latest quarter', () => {
            const [latest] = buildFundamentals('AAPL', AAPL_PERIODS);

            expect(latest?.fiscalDateEnding).toBe('2024-06-30');
            expect(latest?.metrics).toEqual({
                reportedEPS: 1.12,
                estimatedEPS: 1.1,
                surprisePercentage: 1.82,
                epsChangeQoQ: 12,
                epsChangeYoY: 40,
                revenue: 90_000,
                revenueChangeQoQ: 12.5,
                revenueChangeYoY: 20,
                netIncome: 15_200,
                netIncomeChangeQoQ: 8.57,
                netIncomeChangeYoY: 26.67,
                bookValuePerShare: 6.67,
                returnOnEquity: 15.2,
                returnOnAssets: 5.07,
                totalAssets: 300_000,
                totalLiabilities: 200_000,
                totalCurrentAssets: 120_000,
                totalCurrentLiabilities: 100_000,
                inventory: 10_000,
                shareholderEquity: 100_000,
                sharesOutstanding: 15_000_000_000,
                operatingCashFlow: 20_000,
                capitalExpenditure: 3_000,
                freeCashFlow: 17_000,
                debtToEquity: 2,
                currentRatio: 1.2,
                quickRatio: 1.1,
                leverageRatio: 0.67
            });
        });

        it('keeps four quarters, most recent first, whatever the input order', () => {
            const shuffled = [AAPL_PERIODS[5], AAPL_PERIODS[0], AAPL_PERIODS[3], AAPL_PERIODS[1], AAPL_PERIODS[2], AAPL_PERIODS[4]]
                .filter(p => p !== undefined);

            const records = buildFundamentals('AAPL', shuffled);

            expect(records.map(r => r.fiscalDateEnding)).toEqual(['2024-06-30', '2024-03-31', '2023-12-31', '2023-09-30']);
            // 2023-09-30 would compare with 2022-09-30, which is not in the input
            expect(records[3]?.metrics.epsChangeYoY).toBeNull();
            expect(records[1]?.metrics.epsChangeYoY).toBe(0);
        });

        it('drops duplicate quarters', () => {
            const records = buildFundamentals('AAPL', [period('2024-06-30'), period('2024-06-30', { reportedEPS: 9 })]);
            expect(records).toHaveLength(1);
            expect(records[0]?.metrics.epsChangeQoQ).toBeNull();
        });

        it('yields null instead of failing on missing or zero inputs', () => {
            const [latest, previous] = buildFundamentals('XYZ', [
                period('2024-06-30', { revenue: null, shareholderEquity: 0, inventory: null }),
                period('2024-03-31', { reportedEPS: 0 })
            ]);

            expect(latest?.metrics.revenue).toBeNull();
            expect(latest?.metrics.revenueChangeQoQ).toBeNull();
            expect(latest?.metrics.epsChangeQoQ).toBeNull();
            expect(latest?.metrics.epsChangeYoY).toBeNull();
            expect(latest?.metrics.returnOnEquity).toBeNull();
            expect(latest?.metrics.debtToEquity).toBeNull();
            expect(latest?.metrics.quickRatio).toBeNull();
            expect(latest?.metrics.bookValuePerShare).toBe(0);
            expect(previous?.metrics.revenueChangeQoQ).toBeNull();
        });

        it('prefers a reported free cash flow over OCF minus capex', () => {
            const [latest] = buildFundamentals('AAPL', [period('2024-06-30', { freeCashFlow: 16_500_000_000 })]);
            expect(latest?.metrics.freeCashFlow).toBe(16_500);
        });
    });

    describe('table rendering', () => {
        const table = toFundamentalsTable('AAPL', buildFundamentals('AAPL', AAPL_PERIODS));

        it('has one column per retained quarter', () => {
            expect(table.periods).toEqual(['2024-06-30', '2024-03-31', '2023-12-31', '2023-09-30']);
            expect(table.rows.find(row => row.metric === 'epsChangeQoQ')?.values).toEqual([12, 5.26, 5.56, 12.5]);
        });

        it('renders HTML rows with units and N/A for missing values', () => {
            const html = renderFundamentalsHtml(table);
            const lines = html.split('\n');

            expect(lines[0]).toBe('<table class="fundamentals">');
            expect(lines[1]).toBe('<caption>AAPL quarterly fundamentals</caption>');
            expect(lines[2]).toBe(
                '<thead><tr><th>Metric</th><th>Unit</th><th>2024-06-30</th><th>2024-03-31</th><th>2023-12-31</th><th>2023-09-30</th></tr></thead>'
            );
            expect(lines).toContain('<tr><td>Reported EPS</td><td>USD/share</td><td>1.12</td><td>1</td><td>0.95</td><td>0.9</td></tr>');
            expect(lines[lines.length - 1]).toBe('</table>');

            const sparse = renderFundamentalsHtml(toFundamentalsTable('XYZ', buildFundamentals('XYZ', [period('2024-06-30')])));
            expect(sparse).toContain('<tr><td>EPS Change QoQ</td><td>%</td><td>N/A</td></tr>');
        });

        it('escapes HTML in labels', () => {
            const html = renderFundamentalsHtml({ ticker: '<X&Y>', periods: [], rows: [] });
            expect(html.split('\n')[1]).toBe('<caption>&lt;X&amp;Y&gt; quarterly fundamentals</caption>');
        });

        it('renders a text table for the terminal', () => {
            const text = renderFundamentalsText(table);
            expect(text).toContain('Return on Equity');
            expect(text).toContain('2024-06-30');
        });
    });

    describe('gatherFundamentals', () => {
        it('normalizes the ticker and returns the table and HTML', async () => {
            const provider = fakeFundamentals({ AAPL: AAPL_PERIODS });

            const result = await gatherFundamentals(provider, ' aapl ');

            expect(provider.fetchFundamentals).toHaveBeenCalledWith('AAPL');
            expect(result.ok).toBe(true);
            if (result.ok) {
                expect(result.records).toHaveLength(4);
                expect(result.html).toContain('<caption>AAPL quarterly fundamentals</caption>');
                expect(result.provider).toBe('fake');
            }
        });

        it('classifies provider failures instead of throwing', async () => {
            const provider = fakeFundamentals({});
            provider.fetchFundamentals.mockRejectedValueOnce(new ApiError('NOT_FOUND', 'FMP resource not found (404)'));

            await expect(gatherFundamentals(provider, 'ZZZZ')).resolves.toEqual({
                ok: false,
                ticker: 'ZZZZ',
                provider: 'fake',
                error: { kind: 'ProviderNotFoundError', message: 'FMP resource not found (404)' }
            });
        });

        it('reports an empty period list as EmptyResultError', async () => {
            const provider = fakeFundamentals({ NEWCO: [] });

            const result = await gatherFundamentals(provider, 'NEWCO');

            expect(result).toMatchObject({ ok: false, error: { kind: 'EmptyResultError', message: 'fake returned no statements for NEWCO' } });
        });

        it('throws on an invalid ticker before calling the provider', async () => {
            const provider = fakeFundamentals({});

            await expect(gatherFundamentals(provider, '')).rejects.toThrow(InvalidTickerError);
            expect(provider.fetchFundamentals).not.toHaveBeenCalled();
        });
    });
});
