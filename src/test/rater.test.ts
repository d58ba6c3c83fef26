import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
    createStockRater,
    fallbackRating,
    formatRatingSummary,
    parseRatingResponse
} from '../../services/rating/rater.ts';
import { buildRatingPrompt } from '../../services/rating/prompts.ts';
import { LlmError } from '../../services/utils/retry.ts';
import type { RatingInput } from '../../types.ts';
import { fakeLlm } from './helpers.ts';

const INPUT: RatingInput = {
    companyName: 'Apple Inc.',
    financialDataHtml: '<table class="fundamentals"><caption>AAPL quarterly fundamentals</caption></table>',
    companySentiment: 'Score: +3 (Positive)\nCompany news is upbeat.',
    sectorSentiment: 'Score: -1 (Slightly Negative)\nSector demand is soft.'
};

const BUY_REPLY = JSON.stringify({
    rating: 'Buy',
    confidence: 0.72,
    reasoning: 'EPS grew 12% QoQ and ROE is 15.2%.',
    key_factors: ['EPS growth', 'High ROE'],
    risk_factors: ['Soft sector demand'],
    recommendation_summary: 'Accumulate on weakness.'
});

describe('stock rater', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    describe('parseRatingResponse', () => {
        it('maps a valid reply', () => {
            expect(parseRatingResponse(BUY_REPLY)).toEqual({
                rating: 'Buy',
                confidence: 0.72,
                reasoning: 'EPS grew 12% QoQ and ROE is 15.2%.',
                keyFactors: ['EPS growth', 'High ROE'],
                riskFactors: ['Soft sector demand'],
                recommendationSummary: 'Accumulate on weakness.'
            });
        });

        it('coerces loose factor lists', () => {
            const raw = '```json\n{"rating": "Hold", "confidence": 0.4, "reasoning": " Fairly valued. ", "key_factors": "Cash pile", ' +
                '"risk_factors": [" Valuation ", 3, ""], "recommendation_summary": "Hold."}\n```';

            expect(parseRatingResponse(raw)).toEqual({
                rating: 'Hold',
                confidence: 0.4,
                reasoning: 'Fairly valued.',
                keyFactors: ['Cash pile'],
                riskFactors: ['Valuation', '3'],
                recommendationSummary: 'Hold.'
            });
        });

        it('rejects ratings outside the scale and confidence outside [0, 1]', () => {
            expect(() => parseRatingResponse('{"rating": "Outperform", "confidence": 0.6}')).toThrow(LlmError);
            expect(() => parseRatingResponse('{"rating": "buy", "confidence": 0.6}')).toThrow(/rating/);
            expect(() => parseRatingResponse('{"rating": "Buy", "confidence": 1.5}')).toThrow(/confidence/);
        });

        it('requires reasoning and a recommendation summary', () => {
            expect(() => parseRatingResponse('{"rating": "Buy", "confidence": 0.6, "recommendation_summary": "Buy."}')).toThrow(/reasoning/);
            expect(() => parseRatingResponse('{"rating": "Buy", "confidence": 0.6, "reasoning": "  ", "recommendation_summary": "Buy."}')).toThrow(/reasoning/);
            expect(() => parseRatingResponse('{"rating": "Buy", "confidence": 0.6, "reasoning": "Cheap."}')).toThrow(/recommendation_summary/);
        });
    });

    describe('rateStock', () => {
        it('returns the validated rating from a single call', async () => {
            const llm = fakeLlm(() => BUY_REPLY);

            const outcome = await createStockRater({ llm }).rateStock(INPUT);

            expect(outcome.status).toBe('ok');
            expect(outcome.result.rating).toBe('Buy');
            expect(llm.generate).toHaveBeenCalledTimes(1);
            expect(llm.generate.mock.calls[0]?.[0]).toMatchObject({ json: true, temperature: 0, prompt: buildRatingPrompt(INPUT) });
        });

        it('falls back to Hold at zero confidence on malformed JSON', async () => {
            const llm = fakeLlm(() => 'I think this stock is a Buy.');

            const outcome = await createStockRater({ llm }).rateStock(INPUT);

            expect(outcome.status).toBe('fallback');
            expect(outcome.result).toMatchObject({ rating: 'Hold', confidence: 0, keyFactors: [], riskFactors: [] });
            if (outcome.status === 'fallback') {
                expect(outcome.reason).toMatch(/^LLMParseError: /);
                expect(outcome.result.reasoning).toBe(`Rating could not be produced, defaulting to Hold. ${outcome.reason}`);
            }
            expect(llm.generate).toHaveBeenCalledTimes(1);
        });

        it('falls back on an out-of-scale rating', async () => {
            const llm = fakeLlm(() => '{"rating": "Outperform", "confidence": 0.9}');

            const outcome = await createStockRater({ llm }).rateStock(INPUT);

            expect(outcome.status).toBe('fallback');
            expect(outcome.result.rating).toBe('Hold');
        });

        it('falls back when the reply omits its reasoning', async () => {
            const llm = fakeLlm(() => '{"rating": "Buy", "confidence": 0.8, "key_factors": ["EPS growth"]}');

            const outcome = await createStockRater({ llm }).rateStock(INPUT);

            expect(outcome).toMatchObject({ status: 'fallback', result: { rating: 'Hold', confidence: 0 } });
        });

        it('falls back on a timeout without retrying', async () => {
            const llm = fakeLlm(() => {
                throw new LlmError('TIMEOUT', 'Gemini did not answer within 60000ms');
            });

            const outcome = await createStockRater({ llm }).rateStock(INPUT);

            expect(outcome).toMatchObject({
                status: 'fallback',
                reason: 'LLMTimeoutError: Gemini did not answer within 60000ms'
            });
            expect(llm.generate).toHaveBeenCalledTimes(1);
        });
    });

    describe('buildRatingPrompt', () => {
        it('is deterministic and carries every input', () => {
            const prompt = buildRatingPrompt(INPUT);

            expect(buildRatingPrompt({ ...INPUT })).toBe(prompt);
            expect(prompt).toContain('Rate the stock of Apple Inc.');
            expect(prompt).toContain(INPUT.financialDataHtml);
            expect(prompt).toContain(`COMPANY NEWS SENTIMENT (scale -5 to +5):\n${INPUT.companySentiment}`);
            expect(prompt).toContain(`SECTOR NEWS SENTIMENT (scale -5 to +5):\n${INPUT.sectorSentiment}`);
        });
    });

    describe('formatRatingSummary', () => {
        it('prints every section', () => {
            const text = formatRatingSummary({
                rating: 'Buy',
                confidence: 0.75,
                reasoning: 'Earnings are accelerating.',
                keyFactors: ['EPS growth'],
                riskFactors: [],
                recommendationSummary: 'Accumulate.'
            });

            expect(text).toBe([
                'STOCK RATING SUMMARY',
                '====================',
                '',
                'Rating: Buy',
                'Confidence: 75.0%',
                '',
                'REASONING:',
                'Earnings are accelerating.',
                '',
                'KEY POSITIVE FACTORS:',
                '• EPS growth',
                '',
                'RISK FACTORS:',
                '• (none)',
                '',
                'RECOMMENDATION:',
                'Accumulate.'
            ].join('\n'));
        });

        it('describes the fallback', () => {
            expect(fallbackRating('LLMParseError: x').recommendationSummary).toBe(
                'Hold by default: no validated rating was available.'
            );
        });
    });
});
