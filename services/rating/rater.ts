import type { RatingInput, RatingOutcome, RatingResult } from '../../types.ts';
import { LlmError, errorKindOf, errorMessageOf } from '../utils/retry.ts';
import { STRICT_JSON_SYSTEM_PROMPT, parseJSON, type LlmClient } from '../ai/llm.ts';
import { buildRatingPrompt } from './prompts.ts';
import { RatingResponseSchema } from './schema.ts';

export interface StockRater {
  rateStock(input: RatingInput): Promise<RatingOutcome>;
}

export interface StockRaterDeps {
  llm: LlmClient;
}

/**
 * Parses and validates a rating reply. Throws LlmError('PARSE') when the reply
 * is not JSON or does not match the rating schema.
 */
export function parseRatingResponse(raw: string): RatingResult {
  const parsed = RatingResponseSchema.safeParse(parseJSON(raw));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'response'}: ${issue.message}`);
    throw new LlmError('PARSE', `Rating reply failed validation (${issues.join('; ')})`);
  }

  const data = parsed.data;
  return {
    rating: data.rating,
    confidence: data.confidence,
    reasoning: data.reasoning,
    keyFactors: data.key_factors,
    riskFactors: data.risk_factors,
    recommendationSummary: data.recommendation_summary
  };
}

export const fallbackRating = (reason: string): RatingResult => ({
  rating: 'Hold',
  confidence: 0,
  reasoning: `Rating could not be produced, defaulting to Hold. ${reason}`,
  keyFactors: [],
  riskFactors: [],
  recommendationSummary: 'Hold by default: no validated rating was available.'
});

/**
 * One LLM call per rating, never retried. Any failure becomes a Hold/0.0
 * fallback outcome carrying the reason.
 */
export const createStockRater = ({ llm }: StockRaterDeps): StockRater => ({
  async rateStock(input: RatingInput): Promise<RatingOutcome> {
    const prompt = buildRatingPrompt(input);
    try {
      const raw = await llm.generate({ system: STRICT_JSON_SYSTEM_PROMPT, prompt, json: true, temperature: 0 });
      const result = parseRatingResponse(raw);
      console.log(`[Rater] ${input.companyName}: ${result.rating} (${result.confidence})`);
      return { status: 'ok', result };
    } catch (error) {
      const reason = `${errorKindOf(error)}: ${errorMessageOf(error)}`;
      console.warn(`[Rater] Falling back to Hold for ${input.companyName}: ${reason}`);
      return { status: 'fallback', result: fallbackRating(reason), reason };
    }
  }
});

const bullets = (items: string[]) => (items.length > 0 ? items.map(item => `• ${item}`).join('\n') : '• (none)');

export function formatRatingSummary(result: RatingResult): string {
  return [
    'STOCK RATING SUMMARY',
    '====================',
    '',
    `Rating: ${result.rating}`,
    `Confidence: ${(result.confidence * 100).toFixed(1)}%`,
    '',
    'REASONING:',
    result.reasoning,
    '',
    'KEY POSITIVE FACTORS:',
    bullets(result.keyFactors),
    '',
    'RISK FACTORS:',
    bullets(result.riskFactors),
    '',
    'RECOMMENDATION:',
    result.recommendationSummary
  ].join('\n');
}
