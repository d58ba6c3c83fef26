import type { RatingInput } from '../../types.ts';

export const RATING_RUBRIC = `
RATING SCALE:
- Strong Buy: excellent fundamentals (strong, accelerating earnings and revenue growth, high returns on equity, healthy balance sheet) AND positive company and sector sentiment.
- Buy: good fundamentals with positive or improving momentum; sentiment neutral to positive; risks are manageable.
- Hold: mixed picture; strengths and weaknesses roughly balance, or the data is insufficient for a clear call.
- Sell: deteriorating fundamentals (falling earnings, weakening margins or balance sheet) and/or clearly negative sentiment.
- Strong Sell: severe fundamental problems (losses, excessive leverage, liquidity stress) combined with negative sentiment.

CONFIDENCE: a number between 0.0 and 1.0. Use higher values only when fundamentals and sentiment point the same way.
`.trim();

export const RATING_SCHEMA = `
{
  "rating": "Strong Buy" | "Buy" | "Hold" | "Sell" | "Strong Sell",
  "confidence": number between 0.0 and 1.0,
  "reasoning": "2-4 sentences citing the specific metrics and sentiment that drove the rating",
  "key_factors": ["positive factor", "..."],
  "risk_factors": ["risk factor", "..."],
  "recommendation_summary": "one-sentence recommendation"
}
`.trim();

/**
 * Builds the rating prompt. Pure: identical inputs give an identical prompt.
 */
export function buildRatingPrompt(input: RatingInput): string {
  return `
TASK: You are a senior equity analyst. Rate the stock of ${input.companyName} using the quarterly fundamentals and the news sentiment below.
Base the rating on the data given here only. Cite concrete figures (for example EPS growth, return on equity, debt to equity) in your reasoning.

${RATING_RUBRIC}

FINANCIAL FUNDAMENTALS (quarterly, most recent first; USD amounts in millions):
${input.financialDataHtml}

COMPANY NEWS SENTIMENT (scale -5 to +5):
${input.companySentiment}

SECTOR NEWS SENTIMENT (scale -5 to +5):
${input.sectorSentiment}

The "rating" value MUST be exactly one of: "Strong Buy", "Buy", "Hold", "Sell", "Strong Sell".

SCHEMA:
${RATING_SCHEMA}
`.trim();
}
