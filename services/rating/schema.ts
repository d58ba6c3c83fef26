import { z } from 'zod';
import { RATINGS } from '../../types.ts';

/** A list of factors; a lone string becomes one item, a missing list is empty. */
const FactorList = z.preprocess(
  value => (value == null ? [] : typeof value === 'string' ? [value] : value),
  z.array(z.union([z.string(), z.number()]).transform(item => String(item).trim()))
).transform(items => items.filter(item => item.length > 0));

export const RatingResponseSchema = z.object({
  rating: z.enum(RATINGS),
  confidence: z.number().min(0).max(1),
  reasoning: z.string().trim().min(1),
  key_factors: FactorList,
  risk_factors: FactorList,
  recommendation_summary: z.string().trim().min(1)
});

export type RatingResponse = z.infer<typeof RatingResponseSchema>;
