import { z } from 'zod';

import { PreferencesSchema } from './product';
import type { Product } from './product';

export interface Recommendation {
  readonly product: Readonly<Product>;
  readonly explanation: string;
  readonly confidence_score: number;
}

export interface RecommendationSuccess {
  recommendations: readonly Recommendation[];
  count: number;
}

export interface RecommendationFailure {
  recommendations: readonly [];
  count: 0;
  error: string;
}

export type RecommendationResult = RecommendationSuccess | RecommendationFailure;

export function isRecommendationFailure(result: RecommendationResult): result is RecommendationFailure {
  return 'error' in result;
}

export function recommendationFailure(error: string): RecommendationFailure {
  return { recommendations: [], count: 0, error };
}

// POST /recommend
export const RecommendRequestSchema = z.object({
  preferences: PreferencesSchema.default({}),
  history: z.array(z.string()).default([])
});

export type RecommendRequestBody = z.input<typeof RecommendRequestSchema>;
export type RecommendRequest = z.output<typeof RecommendRequestSchema>;

// GET /products
export interface ProductsResponseBody {
  items: Product[];
  total: number;
  categories: string[];
  brands: string[];
}
