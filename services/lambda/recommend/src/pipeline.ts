import { Catalog, recommendationFailure } from '@storefront/core';
import type { BrowsingHistory, Preferences, Product, RecommendationResult } from '@storefront/core';
import type { ModelInvoker } from '@storefront/common';

import { promptCacheKey, RecommendationCache } from './cache';
import { parseRecommendations } from './parse';
import { buildRecommendationPrompt } from './prompt';

/**
 * Prompt -> model -> parse, with results cached by prompt hash.
 *
 * The key only covers what the prompt contains, which is the first few catalog
 * products. Two catalogs sharing that prefix share cache entries.
 */
export class RecommendationPipeline {
  constructor(
    private readonly invoke: ModelInvoker,
    readonly cache: RecommendationCache = new RecommendationCache()
  ) {}

  async generate(
    preferences: Preferences,
    history: BrowsingHistory,
    products: readonly Product[]
  ): Promise<RecommendationResult> {
    const prompt = buildRecommendationPrompt(preferences, history, products);
    const key = promptCacheKey(prompt);

    const cached = this.cache.get(key);
    if (cached) {
      console.info('[recommend] using cached model response', { key });
      return cached;
    }

    let raw: string;
    try {
      raw = await this.invoke(prompt);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error('[recommend] model invocation failed', { key, error: message });
      return recommendationFailure(message);
    }

    const recommendations = parseRecommendations(raw, new Catalog(products));
    console.info('[recommend] parsed recommendations', { key, count: recommendations.length });
    return this.cache.set(key, { recommendations, count: recommendations.length });
  }
}
