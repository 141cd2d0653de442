import crypto from 'crypto';

import type { Product, Recommendation, RecommendationSuccess } from '@storefront/core';

export function promptCacheKey(prompt: string) {
  return crypto.createHash('md5').update(prompt, 'utf8').digest('hex');
}

// Copies so that neither the caller nor the catalog shares objects with the cache
function frozenProduct({ tags, ...fields }: Readonly<Product>): Readonly<Product> {
  if (tags === undefined) return Object.freeze({ ...fields });
  const tagsCopy = [...tags];
  Object.freeze(tagsCopy);
  return Object.freeze({ ...fields, tags: tagsCopy });
}

function frozenRecommendation({ product, explanation, confidence_score }: Recommendation): Recommendation {
  return Object.freeze({ product: frozenProduct(product), explanation, confidence_score });
}

/**
 * Exact-match cache of successful results, owned by one pipeline.
 * No eviction; entries live as long as the owner and are never replaced.
 * Stored results are deep-frozen copies.
 */
export class RecommendationCache {
  private readonly entries = new Map<string, RecommendationSuccess>();

  get size() {
    return this.entries.size;
  }

  get(key: string): RecommendationSuccess | undefined {
    return this.entries.get(key);
  }

  set(key: string, result: RecommendationSuccess): RecommendationSuccess {
    const existing = this.entries.get(key);
    if (existing) return existing;

    const frozen = Object.freeze({
      recommendations: Object.freeze(result.recommendations.map(frozenRecommendation)),
      count: result.count
    });
    this.entries.set(key, frozen);
    return frozen;
  }
}
