import { Catalog } from '@storefront/core';
import type { BrowsingHistory, Preferences, Product } from '@storefront/core';

export const PROMPT_SAMPLE_SIZE = 5;

// Fixed key order so equal inputs always serialize to the same bytes
function canonicalPreferences({ priceRange, categories, brands }: Preferences) {
  return { priceRange, categories: [...categories], brands: [...brands] };
}

function canonicalProduct({ id, name, category, brand, price, tags }: Product) {
  return tags === undefined ? { id, name, category, brand, price } : { id, name, category, brand, price, tags: [...tags] };
}

function toJson(value: unknown) {
  return JSON.stringify(value, null, 2);
}

/**
 * Only the first {@link PROMPT_SAMPLE_SIZE} catalog products go into the prompt,
 * so the model may answer with ids outside the sample.
 */
export function buildRecommendationPrompt(
  preferences: Preferences,
  history: BrowsingHistory,
  products: readonly Product[]
): string {
  const sample = new Catalog(products).sample(PROMPT_SAMPLE_SIZE).map(canonicalProduct);

  const prompt =
    'User Preferences:\n' +
    toJson(canonicalPreferences(preferences)) +
    '\n\n' +
    'Browsing History:\n' +
    toJson([...history]) +
    '\n\n' +
    'Available Products (sample):\n' +
    toJson(sample) +
    '\n\n' +
    'Please recommend between 3 to 5 products that best match these preferences and browsing history. ' +
    'For each recommendation, provide the product ID, a brief explanation, and a confidence score (1-10). ' +
    'Output only valid JSON in the following format:\n' +
    '[{"id": "prodXYZ", "explanation": "Because...", "confidence_score": 8}, ...]';

  return prompt.trim();
}
