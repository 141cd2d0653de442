import type { Product, Recommendation } from '@storefront/core';

export const DEFAULT_CONFIDENCE_SCORE = 5;

export type ExtractedArray =
  | { kind: 'array'; items: unknown[] }
  | { kind: 'empty'; reason: 'no-brackets' | 'invalid-json' | 'not-array' };

interface ProductLookup {
  get(id: string): Product | undefined;
}

/**
 * Takes everything from the first `[` to the last `]` and tries to read it as
 * a JSON array. Brackets in the prose around the array break this; the model
 * is asked for bare JSON, so the heuristic stays as is.
 */
export function extractJsonArray(raw: string): ExtractedArray {
  const start = raw.indexOf('[');
  const end = raw.lastIndexOf(']');
  if (start === -1 || end === -1) {
    return { kind: 'empty', reason: 'no-brackets' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.slice(start, end + 1));
  } catch {
    return { kind: 'empty', reason: 'invalid-json' };
  }

  if (!Array.isArray(parsed)) {
    return { kind: 'empty', reason: 'not-array' };
  }
  return { kind: 'array', items: parsed };
}

function readExplanation(value: unknown) {
  return typeof value === 'string' ? value : '';
}

function readConfidence(value: unknown) {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const numeric = Number(value);
    if (Number.isFinite(numeric)) return numeric;
  }
  return DEFAULT_CONFIDENCE_SCORE;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseRecommendations(raw: string, catalog: ProductLookup): Recommendation[] {
  const extracted = extractJsonArray(raw);
  if (extracted.kind === 'empty') {
    console.error('[recommend] could not read a JSON array from model output', {
      reason: extracted.reason,
      output: raw.substring(0, 500)
    });
    return [];
  }

  const recommendations: Recommendation[] = [];
  for (const item of extracted.items) {
    const id = isRecord(item) ? item.id : undefined;
    const product = typeof id === 'string' ? catalog.get(id) : undefined;
    if (!isRecord(item) || !product) {
      console.warn('[recommend] unknown product id recommended', { id });
      continue;
    }

    recommendations.push({
      product,
      explanation: readExplanation(item.explanation),
      confidence_score: readConfidence(item.confidence_score)
    });
  }
  return recommendations;
}
