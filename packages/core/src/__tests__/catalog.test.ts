import { describe, it, expect } from 'vitest';

import {
  addToHistory,
  Catalog,
  CatalogSchema,
  clearHistory,
  dedupeHistory,
  filterProducts,
  PreferencesSchema,
  resolveHistory
} from '../index';
import type { Product } from '../index';

const shoes: Product[] = [
  { id: 'p40', name: 'Budget Runner', category: 'Footwear', brand: 'Acme', price: 40 },
  { id: 'p60', name: 'Daily Trainer', category: 'Footwear', brand: 'Acme', price: 60 },
  { id: 'p120', name: 'Race Flat', category: 'Footwear', brand: 'Zoom', price: 120 }
];

const mixed: Product[] = [
  ...shoes,
  { id: 'h1', name: 'Headphones', category: 'Electronics', brand: 'Zoom', price: 50 },
  { id: 'h2', name: 'Speaker', category: 'Electronics', brand: 'Beat', price: 100 }
];

describe('filterProducts', () => {
  it('keeps only the 50-100 footwear item', () => {
    const result = filterProducts(shoes, { priceRange: '50-100', categories: ['Footwear'], brands: [] });
    expect(result.map((p) => p.id)).toEqual(['p60']);
  });

  it('treats band edges as 0-50 inclusive and 50-100 exclusive at the bottom', () => {
    expect(filterProducts(mixed, { priceRange: '0-50', categories: [], brands: [] }).map((p) => p.id)).toEqual([
      'p40',
      'h1'
    ]);
    expect(filterProducts(mixed, { priceRange: '50-100', categories: [], brands: [] }).map((p) => p.id)).toEqual([
      'p60',
      'h2'
    ]);
    expect(filterProducts(mixed, { priceRange: '100+', categories: [], brands: [] }).map((p) => p.id)).toEqual([
      'p120'
    ]);
  });

  it('returns everything for empty preferences', () => {
    expect(filterProducts(mixed, { priceRange: 'all', categories: [], brands: [] })).toEqual(mixed);
  });

  it('combines category and brand filters', () => {
    const result = filterProducts(mixed, { priceRange: 'all', categories: ['Electronics'], brands: ['Zoom'] });
    expect(result.map((p) => p.id)).toEqual(['h1']);
  });
});

describe('Catalog', () => {
  it('looks products up by id and keeps the first of duplicate ids', () => {
    const catalog = new Catalog([...mixed, { id: 'p40', name: 'Duplicate', category: 'X', brand: 'Y', price: 1 }]);
    expect(catalog.get('p40')?.name).toBe('Budget Runner');
    expect(catalog.get('missing')).toBeUndefined();
    expect(catalog.size).toBe(6);
  });

  it('samples from the front in catalog order', () => {
    const catalog = new Catalog(mixed);
    expect(catalog.sample(2).map((p) => p.id)).toEqual(['p40', 'p60']);
    expect(catalog.sample(10)).toHaveLength(5);
    expect(new Catalog([]).sample(5)).toEqual([]);
  });

  it('lists distinct categories and brands in first-seen order', () => {
    const catalog = new Catalog(mixed);
    expect(catalog.categories()).toEqual(['Footwear', 'Electronics']);
    expect(catalog.brands()).toEqual(['Acme', 'Zoom', 'Beat']);
  });
});

describe('browsing history', () => {
  it('adds an id only once', () => {
    let history = addToHistory([], 'p40');
    history = addToHistory(history, 'h1');
    history = addToHistory(history, 'p40');
    expect(history).toEqual(['p40', 'h1']);
  });

  it('does not mutate the previous history', () => {
    const before = ['p40'];
    const after = addToHistory(before, 'p60');
    expect(before).toEqual(['p40']);
    expect(after).toEqual(['p40', 'p60']);
  });

  it('dedupes while keeping the first position', () => {
    expect(dedupeHistory(['a', 'b', 'a', 'c', 'b'])).toEqual(['a', 'b', 'c']);
    expect(clearHistory()).toEqual([]);
  });

  it('resolves ids to products and drops unknown ones', () => {
    const catalog = new Catalog(mixed);
    expect(resolveHistory(catalog, ['h2', 'ghost', 'p40']).map((p) => p.name)).toEqual(['Speaker', 'Budget Runner']);
  });
});

describe('schemas', () => {
  it('fills preference defaults', () => {
    expect(PreferencesSchema.parse({})).toEqual({ priceRange: 'all', categories: [], brands: [] });
  });

  it('rejects an unknown price range', () => {
    expect(PreferencesSchema.safeParse({ priceRange: '10-20' }).success).toBe(false);
  });

  it('rejects products with a negative price', () => {
    const result = CatalogSchema.safeParse([{ id: 'x', name: 'X', category: 'C', brand: 'B', price: -1 }]);
    expect(result.success).toBe(false);
  });
});
