import type { BrowsingHistory, Preferences, Product } from './product';

/**
 * Read-only view over the loaded product list.
 * Lookups go through an id index; on duplicate ids the first product wins.
 */
export class Catalog {
  private readonly products: readonly Product[];
  private readonly byId = new Map<string, Product>();

  constructor(products: readonly Product[]) {
    this.products = [...products];
    for (const product of this.products) {
      if (!this.byId.has(product.id)) {
        this.byId.set(product.id, product);
      }
    }
  }

  get size() {
    return this.products.length;
  }

  all(): readonly Product[] {
    return this.products;
  }

  get(id: string): Product | undefined {
    return this.byId.get(id);
  }

  sample(count: number): Product[] {
    return this.products.slice(0, Math.max(0, count));
  }

  categories(): string[] {
    return distinct(this.products.map((product) => product.category));
  }

  brands(): string[] {
    return distinct(this.products.map((product) => product.brand));
  }
}

function distinct(values: string[]) {
  return [...new Set(values)];
}

function matchesPriceRange(price: number, range: Preferences['priceRange']) {
  switch (range) {
    case '0-50':
      return price <= 50;
    case '50-100':
      return price > 50 && price <= 100;
    case '100+':
      return price > 100;
    case 'all':
      return true;
  }
}

export function filterProducts(products: readonly Product[], { priceRange, categories, brands }: Preferences) {
  return products.filter((product) => {
    if (!matchesPriceRange(product.price, priceRange)) {
      return false;
    }

    if (categories.length > 0 && !categories.includes(product.category)) {
      return false;
    }

    if (brands.length > 0 && !brands.includes(product.brand)) {
      return false;
    }

    return true;
  });
}

// ===== Browsing history =====

export function addToHistory(history: BrowsingHistory, productId: string): BrowsingHistory {
  if (history.includes(productId)) return [...history];
  return [...history, productId];
}

export function dedupeHistory(history: readonly string[]): BrowsingHistory {
  return distinct([...history]);
}

export function clearHistory(): BrowsingHistory {
  return [];
}

export function resolveHistory(catalog: Catalog, history: BrowsingHistory): Product[] {
  return history
    .map((id) => catalog.get(id))
    .filter((product): product is Product => Boolean(product));
}
