import { z } from 'zod';

export const PRICE_RANGES = ['all', '0-50', '50-100', '100+'] as const;
export type PriceRange = (typeof PRICE_RANGES)[number];

export const ProductSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  category: z.string(),
  brand: z.string(),
  price: z.number().nonnegative(),
  tags: z.array(z.string()).optional()
});

export const CatalogSchema = z.array(ProductSchema);

export type Product = z.infer<typeof ProductSchema>;

export const PreferencesSchema = z.object({
  priceRange: z.enum(PRICE_RANGES).default('all'),
  categories: z.array(z.string()).default([]),
  brands: z.array(z.string()).default([])
});

export type Preferences = z.infer<typeof PreferencesSchema>;

/** Ordered product ids, oldest view first, each id at most once. */
export type BrowsingHistory = string[];
