import { promises as fs } from 'fs';
import path from 'path';

import { GetObjectCommand, S3Client } from '@aws-sdk/client-s3';

import { Catalog, CatalogSchema } from '@storefront/core';
import type { AppConfig } from '@storefront/common';

export const DEFAULT_FIXTURE = path.join('data', 'fixtures', 'products.sample.json');

interface CatalogSourceOptions extends Pick<AppConfig, 'region' | 'catalog'> {
  cwd?: string;
}

async function readS3Text(region: string, bucket: string, key: string): Promise<string> {
  const s3Client = new S3Client({ region });
  const response = await s3Client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
  const body = await response.Body?.transformToString('utf-8');
  if (!body) {
    throw new Error(`Failed to read S3 object ${bucket}/${key}`);
  }
  return body;
}

async function resolveFixturePath(cwd: string): Promise<string> {
  // Walk up a few levels to find the top-level data/fixtures
  const maxUp = 4;
  let root = cwd;
  for (let i = 0; i <= maxUp; i++) {
    const candidate = path.join(root, DEFAULT_FIXTURE);
    try {
      await fs.access(candidate);
      return candidate;
    } catch {
      const parent = path.dirname(root);
      if (parent === root) break;
      root = parent;
    }
  }

  // Fallback to cwd (the read below reports it)
  return path.join(cwd, DEFAULT_FIXTURE);
}

async function readCatalogText({ region, catalog, cwd = process.cwd() }: CatalogSourceOptions) {
  if (catalog.bucket) {
    return { origin: `s3://${catalog.bucket}/${catalog.key}`, text: await readS3Text(region, catalog.bucket, catalog.key) };
  }
  const filePath = catalog.fixturePath ?? (await resolveFixturePath(cwd));
  return { origin: filePath, text: await fs.readFile(filePath, 'utf-8') };
}

/**
 * Loads the product list once. Any read or validation problem is logged and
 * results in an empty catalog.
 */
export async function loadCatalog(options: CatalogSourceOptions): Promise<Catalog> {
  let origin = options.catalog.bucket ?? options.catalog.fixturePath ?? DEFAULT_FIXTURE;
  try {
    const source = await readCatalogText(options);
    origin = source.origin;
    const parsed = CatalogSchema.safeParse(JSON.parse(source.text));
    if (!parsed.success) {
      console.error('[catalog] invalid product data', { origin, issues: parsed.error.issues.slice(0, 5) });
      return new Catalog([]);
    }
    console.info('[catalog] loaded', { origin, total: parsed.data.length });
    return new Catalog(parsed.data);
  } catch (error) {
    console.error('[catalog] failed to load products', { origin, error });
    return new Catalog([]);
  }
}
