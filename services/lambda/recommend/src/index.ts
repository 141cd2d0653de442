import type { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2 } from 'aws-lambda';
import { z } from 'zod';

import { createLlamaInvoker, loadConfig, logInvokerEnv } from '@storefront/common';
import {
  dedupeHistory,
  filterProducts,
  isRecommendationFailure,
  PRICE_RANGES,
  RecommendRequestSchema
} from '@storefront/core';
import type { Catalog, ProductsResponseBody } from '@storefront/core';

import { loadCatalog } from './catalog-source';
import { RecommendationPipeline } from './pipeline';

// Throws on a missing credential, so the function never starts without one
const config = loadConfig();
const invoker = createLlamaInvoker(config);
const pipeline = new RecommendationPipeline(invoker.invoke);

let catalogPromise: Promise<Catalog> | undefined;

function getCatalog() {
  catalogPromise ??= loadCatalog(config);
  return catalogPromise;
}

function json(statusCode: number, body: unknown): APIGatewayProxyStructuredResultV2 {
  return {
    statusCode,
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body)
  };
}

function splitList(value?: string) {
  return (value ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);
}

const ProductsQuerySchema = z.object({
  priceRange: z.enum(PRICE_RANGES).default('all'),
  categories: z.string().optional().transform(splitList),
  brands: z.string().optional().transform(splitList)
});

function readBody(event: APIGatewayProxyEventV2) {
  if (!event.body) return undefined;
  // API Gateway v2 may hand over the body base64 encoded
  return event.isBase64Encoded ? Buffer.from(event.body, 'base64').toString('utf-8') : event.body;
}

// ========================================
// GET /products
// ========================================
export async function productsHandler(event: APIGatewayProxyEventV2): Promise<APIGatewayProxyStructuredResultV2> {
  const query = ProductsQuerySchema.safeParse(event.queryStringParameters ?? {});
  if (!query.success) {
    return json(400, { message: 'invalid query', issues: query.error.issues });
  }

  const catalog = await getCatalog();
  const items = filterProducts(catalog.all(), query.data);
  const response: ProductsResponseBody = {
    items,
    total: items.length,
    categories: catalog.categories(),
    brands: catalog.brands()
  };
  return json(200, response);
}

// ========================================
// POST /recommend
// ========================================
export async function recommendHandler(event: APIGatewayProxyEventV2): Promise<APIGatewayProxyStructuredResultV2> {
  const body = readBody(event);
  let payload: unknown = {};
  if (body) {
    try {
      payload = JSON.parse(body);
    } catch {
      return json(400, { message: 'body must be valid JSON' });
    }
  }

  const request = RecommendRequestSchema.safeParse(payload);
  if (!request.success) {
    return json(400, { message: 'invalid request', issues: request.error.issues });
  }

  const { preferences } = request.data;
  const history = dedupeHistory(request.data.history);
  const catalog = await getCatalog();

  logInvokerEnv(config);
  console.info('[handler] recommend start', { history: history.length, catalog: catalog.size });
  const result = await pipeline.generate(preferences, history, catalog.all());

  if (isRecommendationFailure(result)) {
    console.error('[handler] recommend failed', { error: result.error });
    return json(502, result);
  }
  console.info('[handler] recommend completed', { count: result.count });
  return json(200, result);
}

export const handler = recommendHandler;
