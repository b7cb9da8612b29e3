/**
 * Plain catalog listing with optional price bounds, no query understanding.
 */

import { z } from 'zod'
import { buildListingCacheKey, CACHE_TTL_SECONDS, RedisCacheBackend, ResponseCache } from './ai-search/cache'
import type { CacheBackend } from './ai-search/cache'
import { PgProductStore } from './ai-search/product-store'
import type { ProductStore } from './ai-search/product-store'
import { loggers } from '../config/logger'

const log = loggers.products

export const listingResponseSchema = z.object({
  results: z.array(
    z.object({
      productId: z.string(),
      title: z.string(),
      price: z.number(),
      tags: z.array(z.string()),
    })
  ),
  totalCount: z.number().int().min(0),
  page: z.number().int().min(1),
  limit: z.number().int().min(1),
  totalPages: z.number().int().min(0),
  cacheHit: z.boolean(),
})

export type ListingResponse = z.infer<typeof listingResponseSchema>

export interface ListingRequest {
  minPrice: number | null
  maxPrice: number | null
  page: number
  limit: number
}

export interface ListingDependencies {
  store: Pick<ProductStore, 'listProducts'>
  cache: Pick<ResponseCache<ListingResponse>, 'get' | 'set'>
}

export function createListingDependencies(
  store: ProductStore = new PgProductStore(),
  backend: CacheBackend = new RedisCacheBackend()
): ListingDependencies {
  return {
    store,
    cache: new ResponseCache(backend, listingResponseSchema, CACHE_TTL_SECONDS.listing, 'listing'),
  }
}

export async function listProducts(request: ListingRequest, deps: ListingDependencies): Promise<ListingResponse> {
  const cacheKey = buildListingCacheKey(request)
  const cached = await deps.cache.get(cacheKey)
  if (cached) {
    return { ...cached, cacheHit: true }
  }

  const { rows, totalCount } = await deps.store.listProducts({
    minPrice: request.minPrice,
    maxPrice: request.maxPrice,
    limit: request.limit,
    offset: (request.page - 1) * request.limit,
  })

  const response: ListingResponse = {
    results: rows,
    totalCount,
    page: request.page,
    limit: request.limit,
    totalPages: Math.ceil(totalCount / request.limit),
    cacheHit: false,
  }

  await deps.cache.set(cacheKey, response)
  log.debug('Listing served', { page: request.page, count: rows.length, totalCount })
  return response
}
