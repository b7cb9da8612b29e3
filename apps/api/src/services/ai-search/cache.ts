/**
 * Search Caching Layer
 *
 * Caches full search responses keyed on the extracted intent rather than the
 * raw text, so "schoenen onder 50 euro" and "schoenen 50 euro of minder"
 * share an entry. Listing pages and autocomplete suggestions use their own
 * namespaces and TTLs.
 *
 * Redis is optional. Any read or write failure is logged and treated as a
 * miss; a search never fails because the cache is down.
 */

import { createHash } from 'node:crypto'
import type { ZodType, ZodTypeDef } from 'zod'
import { getRedisClient } from '../../config/redis'
import { loggers } from '../../config/logger'
import type { TargetLanguage } from '../../config/search-config'
import { roundPrice } from './price-patterns'

const log = loggers.cache

// Cache TTLs in seconds
export const CACHE_TTL_SECONDS = {
  aiSearch: parseInt(process.env.AI_SEARCH_CACHE_TTL || '900', 10), // 15 minutes
  listing: parseInt(process.env.LISTING_CACHE_TTL || '3600', 10), // 1 hour
  autocomplete: parseInt(process.env.AUTOCOMPLETE_CACHE_TTL || '300', 10), // 5 minutes
} as const

// Cache key prefixes. Bump the version when the cached payload shape changes.
export const CACHE_PREFIX = 'search:v1:'
const AI_SEARCH_PREFIX = `${CACHE_PREFIX}ai:`
const LISTING_PREFIX = `${CACHE_PREFIX}list:`
const AUTOCOMPLETE_PREFIX = `${CACHE_PREFIX}suggest:`

export interface SearchCacheKeyInput {
  cleanedQuery: string
  minPrice: number | null
  maxPrice: number | null
  page: number
  limit: number
  targetLanguage: TargetLanguage
}

export interface ListingCacheKeyInput {
  minPrice: number | null
  maxPrice: number | null
  page: number
  limit: number
}

/**
 * Lowercase, NFKC, collapsed whitespace
 */
export function normalizeCacheText(text: string): string {
  return text.normalize('NFKC').toLowerCase().replace(/\s+/g, ' ').trim()
}

function hashKey(prefix: string, parts: readonly unknown[]): string {
  return `${prefix}${createHash('sha256').update(JSON.stringify(parts)).digest('hex')}`
}

function roundOrNull(value: number | null): number | null {
  return value === null ? null : roundPrice(value)
}

/**
 * Pure function of the normalized inputs; the raw query never reaches the key
 */
export function buildSearchCacheKey(input: SearchCacheKeyInput): string {
  return hashKey(AI_SEARCH_PREFIX, [
    normalizeCacheText(input.cleanedQuery),
    roundOrNull(input.minPrice),
    roundOrNull(input.maxPrice),
    input.page,
    input.limit,
    input.targetLanguage,
  ])
}

export function buildListingCacheKey(input: ListingCacheKeyInput): string {
  return hashKey(LISTING_PREFIX, [roundOrNull(input.minPrice), roundOrNull(input.maxPrice), input.page, input.limit])
}

export function buildAutocompleteCacheKey(prefix: string, limit: number): string {
  return hashKey(AUTOCOMPLETE_PREFIX, [normalizeCacheText(prefix), limit])
}

/**
 * Minimal key/value surface the response caches need
 */
export interface CacheBackend {
  get(key: string): Promise<string | null>
  set(key: string, value: string, ttlSeconds: number): Promise<void>
}

export class RedisCacheBackend implements CacheBackend {
  async get(key: string): Promise<string | null> {
    return getRedisClient().get(key)
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await getRedisClient().setex(key, ttlSeconds, value)
  }
}

/**
 * Typed cache over a backend. Entries that no longer match the schema are
 * treated as misses.
 */
export class ResponseCache<T> {
  constructor(
    private readonly backend: CacheBackend,
    private readonly schema: ZodType<T, ZodTypeDef, unknown>,
    private readonly ttlSeconds: number,
    private readonly name: string
  ) {}

  async get(key: string): Promise<T | null> {
    let cached: string | null
    try {
      cached = await this.backend.get(key)
    } catch (error) {
      log.warn('CACHE_GET_ERROR', {
        cache: this.name,
        key,
        error: error instanceof Error ? error.message : String(error),
      })
      return null
    }

    if (cached === null) {
      log.debug('CACHE_MISS', { cache: this.name, key })
      return null
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(cached)
    } catch {
      log.warn('CACHE_ENTRY_INVALID', { cache: this.name, key, reason: 'json' })
      return null
    }

    const result = this.schema.safeParse(parsed)
    if (!result.success) {
      log.warn('CACHE_ENTRY_INVALID', { cache: this.name, key, reason: 'schema' })
      return null
    }

    log.debug('CACHE_HIT', { cache: this.name, key })
    return result.data
  }

  async set(key: string, value: T): Promise<void> {
    try {
      await this.backend.set(key, JSON.stringify(value), this.ttlSeconds)
      log.debug('CACHE_SET', { cache: this.name, key, ttl: this.ttlSeconds })
    } catch (error) {
      // Don't fail on cache errors, just log
      log.warn('CACHE_SET_ERROR', {
        cache: this.name,
        key,
        error: error instanceof Error ? error.message : String(error),
      })
    }
  }
}

/**
 * Clear all search caches (for deploys of a new config snapshot or debugging).
 * Uses SCAN so a large keyspace does not block Redis.
 */
export async function clearSearchCaches(): Promise<number> {
  const redis = getRedisClient()
  const stream = redis.scanStream({ match: `${CACHE_PREFIX}*`, count: 500 })
  let deleted = 0

  for await (const batch of stream) {
    const keys: unknown[] = Array.isArray(batch) ? batch : []
    const names = keys.filter((key): key is string => typeof key === 'string')
    if (names.length > 0) {
      deleted += await redis.del(...names)
    }
  }

  log.info('CACHE_CLEARED', { deleted })
  return deleted
}
