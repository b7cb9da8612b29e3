import { describe, it, expect, beforeEach } from 'vitest'
import request from 'supertest'
import { z } from 'zod'
import { createApp } from '../../app'
import type { AppDependencies } from '../../app'
import { ResponseCache } from '../../services/ai-search/cache'
import { CandidateRetriever } from '../../services/ai-search/candidate-retriever'
import type { EmbeddingClient, EmbedOptions } from '../../services/ai-search/embedding-service'
import { searchResponseSchema } from '../../services/ai-search/types'
import { listingResponseSchema } from '../../services/product-listing'
import { loadSearchConfigFile } from '../../config/search-config'
import { EmbeddingError } from '../../lib/errors'
import {
  CATALOG,
  FakeEmbeddingClient,
  InMemoryProductStore,
  MemoryCacheBackend,
  MemoryRateLimitStore,
  TEST_DIMENSIONS,
} from '../../services/ai-search/__tests__/fakes'

const config = loadSearchConfigFile()

/**
 * Never answers; settles only when the request signal aborts
 */
class HangingEmbeddingClient implements EmbeddingClient {
  readonly dimensions = TEST_DIMENSIONS

  embed(_text: string, options?: EmbedOptions): Promise<number[]> {
    return new Promise((_resolve, reject) => {
      options?.signal?.addEventListener('abort', () => reject(options.signal?.reason), { once: true })
    })
  }
}

interface Overrides {
  embeddings?: EmbeddingClient
  maintenance?: boolean
  aiSearchEnabled?: boolean
  database?: () => Promise<boolean>
  redis?: () => Promise<boolean>
  requestTimeoutMs?: number
  rateLimitMax?: number
}

function createTestApp(overrides: Overrides = {}) {
  const store = new InMemoryProductStore(CATALOG)
  const backend = new MemoryCacheBackend()
  const deps: AppDependencies = {
    search: {
      retriever: new CandidateRetriever(overrides.embeddings ?? new FakeEmbeddingClient(), store),
      cache: new ResponseCache(backend, searchResponseSchema, 900, 'ai-search'),
      recordAnalytics: () => undefined,
      inferPrice: async () => null,
      getConfig: () => config,
    },
    suggestions: {
      store,
      cache: new ResponseCache(backend, z.array(z.string()), 300, 'autocomplete'),
      getConfig: () => config,
    },
    listing: { store, cache: new ResponseCache(backend, listingResponseSchema, 3600, 'listing') },
    health: {
      database: overrides.database ?? (async () => true),
      redis: overrides.redis ?? (async () => true),
    },
    rateLimit: { store: new MemoryRateLimitStore(), max: overrides.rateLimitMax ?? 1000, windowMs: 60_000 },
    isMaintenanceMode: async () => overrides.maintenance ?? false,
    isAiSearchEnabled: async () => overrides.aiSearchEnabled ?? true,
    requestTimeoutMs: overrides.requestTimeoutMs ?? 5000,
  }
  return createApp(deps)
}

describe('GET /health', () => {
  it('reports ok when both backends answer', async () => {
    const res = await request(createTestApp()).get('/health')

    expect(res.status).toBe(200)
    expect(res.body).toMatchObject({ status: 'ok', checks: { database: true, redis: true } })
  })

  it('is degraded but up without Redis', async () => {
    const res = await request(createTestApp({ redis: async () => false })).get('/health')

    expect(res.status).toBe(200)
    expect(res.body.status).toBe('degraded')
  })

  it('is unavailable when the database check fails', async () => {
    const res = await request(
      createTestApp({
        database: async () => {
          throw new Error('connection refused')
        },
      })
    ).get('/health')

    expect(res.status).toBe(503)
    expect(res.body).toMatchObject({ status: 'unavailable', checks: { database: false, redis: true } })
  })

  it('answers during maintenance', async () => {
    const res = await request(createTestApp({ maintenance: true })).get('/health')

    expect(res.status).toBe(200)
  })
})

describe('/api/search', () => {
  let app: ReturnType<typeof createTestApp>

  beforeEach(() => {
    app = createTestApp()
  })

  it('searches with query string parameters', async () => {
    const res = await request(app).get('/api/search').query({ query: 'goedkope schoenen', limit: 10 })

    expect(res.status).toBe(200)
    expect(res.headers['x-request-id']).toBeDefined()
    expect(res.body).toMatchObject({
      query: 'goedkope schoenen',
      cleanedQuery: 'schoenen',
      language: 'nl',
      totalCount: 11,
      page: 1,
      limit: 10,
      cacheHit: false,
    })
    expect(res.body.priceFilter.max).toBe(120)
  })

  it('searches with a JSON body and a target language', async () => {
    const res = await request(app).post('/api/search').send({ query: 'jurk onder 10 euro', lang: 'en' })

    expect(res.status).toBe(200)
    expect(res.body.language).toBe('en')
    expect(res.body.priceFilter.fallbackUsed).toBe(true)
    expect(res.body.message).toBe('Geen producten gevonden binnen de prijsklasse, hier zijn de goedkoopste alternatieven.')
    expect(res.body.limit).toBe(25)
  })

  it('serves a repeated search from the cache', async () => {
    await request(app).get('/api/search').query({ query: 'goedkope schoenen' })
    const res = await request(app).get('/api/search').query({ query: 'goedkope schoenen' })

    expect(res.body.cacheHit).toBe(true)
  })

  it('rejects a missing query', async () => {
    const res = await request(app).get('/api/search')

    expect(res.status).toBe(400)
    expect(res.body.errorCode).toBe('VALIDATION_FAILED')
  })

  it('rejects an out-of-range limit', async () => {
    const res = await request(app).get('/api/search').query({ query: 'jas', limit: 101 })

    expect(res.status).toBe(400)
  })

  it('rejects a page beyond the deepest served page', async () => {
    const res = await request(app).get('/api/search').query({ query: 'jas', page: '1e20' })

    expect(res.status).toBe(400)
    expect(res.body.errorCode).toBe('VALIDATION_FAILED')
    expect(res.body.details.issues[0]).toMatchObject({ path: 'page', code: 'too_big' })
  })

  it('rejects an unsupported language', async () => {
    const res = await request(app).post('/api/search').send({ query: 'jas', lang: 'de' })

    expect(res.status).toBe(400)
  })

  it('answers 429 with rate limit headers once the client is over the limit', async () => {
    const limited = createTestApp({ rateLimitMax: 2 })

    const first = await request(limited).get('/api/search').query({ query: 'jas' })
    expect(first.status).toBe(200)
    expect(first.headers['x-ratelimit-limit']).toBe('2')
    expect(first.headers['x-ratelimit-remaining']).toBe('1')

    await request(limited).post('/api/search').send({ query: 'jas' })
    const third = await request(limited).get('/api/search').query({ query: 'jas' })

    expect(third.status).toBe(429)
    expect(third.headers['retry-after']).toBe('60')
    expect(third.headers['x-ratelimit-remaining']).toBe('0')
    expect(third.body).toMatchObject({ errorCode: 'RATE_LIMIT_EXCEEDED', error: 'Too many requests. Please wait a moment' })
  })

  it('does not count autocomplete against the search limit', async () => {
    const limited = createTestApp({ rateLimitMax: 1 })

    await request(limited).get('/api/search/suggestions').query({ q: 'le' })
    await request(limited).get('/api/search/suggestions').query({ q: 'le' })
    const res = await request(limited).get('/api/search').query({ query: 'jas' })

    expect(res.status).toBe(200)
  })

  it('returns 503 when AI search is switched off', async () => {
    const res = await request(createTestApp({ aiSearchEnabled: false })).get('/api/search').query({ query: 'jas' })

    expect(res.status).toBe(503)
    expect(res.body.errorCode).toBe('FEATURE_DISABLED')
  })

  it('returns 503 when the embedding provider times out', async () => {
    const embeddings = new FakeEmbeddingClient()
    embeddings.failWith = new EmbeddingError('timeout', 'Embedding request timed out')

    const res = await request(createTestApp({ embeddings })).get('/api/search').query({ query: 'jas' })

    expect(res.status).toBe(503)
    expect(res.body).toMatchObject({
      errorCode: 'EMBEDDING_TIMEOUT',
      error: 'Search is temporarily unavailable. Please try again',
    })
  })

  it('returns 504 when the request deadline passes', async () => {
    const res = await request(createTestApp({ embeddings: new HangingEmbeddingClient(), requestTimeoutMs: 20 }))
      .get('/api/search')
      .query({ query: 'jas' })

    expect(res.status).toBe(504)
    expect(res.body.errorCode).toBe('REQUEST_TIMEOUT')
  })

  it('returns 503 during maintenance', async () => {
    const res = await request(createTestApp({ maintenance: true })).get('/api/search').query({ query: 'jas' })

    expect(res.status).toBe(503)
    expect(res.body.errorCode).toBe('MAINTENANCE_MODE')
  })
})

describe('POST /api/search/parse', () => {
  it('returns the price intent without searching', async () => {
    const res = await request(createTestApp()).post('/api/search/parse').send({ query: 'jurk onder 10 euro' })

    expect(res.status).toBe(200)
    expect(res.body).toMatchObject({
      cleanedQuery: 'jurk',
      priceIntent: { minPrice: null, maxPrice: 10, source: 'regex_range' },
      category: 'dresses',
    })
  })
})

describe('GET /api/search/suggestions', () => {
  it('returns matching titles', async () => {
    const res = await request(createTestApp()).get('/api/search/suggestions').query({ q: 'le' })

    expect(res.status).toBe(200)
    expect(res.body).toEqual({ suggestions: ['Leren jas', 'Leren tas'] })
  })

  it('returns an empty list without a prefix', async () => {
    const res = await request(createTestApp()).get('/api/search/suggestions')

    expect(res.body).toEqual({ suggestions: [] })
  })

  it('caps the limit', async () => {
    const res = await request(createTestApp()).get('/api/search/suggestions').query({ q: 'le', limit: 21 })

    expect(res.status).toBe(400)
  })
})

describe('GET /api/products', () => {
  it('lists products within the price bounds', async () => {
    const res = await request(createTestApp()).get('/api/products').query({ minPrice: 40, maxPrice: 60, limit: 2 })

    expect(res.status).toBe(200)
    expect(res.body).toMatchObject({ totalCount: 3, page: 1, limit: 2, totalPages: 2, cacheHit: false })
    expect(res.body.results.map((r: { productId: string }) => r.productId)).toEqual(['s3', 't2'])
  })

  it('rejects inverted bounds', async () => {
    const res = await request(createTestApp()).get('/api/products').query({ minPrice: 80, maxPrice: 20 })

    expect(res.status).toBe(400)
    expect(res.body.details.issues[0].path).toBe('minPrice')
  })
})

describe('unknown routes', () => {
  it('return a JSON 404', async () => {
    const res = await request(createTestApp()).get('/api/nope')

    expect(res.status).toBe(404)
    expect(res.body.errorCode).toBe('NOT_FOUND')
  })
})
