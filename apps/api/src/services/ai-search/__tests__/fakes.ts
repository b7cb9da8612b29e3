/**
 * In-process stand-ins for the embedding provider, the product store, the
 * cache backend and the rate limit counters.
 */

import type { RateLimitHit, RateLimitStore } from '../../../middleware/rate-limit'
import type { CacheBackend } from '../cache'
import { compareByPrice, compareBySimilarity } from '../candidate-retriever'
import type { EmbeddingClient, EmbedOptions } from '../embedding-service'
import type { ListingQuery, ProductListing, ProductStore, StorePage, StoreQuery, TitleSuggestionQuery } from '../product-store'
import type { CandidateResult } from '../types'

export const TEST_DIMENSIONS = 16

/**
 * Bag-of-words vector: one constant component plus hashed word counts
 */
export function textVector(text: string): number[] {
  const vector = new Array<number>(TEST_DIMENSIONS).fill(0)
  vector[0] = 1
  const words = text.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter((w) => w.length > 0)
  for (const word of words) {
    let hash = 0
    for (const ch of word) {
      hash = (hash * 31 + (ch.codePointAt(0) ?? 0)) % 9973
    }
    vector[1 + (hash % (TEST_DIMENSIONS - 1))] += 1
  }
  return vector
}

export function cosine(a: readonly number[], b: readonly number[]): number {
  let dot = 0
  let na = 0
  let nb = 0
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    dot += a[i] * b[i]
    na += a[i] * a[i]
    nb += b[i] * b[i]
  }
  return na === 0 || nb === 0 ? 0 : dot / Math.sqrt(na * nb)
}

export class FakeEmbeddingClient implements EmbeddingClient {
  readonly dimensions = TEST_DIMENSIONS
  readonly texts: string[] = []
  failWith: Error | null = null

  async embed(text: string, _options?: EmbedOptions): Promise<number[]> {
    this.texts.push(text)
    if (this.failWith) throw this.failWith
    return textVector(text)
  }
}

export interface FakeProduct {
  id: string
  title: string
  price: number
  tags: string[]
}

export class InMemoryProductStore implements ProductStore {
  readonly searches: StoreQuery[] = []
  readonly suggestionQueries: TitleSuggestionQuery[] = []
  failWith: Error | null = null
  private readonly vectors: Map<string, number[]>

  constructor(private readonly products: readonly FakeProduct[]) {
    this.vectors = new Map(products.map((p) => [p.id, textVector(`${p.title} ${p.tags.join(' ')}`)]))
  }

  async similaritySearch(params: StoreQuery): Promise<StorePage> {
    this.searches.push(params)
    if (this.failWith) throw this.failWith

    const matching: CandidateResult[] = this.products
      .filter((p) => (params.minPrice === null || p.price >= params.minPrice) && (params.maxPrice === null || p.price <= params.maxPrice))
      .map((p) => ({
        productId: p.id,
        title: p.title,
        price: p.price,
        tags: p.tags,
        similarity: cosine(params.vector, this.vectors.get(p.id) ?? []),
      }))
      .sort(compareBySimilarity)

    const pool = params.rank === 'price' ? matching.slice(0, params.candidatePool ?? params.limit).sort(compareByPrice) : matching

    return {
      rows: pool.slice(params.offset, params.offset + params.limit),
      totalCount: pool.length,
    }
  }

  async listProducts(params: ListingQuery): Promise<{ rows: ProductListing[]; totalCount: number }> {
    const matching = this.products
      .filter((p) => (params.minPrice === null || p.price >= params.minPrice) && (params.maxPrice === null || p.price <= params.maxPrice))
      .sort((a, b) => a.title.localeCompare(b.title) || a.id.localeCompare(b.id))
    return {
      rows: matching
        .slice(params.offset, params.offset + params.limit)
        .map((p) => ({ productId: p.id, title: p.title, price: p.price, tags: p.tags })),
      totalCount: matching.length,
    }
  }

  async suggestTitles(params: TitleSuggestionQuery): Promise<string[]> {
    this.suggestionQueries.push(params)
    const lower = params.prefix.toLowerCase()
    return [
      ...new Set(
        this.products
          .filter((p) => (params.minPrice === null || p.price >= params.minPrice) && (params.maxPrice === null || p.price <= params.maxPrice))
          .map((p) => p.title)
      ),
    ]
      .filter((title) => title.toLowerCase().startsWith(lower))
      .sort()
      .slice(0, params.limit)
  }
}

export class MemoryCacheBackend implements CacheBackend {
  readonly entries = new Map<string, { value: string; ttlSeconds: number }>()
  failing = false
  gets = 0
  sets = 0

  async get(key: string): Promise<string | null> {
    this.gets++
    if (this.failing) throw new Error('connect ECONNREFUSED 127.0.0.1:6379')
    return this.entries.get(key)?.value ?? null
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.sets++
    if (this.failing) throw new Error('connect ECONNREFUSED 127.0.0.1:6379')
    this.entries.set(key, { value, ttlSeconds })
  }
}

export class MemoryRateLimitStore implements RateLimitStore {
  readonly counts = new Map<string, number>()
  failing = false

  async hit(key: string, windowMs: number): Promise<RateLimitHit> {
    if (this.failing) throw new Error('connect ECONNREFUSED 127.0.0.1:6379')
    const count = (this.counts.get(key) ?? 0) + 1
    this.counts.set(key, count)
    return { count, ttlMs: windowMs }
  }
}

export const CATALOG: readonly FakeProduct[] = [
  { id: 's1', title: 'Witte sneakers', price: 59.95, tags: ['schoenen', 'wit'] },
  { id: 's2', title: 'Zwarte leren schoenen', price: 89, tags: ['schoenen', 'leer'] },
  { id: 's3', title: 'Canvas schoenen', price: 45, tags: ['schoenen'] },
  { id: 's4', title: 'Wandelschoenen', price: 110, tags: ['schoenen'] },
  { id: 's5', title: 'Suede loafers', price: 119, tags: ['schoenen'] },
  { id: 's6', title: 'Designer pumps', price: 320, tags: ['schoenen'] },
  { id: 's7', title: 'Luxe laarzen', price: 280, tags: ['schoenen'] },
  { id: 'c1', title: 'Regenjas', price: 79, tags: ['jas'] },
  { id: 'c2', title: 'Wollen winterjas', price: 189, tags: ['jas'] },
  { id: 'c3', title: 'Kasjmier jas', price: 420, tags: ['jas'] },
  { id: 'c4', title: 'Leren jas', price: 299, tags: ['jas'] },
  { id: 'c5', title: 'Parka', price: 260, tags: ['jas'] },
  { id: 'd1', title: 'Zomerjurk', price: 39, tags: ['jurk'] },
  { id: 'd2', title: 'Avondjurk', price: 149, tags: ['jurk'] },
  { id: 't1', title: 'Katoenen shirt', price: 19.95, tags: ['shirt'] },
  { id: 't2', title: 'Linnen overhemd', price: 49, tags: ['shirt'] },
  { id: 'a1', title: 'Leren tas', price: 65, tags: ['tas'] },
  { id: 'a2', title: 'Wollen sjaal', price: 22, tags: ['sjaal'] },
]

export function candidate(productId: string, price: number, similarity: number, tags: string[] = []): CandidateResult {
  return { productId, title: productId, price, tags, similarity }
}
