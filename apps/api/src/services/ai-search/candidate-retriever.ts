/**
 * Candidate retrieval: embed the cleaned query once, then run similarity
 * searches against the product store with the price predicate pushed down.
 */

import { loggers } from '../../config/logger'
import { EmbeddingError, RetrievalError } from '../../lib/errors'
import { throwIfAborted } from '../../lib/abort'
import type { EmbeddingClient } from './embedding-service'
import type { ProductStore } from './product-store'
import type { CandidateResult } from './types'

const log = loggers.search

export interface VectorSearchOptions {
  minPrice: number | null
  maxPrice: number | null
  page: number
  limit: number
  rank?: 'similarity' | 'price'
  candidatePool?: number
  signal?: AbortSignal
}

export interface CandidatePage {
  results: CandidateResult[]
  totalCount: number
}

export interface RetrievalResult extends CandidatePage {
  vector: number[]
}

/**
 * Similarity descending, then cheaper first, then id for a stable order
 */
export function compareBySimilarity(a: CandidateResult, b: CandidateResult): number {
  return b.similarity - a.similarity || a.price - b.price || a.productId.localeCompare(b.productId)
}

/**
 * Fallback order: cheapest first, then most similar
 */
export function compareByPrice(a: CandidateResult, b: CandidateResult): number {
  return a.price - b.price || b.similarity - a.similarity || a.productId.localeCompare(b.productId)
}

export class CandidateRetriever {
  constructor(
    private readonly embeddings: EmbeddingClient,
    private readonly store: ProductStore
  ) {}

  /**
   * Embedding failures become RetrievalError{embedding_failed}; cancellation passes through.
   */
  async embedQuery(text: string, signal?: AbortSignal): Promise<number[]> {
    try {
      return await this.embeddings.embed(text, { signal })
    } catch (error) {
      if (error instanceof EmbeddingError) {
        throw new RetrievalError('embedding_failed', error)
      }
      throw error
    }
  }

  /**
   * Embed and run the filtered similarity search.
   */
  async retrieve(cleanedQuery: string, options: VectorSearchOptions): Promise<RetrievalResult> {
    const vector = await this.embedQuery(cleanedQuery, options.signal)
    const page = await this.searchWithVector(vector, options)
    return { ...page, vector }
  }

  async searchWithVector(vector: readonly number[], options: VectorSearchOptions): Promise<CandidatePage> {
    throwIfAborted(options.signal)
    const rank = options.rank ?? 'similarity'

    const { rows, totalCount } = await this.store.similaritySearch({
      vector,
      minPrice: options.minPrice,
      maxPrice: options.maxPrice,
      limit: options.limit,
      offset: (options.page - 1) * options.limit,
      rank,
      candidatePool: options.candidatePool,
      signal: options.signal,
    })

    // The store already orders rows; re-sorting pins the tie-break independent of the backend
    const results = [...rows].sort(rank === 'price' ? compareByPrice : compareBySimilarity)

    log.debug('Candidates retrieved', {
      rank,
      minPrice: options.minPrice,
      maxPrice: options.maxPrice,
      page: options.page,
      count: results.length,
      totalCount,
    })

    return { results, totalCount }
  }
}
