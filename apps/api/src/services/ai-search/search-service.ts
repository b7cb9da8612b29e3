import { z } from 'zod'
import { getRequestContext } from '@searchlight/logger'
import { loggers } from '../../config/logger'
import { getSearchConfig } from '../../config/search-config'
import type { SearchConfig } from '../../config/search-config'
import { throwIfAborted } from '../../lib/abort'
import { fetchPopularQueries, recordSearchAnalytics } from '../query-analytics'
import type { AnalyticsRecorder, PopularQueriesFn } from '../query-analytics'
import { applyAdaptiveFilters, summarizeAdaptive } from './adaptive-filters'
import { buildAutocompleteCacheKey, buildSearchCacheKey, CACHE_TTL_SECONDS, RedisCacheBackend, ResponseCache } from './cache'
import type { CacheBackend } from './cache'
import { CandidateRetriever } from './candidate-retriever'
import { detectCategory } from './catalog-knowledge'
import { OpenAIEmbeddingClient } from './embedding-service'
import { isPriceFilterApplied, resolveFallback } from './fallback-resolver'
import { inferPriceWithLlm } from './price-inference'
import type { PriceInferenceFn } from './price-inference'
import { extractPriceIntent } from './price-intent'
import { PgProductStore } from './product-store'
import type { ProductStore } from './product-store'
import { cleanQuery } from './query-normalizer'
import { searchResponseSchema } from './types'
import type { AdaptiveSummary, PriceIntentSource, PriceRange, SearchRequest, SearchResponse } from './types'

const log = loggers.ai

/**
 * Collaborators of the search pipeline. Built once per process; the config
 * snapshot is read once per request.
 */
export interface SearchDependencies {
  retriever: Pick<CandidateRetriever, 'retrieve' | 'searchWithVector' | 'embedQuery'>
  cache: Pick<ResponseCache<SearchResponse>, 'get' | 'set'>
  recordAnalytics: AnalyticsRecorder
  inferPrice?: PriceInferenceFn
  getConfig?: () => SearchConfig
}

export interface SuggestionDependencies {
  store: Pick<ProductStore, 'suggestTitles'>
  cache: Pick<ResponseCache<string[]>, 'get' | 'set'>
  popularQueries?: PopularQueriesFn
  getConfig?: () => SearchConfig
}

export interface SearchOptions {
  signal?: AbortSignal
}

export interface ParsedQuery {
  query: string
  cleanedQuery: string
  priceIntent: {
    minPrice: number | null
    maxPrice: number | null
    confidence: number
    source: PriceIntentSource
  }
  category: string | null
}

export function createSearchDependencies(
  store: ProductStore = new PgProductStore(),
  backend: CacheBackend = new RedisCacheBackend()
): SearchDependencies {
  return {
    retriever: new CandidateRetriever(new OpenAIEmbeddingClient(), store),
    cache: new ResponseCache(backend, searchResponseSchema, CACHE_TTL_SECONDS.aiSearch, 'ai-search'),
    recordAnalytics: recordSearchAnalytics,
    inferPrice: inferPriceWithLlm,
  }
}

export function createSuggestionDependencies(
  store: ProductStore = new PgProductStore(),
  backend: CacheBackend = new RedisCacheBackend()
): SuggestionDependencies {
  return {
    store,
    cache: new ResponseCache(backend, z.array(z.string()), CACHE_TTL_SECONDS.autocomplete, 'autocomplete'),
    popularQueries: fetchPopularQueries,
  }
}

function recordOutcome(deps: SearchDependencies, response: SearchResponse, startTime: number): void {
  deps.recordAnalytics({
    query: response.query,
    cleanedQuery: response.cleanedQuery,
    searchType: 'ai',
    filters: {
      minPrice: response.priceFilter.min,
      maxPrice: response.priceFilter.max,
      priceSource: response.priceFilter.source,
      confidence: response.priceFilter.confidence,
      language: response.language,
    },
    resultCount: response.results.length,
    totalCount: response.totalCount,
    page: response.page,
    limit: response.limit,
    latencyMs: Date.now() - startTime,
    cacheHit: response.cacheHit,
    fallbackUsed: response.priceFilter.fallbackUsed,
    strategiesApplied: response.adaptive?.strategiesApplied ?? [],
    requestId: getRequestContext()?.requestId ?? null,
  })
}

/**
 * Natural-language product search.
 *
 * The search process:
 * 1. Extract a price intent from the raw query
 * 2. Strip the matched price phrases to get the cleaned query
 * 3. Look up the response cache (keyed on cleaned query + filters + paging)
 * 4. Embed the cleaned query and run the filtered similarity search
 * 5. Fall back to the cheapest relevant products when the price filter left nothing
 * 6. On a poor first page, apply adaptive filter strategies
 * 7. Cache the response and record analytics without waiting for the write
 *
 * Embedding and store failures propagate; they are never turned into an empty
 * result. A cancelled request stops at the next stage boundary and caches nothing.
 */
export async function aiSearch(
  request: SearchRequest,
  deps: SearchDependencies,
  options: SearchOptions = {}
): Promise<SearchResponse> {
  const startTime = Date.now()
  const { signal } = options
  const { page, limit, targetLanguage } = request
  const config = (deps.getConfig ?? getSearchConfig)()

  log.debug('Starting search', { query: request.rawQuery, page, limit, targetLanguage, configVersion: config.version })

  const intent = await extractPriceIntent(request.rawQuery, { config, inferPrice: deps.inferPrice, signal })
  throwIfAborted(signal)

  const cleanedQuery = cleanQuery(request.rawQuery, intent)
  const filter: PriceRange = { minPrice: intent.minPrice, maxPrice: intent.maxPrice }

  const cacheKey = buildSearchCacheKey({ cleanedQuery, ...filter, page, limit, targetLanguage })
  const cached = await deps.cache.get(cacheKey)
  if (cached) {
    // Another phrasing of the same intent may have filled this entry
    const response: SearchResponse = {
      ...cached,
      query: request.rawQuery,
      priceFilter: { ...cached.priceFilter, source: intent.source, confidence: intent.confidence },
      cacheHit: true,
    }
    recordOutcome(deps, response, startTime)
    return response
  }

  const retrieval = await deps.retriever.retrieve(cleanedQuery, { ...filter, page, limit, signal })

  const resolution = await resolveFallback({
    retriever: deps.retriever,
    vector: retrieval.vector,
    filter,
    filtered: retrieval,
    page,
    limit,
    language: config.storeLanguage,
    candidatePool: config.quality.fallbackPoolSize,
    signal,
  })

  let results = resolution.results
  let totalCount = resolution.totalCount
  let adaptive: AdaptiveSummary | null = null

  if (page === 1 && !resolution.fallbackUsed && totalCount > 0) {
    const outcome = await applyAdaptiveFilters(
      { results, totalCount, filter, applied: [] },
      {
        config,
        cleanedQuery,
        requestFilter: filter,
        queryCategory: detectCategory(request.rawQuery, config),
        limit,
        vector: retrieval.vector,
        retriever: deps.retriever,
        signal,
      }
    )
    results = outcome.state.results
    totalCount = outcome.state.totalCount
    adaptive = summarizeAdaptive(outcome.state, filter, config.storeLanguage)
  }

  throwIfAborted(signal)

  const response: SearchResponse = {
    query: request.rawQuery,
    cleanedQuery,
    language: targetLanguage,
    results,
    totalCount,
    page,
    limit,
    totalPages: Math.ceil(totalCount / limit),
    priceFilter: {
      min: filter.minPrice,
      max: filter.maxPrice,
      applied: isPriceFilterApplied(filter),
      fallbackUsed: resolution.fallbackUsed,
      source: intent.source,
      confidence: intent.confidence,
    },
    message: resolution.message,
    cacheHit: false,
    adaptive,
  }

  await deps.cache.set(cacheKey, response)

  log.info('Search completed', {
    resultCount: results.length,
    totalCount,
    fallbackUsed: resolution.fallbackUsed,
    strategiesApplied: adaptive?.strategiesApplied ?? [],
    processingTimeMs: Date.now() - startTime,
  })

  recordOutcome(deps, response, startTime)
  return response
}

/**
 * Price intent and cleaned query for a raw query, without retrieval
 */
export async function parseQuery(
  rawQuery: string,
  deps: Pick<SearchDependencies, 'inferPrice' | 'getConfig'>,
  options: SearchOptions = {}
): Promise<ParsedQuery> {
  const config = (deps.getConfig ?? getSearchConfig)()
  const intent = await extractPriceIntent(rawQuery, { config, inferPrice: deps.inferPrice, signal: options.signal })
  return {
    query: rawQuery,
    cleanedQuery: cleanQuery(rawQuery, intent),
    priceIntent: {
      minPrice: intent.minPrice,
      maxPrice: intent.maxPrice,
      confidence: intent.confidence,
      source: intent.source,
    },
    category: detectCategory(rawQuery, config)?.name ?? null,
  }
}

/**
 * Popular queries first, then product titles; case-insensitive duplicates dropped
 */
export function mergeSuggestions(popular: readonly string[], titles: readonly string[], limit: number): string[] {
  const seen = new Set<string>()
  const merged: string[] = []
  for (const suggestion of [...popular, ...titles]) {
    const key = suggestion.toLowerCase()
    if (seen.has(key)) continue
    seen.add(key)
    merged.push(suggestion)
    if (merged.length >= limit) break
  }
  return merged
}

/**
 * Autocomplete for a partial query.
 *
 * A price phrase in the partial query ("leren tas onder 100") restricts the
 * title suggestions to that range and is stripped from the title prefix.
 * Extraction stays in-process here; the LLM never runs per keystroke.
 */
export async function getSearchSuggestions(
  partialQuery: string,
  deps: SuggestionDependencies,
  limit = 8
): Promise<string[]> {
  const prefix = partialQuery.trim()
  if (prefix.length === 0) return []

  const cacheKey = buildAutocompleteCacheKey(prefix, limit)
  const cached = await deps.cache.get(cacheKey)
  if (cached) return cached

  const config = (deps.getConfig ?? getSearchConfig)()
  const intent = await extractPriceIntent(prefix, { config, useLlm: false })

  const [popular, titles] = await Promise.all([
    deps.popularQueries ? deps.popularQueries(prefix, limit) : Promise.resolve([]),
    deps.store.suggestTitles({
      prefix: cleanQuery(prefix, intent),
      limit,
      minPrice: intent.minPrice,
      maxPrice: intent.maxPrice,
    }),
  ])

  const suggestions = mergeSuggestions(popular, titles, limit)
  await deps.cache.set(cacheKey, suggestions)
  return suggestions
}
