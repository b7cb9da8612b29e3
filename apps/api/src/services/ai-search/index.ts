// Natural-language product search module

// Main search service
export {
  aiSearch,
  parseQuery,
  getSearchSuggestions,
  createSearchDependencies,
  createSuggestionDependencies,
} from './search-service'
export type { SearchDependencies, SuggestionDependencies, SearchOptions, ParsedQuery } from './search-service'

// Price intent
export { extractPriceIntent, emptyPriceIntent, mergePriceSignals } from './price-intent'
export { matchPricePatterns } from './price-patterns'
export { cleanQuery } from './query-normalizer'

// Retrieval and recovery
export { CandidateRetriever } from './candidate-retriever'
export { resolveFallback, FALLBACK_MESSAGES } from './fallback-resolver'
export { applyAdaptiveFilters, evaluateQuality } from './adaptive-filters'
export { buildStrategyCatalog } from './filter-strategies'

// Caching
export {
  buildSearchCacheKey,
  buildListingCacheKey,
  clearSearchCaches,
  CACHE_TTL_SECONDS,
  RedisCacheBackend,
  ResponseCache,
} from './cache'
export type { CacheBackend } from './cache'

// Store and embeddings
export { PgProductStore } from './product-store'
export type { ProductStore, ProductListing } from './product-store'
export { OpenAIEmbeddingClient, buildProductText } from './embedding-service'
export type { EmbeddingClient } from './embedding-service'

export type {
  SearchRequest,
  SearchResponse,
  PriceIntent,
  PriceIntentSource,
  CandidateResult,
} from './types'
export { searchResponseSchema } from './types'
