/**
 * Search analytics recorder.
 *
 * One row per answered search in `search_analytics`. Recording is
 * fire-and-forget: the caller never awaits the write, and a failed insert is
 * logged and dropped. The same table feeds the popular-search suggestions.
 */

import { query } from '@searchlight/db'
import { loggers } from '../config/logger'

const log = loggers.analytics

const MAX_QUERY_LENGTH = 500

export const POPULAR_WINDOW_DAYS = parseInt(process.env.POPULAR_SEARCH_WINDOW_DAYS || '30', 10)

export type SearchType = 'ai' | 'listing' | 'suggestions'

export interface SearchAnalyticsEvent {
  query: string
  cleanedQuery: string | null
  searchType: SearchType
  filters: {
    minPrice: number | null
    maxPrice: number | null
    priceSource: string | null
    confidence: number | null
    language: string | null
  }
  resultCount: number
  totalCount: number
  page: number
  limit: number
  latencyMs: number
  cacheHit: boolean
  fallbackUsed: boolean
  strategiesApplied: readonly string[]
  requestId: string | null
}

export type AnalyticsSink = (event: Readonly<SearchAnalyticsEvent>) => Promise<void>

export type AnalyticsRecorder = (event: SearchAnalyticsEvent) => void

export type PopularQueriesFn = (prefix: string, limit: number) => Promise<string[]>

export async function insertSearchAnalytics(event: Readonly<SearchAnalyticsEvent>): Promise<void> {
  await query(
    `INSERT INTO search_analytics
       (query, cleaned_query, search_type, filters, result_count, total_count,
        page, page_limit, latency_ms, cache_hit, fallback_used, strategies_applied, request_id)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)`,
    [
      event.query.slice(0, MAX_QUERY_LENGTH),
      event.cleanedQuery?.slice(0, MAX_QUERY_LENGTH) ?? null,
      event.searchType,
      JSON.stringify(event.filters),
      event.resultCount,
      event.totalCount,
      event.page,
      event.limit,
      Math.round(event.latencyMs),
      event.cacheHit,
      event.fallbackUsed,
      [...event.strategiesApplied],
      event.requestId,
    ]
  )
}

/**
 * The recorder hands the sink a frozen copy, so nothing it does can reach
 * the response still being sent.
 */
export function createAnalyticsRecorder(sink: AnalyticsSink = insertSearchAnalytics): AnalyticsRecorder {
  return (event) => {
    const snapshot: Readonly<SearchAnalyticsEvent> = Object.freeze({
      ...event,
      filters: Object.freeze({ ...event.filters }),
      strategiesApplied: Object.freeze([...event.strategiesApplied]),
    })

    void Promise.resolve()
      .then(() => sink(snapshot))
      .catch((error: unknown) => {
        log.warn('ANALYTICS_WRITE_FAILED', { searchType: snapshot.searchType, requestId: snapshot.requestId }, error)
      })
  }
}

export const recordSearchAnalytics: AnalyticsRecorder = createAnalyticsRecorder()

/**
 * Most searched queries starting with the prefix over the recent window.
 * Only AI searches that found something count.
 */
export const fetchPopularQueries: PopularQueriesFn = async (prefix, limit) => {
  const escaped = prefix.trim().toLowerCase().replace(/[\\%_]/g, (c) => `\\${c}`)
  const rows = await query<{ query: string; searches: string | number }>(
    `SELECT lower(query) AS query, COUNT(*) AS searches
     FROM search_analytics
     WHERE search_type = 'ai'
       AND result_count > 0
       AND lower(query) LIKE $1
       AND created_at > now() - make_interval(days => $2)
     GROUP BY lower(query)
     ORDER BY searches DESC, query ASC
     LIMIT $3`,
    [`${escaped}%`, POPULAR_WINDOW_DAYS, limit]
  )
  return rows.map((row) => row.query)
}
