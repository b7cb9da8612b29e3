/**
 * Adaptive filter engine.
 *
 * Runs when a search returned something but the page looks poor: too few
 * matches overall, a single category where the query named none, or an
 * average price that does not fit the extracted intent. Strategies from the
 * configured catalog are applied in priority order, re-evaluating after each
 * one, until the page is acceptable, `maxStrategies` have run, or
 * emergency_fallback has run.
 */

import { loggers } from '../../config/logger'
import type { CategoryConfig, SearchConfig, StrategyName, TargetLanguage } from '../../config/search-config'
import { RetrievalError, StoreQueryError } from '../../lib/errors'
import { throwIfAborted } from '../../lib/abort'
import { categorizeProduct, UNCATEGORIZED } from './catalog-knowledge'
import type { CandidateRetriever } from './candidate-retriever'
import { isPriceFilterApplied } from './fallback-resolver'
import { buildStrategyCatalog } from './filter-strategies'
import type { AdaptiveSummary, CandidateResult, PriceRange } from './types'

const log = loggers.search

export interface AdaptiveState {
  results: CandidateResult[]
  totalCount: number
  /** Price filter currently in effect (widened by the price strategies) */
  filter: PriceRange
  applied: StrategyName[]
}

export interface AdaptiveContext {
  config: SearchConfig
  cleanedQuery: string
  /** Filter extracted from the request; widening is always computed from this */
  requestFilter: PriceRange
  queryCategory: CategoryConfig | null
  limit: number
  vector: readonly number[]
  retriever: Pick<CandidateRetriever, 'searchWithVector' | 'embedQuery'>
  signal?: AbortSignal
}

export interface QualitySignals {
  resultCount: number
  totalCount: number
  distinctCategories: number
  averagePrice: number | null
  tooFewResults: boolean
  lowDiversity: boolean
  priceIncoherent: boolean
}

export interface AdaptiveOutcome {
  state: AdaptiveState
  signals: QualitySignals
}

export function evaluateQuality(state: AdaptiveState, ctx: AdaptiveContext): QualitySignals {
  const { quality } = ctx.config
  const resultCount = state.results.length

  const categories = new Set(
    state.results.map((r) => categorizeProduct(r, ctx.config)).filter((c) => c !== UNCATEGORIZED)
  )

  const averagePrice =
    resultCount > 0 ? state.results.reduce((sum, r) => sum + r.price, 0) / resultCount : null

  const { minPrice, maxPrice } = ctx.requestFilter
  const tolerance = quality.priceCoherenceTolerance
  const priceIncoherent =
    averagePrice !== null &&
    ((maxPrice !== null && averagePrice > maxPrice * tolerance) ||
      (minPrice !== null && averagePrice < minPrice / tolerance))

  return {
    resultCount,
    totalCount: state.totalCount,
    distinctCategories: categories.size,
    averagePrice,
    tooFewResults: state.totalCount < quality.minResults,
    // Only meaningful when the query did not ask for a category and something was recognised
    lowDiversity:
      ctx.queryCategory === null &&
      resultCount >= 2 &&
      categories.size > 0 &&
      categories.size < quality.minDistinctCategories,
    priceIncoherent,
  }
}

export function isBelowThreshold(signals: QualitySignals): boolean {
  return signals.tooFewResults || signals.lowDiversity || signals.priceIncoherent
}

export async function applyAdaptiveFilters(initial: AdaptiveState, ctx: AdaptiveContext): Promise<AdaptiveOutcome> {
  let state = initial
  let signals = evaluateQuality(state, ctx)
  if (!isBelowThreshold(signals)) {
    return { state, signals }
  }

  const catalog = buildStrategyCatalog(ctx.config)
  const maxStrategies = ctx.config.quality.maxStrategies
  let attempts = 0

  for (const strategy of catalog) {
    if (attempts >= maxStrategies) break
    if (!strategy.isApplicable(state, ctx, signals)) continue

    throwIfAborted(ctx.signal)
    attempts++

    try {
      state = await strategy.apply(state, ctx)
    } catch (error) {
      // Keep what we have; the base result set is still valid
      if (error instanceof RetrievalError || error instanceof StoreQueryError) {
        log.warn('Adaptive strategy failed, keeping current results', { strategy: strategy.name }, error)
        break
      }
      throw error
    }

    signals = evaluateQuality(state, ctx)
    log.debug('Adaptive strategy applied', {
      strategy: strategy.name,
      resultCount: signals.resultCount,
      totalCount: signals.totalCount,
      stillBelowThreshold: isBelowThreshold(signals),
    })

    if (strategy.name === 'emergency_fallback' || !isBelowThreshold(signals)) break
  }

  return { state, signals }
}

export const PRICE_FILTER_DROPPED_NOTICES: Record<TargetLanguage, string> = {
  nl: 'Te weinig producten binnen de prijsklasse, daarom tonen we ook producten buiten je budget.',
  en: 'Too few products in the requested price range, so products outside your budget are shown too.',
}

/**
 * Response summary of an adaptive run, or null when no strategy applied.
 */
export function summarizeAdaptive(
  state: AdaptiveState,
  requestFilter: PriceRange,
  language: TargetLanguage
): AdaptiveSummary | null {
  if (state.applied.length === 0) return null

  const filterDropped = isPriceFilterApplied(requestFilter) && !isPriceFilterApplied(state.filter)
  return {
    strategiesApplied: [...state.applied],
    effectiveMin: state.filter.minPrice,
    effectiveMax: state.filter.maxPrice,
    notice: filterDropped ? PRICE_FILTER_DROPPED_NOTICES[language] : null,
  }
}
