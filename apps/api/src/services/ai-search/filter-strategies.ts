/**
 * Strategy catalog for the adaptive filter engine.
 *
 * Names, priorities, expected improvement and parameters come from the search
 * config; the behaviour behind each name lives here. Every apply() derives its
 * change from the request (never from the previous widening) and merges new
 * rows after the existing ones, so running a strategy twice changes nothing
 * the second time.
 */

import type { SearchConfig, StrategyConfig, StrategyName } from '../../config/search-config'
import { categorizeProduct, findTermSpans, removeTerms } from './catalog-knowledge'
import { compareBySimilarity } from './candidate-retriever'
import { roundPrice } from './price-patterns'
import type { AdaptiveContext, AdaptiveState, QualitySignals } from './adaptive-filters'
import type { CandidateResult, PriceRange } from './types'

export interface FilterStrategy {
  readonly name: StrategyName
  readonly priority: number
  readonly expectedImprovement: number
  isApplicable(state: AdaptiveState, ctx: AdaptiveContext, signals: QualitySignals): boolean
  apply(state: AdaptiveState, ctx: AdaptiveContext): Promise<AdaptiveState>
}

type StrategyBehavior = Pick<FilterStrategy, 'isApplicable' | 'apply'>

/**
 * Append unseen candidates (best first) after the existing ones, up to limit
 */
export function mergeResults(
  existing: readonly CandidateResult[],
  incoming: readonly CandidateResult[],
  limit: number
): CandidateResult[] {
  const seen = new Set(existing.map((r) => r.productId))
  const merged = [...existing]
  for (const candidate of [...incoming].sort(compareBySimilarity)) {
    if (merged.length >= limit) break
    if (seen.has(candidate.productId)) continue
    seen.add(candidate.productId)
    merged.push(candidate)
  }
  return merged
}

/**
 * Round-robin across categories. Groups are ordered by their best member and
 * members by similarity, so the outcome depends only on the candidate set.
 */
export function interleaveByCategory(
  candidates: readonly CandidateResult[],
  limit: number,
  config: SearchConfig
): CandidateResult[] {
  const groups = new Map<string, CandidateResult[]>()
  for (const candidate of candidates) {
    const category = categorizeProduct(candidate, config)
    const group = groups.get(category) ?? []
    group.push(candidate)
    groups.set(category, group)
  }

  const ordered = [...groups.values()]
    .map((group) => [...group].sort(compareBySimilarity))
    .sort((a, b) => compareBySimilarity(a[0], b[0]))

  const selected: CandidateResult[] = []
  for (let round = 0; selected.length < limit; round++) {
    let picked = false
    for (const group of ordered) {
      if (selected.length >= limit) break
      const candidate = group[round]
      if (candidate) {
        selected.push(candidate)
        picked = true
      }
    }
    if (!picked) break
  }
  return selected
}

function markApplied(state: AdaptiveState, name: StrategyName): AdaptiveState {
  return state.applied.includes(name) ? state : { ...state, applied: [...state.applied, name] }
}

async function requery(
  state: AdaptiveState,
  ctx: AdaptiveContext,
  name: StrategyName,
  filter: PriceRange,
  vector: readonly number[]
): Promise<AdaptiveState> {
  const page = await ctx.retriever.searchWithVector(vector, {
    minPrice: filter.minPrice,
    maxPrice: filter.maxPrice,
    page: 1,
    limit: ctx.limit,
    signal: ctx.signal,
  })
  return markApplied(
    {
      results: mergeResults(state.results, page.results, ctx.limit),
      totalCount: Math.max(state.totalCount, page.totalCount),
      filter,
      applied: state.applied,
    },
    name
  )
}

/**
 * Re-embed the query with some terms dropped (material, colour) and merge what that finds
 */
function termFallback(name: StrategyName, terms: (config: SearchConfig) => readonly string[]): StrategyBehavior {
  return {
    isApplicable: (_state, ctx, signals) =>
      signals.tooFewResults && findTermSpans(ctx.cleanedQuery, terms(ctx.config)).length > 0,
    apply: async (state, ctx) => {
      const text = removeTerms(ctx.cleanedQuery, terms(ctx.config))
      if (text.length === 0 || text === ctx.cleanedQuery) {
        return markApplied(state, name)
      }
      const vector = await ctx.retriever.embedQuery(text, ctx.signal)
      return requery(state, ctx, name, state.filter, vector)
    },
  }
}

const BEHAVIORS: Record<StrategyName, (params: Record<string, number>) => StrategyBehavior> = {
  price_broaden_low: (params) => ({
    isApplicable: (_state, ctx, signals) =>
      ctx.requestFilter.minPrice !== null && (signals.tooFewResults || signals.priceIncoherent),
    apply: async (state, ctx) => {
      const requested = ctx.requestFilter.minPrice
      const current = state.filter.minPrice
      if (requested === null || current === null) return markApplied(state, 'price_broaden_low')

      const widened = Math.min(current, roundPrice(requested * (1 - (params.factor ?? 0.5))))
      if (widened === current) return markApplied(state, 'price_broaden_low')
      return requery(state, ctx, 'price_broaden_low', { ...state.filter, minPrice: widened }, ctx.vector)
    },
  }),

  price_broaden_high: (params) => ({
    isApplicable: (_state, ctx, signals) =>
      ctx.requestFilter.maxPrice !== null && (signals.tooFewResults || signals.priceIncoherent),
    apply: async (state, ctx) => {
      const requested = ctx.requestFilter.maxPrice
      const current = state.filter.maxPrice
      if (requested === null || current === null) return markApplied(state, 'price_broaden_high')

      const widened = Math.max(current, roundPrice(requested * (1 + (params.factor ?? 0.5))))
      if (widened === current) return markApplied(state, 'price_broaden_high')
      return requery(state, ctx, 'price_broaden_high', { ...state.filter, maxPrice: widened }, ctx.vector)
    },
  }),

  category_broaden: () => ({
    isApplicable: (_state, ctx, signals) =>
      signals.tooFewResults && ctx.queryCategory !== null && ctx.queryCategory.related.length > 0,
    apply: async (state, ctx) => {
      if (!ctx.queryCategory) return markApplied(state, 'category_broaden')
      const text = `${ctx.cleanedQuery} ${ctx.queryCategory.related.join(' ')}`
      const vector = await ctx.retriever.embedQuery(text, ctx.signal)
      return requery(state, ctx, 'category_broaden', state.filter, vector)
    },
  }),

  diversity_improve: (params) => ({
    isApplicable: (_state, _ctx, signals) => signals.lowDiversity,
    apply: async (state, ctx) => {
      const pool = await ctx.retriever.searchWithVector(ctx.vector, {
        minPrice: state.filter.minPrice,
        maxPrice: state.filter.maxPrice,
        page: 1,
        limit: ctx.limit * Math.max(1, params.poolMultiplier ?? 3),
        signal: ctx.signal,
      })
      const candidates = mergeResults(state.results, pool.results, Number.MAX_SAFE_INTEGER)
      return markApplied(
        {
          ...state,
          results: interleaveByCategory(candidates, ctx.limit, ctx.config),
          totalCount: Math.max(state.totalCount, pool.totalCount),
        },
        'diversity_improve'
      )
    },
  }),

  material_fallback: () => termFallback('material_fallback', (config) => config.materials),

  color_fallback: () => termFallback('color_fallback', (config) => config.colors),

  emergency_fallback: () => ({
    isApplicable: () => true,
    apply: (state, ctx) =>
      requery(state, ctx, 'emergency_fallback', { minPrice: null, maxPrice: null }, ctx.vector),
  }),
}

function toStrategy(entry: StrategyConfig): FilterStrategy {
  const behavior = BEHAVIORS[entry.name](entry.params)
  return {
    name: entry.name,
    priority: entry.priority,
    expectedImprovement: entry.expectedImprovement,
    isApplicable: behavior.isApplicable,
    apply: behavior.apply,
  }
}

const catalogCache = new WeakMap<SearchConfig, readonly FilterStrategy[]>()

/**
 * Enabled strategies, lowest priority number first, higher expected improvement
 * breaking ties. Built once per config snapshot.
 */
export function buildStrategyCatalog(config: SearchConfig): readonly FilterStrategy[] {
  const cached = catalogCache.get(config)
  if (cached) return cached

  const catalog = config.strategies
    .filter((entry) => entry.enabled)
    .map(toStrategy)
    .sort(
      (a, b) =>
        a.priority - b.priority || b.expectedImprovement - a.expectedImprovement || a.name.localeCompare(b.name)
    )

  catalogCache.set(config, catalog)
  return catalog
}

export function getStrategy(config: SearchConfig, name: StrategyName): FilterStrategy | undefined {
  return buildStrategyCatalog(config).find((s) => s.name === name)
}
