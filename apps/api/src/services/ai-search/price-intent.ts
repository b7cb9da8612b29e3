/**
 * Price intent extraction.
 *
 * Strategies run in order (pattern table, budget/premium keywords, LLM) and
 * stop as soon as the merged result reaches the configured confidence. The
 * LLM only runs when the query carries a price hint, so queries without any
 * price language never leave the process.
 */

import { loggers } from '../../config/logger'
import type { SearchConfig } from '../../config/search-config'
import { containsAnyTerm, detectCategory, findTermSpans } from './catalog-knowledge'
import { matchPricePatterns } from './price-patterns'
import { inferPriceWithLlm } from './price-inference'
import type { PriceInferenceFn } from './price-inference'
import type { MatchedSpan, PriceIntent } from './types'

const log = loggers.ai

export interface ExtractionContext {
  config: SearchConfig
  inferPrice?: PriceInferenceFn
  /** false keeps extraction in-process (autocomplete runs on every keystroke) */
  useLlm?: boolean
  signal?: AbortSignal
}

type ConflictHandler = (details: Record<string, unknown>) => void

interface ExtractionStrategy {
  name: 'pattern' | 'keyword' | 'llm'
  /** Pure and synchronous: may be run after an early exit to look for contradictions */
  cheap: boolean
  run(query: string, ctx: ExtractionContext, onConflict: ConflictHandler): PriceIntent | null | Promise<PriceIntent | null>
}

export function emptyPriceIntent(): PriceIntent {
  return {
    minPrice: null,
    maxPrice: null,
    confidence: 0,
    source: 'store_statistical_fallback',
    matches: [],
  }
}

export function hasPriceHint(query: string, config: SearchConfig): boolean {
  return /[\d€]/.test(query) || containsAnyTerm(query, config.extraction.priceHints)
}

/**
 * "goedkoop" caps the price at the category's budget band, "duur" sets a floor
 * at its premium band. Equal numbers of both kinds cancel out.
 */
export function matchPriceKeywords(query: string, config: SearchConfig, onConflict?: ConflictHandler): PriceIntent | null {
  const budget = findTermSpans(query, config.extraction.budgetKeywords)
  const premium = findTermSpans(query, config.extraction.premiumKeywords)
  if (budget.length === 0 && premium.length === 0) return null

  if (budget.length === premium.length) {
    onConflict?.({
      layer: 'keyword',
      budget: budget.map((s) => s.text),
      premium: premium.map((s) => s.text),
      resolution: 'discarded_both',
    })
    return null
  }

  const band = detectCategory(query, config)?.band ?? config.defaultBand
  const confidence = config.extraction.keywordConfidence

  if (budget.length > premium.length) {
    return { minPrice: null, maxPrice: band.budgetMax, confidence, source: 'budget_keyword', matches: budget }
  }
  return { minPrice: band.premiumMin, maxPrice: null, confidence, source: 'premium_keyword', matches: premium }
}

const STRATEGIES: readonly ExtractionStrategy[] = [
  {
    name: 'pattern',
    cheap: true,
    run: (query, _ctx, onConflict) => matchPricePatterns(query, onConflict),
  },
  {
    name: 'keyword',
    cheap: true,
    run: (query, ctx, onConflict) => matchPriceKeywords(query, ctx.config, onConflict),
  },
  {
    name: 'llm',
    cheap: false,
    run: async (query, ctx) => {
      if (ctx.useLlm === false || !hasPriceHint(query, ctx.config)) return null
      const band = detectCategory(query, ctx.config)?.band ?? ctx.config.defaultBand
      const infer = ctx.inferPrice ?? inferPriceWithLlm
      const range = await infer(query, { band, signal: ctx.signal })
      if (!range) return null
      return {
        ...range,
        confidence: ctx.config.extraction.llmConfidence,
        source: 'llm_inference',
        matches: [],
      }
    },
  },
]

function pickSide(signals: readonly PriceIntent[], side: 'minPrice' | 'maxPrice'): PriceIntent | null {
  let best: PriceIntent | null = null
  for (const signal of signals) {
    // Strictly greater: ties stay with the earlier (more deterministic) layer
    if (signal[side] !== null && (!best || signal.confidence > best.confidence)) {
      best = signal
    }
  }
  return best
}

/**
 * Combine signals side by side. Signals are in strategy order.
 * The result never has minPrice > maxPrice.
 */
export function mergePriceSignals(signals: readonly PriceIntent[], onConflict?: ConflictHandler): PriceIntent | null {
  let minFrom = pickSide(signals, 'minPrice')
  let maxFrom = pickSide(signals, 'maxPrice')

  for (const signal of signals) {
    if (minFrom && signal !== minFrom && signal.minPrice !== null && signal.minPrice !== minFrom.minPrice) {
      onConflict?.({ side: 'min', kept: minFrom.source, discarded: signal.source, keptValue: minFrom.minPrice, discardedValue: signal.minPrice })
    }
    if (maxFrom && signal !== maxFrom && signal.maxPrice !== null && signal.maxPrice !== maxFrom.maxPrice) {
      onConflict?.({ side: 'max', kept: maxFrom.source, discarded: signal.source, keptValue: maxFrom.maxPrice, discardedValue: signal.maxPrice })
    }
  }

  if (minFrom && maxFrom && minFrom.minPrice !== null && maxFrom.maxPrice !== null && minFrom.minPrice > maxFrom.maxPrice) {
    const keepMin =
      minFrom.confidence > maxFrom.confidence ||
      (minFrom.confidence === maxFrom.confidence && signals.indexOf(minFrom) <= signals.indexOf(maxFrom))
    onConflict?.({
      side: 'both',
      kept: keepMin ? minFrom.source : maxFrom.source,
      discarded: keepMin ? maxFrom.source : minFrom.source,
      minPrice: minFrom.minPrice,
      maxPrice: maxFrom.maxPrice,
    })
    if (keepMin) {
      maxFrom = null
    } else {
      minFrom = null
    }
  }

  const contributors = [minFrom, maxFrom]
    .filter((s): s is PriceIntent => s !== null)
    .filter((s, i, all) => all.indexOf(s) === i)
    .sort((a, b) => signals.indexOf(a) - signals.indexOf(b))

  if (contributors.length === 0) return null

  const strongest = contributors.reduce((a, b) => (b.confidence > a.confidence ? b : a))
  const matches: MatchedSpan[] = contributors.flatMap((s) => s.matches).sort((a, b) => a.start - b.start)

  return {
    minPrice: minFrom?.minPrice ?? null,
    maxPrice: maxFrom?.maxPrice ?? null,
    confidence: strongest.confidence,
    source: strongest.source,
    matches,
  }
}

function logConflict(query: string): ConflictHandler {
  return (details) => log.info('PRICE_INTENT_CONFLICT', { query, ...details })
}

/**
 * A cheap layer skipped by the early exit may still contradict the result;
 * such signals are reported and dropped.
 */
function reportSkippedContradictions(
  query: string,
  ctx: ExtractionContext,
  result: PriceIntent,
  skipped: readonly ExtractionStrategy[]
): void {
  const onConflict = logConflict(query)
  for (const strategy of skipped) {
    if (!strategy.cheap) continue
    const signal = strategy.run(query, ctx, onConflict)
    if (!signal || signal instanceof Promise) continue

    const sameSide =
      (signal.minPrice !== null && result.minPrice !== null && signal.minPrice !== result.minPrice) ||
      (signal.maxPrice !== null && result.maxPrice !== null && signal.maxPrice !== result.maxPrice)
    const inverted =
      (signal.minPrice !== null && result.maxPrice !== null && signal.minPrice > result.maxPrice) ||
      (signal.maxPrice !== null && result.minPrice !== null && signal.maxPrice < result.minPrice)

    if (sameSide || inverted) {
      onConflict({
        kept: result.source,
        discarded: signal.source,
        keptRange: [result.minPrice, result.maxPrice],
        discardedRange: [signal.minPrice, signal.maxPrice],
      })
    }
  }
}

/**
 * Extract a price intent from the raw query. Never throws; the worst case is
 * the empty intent.
 */
export async function extractPriceIntent(rawQuery: string, ctx: ExtractionContext): Promise<PriceIntent> {
  const threshold = ctx.config.extraction.confidenceThreshold
  const onConflict = logConflict(rawQuery)
  const signals: PriceIntent[] = []

  for (let i = 0; i < STRATEGIES.length; i++) {
    const strategy = STRATEGIES[i]
    let signal: PriceIntent | null
    try {
      signal = await strategy.run(rawQuery, ctx, onConflict)
    } catch (error) {
      log.warn('Price extraction strategy failed', { strategy: strategy.name }, error)
      continue
    }
    if (!signal) continue

    signals.push(signal)
    const merged = mergePriceSignals(signals, onConflict)
    if (merged && merged.confidence >= threshold) {
      reportSkippedContradictions(rawQuery, ctx, merged, STRATEGIES.slice(i + 1))
      log.debug('Price intent extracted', {
        strategy: strategy.name,
        minPrice: merged.minPrice,
        maxPrice: merged.maxPrice,
        confidence: merged.confidence,
        source: merged.source,
      })
      return merged
    }
  }

  return mergePriceSignals(signals, onConflict) ?? emptyPriceIntent()
}
