/**
 * Deterministic price phrase table (Dutch and English).
 *
 * Patterns are tried per kind in table order; ranges beat one-sided bounds,
 * bounds beat "about X", and "about X" beats a bare amount.
 */

import type { MatchedSpan, PriceIntent } from './types'

export type PricePatternKind = 'range' | 'below' | 'above' | 'approximate' | 'exact'

export interface PricePattern {
  id: string
  language: 'nl' | 'en'
  kind: PricePatternKind
  regex: RegExp
  confidence: number
  /** Only count a match that mentions a currency or a price word (guards "maat 38 tot 42") */
  requiresCurrency?: boolean
}

// 1.250 / 1.250,50 (thousands) or 12 / 12,5 / 12.50
const NUM = String.raw`(\d{1,3}(?:\.\d{3})+(?:,\d{1,2})?|\d+(?:[.,]\d{1,2})?)`
const PRE = String.raw`(?<![\d.,])(?:€\s*)?`
const CUR = String.raw`(?:\s*(?:euros?\b|eur\b|€))?`
const CURRENCY_MARK = /€|\beur(?:o|os)?\b|\b(?:prijs|budget|price)\b/i

function pattern(
  id: string,
  language: 'nl' | 'en',
  kind: PricePatternKind,
  source: string,
  confidence: number,
  requiresCurrency = false
): PricePattern {
  return { id, language, kind, regex: new RegExp(source, 'gi'), confidence, requiresCurrency }
}

export const PRICE_PATTERNS: readonly PricePattern[] = [
  // Ranges
  pattern('nl_between', 'nl', 'range', String.raw`\btussen\s+${PRE}${NUM}${CUR}\s+en\s+${PRE}${NUM}${CUR}`, 0.95),
  pattern('en_between', 'en', 'range', String.raw`\bbetween\s+${PRE}${NUM}${CUR}\s+and\s+${PRE}${NUM}${CUR}`, 0.95),
  pattern('nl_from_to', 'nl', 'range', String.raw`${PRE}${NUM}${CUR}\s+tot\s+${PRE}${NUM}${CUR}`, 0.95, true),
  pattern('en_from_to', 'en', 'range', String.raw`${PRE}${NUM}${CUR}\s+to\s+${PRE}${NUM}${CUR}`, 0.95, true),
  pattern('dash_range', 'nl', 'range', String.raw`${PRE}${NUM}${CUR}\s*-\s*${PRE}${NUM}${CUR}`, 0.95, true),

  // Upper bounds
  pattern('nl_below', 'nl', 'below', String.raw`\b(?:onder|beneden|maximaal|max\.?|hooguit)\s+${PRE}${NUM}${CUR}`, 0.9),
  pattern('nl_up_to', 'nl', 'below', String.raw`\b(?:(?:prijs|budget)\s+)?tot\s+${PRE}${NUM}${CUR}`, 0.9, true),
  pattern('en_below', 'en', 'below', String.raw`\b(?:under|below|less\s+than|up\s+to|at\s+most|maximum)\s+${PRE}${NUM}${CUR}`, 0.9),
  pattern('nl_or_less', 'nl', 'below', String.raw`${PRE}${NUM}${CUR}\s+of\s+(?:minder|goedkoper)\b`, 0.9, true),
  pattern('en_or_less', 'en', 'below', String.raw`${PRE}${NUM}${CUR}\s+or\s+(?:less|cheaper)\b`, 0.9, true),

  // Lower bounds
  pattern('nl_above', 'nl', 'above', String.raw`\b(?:boven|vanaf|minimaal|minstens|meer\s+dan)\s+${PRE}${NUM}${CUR}`, 0.9),
  pattern('en_above', 'en', 'above', String.raw`\b(?:above|over|more\s+than|at\s+least|minimum)\s+${PRE}${NUM}${CUR}`, 0.9),
  pattern('nl_or_more', 'nl', 'above', String.raw`${PRE}${NUM}${CUR}\s+of\s+(?:meer|duurder)\b`, 0.9, true),
  pattern('en_or_more', 'en', 'above', String.raw`${PRE}${NUM}${CUR}\s+or\s+more\b`, 0.9, true),

  // About X
  pattern('nl_around', 'nl', 'approximate', String.raw`\b(?:rond(?:\s+de)?|ongeveer|circa|ca\.|zo'n)\s+${PRE}${NUM}${CUR}`, 0.8),
  pattern('en_around', 'en', 'approximate', String.raw`\b(?:around|about|approximately|roughly)\s+${PRE}${NUM}${CUR}`, 0.8),

  // Bare amounts
  pattern('euro_prefix', 'nl', 'exact', String.raw`€\s*${NUM}`, 0.85),
  pattern('euro_suffix', 'nl', 'exact', String.raw`(?<![\d.,])${NUM}\s*(?:euros?\b|eur\b|€)`, 0.85),
]

export const APPROXIMATE_SPREAD = 0.2
export const EXACT_SPREAD = 0.1

/**
 * Parse a matched amount. Dots followed by three digits are thousands separators;
 * a comma is a decimal separator.
 */
export function parseAmount(raw: string): number {
  const normalized = /^\d{1,3}(?:\.\d{3})+(?:,\d{1,2})?$/.test(raw)
    ? raw.replace(/\./g, '').replace(',', '.')
    : raw.replace(',', '.')
  return Number(normalized)
}

export function roundPrice(value: number): number {
  return Math.round(value * 100) / 100
}

interface PatternHit {
  pattern: PricePattern
  span: MatchedSpan
  amounts: number[]
}

function toHit(candidate: PricePattern, match: RegExpMatchArray): PatternHit | null {
  if (candidate.requiresCurrency && !CURRENCY_MARK.test(match[0])) return null

  const amounts = match
    .slice(1)
    .filter((group): group is string => group !== undefined)
    .map(parseAmount)
    .filter((n) => Number.isFinite(n))

  if (amounts.length === 0) return null

  const start = match.index ?? 0
  return {
    pattern: candidate,
    span: { start, end: start + match[0].length, text: match[0] },
    amounts,
  }
}

/**
 * First match of the pattern that qualifies. A rejected match ("maat 42-44")
 * does not hide a later price phrase ("50-80 euro").
 */
function findHit(query: string, candidate: PricePattern): PatternHit | null {
  for (const match of query.matchAll(candidate.regex)) {
    const hit = toHit(candidate, match)
    if (hit) return hit
  }
  return null
}

function firstHit(query: string, kind: PricePatternKind): PatternHit | null {
  for (const candidate of PRICE_PATTERNS) {
    if (candidate.kind !== kind) continue
    const hit = findHit(query, candidate)
    if (hit) return hit
  }
  return null
}

export type PatternConflictHandler = (details: Record<string, unknown>) => void

/**
 * Run the pattern table against a query. Returns null when nothing matched.
 */
export function matchPricePatterns(query: string, onConflict?: PatternConflictHandler): PriceIntent | null {
  const range = firstHit(query, 'range')
  if (range && range.amounts.length >= 2) {
    const [a, b] = range.amounts
    return {
      minPrice: roundPrice(Math.min(a, b)),
      maxPrice: roundPrice(Math.max(a, b)),
      confidence: range.pattern.confidence,
      source: 'regex_range',
      matches: [range.span],
    }
  }

  const below = firstHit(query, 'below')
  const above = firstHit(query, 'above')

  if (below && above) {
    const maxPrice = roundPrice(below.amounts[0])
    const minPrice = roundPrice(above.amounts[0])
    if (minPrice <= maxPrice) {
      return {
        minPrice,
        maxPrice,
        confidence: Math.min(below.pattern.confidence, above.pattern.confidence),
        source: 'regex_range',
        matches: [above.span, below.span].sort((x, y) => x.start - y.start),
      }
    }
    // "boven 100 onder 50": keep the stronger bound, earlier phrase on a tie
    const keepBelow =
      below.pattern.confidence > above.pattern.confidence ||
      (below.pattern.confidence === above.pattern.confidence && below.span.start <= above.span.start)
    onConflict?.({
      kept: keepBelow ? below.pattern.id : above.pattern.id,
      discarded: keepBelow ? above.pattern.id : below.pattern.id,
      minPrice,
      maxPrice,
    })
    return keepBelow ? boundIntent(below, 'max') : boundIntent(above, 'min')
  }

  if (below) return boundIntent(below, 'max')
  if (above) return boundIntent(above, 'min')

  const approximate = firstHit(query, 'approximate')
  if (approximate) return spreadIntent(approximate, APPROXIMATE_SPREAD)

  const exact = firstHit(query, 'exact')
  if (exact) return spreadIntent(exact, EXACT_SPREAD)

  return null
}

function boundIntent(hit: PatternHit, side: 'min' | 'max'): PriceIntent {
  const value = roundPrice(hit.amounts[0])
  return {
    minPrice: side === 'min' ? value : null,
    maxPrice: side === 'max' ? value : null,
    confidence: hit.pattern.confidence,
    source: 'regex_range',
    matches: [hit.span],
  }
}

function spreadIntent(hit: PatternHit, spread: number): PriceIntent {
  const value = hit.amounts[0]
  return {
    minPrice: roundPrice(value * (1 - spread)),
    maxPrice: roundPrice(value * (1 + spread)),
    confidence: hit.pattern.confidence,
    source: 'regex_exact',
    matches: [hit.span],
  }
}
