/**
 * Catalog vocabulary lookups against the search config: categories,
 * materials and colours mentioned in a query or attached to a product.
 */

import type { CategoryConfig, SearchConfig } from '../../config/search-config'
import type { CandidateResult, MatchedSpan } from './types'

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

const termPatternCache = new Map<string, RegExp>()

function termPattern(term: string): RegExp {
  let regex = termPatternCache.get(term)
  if (!regex) {
    // Whole words only; letters, digits and hyphens count as word characters
    regex = new RegExp(`(?<![\\p{L}\\p{N}-])${escapeRegExp(term)}(?![\\p{L}\\p{N}-])`, 'giu')
    termPatternCache.set(term, regex)
  }
  return regex
}

/**
 * All whole-word occurrences of any of the terms, ordered by position.
 */
export function findTermSpans(text: string, terms: readonly string[]): MatchedSpan[] {
  const spans: MatchedSpan[] = []
  for (const term of terms) {
    for (const match of text.matchAll(termPattern(term))) {
      const start = match.index ?? 0
      spans.push({ start, end: start + match[0].length, text: match[0] })
    }
  }
  return spans.sort((a, b) => a.start - b.start || b.end - a.end)
}

export function containsAnyTerm(text: string, terms: readonly string[]): boolean {
  return findTermSpans(text, terms).length > 0
}

/**
 * Category whose keyword appears first in the text
 */
export function detectCategory(text: string, config: SearchConfig): CategoryConfig | null {
  let best: { category: CategoryConfig; position: number } | null = null
  for (const category of config.categories) {
    const first = findTermSpans(text, category.keywords)[0]
    if (first && (!best || first.start < best.position)) {
      best = { category, position: first.start }
    }
  }
  return best?.category ?? null
}

export const UNCATEGORIZED = 'other'

/**
 * Tags decide first, then the title
 */
export function categorizeProduct(product: Pick<CandidateResult, 'title' | 'tags'>, config: SearchConfig): string {
  const fromTags = detectCategory(product.tags.join(' '), config)
  if (fromTags) return fromTags.name
  return detectCategory(product.title, config)?.name ?? UNCATEGORIZED
}

/**
 * Remove spans from text and tidy the leftover whitespace and separators.
 */
export function removeSpans(text: string, spans: readonly MatchedSpan[]): string {
  const ordered = [...spans].sort((a, b) => a.start - b.start)
  let cursor = 0
  let out = ''
  for (const span of ordered) {
    if (span.end <= cursor) continue
    out += text.slice(cursor, Math.max(cursor, span.start))
    cursor = Math.max(cursor, span.end)
  }
  out += text.slice(cursor)

  return out
    .replace(/\s+/g, ' ')
    .replace(/\s+([,;:])/g, '$1')
    .replace(/^[\s,;:-]+|[\s,;:-]+$/g, '')
}

export function removeTerms(text: string, terms: readonly string[]): string {
  return removeSpans(text, findTermSpans(text, terms))
}
