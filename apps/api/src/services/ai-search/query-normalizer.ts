import { removeSpans } from './catalog-knowledge'
import type { PriceIntent } from './types'

/**
 * Strip the phrases the winning extraction strategies matched. A query with no
 * matched phrases comes back untouched; one that would be left empty (the
 * whole query was a price phrase) also comes back untouched.
 */
export function cleanQuery(rawQuery: string, intent: PriceIntent): string {
  if (intent.matches.length === 0) return rawQuery
  const cleaned = removeSpans(rawQuery, intent.matches)
  return cleaned.length > 0 ? cleaned : rawQuery
}
