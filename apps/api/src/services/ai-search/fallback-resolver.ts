/**
 * Fallback resolution as a three-state machine:
 *
 *   FILTERED --(results, or no filter)--> DONE
 *   FILTERED --(zero results under a price filter)--> FALLBACK --> DONE
 *
 * There is no edge back into FALLBACK, so a request gets at most one
 * unfiltered re-query.
 */

import type { TargetLanguage } from '../../config/search-config'
import { throwIfAborted } from '../../lib/abort'
import type { CandidatePage, CandidateRetriever } from './candidate-retriever'
import type { CandidateResult, PriceRange } from './types'

export type FallbackState = 'FILTERED' | 'FALLBACK' | 'DONE'

const TRANSITIONS: Record<FallbackState, readonly FallbackState[]> = {
  FILTERED: ['FALLBACK', 'DONE'],
  FALLBACK: ['DONE'],
  DONE: [],
}

export const FALLBACK_MESSAGES: Record<TargetLanguage, string> = {
  nl: 'Geen producten gevonden binnen de prijsklasse, hier zijn de goedkoopste alternatieven.',
  en: 'No products found in the requested price range, here are the cheapest alternatives.',
}

export interface FallbackInput {
  retriever: Pick<CandidateRetriever, 'searchWithVector'>
  vector: readonly number[]
  filter: PriceRange
  filtered: CandidatePage
  page: number
  limit: number
  /** Store language; the fallback message is always in it */
  language: TargetLanguage
  candidatePool: number
  signal?: AbortSignal
}

export interface FallbackResolution {
  results: CandidateResult[]
  totalCount: number
  fallbackUsed: boolean
  message: string | null
  fallbackRetrievals: number
  trace: FallbackState[]
}

export class IllegalTransitionError extends Error {
  constructor(from: FallbackState, to: FallbackState) {
    super(`Illegal fallback transition ${from} -> ${to}`)
    this.name = 'IllegalTransitionError'
  }
}

/**
 * Validate a transition against the table and return the new state
 */
export function transition(from: FallbackState, to: FallbackState): FallbackState {
  if (!TRANSITIONS[from].includes(to)) {
    throw new IllegalTransitionError(from, to)
  }
  return to
}

export function isPriceFilterApplied(filter: PriceRange): boolean {
  return filter.minPrice !== null || filter.maxPrice !== null
}

export async function resolveFallback(input: FallbackInput): Promise<FallbackResolution> {
  let state: FallbackState = 'FILTERED'
  const trace: FallbackState[] = [state]
  let outcome: CandidatePage = input.filtered
  let fallbackUsed = false
  let fallbackRetrievals = 0

  while (state !== 'DONE') {
    switch (state) {
      case 'FILTERED':
        state = transition(
          state,
          input.filtered.totalCount > 0 || !isPriceFilterApplied(input.filter) ? 'DONE' : 'FALLBACK'
        )
        trace.push(state)
        break

      case 'FALLBACK': {
        throwIfAborted(input.signal)
        fallbackRetrievals++
        const unfiltered = await input.retriever.searchWithVector(input.vector, {
          minPrice: null,
          maxPrice: null,
          page: input.page,
          limit: input.limit,
          rank: 'price',
          candidatePool: input.candidatePool,
          signal: input.signal,
        })
        // An empty catalog answer after fallback is a plain zero-result response
        if (unfiltered.totalCount > 0) {
          outcome = unfiltered
          fallbackUsed = true
        }
        state = transition(state, 'DONE')
        trace.push(state)
        break
      }
    }
  }

  return {
    results: outcome.results,
    totalCount: outcome.totalCount,
    fallbackUsed,
    message: fallbackUsed ? FALLBACK_MESSAGES[input.language] : null,
    fallbackRetrievals,
    trace,
  }
}
