/**
 * Shared types for the search pipeline.
 *
 * SearchResponse and its parts are zod schemas because cached payloads are
 * read back from Redis and validated before they are served.
 */

import { z } from 'zod'
import { STRATEGY_NAMES, SUPPORTED_LANGUAGES } from '../../config/search-config'
import type { TargetLanguage } from '../../config/search-config'

export const PRICE_INTENT_SOURCES = [
  'regex_exact',
  'regex_range',
  'budget_keyword',
  'premium_keyword',
  'llm_inference',
  'store_statistical_fallback',
] as const

export type PriceIntentSource = (typeof PRICE_INTENT_SOURCES)[number]

/**
 * A substring of the raw query that an extraction strategy consumed
 */
export interface MatchedSpan {
  start: number
  end: number
  text: string
}

/**
 * Parsed price constraint. When both bounds are set, minPrice <= maxPrice.
 */
export interface PriceIntent {
  minPrice: number | null
  maxPrice: number | null
  confidence: number
  source: PriceIntentSource
  matches: readonly MatchedSpan[]
}

export interface SearchRequest {
  readonly rawQuery: string
  readonly page: number
  readonly limit: number
  readonly targetLanguage: TargetLanguage
}

export const candidateResultSchema = z.object({
  productId: z.string(),
  title: z.string(),
  price: z.number(),
  tags: z.array(z.string()),
  similarity: z.number(),
})

export type CandidateResult = z.infer<typeof candidateResultSchema>

export const priceFilterSummarySchema = z.object({
  min: z.number().nullable(),
  max: z.number().nullable(),
  applied: z.boolean(),
  fallbackUsed: z.boolean(),
  source: z.enum(PRICE_INTENT_SOURCES),
  confidence: z.number(),
})

export type PriceFilterSummary = z.infer<typeof priceFilterSummarySchema>

export const adaptiveSummarySchema = z.object({
  strategiesApplied: z.array(z.enum(STRATEGY_NAMES)),
  effectiveMin: z.number().nullable(),
  effectiveMax: z.number().nullable(),
  /** Set when the strategies dropped the requested price filter entirely */
  notice: z.string().nullable(),
})

export type AdaptiveSummary = z.infer<typeof adaptiveSummarySchema>

export const searchResponseSchema = z.object({
  query: z.string(),
  cleanedQuery: z.string(),
  language: z.enum(SUPPORTED_LANGUAGES),
  results: z.array(candidateResultSchema),
  totalCount: z.number().int().min(0),
  page: z.number().int().min(1),
  limit: z.number().int().min(1),
  totalPages: z.number().int().min(0),
  priceFilter: priceFilterSummarySchema,
  message: z.string().nullable(),
  cacheHit: z.boolean(),
  adaptive: adaptiveSummarySchema.nullable(),
})

/**
 * Invariants: priceFilter.fallbackUsed implies priceFilter.applied, and
 * message is non-null exactly when fallbackUsed is true.
 */
export type SearchResponse = z.infer<typeof searchResponseSchema>

export interface PriceRange {
  minPrice: number | null
  maxPrice: number | null
}
