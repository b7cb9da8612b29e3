/**
 * LLM price inference for queries whose price language the pattern table and
 * keyword lists could not pin down ("iets voor een klein budget").
 */

import Anthropic from '@anthropic-ai/sdk'
import { z } from 'zod'
import { loggers } from '../../config/logger'
import type { PriceBand } from '../../config/search-config'
import { roundPrice } from './price-patterns'
import type { PriceRange } from './types'

const log = loggers.ai

const PRICE_INFERENCE_MODEL = process.env.PRICE_INFERENCE_MODEL || 'claude-3-5-haiku-20241022'
export const PRICE_INFERENCE_TIMEOUT_MS = parseInt(process.env.PRICE_INFERENCE_TIMEOUT_MS || '4000', 10)

export type MessagesApi = Pick<Anthropic['messages'], 'create'>

export interface PriceInferenceOptions {
  band: PriceBand
  timeoutMs?: number
  signal?: AbortSignal
}

/**
 * Returns null when the model gives no usable bounds; never throws.
 */
export type PriceInferenceFn = (query: string, options: PriceInferenceOptions) => Promise<PriceRange | null>

const llmPriceSchema = z.object({
  min_price: z.number().nullable().optional(),
  max_price: z.number().nullable().optional(),
})

let messagesApi: MessagesApi | null = null

function getMessagesApi(): MessagesApi | null {
  if (messagesApi) return messagesApi
  if (!process.env.ANTHROPIC_API_KEY) return null
  messagesApi = new Anthropic({ apiKey: process.env.ANTHROPIC_API_KEY }).messages
  return messagesApi
}

function buildSystemPrompt(band: PriceBand): string {
  return `You extract price constraints from web shop search queries (Dutch or English).
Prices are in euros. In this shop "cheap" usually means below €${band.budgetMax} and "expensive" above €${band.premiumMin}.

Respond with ONLY a JSON object: {"min_price": number | null, "max_price": number | null}
Use null for a bound the query does not imply. Do not guess when the query has no price meaning.`
}

/**
 * Parse the model's text into a price range. Inverted bounds are swapped and
 * non-positive values dropped.
 */
export function parseInferenceText(text: string): PriceRange | null {
  const jsonMatch = text.match(/\{[\s\S]*\}/)
  if (!jsonMatch) return null

  let raw: unknown
  try {
    raw = JSON.parse(jsonMatch[0])
  } catch {
    return null
  }

  const parsed = llmPriceSchema.safeParse(raw)
  if (!parsed.success) return null

  let minPrice = positiveOrNull(parsed.data.min_price)
  let maxPrice = positiveOrNull(parsed.data.max_price)
  if (minPrice === null && maxPrice === null) return null

  if (minPrice !== null && maxPrice !== null && minPrice > maxPrice) {
    ;[minPrice, maxPrice] = [maxPrice, minPrice]
  }
  return { minPrice, maxPrice }
}

function positiveOrNull(value: number | null | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? roundPrice(value) : null
}

export function createPriceInference(api: MessagesApi | null = null): PriceInferenceFn {
  return async (query, { band, timeoutMs = PRICE_INFERENCE_TIMEOUT_MS, signal }) => {
    const client = api ?? getMessagesApi()
    if (!client) {
      log.debug('Price inference skipped, no API key configured')
      return null
    }

    const started = Date.now()
    try {
      const message = await client.create(
        {
          model: PRICE_INFERENCE_MODEL,
          max_tokens: 100,
          system: buildSystemPrompt(band),
          messages: [{ role: 'user', content: `Query: "${query}"` }],
        },
        { timeout: timeoutMs, signal, maxRetries: 0 }
      )

      const textContent = message.content.find((block) => block.type === 'text')
      if (!textContent || textContent.type !== 'text') {
        log.warn('PRICE_INFERENCE_EMPTY', { durationMs: Date.now() - started })
        return null
      }

      const range = parseInferenceText(textContent.text)
      if (!range) {
        log.warn('PRICE_INFERENCE_MALFORMED', { durationMs: Date.now() - started })
        return null
      }

      log.debug('Price inferred', { ...range, durationMs: Date.now() - started })
      return range
    } catch (error) {
      log.warn('PRICE_INFERENCE_FAILED', { durationMs: Date.now() - started, aborted: signal?.aborted ?? false }, error)
      return null
    }
  }
}

export const inferPriceWithLlm: PriceInferenceFn = createPriceInference()
