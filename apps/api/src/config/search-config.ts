/**
 * Versioned search configuration: keyword lists, category price bands and the
 * adaptive filter strategy catalog.
 *
 * The artifact is produced offline and only read here. The live snapshot is
 * deep-frozen and replaced as a whole on reload, so a request that captured
 * it keeps a consistent view until it finishes.
 */

import { readFileSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { loggers } from './logger'

const log = loggers.config

export const DEFAULT_SEARCH_CONFIG_PATH = fileURLToPath(new URL('../../config/search-config.json', import.meta.url))

export const STRATEGY_NAMES = [
  'price_broaden_low',
  'price_broaden_high',
  'category_broaden',
  'diversity_improve',
  'material_fallback',
  'color_fallback',
  'emergency_fallback',
] as const

export type StrategyName = (typeof STRATEGY_NAMES)[number]

export const SUPPORTED_LANGUAGES = ['nl', 'en'] as const

export type TargetLanguage = (typeof SUPPORTED_LANGUAGES)[number]

const priceBandSchema = z
  .object({
    budgetMax: z.number().positive(),
    premiumMin: z.number().positive(),
  })
  .refine((band) => band.budgetMax <= band.premiumMin, {
    message: 'budgetMax must not exceed premiumMin',
  })

const keywordList = z.array(z.string().min(1).transform((s) => s.toLowerCase()))

const categorySchema = z.object({
  name: z.string().min(1),
  keywords: keywordList.nonempty(),
  related: keywordList.default([]),
  band: priceBandSchema,
})

const strategySchema = z.object({
  name: z.enum(STRATEGY_NAMES),
  priority: z.number().int(),
  expectedImprovement: z.number().min(0).max(1),
  enabled: z.boolean().default(true),
  params: z.record(z.number()).default({}),
})

export const searchConfigSchema = z.object({
  version: z.string().min(1),
  storeLanguage: z.enum(SUPPORTED_LANGUAGES),
  extraction: z.object({
    confidenceThreshold: z.number().min(0).max(1),
    keywordConfidence: z.number().min(0).max(1),
    llmConfidence: z.number().min(0).max(1),
    budgetKeywords: keywordList,
    premiumKeywords: keywordList,
    priceHints: keywordList,
  }),
  defaultBand: priceBandSchema,
  categories: z.array(categorySchema),
  materials: keywordList,
  colors: keywordList,
  quality: z.object({
    minResults: z.number().int().min(0),
    minDistinctCategories: z.number().int().min(1),
    priceCoherenceTolerance: z.number().min(1),
    maxStrategies: z.number().int().min(1),
    fallbackPoolSize: z.number().int().min(1),
  }),
  strategies: z
    .array(strategySchema)
    .min(1)
    .refine((list) => list.some((s) => s.name === 'emergency_fallback' && s.enabled), {
      message: 'catalog must contain an enabled emergency_fallback strategy',
    })
    .refine((list) => new Set(list.map((s) => s.name)).size === list.length, {
      message: 'strategy names must be unique',
    }),
})

export type SearchConfig = z.infer<typeof searchConfigSchema>
export type PriceBand = SearchConfig['defaultBand']
export type CategoryConfig = SearchConfig['categories'][number]
export type StrategyConfig = SearchConfig['strategies'][number]

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
    Object.freeze(value)
  }
  return value
}

/**
 * Validate a raw artifact and return a frozen snapshot. Throws on invalid input.
 */
export function parseSearchConfig(raw: unknown): SearchConfig {
  return deepFreeze(searchConfigSchema.parse(raw))
}

export function loadSearchConfigFile(path: string = DEFAULT_SEARCH_CONFIG_PATH): SearchConfig {
  return parseSearchConfig(JSON.parse(readFileSync(path, 'utf-8')))
}

let current: SearchConfig | null = null

/**
 * Current snapshot. Loaded lazily from SEARCH_CONFIG_PATH (or the bundled file) on first use.
 */
export function getSearchConfig(): SearchConfig {
  if (!current) {
    current = loadSearchConfigFile(process.env.SEARCH_CONFIG_PATH || DEFAULT_SEARCH_CONFIG_PATH)
    log.info('Search config loaded', { version: current.version })
  }
  return current
}

/**
 * Swap in a new snapshot. Used by the reloader and by tests.
 */
export function setSearchConfig(config: SearchConfig): void {
  current = config
}

/**
 * Re-read the artifact. An invalid or unreadable file leaves the live snapshot in place.
 */
export async function reloadSearchConfig(path: string = process.env.SEARCH_CONFIG_PATH || DEFAULT_SEARCH_CONFIG_PATH): Promise<boolean> {
  try {
    const next = parseSearchConfig(JSON.parse(await readFile(path, 'utf-8')))
    const previousVersion = current?.version
    current = next
    if (previousVersion !== next.version) {
      log.info('Search config reloaded', { previousVersion, version: next.version })
    }
    return true
  } catch (error) {
    log.error('Search config reload failed, keeping current snapshot', { path, version: current?.version }, error)
    return false
  }
}

/**
 * Periodic reload. Returns a stop function; the timer does not keep the process alive.
 */
export function startSearchConfigReload(intervalMs: number): () => void {
  if (intervalMs <= 0) {
    return () => undefined
  }
  const timer = setInterval(() => {
    void reloadSearchConfig()
  }, intervalMs)
  timer.unref()
  return () => clearInterval(timer)
}
