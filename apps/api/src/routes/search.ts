import { Router } from 'express'
import type { Request, Response, NextFunction, RequestHandler } from 'express'
import { z } from 'zod'
import { limitParam, pageParam } from '../lib/paging'
import { isAiSearchEnabled } from '@searchlight/db'
import { aiSearch, getSearchSuggestions, parseQuery } from '../services/ai-search'
import type { SearchDependencies, SuggestionDependencies } from '../services/ai-search'
import { getSearchConfig, SUPPORTED_LANGUAGES } from '../config/search-config'
import { createRequestSignal, REQUEST_TIMEOUT_MS } from '../lib/abort'
import { ServiceDisabledError } from '../lib/errors'
import { loggers } from '../config/logger'

const log = loggers.search

export interface SearchRouterOptions {
  search: SearchDependencies
  suggestions: SuggestionDependencies
  isEnabled?: () => Promise<boolean>
  requestTimeoutMs?: number
  /** Applied to the search endpoints only; autocomplete runs per keystroke */
  rateLimit?: RequestHandler
}

/**
 * Natural-language search
 * GET /api/search?query=...&page=1&limit=25&lang=nl
 * POST /api/search { query, page, limit, lang }
 *
 * Accepts queries like:
 * - "goedkope schoenen"
 * - "zwarte jas onder 200 euro"
 * - "dress between 50 and 100 euro"
 */
const searchSchema = z.object({
  query: z.string().trim().min(1).max(500),
  page: pageParam,
  limit: limitParam,
  lang: z.enum(SUPPORTED_LANGUAGES).optional(),
})

const parseSchema = z.object({
  query: z.string().trim().min(1).max(500),
})

const suggestionsSchema = z.object({
  q: z.string().max(100).default(''),
  limit: z.coerce.number().int().min(1).max(20).default(8),
})

export function createSearchRouter(options: SearchRouterOptions): Router {
  const router = Router()
  const isEnabled = options.isEnabled ?? isAiSearchEnabled
  const requestTimeoutMs = options.requestTimeoutMs ?? REQUEST_TIMEOUT_MS
  const getConfig = options.search.getConfig ?? getSearchConfig

  const handleSearch = async (input: unknown, res: Response, next: NextFunction) => {
    const { signal, dispose } = createRequestSignal(res, requestTimeoutMs)
    try {
      const params = searchSchema.parse(input)

      if (!(await isEnabled())) {
        log.info('AI search disabled via admin settings')
        throw new ServiceDisabledError('AI search')
      }

      const result = await aiSearch(
        {
          rawQuery: params.query,
          page: params.page,
          limit: params.limit,
          targetLanguage: params.lang ?? getConfig().storeLanguage,
        },
        options.search,
        { signal }
      )
      res.json(result)
    } catch (error) {
      next(error)
    } finally {
      dispose()
    }
  }

  const limiter: RequestHandler = options.rateLimit ?? ((_req, _res, next) => next())

  router.get('/', limiter, (req: Request, res: Response, next: NextFunction) => handleSearch(req.query, res, next))
  router.post('/', limiter, (req: Request, res: Response, next: NextFunction) => handleSearch(req.body, res, next))

  /**
   * Price intent preview, no retrieval
   * POST /api/search/parse { query }
   */
  router.post('/parse', async (req: Request, res: Response, next: NextFunction) => {
    const { signal, dispose } = createRequestSignal(res, requestTimeoutMs)
    try {
      const { query } = parseSchema.parse(req.body)
      res.json(await parseQuery(query, options.search, { signal }))
    } catch (error) {
      next(error)
    } finally {
      dispose()
    }
  })

  /**
   * Title autocomplete
   * GET /api/search/suggestions?q=zwarte&limit=8
   */
  router.get('/suggestions', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { q, limit } = suggestionsSchema.parse(req.query)
      const suggestions = await getSearchSuggestions(q, options.suggestions, limit)
      res.json({ suggestions })
    } catch (error) {
      next(error)
    }
  })

  return router
}
