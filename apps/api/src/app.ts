import express from 'express'
import type { Express, Request, Response } from 'express'
import cors from 'cors'
import helmet from 'helmet'
import { pingDatabase } from '@searchlight/db'
import { requestContextMiddleware } from './middleware/request-context'
import { requestLoggerMiddleware } from './middleware/request-logger'
import { createMaintenanceMiddleware } from './middleware/maintenance'
import { errorHandler } from './middleware/error-handler'
import { createRateLimitMiddleware, RedisRateLimitStore } from './middleware/rate-limit'
import type { RateLimitOptions } from './middleware/rate-limit'
import { createSearchRouter } from './routes/search'
import { createProductsRouter } from './routes/products'
import { createSearchDependencies, createSuggestionDependencies } from './services/ai-search'
import type { SearchDependencies, SuggestionDependencies } from './services/ai-search'
import { createListingDependencies } from './services/product-listing'
import type { ListingDependencies } from './services/product-listing'
import { pingRedis } from './config/redis'
import { withDeadline } from './lib/abort'

const HEALTH_CHECK_TIMEOUT_MS = 3000

export interface HealthChecks {
  database: () => Promise<boolean>
  redis: () => Promise<boolean>
}

export interface AppDependencies {
  search: SearchDependencies
  suggestions: SuggestionDependencies
  listing: ListingDependencies
  health: HealthChecks
  rateLimit: RateLimitOptions
  isMaintenanceMode?: () => Promise<boolean>
  isAiSearchEnabled?: () => Promise<boolean>
  requestTimeoutMs?: number
}

export function createDefaultDependencies(): AppDependencies {
  return {
    search: createSearchDependencies(),
    suggestions: createSuggestionDependencies(),
    listing: createListingDependencies(),
    health: { database: pingDatabase, redis: pingRedis },
    rateLimit: { store: new RedisRateLimitStore() },
  }
}

function allowedOrigins(): string[] {
  return (process.env.CORS_ORIGIN || 'http://localhost:3000')
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0)
}

async function runCheck(check: () => Promise<boolean>): Promise<boolean> {
  try {
    return await withDeadline(check(), HEALTH_CHECK_TIMEOUT_MS, () => new Error('Health check timed out'))
  } catch {
    return false
  }
}

export function createApp(deps: AppDependencies = createDefaultDependencies()): Express {
  const app = express()
  const origins = allowedOrigins()

  app.use(helmet())

  // Must be early in the chain to capture all request processing
  app.use(requestContextMiddleware)
  app.use(requestLoggerMiddleware)

  app.use(
    cors({
      origin: (origin, callback) => {
        // Allow requests with no origin (like curl or server-to-server)
        if (!origin || origins.includes(origin)) {
          callback(null, true)
        } else {
          callback(null, false)
        }
      },
    })
  )

  app.use(express.json({ limit: '16kb' }))

  // Redis being down degrades caching only, so it does not fail the check
  app.get('/health', async (_req: Request, res: Response) => {
    const [database, redis] = await Promise.all([runCheck(deps.health.database), runCheck(deps.health.redis)])
    res.status(database ? 200 : 503).json({
      status: database ? (redis ? 'ok' : 'degraded') : 'unavailable',
      checks: { database, redis },
      timestamp: new Date().toISOString(),
    })
  })

  app.use(createMaintenanceMiddleware(deps.isMaintenanceMode))

  app.use(
    '/api/search',
    createSearchRouter({
      search: deps.search,
      suggestions: deps.suggestions,
      isEnabled: deps.isAiSearchEnabled,
      requestTimeoutMs: deps.requestTimeoutMs,
      rateLimit: createRateLimitMiddleware(deps.rateLimit),
    })
  )
  app.use('/api/products', createProductsRouter(deps.listing))

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'The requested resource was not found', errorCode: 'NOT_FOUND' })
  })

  app.use(errorHandler)

  return app
}
