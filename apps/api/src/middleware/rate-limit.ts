import type { Request, Response, NextFunction } from 'express'
import { getRedisClient } from '../config/redis'
import { loggers } from '../config/logger'
import { RateLimitExceededError } from '../lib/errors'

const log = loggers.server

export const RATE_LIMIT_MAX = parseInt(process.env.RATE_LIMIT_MAX || '60', 10)
export const RATE_LIMIT_WINDOW_MS = parseInt(process.env.RATE_LIMIT_WINDOW_MS || '60000', 10)

export interface RateLimitHit {
  /** Requests counted in the current window, this one included */
  count: number
  /** Time until the window resets */
  ttlMs: number
}

/**
 * Fixed-window request counter keyed per client
 */
export interface RateLimitStore {
  hit(key: string, windowMs: number): Promise<RateLimitHit>
}

/**
 * Counters in Redis, so every API instance shares the same window.
 * INCR and PTTL run in one MULTI; a new key gets its expiry right after.
 */
export class RedisRateLimitStore implements RateLimitStore {
  async hit(key: string, windowMs: number): Promise<RateLimitHit> {
    const redis = getRedisClient()
    const results = await redis.multi().incr(key).pttl(key).exec()
    if (!results) {
      throw new Error('Rate limit transaction was discarded')
    }

    const [incr, pttl] = results
    const error = incr?.[0] ?? pttl?.[0]
    if (error) throw error

    const count = incr?.[1]
    const ttl = pttl?.[1]
    if (typeof count !== 'number' || typeof ttl !== 'number') {
      throw new Error('Unexpected rate limit reply')
    }

    if (ttl < 0) {
      await redis.pexpire(key, windowMs)
      return { count, ttlMs: windowMs }
    }
    return { count, ttlMs: ttl }
  }
}

export interface RateLimitOptions {
  store: RateLimitStore
  /** Time window in milliseconds (default: RATE_LIMIT_WINDOW_MS) */
  windowMs?: number
  /** Maximum requests per window (default: RATE_LIMIT_MAX) */
  max?: number
  keyPrefix?: string
  keyGenerator?: (req: Request) => string
}

/**
 * Per-client rate limit with X-RateLimit-* headers. Over the limit the request
 * goes to the error handler as a 429 with Retry-After; when the counter store
 * is unreachable the request is let through.
 */
export function createRateLimitMiddleware(options: RateLimitOptions) {
  const {
    store,
    windowMs = RATE_LIMIT_WINDOW_MS,
    max = RATE_LIMIT_MAX,
    keyPrefix = 'rl:search:',
    keyGenerator = (req: Request) => req.ip || 'unknown',
  } = options

  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const client = keyGenerator(req)

    let hit: RateLimitHit
    try {
      hit = await store.hit(`${keyPrefix}${client}`, windowMs)
    } catch (error) {
      log.warn('RATE_LIMIT_STORE_ERROR', { client, action: 'fail_open' }, error)
      next()
      return
    }

    res.setHeader('X-RateLimit-Limit', max)
    res.setHeader('X-RateLimit-Remaining', Math.max(0, max - hit.count))
    res.setHeader('X-RateLimit-Reset', Math.ceil((Date.now() + hit.ttlMs) / 1000))

    if (hit.count > max) {
      const retryAfterSec = Math.max(1, Math.ceil(hit.ttlMs / 1000))
      res.setHeader('Retry-After', retryAfterSec)
      log.warn('RATE_LIMIT_BLOCKED', { client, count: hit.count, max, path: req.path, method: req.method })
      next(new RateLimitExceededError(retryAfterSec))
      return
    }

    next()
  }
}
