import { describe, it, expect, vi, beforeEach } from 'vitest'
import express from 'express'
import type { Request, Response } from 'express'
import request from 'supertest'

const redis = vi.hoisted(() => ({ multi: vi.fn(), pexpire: vi.fn() }))

vi.mock('../../config/redis', () => ({ getRedisClient: () => redis }))

import { createRateLimitMiddleware, RedisRateLimitStore } from '../rate-limit'
import { errorHandler } from '../error-handler'
import { MemoryRateLimitStore } from '../../services/ai-search/__tests__/fakes'

function createTestApp(store: MemoryRateLimitStore) {
  const app = express()
  app.use(
    createRateLimitMiddleware({
      store,
      max: 2,
      windowMs: 30_000,
      keyGenerator: (req: Request) => req.get('x-client') ?? 'anonymous',
    })
  )
  app.get('/api/search', (_req: Request, res: Response) => {
    res.json({ results: [] })
  })
  app.use(errorHandler)
  return app
}

function replyWith(replies: unknown) {
  const chain = { incr: vi.fn(), pttl: vi.fn(), exec: vi.fn(async () => replies) }
  chain.incr.mockReturnValue(chain)
  chain.pttl.mockReturnValue(chain)
  redis.multi.mockReturnValue(chain)
  return chain
}

describe('createRateLimitMiddleware', () => {
  let store: MemoryRateLimitStore

  beforeEach(() => {
    store = new MemoryRateLimitStore()
  })

  it('reports the remaining budget on every response', async () => {
    const before = Math.ceil((Date.now() + 30_000) / 1000)
    const res = await request(createTestApp(store)).get('/api/search').set('x-client', 'a')
    const after = Math.ceil((Date.now() + 30_000) / 1000)

    expect(res.status).toBe(200)
    expect(res.headers['x-ratelimit-limit']).toBe('2')
    expect(res.headers['x-ratelimit-remaining']).toBe('1')
    expect(Number(res.headers['x-ratelimit-reset'])).toBeGreaterThanOrEqual(before)
    expect(Number(res.headers['x-ratelimit-reset'])).toBeLessThanOrEqual(after)
  })

  it('answers 429 with Retry-After once the window is used up', async () => {
    const app = createTestApp(store)
    await request(app).get('/api/search').set('x-client', 'a')
    await request(app).get('/api/search').set('x-client', 'a')

    const res = await request(app).get('/api/search').set('x-client', 'a')

    expect(res.status).toBe(429)
    expect(res.headers['retry-after']).toBe('30')
    expect(res.headers['x-ratelimit-remaining']).toBe('0')
    expect(res.body).toEqual({
      error: 'Too many requests. Please wait a moment',
      errorCode: 'RATE_LIMIT_EXCEEDED',
      requestId: null,
    })
  })

  it('counts each client separately', async () => {
    const app = createTestApp(store)
    await request(app).get('/api/search').set('x-client', 'a')
    await request(app).get('/api/search').set('x-client', 'a')

    const res = await request(app).get('/api/search').set('x-client', 'b')

    expect(res.status).toBe(200)
    expect(store.counts).toEqual(
      new Map([
        ['rl:search:a', 2],
        ['rl:search:b', 1],
      ])
    )
  })

  it('lets requests through when the counter store is down', async () => {
    store.failing = true

    const res = await request(createTestApp(store)).get('/api/search')

    expect(res.status).toBe(200)
    expect(res.headers['x-ratelimit-limit']).toBeUndefined()
  })
})

describe('RedisRateLimitStore', () => {
  beforeEach(() => {
    redis.multi.mockReset()
    redis.pexpire.mockReset()
    redis.pexpire.mockResolvedValue(1)
  })

  it('starts the window on the first hit', async () => {
    const chain = replyWith([
      [null, 1],
      [null, -1],
    ])

    const hit = await new RedisRateLimitStore().hit('rl:search:a', 60_000)

    expect(hit).toEqual({ count: 1, ttlMs: 60_000 })
    expect(chain.incr).toHaveBeenCalledWith('rl:search:a')
    expect(chain.pttl).toHaveBeenCalledWith('rl:search:a')
    expect(redis.pexpire).toHaveBeenCalledWith('rl:search:a', 60_000)
  })

  it('keeps the running window on later hits', async () => {
    replyWith([
      [null, 3],
      [null, 4200],
    ])

    const hit = await new RedisRateLimitStore().hit('rl:search:a', 60_000)

    expect(hit).toEqual({ count: 3, ttlMs: 4200 })
    expect(redis.pexpire).not.toHaveBeenCalled()
  })

  it('fails when the transaction is discarded', async () => {
    replyWith(null)

    await expect(new RedisRateLimitStore().hit('rl:search:a', 60_000)).rejects.toThrow(
      'Rate limit transaction was discarded'
    )
  })

  it('surfaces a command error', async () => {
    replyWith([
      [new Error('OOM command not allowed'), null],
      [null, -1],
    ])

    await expect(new RedisRateLimitStore().hit('rl:search:a', 60_000)).rejects.toThrow('OOM command not allowed')
  })
})
