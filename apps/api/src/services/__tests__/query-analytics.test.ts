import { describe, it, expect, vi, beforeEach } from 'vitest'

vi.mock('@searchlight/db', () => ({
  query: vi.fn(),
}))

vi.mock('../../config/logger', () => {
  const make = (): Record<string, unknown> => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(() => make()),
  })
  return {
    logger: make(),
    loggers: {
      server: make(),
      search: make(),
      ai: make(),
      cache: make(),
      products: make(),
      analytics: make(),
      config: make(),
    },
  }
})

import { query } from '@searchlight/db'
import { loggers } from '../../config/logger'
import { createAnalyticsRecorder, fetchPopularQueries, insertSearchAnalytics, POPULAR_WINDOW_DAYS } from '../query-analytics'
import type { SearchAnalyticsEvent } from '../query-analytics'

function event(overrides: Partial<SearchAnalyticsEvent> = {}): SearchAnalyticsEvent {
  return {
    query: 'goedkope schoenen',
    cleanedQuery: 'schoenen',
    searchType: 'ai',
    filters: { minPrice: null, maxPrice: 120, priceSource: 'budget_keyword', confidence: 0.6, language: 'nl' },
    resultCount: 10,
    totalCount: 11,
    page: 1,
    limit: 10,
    latencyMs: 42.4,
    cacheHit: false,
    fallbackUsed: false,
    strategiesApplied: [],
    requestId: 'req-1',
    ...overrides,
  }
}

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}

describe('insertSearchAnalytics', () => {
  beforeEach(() => {
    vi.mocked(query).mockReset()
    vi.mocked(query).mockResolvedValue([])
  })

  it('writes one row with the filters as JSON', async () => {
    await insertSearchAnalytics(event({ strategiesApplied: ['price_broaden_low'] }))

    expect(query).toHaveBeenCalledTimes(1)
    const [sql, params] = vi.mocked(query).mock.calls[0]
    expect(sql).toContain('INSERT INTO search_analytics')
    expect(params).toEqual([
      'goedkope schoenen',
      'schoenen',
      'ai',
      '{"minPrice":null,"maxPrice":120,"priceSource":"budget_keyword","confidence":0.6,"language":"nl"}',
      10,
      11,
      1,
      10,
      42,
      false,
      false,
      ['price_broaden_low'],
      'req-1',
    ])
  })

  it('truncates long queries', async () => {
    await insertSearchAnalytics(event({ query: 'x'.repeat(800) }))

    const params = vi.mocked(query).mock.calls[0][1]
    expect(params?.[0]).toBe('x'.repeat(500))
  })
})

describe('fetchPopularQueries', () => {
  beforeEach(() => {
    vi.mocked(query).mockReset()
  })

  it('returns the most searched matching queries in order', async () => {
    vi.mocked(query).mockResolvedValue([
      { query: 'leren jas', searches: '12' },
      { query: 'leren tas', searches: '4' },
    ])

    expect(await fetchPopularQueries('Leren', 5)).toEqual(['leren jas', 'leren tas'])

    const [sql, params] = vi.mocked(query).mock.calls[0]
    expect(sql).toContain('FROM search_analytics')
    expect(sql).toContain('result_count > 0')
    expect(sql).toContain('ORDER BY searches DESC, query ASC')
    expect(params).toEqual(['leren%', POPULAR_WINDOW_DAYS, 5])
  })

  it('escapes LIKE wildcards in the prefix', async () => {
    vi.mocked(query).mockResolvedValue([])

    await fetchPopularQueries(' 50%_off ', 3)

    expect(vi.mocked(query).mock.calls[0][1]).toEqual(['50\\%\\_off%', POPULAR_WINDOW_DAYS, 3])
  })
})

describe('createAnalyticsRecorder', () => {
  beforeEach(() => {
    vi.mocked(loggers.analytics.warn).mockClear()
  })

  it('does not run the sink before the caller continues', async () => {
    const sink = vi.fn(async () => undefined)
    const record = createAnalyticsRecorder(sink)

    record(event())
    expect(sink).not.toHaveBeenCalled()

    await flush()
    expect(sink).toHaveBeenCalledTimes(1)
  })

  it('hands the sink a frozen copy', async () => {
    const sink = vi.fn(async (_event: Readonly<SearchAnalyticsEvent>) => undefined)
    const original = event()
    createAnalyticsRecorder(sink)(original)

    original.resultCount = 0
    original.filters.maxPrice = 1
    await flush()

    const received = sink.mock.calls[0][0]
    expect(received.resultCount).toBe(10)
    expect(received.filters.maxPrice).toBe(120)
    expect(Object.isFrozen(received)).toBe(true)
    expect(Object.isFrozen(received.filters)).toBe(true)
  })

  it('logs and drops a failed write', async () => {
    const record = createAnalyticsRecorder(async () => {
      throw new Error('relation "search_analytics" does not exist')
    })

    expect(() => record(event())).not.toThrow()
    await flush()

    expect(loggers.analytics.warn).toHaveBeenCalledWith(
      'ANALYTICS_WRITE_FAILED',
      { searchType: 'ai', requestId: 'req-1' },
      expect.any(Error)
    )
  })

  it('survives a sink that throws synchronously', async () => {
    const record = createAnalyticsRecorder(() => {
      throw new Error('bad sink')
    })

    record(event())
    await flush()

    expect(loggers.analytics.warn).toHaveBeenCalledTimes(1)
  })
})
