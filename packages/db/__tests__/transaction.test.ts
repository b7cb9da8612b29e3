import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'

const pg = vi.hoisted(() => {
  const client = { query: vi.fn(), release: vi.fn() }
  const pool = {
    connect: vi.fn(async () => client),
    on: vi.fn(),
    end: vi.fn(async () => undefined),
    query: vi.fn(),
  }
  return { client, pool }
})

vi.mock('pg', () => ({
  default: {
    Pool: vi.fn(function () {
      return pg.pool
    }),
  },
}))

import { closePool, withTransaction } from '../client'

function answer(failOn: string[] = []) {
  pg.client.query.mockImplementation(async (text: string) => {
    if (failOn.includes(text)) throw new Error(`${text} failed`)
    return { rows: text.startsWith('SELECT id') ? [{ id: 'p1' }] : [] }
  })
}

describe('withTransaction', () => {
  beforeEach(() => {
    vi.stubEnv('DATABASE_URL', 'postgres://localhost/catalog')
    pg.client.query.mockReset()
    pg.client.release.mockReset()
  })

  afterEach(async () => {
    await closePool()
    vi.unstubAllEnvs()
  })

  it('should apply local settings and the statement timeout before the work', async () => {
    answer()

    const rows = await withTransaction((tx) => tx('SELECT id FROM products WHERE price <= $1', [50]), {
      statementTimeoutMs: 2500.4,
      settings: { 'hnsw.ef_search': '100' },
    })

    expect(rows).toEqual([{ id: 'p1' }])
    expect(pg.client.query.mock.calls).toEqual([
      ['BEGIN'],
      ['SELECT set_config($1, $2, true)', ['hnsw.ef_search', '100']],
      ['SELECT set_config($1, $2, true)', ['statement_timeout', '2500']],
      ['SELECT id FROM products WHERE price <= $1', [50]],
      ['COMMIT'],
    ])
    expect(pg.client.release).toHaveBeenCalledWith(undefined)
  })

  it('should skip set_config without options', async () => {
    answer()

    await withTransaction((tx) => tx('SELECT 1'))

    expect(pg.client.query.mock.calls).toEqual([['BEGIN'], ['SELECT 1', []], ['COMMIT']])
  })

  it('should roll back and rethrow when the work fails', async () => {
    answer(['SELECT 1'])

    await expect(withTransaction((tx) => tx('SELECT 1'))).rejects.toThrow('SELECT 1 failed')

    expect(pg.client.query.mock.calls.at(-1)).toEqual(['ROLLBACK'])
    expect(pg.client.query).not.toHaveBeenCalledWith('COMMIT')
    expect(pg.client.release).toHaveBeenCalledWith(undefined)
  })

  it('should discard the connection when the rollback fails too', async () => {
    answer(['SELECT 1', 'ROLLBACK'])

    await expect(withTransaction((tx) => tx('SELECT 1'))).rejects.toThrow('SELECT 1 failed')

    expect(pg.client.release).toHaveBeenCalledWith(new Error('ROLLBACK failed'))
  })
})
