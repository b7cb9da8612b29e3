/**
 * Product store boundary: pgvector similarity search with the price predicate
 * in the same statement as the distance computation, plus the plain listing
 * and title autocomplete queries.
 *
 * Every call runs in its own transaction with a server-side statement timeout
 * equal to the store deadline, so a query the caller gave up on is cancelled
 * by Postgres instead of holding its connection. Vector searches also switch
 * the HNSW scan to strict-order iterative mode (pgvector 0.8+): the index keeps
 * producing neighbours until the price predicate has let enough rows through,
 * instead of filtering a fixed `ef_search` candidate list.
 */

import { withTransaction } from '@searchlight/db'
import type { TransactionQuery } from '@searchlight/db'
import { loggers } from '../../config/logger'
import { StoreQueryError } from '../../lib/errors'
import { withDeadline } from '../../lib/abort'
import type { CandidateResult } from './types'

const log = loggers.search

export const STORE_QUERY_TIMEOUT_MS = parseInt(process.env.STORE_QUERY_TIMEOUT_MS || '5000', 10)

export interface StoreQuery {
  vector: readonly number[]
  minPrice: number | null
  maxPrice: number | null
  limit: number
  offset: number
  /**
   * similarity: nearest first, cheaper first on equal similarity.
   * price: the `candidatePool` nearest rows, cheapest first.
   */
  rank: 'similarity' | 'price'
  candidatePool?: number
  signal?: AbortSignal
}

export interface StorePage {
  rows: CandidateResult[]
  totalCount: number
}

export interface ListingQuery {
  minPrice: number | null
  maxPrice: number | null
  limit: number
  offset: number
}

export interface ProductListing {
  productId: string
  title: string
  price: number
  tags: string[]
}

export interface TitleSuggestionQuery {
  prefix: string
  limit: number
  minPrice: number | null
  maxPrice: number | null
}

export interface ProductStore {
  similaritySearch(params: StoreQuery): Promise<StorePage>
  listProducts(params: ListingQuery): Promise<{ rows: ProductListing[]; totalCount: number }>
  suggestTitles(params: TitleSuggestionQuery): Promise<string[]>
}

/** pgvector accepts 1..1000 */
const EF_SEARCH_MIN = 40
const EF_SEARCH_MAX = 1000

// Type alias: pg row types must satisfy QueryResultRow
type ProductRow = {
  id: string
  title: string
  price: string | number
  tags: string[] | null
  similarity: string | number
}

export function toVectorLiteral(vector: readonly number[]): string {
  return `[${vector.join(',')}]`
}

function toCandidate(row: ProductRow): CandidateResult {
  return {
    productId: row.id,
    title: row.title,
    price: Number(row.price),
    tags: [...new Set(row.tags ?? [])],
    similarity: Number(row.similarity),
  }
}

/**
 * Candidate list size for the first HNSW pass: enough to cover the requested window
 */
export function efSearchFor(rowsNeeded: number): number {
  return Math.min(EF_SEARCH_MAX, Math.max(EF_SEARCH_MIN, Math.ceil(rowsNeeded)))
}

/**
 * WHERE fragment for the price predicate. Placeholders continue from the params already pushed.
 */
function buildPriceConditions(
  minPrice: number | null,
  maxPrice: number | null,
  params: unknown[],
  base: string[] = ['embedding IS NOT NULL']
): string {
  const conditions = [...base]
  if (minPrice !== null) {
    params.push(minPrice)
    conditions.push(`price >= $${params.length}`)
  }
  if (maxPrice !== null) {
    params.push(maxPrice)
    conditions.push(`price <= $${params.length}`)
  }
  return conditions.join(' AND ')
}

export class PgProductStore implements ProductStore {
  constructor(private readonly timeoutMs: number = STORE_QUERY_TIMEOUT_MS) {}

  private run<T>(
    label: string,
    work: (tx: TransactionQuery) => Promise<T>,
    options: { signal?: AbortSignal; settings?: Record<string, string> } = {}
  ): Promise<T> {
    const transaction = withTransaction(work, {
      statementTimeoutMs: this.timeoutMs,
      settings: options.settings,
    }).catch((error: unknown) => {
      const sqlState = error instanceof Error ? Reflect.get(error, 'code') : undefined
      throw new StoreQueryError(`${label} failed`, {
        sqlState: typeof sqlState === 'string' ? sqlState : undefined,
        timedOut: sqlState === '57014',
        cause: error,
      })
    })

    return withDeadline(
      transaction,
      this.timeoutMs,
      () => new StoreQueryError(`${label} timed out after ${this.timeoutMs}ms`, { timedOut: true }),
      options.signal
    )
  }

  async similaritySearch(params: StoreQuery): Promise<StorePage> {
    const rowParams: unknown[] = [toVectorLiteral(params.vector)]
    const rowWhere = buildPriceConditions(params.minPrice, params.maxPrice, rowParams)

    let rowSql: string
    let countSql: string
    let countParams: unknown[]
    let rowsNeeded: number

    if (params.rank === 'price') {
      const pool = params.candidatePool ?? params.limit
      rowParams.push(pool)
      const candidates = `
        WITH candidates AS (
          SELECT id, title, price, tags, 1 - (embedding <=> $1::vector) AS similarity
          FROM products
          WHERE ${rowWhere}
          ORDER BY embedding <=> $1::vector ASC
          LIMIT $${rowParams.length}
        )`
      // The pool size is what the CTE actually returned, not what the filter matches
      countSql = `${candidates}
        SELECT COUNT(*) AS count FROM candidates`
      countParams = [...rowParams]
      rowParams.push(params.limit, params.offset)
      const n = rowParams.length
      rowSql = `${candidates}
        SELECT * FROM candidates
        ORDER BY price ASC, similarity DESC, id ASC
        LIMIT $${n - 1} OFFSET $${n}`
      rowsNeeded = pool
    } else {
      countParams = []
      const countWhere = buildPriceConditions(params.minPrice, params.maxPrice, countParams)
      countSql = `SELECT COUNT(*) AS count FROM products WHERE ${countWhere}`
      rowParams.push(params.limit, params.offset)
      const n = rowParams.length
      rowSql = `
        SELECT id, title, price, tags, 1 - (embedding <=> $1::vector) AS similarity
        FROM products
        WHERE ${rowWhere}
        ORDER BY embedding <=> $1::vector ASC, price ASC, id ASC
        LIMIT $${n - 1} OFFSET $${n}`
      rowsNeeded = params.offset + params.limit
    }

    const started = Date.now()
    const [rows, countRows] = await this.run(
      'Similarity search',
      async (tx) => [
        await tx<ProductRow>(rowSql, rowParams),
        await tx<{ count: string | number }>(countSql, countParams),
      ] as const,
      {
        signal: params.signal,
        settings: {
          'hnsw.iterative_scan': 'strict_order',
          'hnsw.ef_search': String(efSearchFor(rowsNeeded)),
        },
      }
    )

    log.debug('Similarity search executed', {
      rank: params.rank,
      rows: rows.length,
      durationMs: Date.now() - started,
    })

    return {
      rows: rows.map(toCandidate),
      totalCount: Number(countRows[0]?.count ?? 0),
    }
  }

  async listProducts(params: ListingQuery): Promise<{ rows: ProductListing[]; totalCount: number }> {
    const values: unknown[] = []
    const conditions = buildPriceConditions(params.minPrice, params.maxPrice, values, [])
    const where = conditions.length > 0 ? `WHERE ${conditions}` : ''
    const pageValues = [...values, params.limit, params.offset]

    const [rows, countRows] = await this.run('Product listing', async (tx) => [
      await tx<Omit<ProductRow, 'similarity'>>(
        `SELECT id, title, price, tags FROM products ${where}
         ORDER BY title ASC, id ASC
         LIMIT $${pageValues.length - 1} OFFSET $${pageValues.length}`,
        pageValues
      ),
      await tx<{ count: string | number }>(`SELECT COUNT(*) AS count FROM products ${where}`, values),
    ] as const)

    return {
      rows: rows.map((row) => ({
        productId: row.id,
        title: row.title,
        price: Number(row.price),
        tags: [...new Set(row.tags ?? [])],
      })),
      totalCount: Number(countRows[0]?.count ?? 0),
    }
  }

  /**
   * Distinct titles starting with the prefix, optionally inside a price range
   */
  async suggestTitles(params: TitleSuggestionQuery): Promise<string[]> {
    const escaped = params.prefix.toLowerCase().replace(/[\\%_]/g, (c) => `\\${c}`)
    const values: unknown[] = [`${escaped}%`]
    const where = buildPriceConditions(params.minPrice, params.maxPrice, values, ['lower(title) LIKE $1'])
    values.push(params.limit)

    const rows = await this.run('Title suggestions', (tx) =>
      tx<{ title: string }>(
        `SELECT DISTINCT title FROM products
         WHERE ${where}
         ORDER BY title ASC
         LIMIT $${values.length}`,
        values
      )
    )
    return rows.map((row) => row.title)
  }
}
