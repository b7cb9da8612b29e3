import 'dotenv/config'
import pg from 'pg'
import type { Pool, PoolConfig, QueryResultRow } from 'pg'
import { createLogger } from '@searchlight/logger'

const log = createLogger('db').child('pool')

/**
 * Connection pool configuration
 *
 * Environment variables:
 * - DB_POOL_MAX: Maximum connections (default: 20)
 * - DB_POOL_MIN: Minimum idle connections (default: 2)
 * - DB_STATEMENT_TIMEOUT_MS: Server-side statement timeout (default: 5000)
 * - DB_SERVICE_NAME: Application name for pg_stat_activity (default: searchlight)
 */
export function getPoolConfig(connectionString: string): PoolConfig {
  return {
    connectionString,

    // === Pool Size ===
    max: parseInt(process.env.DB_POOL_MAX || '20', 10),
    min: parseInt(process.env.DB_POOL_MIN || '2', 10),

    // === Timeouts ===
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
    statement_timeout: parseInt(process.env.DB_STATEMENT_TIMEOUT_MS || '5000', 10),

    // === Connection Recycling ===
    maxUses: 7500,

    // === Keep-Alive ===
    keepAlive: true,
    keepAliveInitialDelayMillis: 10000,

    application_name: process.env.DB_SERVICE_NAME || 'searchlight',
  }
}

let pool: Pool | null = null

/**
 * Shared pool, created on first use so importing this module never needs DATABASE_URL.
 */
export function getPool(): Pool {
  if (pool) return pool

  const connectionString = process.env.DATABASE_URL
  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is not set')
  }

  pool = new pg.Pool(getPoolConfig(connectionString))
  pool.on('error', (err) => {
    log.error('Idle client error', {}, err)
  })
  return pool
}

export async function query<T extends QueryResultRow>(text: string, params: unknown[] = []): Promise<T[]> {
  const result = await getPool().query<T>(text, params)
  return result.rows
}

export type TransactionQuery = <T extends QueryResultRow>(text: string, params?: unknown[]) => Promise<T[]>

export interface TransactionOptions {
  /** Server-side statement timeout for this transaction only */
  statementTimeoutMs?: number
  /** Run-time settings local to the transaction (`hnsw.ef_search`, ...) */
  settings?: Record<string, string>
}

/**
 * Run statements on one pooled connection between BEGIN and COMMIT.
 * Settings are applied with `set_config(..., true)`, so they end with the
 * transaction and the connection goes back to the pool unchanged. A statement
 * that outlives `statementTimeoutMs` is cancelled by the server.
 */
export async function withTransaction<T>(
  work: (tx: TransactionQuery) => Promise<T>,
  options: TransactionOptions = {}
): Promise<T> {
  const client = await getPool().connect()
  let discard: Error | undefined

  try {
    await client.query('BEGIN')

    const settings: Record<string, string> = { ...options.settings }
    if (options.statementTimeoutMs !== undefined) {
      settings.statement_timeout = String(Math.max(1, Math.round(options.statementTimeoutMs)))
    }
    for (const [name, value] of Object.entries(settings)) {
      await client.query('SELECT set_config($1, $2, true)', [name, value])
    }

    const tx: TransactionQuery = async <R extends QueryResultRow>(text: string, params: unknown[] = []) => {
      const result = await client.query<R>(text, params)
      return result.rows
    }

    const result = await work(tx)
    await client.query('COMMIT')
    return result
  } catch (error) {
    try {
      await client.query('ROLLBACK')
    } catch (rollbackError) {
      log.warn('Rollback failed, discarding connection', {}, rollbackError)
      discard = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError))
    }
    throw error
  } finally {
    client.release(discard)
  }
}

export async function pingDatabase(): Promise<boolean> {
  try {
    await getPool().query('SELECT 1')
    return true
  } catch (error) {
    log.warn('Database ping failed', {}, error)
    return false
  }
}

export async function closePool(): Promise<void> {
  if (!pool) return
  const current = pool
  pool = null
  await current.end()
}
