import { query } from '@searchlight/db'
import { loggers } from '../../config/logger'
import { delay } from '../../lib/abort'
import { buildProductText, OpenAIEmbeddingClient } from './embedding-service'
import type { EmbeddingClient } from './embedding-service'
import { toVectorLiteral } from './product-store'

const log = loggers.ai

type PendingProduct = {
  id: string
  title: string
  description: string | null
  tags: string[] | null
}

export interface BackfillOptions {
  embeddings?: EmbeddingClient
  batchSize?: number
  /** Pause between batches to stay under provider rate limits */
  pauseMs?: number
  onProgress?: (processed: number, total: number) => void
}

export interface BackfillResult {
  processed: number
  errors: string[]
}

/**
 * Generate embeddings for every product that has none yet.
 * A failed product is recorded and skipped; it stays pending for the next run.
 */
export async function backfillProductEmbeddings(options: BackfillOptions = {}): Promise<BackfillResult> {
  const { batchSize = 50, pauseMs = 200, onProgress } = options
  const embeddings = options.embeddings ?? new OpenAIEmbeddingClient()
  const errors: string[] = []

  const products = await query<PendingProduct>(
    `SELECT id, title, description, tags FROM products WHERE embedding IS NULL ORDER BY id`
  )

  const total = products.length
  let processed = 0
  log.info('Products without embeddings', { total })

  for (let i = 0; i < total; i += batchSize) {
    const batch = products.slice(i, i + batchSize)

    for (const product of batch) {
      try {
        const vector = await embeddings.embed(
          buildProductText({ title: product.title, description: product.description, tags: product.tags ?? [] })
        )
        await query(`UPDATE products SET embedding = $1::vector, updated_at = now() WHERE id = $2`, [
          toVectorLiteral(vector),
          product.id,
        ])
      } catch (error) {
        errors.push(`Failed to embed ${product.id}: ${error instanceof Error ? error.message : String(error)}`)
      }
      processed++
    }

    onProgress?.(processed, total)

    if (i + batchSize < total && pauseMs > 0) {
      await delay(pauseMs)
    }
  }

  return { processed, errors }
}
