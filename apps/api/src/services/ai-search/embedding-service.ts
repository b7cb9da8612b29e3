import OpenAI from 'openai'
import { loggers } from '../../config/logger'
import { EmbeddingError, RequestAbortedError } from '../../lib/errors'
import { abortReason, delay } from '../../lib/abort'

const log = loggers.ai

// text-embedding-3-small: 1536 dimensions
export const EMBEDDING_MODEL = process.env.EMBEDDING_MODEL || 'text-embedding-3-small'
export const EMBEDDING_DIMENSIONS = parseInt(process.env.EMBEDDING_DIMENSIONS || '1536', 10)
export const EMBEDDING_TIMEOUT_MS = parseInt(process.env.EMBEDDING_TIMEOUT_MS || '5000', 10)
const EMBEDDING_RETRY_BACKOFF_MS = parseInt(process.env.EMBEDDING_RETRY_BACKOFF_MS || '250', 10)

// One retry after the first failure
const MAX_ATTEMPTS = 2

export interface EmbedOptions {
  timeoutMs?: number
  signal?: AbortSignal
}

/**
 * text -> float[D]. Rejects with EmbeddingError, or with the request's abort reason.
 */
export interface EmbeddingClient {
  readonly dimensions: number
  embed(text: string, options?: EmbedOptions): Promise<number[]>
}

export type EmbeddingsApi = Pick<OpenAI['embeddings'], 'create'>

export interface OpenAIEmbeddingClientOptions {
  api?: EmbeddingsApi
  model?: string
  dimensions?: number
  timeoutMs?: number
  retryBackoffMs?: number
}

/**
 * Map an OpenAI SDK error to the embedding failure taxonomy
 */
export function toEmbeddingError(error: unknown): EmbeddingError {
  if (error instanceof EmbeddingError) return error

  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new EmbeddingError('timeout', 'Embedding request timed out', { cause: error })
  }
  if (error instanceof OpenAI.APIError) {
    const status = error.status
    // 429 and 5xx are worth a second try; other 4xx will fail the same way again
    const retryable = status === undefined || status === 429 || status >= 500
    return new EmbeddingError('provider_error', `Embedding provider error${status ? ` (${status})` : ''}`, {
      retryable,
      cause: error,
    })
  }
  return new EmbeddingError('provider_error', error instanceof Error ? error.message : String(error), { cause: error })
}

export class OpenAIEmbeddingClient implements EmbeddingClient {
  readonly dimensions: number
  private readonly model: string
  private readonly timeoutMs: number
  private readonly retryBackoffMs: number
  private api: EmbeddingsApi | null

  constructor(options: OpenAIEmbeddingClientOptions = {}) {
    this.api = options.api ?? null
    this.model = options.model ?? EMBEDDING_MODEL
    this.dimensions = options.dimensions ?? EMBEDDING_DIMENSIONS
    this.timeoutMs = options.timeoutMs ?? EMBEDDING_TIMEOUT_MS
    this.retryBackoffMs = options.retryBackoffMs ?? EMBEDDING_RETRY_BACKOFF_MS
  }

  private getApi(): EmbeddingsApi {
    if (!this.api) {
      this.api = new OpenAI({ apiKey: process.env.OPENAI_API_KEY }).embeddings
    }
    return this.api
  }

  async embed(text: string, options: EmbedOptions = {}): Promise<number[]> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs
    const { signal } = options

    for (let attempt = 1; ; attempt++) {
      const started = Date.now()
      try {
        const vector = await this.requestOnce(text, timeoutMs, signal)
        log.debug('Embedding generated', { attempt, durationMs: Date.now() - started })
        return vector
      } catch (error) {
        if (signal?.aborted) {
          throw abortReason(signal)
        }
        if (error instanceof RequestAbortedError) {
          throw error
        }

        const failure = toEmbeddingError(error)
        if (attempt >= MAX_ATTEMPTS || !failure.retryable) {
          log.error('Embedding failed', { attempt, reason: failure.reason, durationMs: Date.now() - started }, failure)
          throw failure
        }

        const backoffMs = this.retryBackoffMs * attempt
        log.warn('Embedding attempt failed, retrying', { attempt, reason: failure.reason, backoffMs })
        await delay(backoffMs, signal)
      }
    }
  }

  private async requestOnce(text: string, timeoutMs: number, signal?: AbortSignal): Promise<number[]> {
    const response = await this.getApi().create(
      { model: this.model, input: text, dimensions: this.dimensions },
      { timeout: timeoutMs, signal, maxRetries: 0 }
    )

    const embedding = response.data[0]?.embedding
    if (!Array.isArray(embedding) || embedding.length !== this.dimensions) {
      throw new EmbeddingError(
        'invalid_response',
        `Expected a ${this.dimensions}-dimensional embedding, got ${Array.isArray(embedding) ? embedding.length : 'none'}`
      )
    }
    return embedding
  }
}

/**
 * Text representation of a product for indexing, kept in line with how queries are embedded.
 */
export function buildProductText(product: { title: string; description?: string | null; tags?: readonly string[] }): string {
  const parts = [product.title]
  if (product.description) {
    parts.push(product.description)
  }
  if (product.tags && product.tags.length > 0) {
    parts.push(`Tags: ${product.tags.join(', ')}`)
  }
  return parts.join('\n')
}
