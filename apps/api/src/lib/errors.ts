/**
 * Error Classification and Structured Error Handling
 *
 * Search failures fall into two groups: infrastructure failures (embedding
 * provider, product store) that surface as 5xx, and legitimate empty or poor
 * results that the fallback and adaptive filter stages recover from. The typed
 * errors below keep those apart.
 */

import { ZodError } from 'zod'

export type ErrorCategory =
  | 'validation' // Client sent invalid data (4xx)
  | 'not_found'
  | 'rate_limit'
  | 'db' // Product store errors
  | 'external' // Embedding / LLM provider failures
  | 'internal'
  | 'timeout'
  | 'unavailable' // Feature switched off or maintenance
  | 'cancelled' // Client went away

export interface ClassifiedError {
  category: ErrorCategory
  code: string
  message: string
  statusCode: number
  isOperational: boolean // Expected errors vs bugs
  isRetryable: boolean
  details?: Record<string, unknown>
  originalError?: Error
}

export const ERROR_CODES = {
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  NOT_FOUND: 'NOT_FOUND',
  RATE_LIMIT_EXCEEDED: 'RATE_LIMIT_EXCEEDED',

  DB_CONNECTION_ERROR: 'DB_CONNECTION_ERROR',
  DB_QUERY_ERROR: 'DB_QUERY_ERROR',
  DB_TIMEOUT: 'DB_TIMEOUT',

  EMBEDDING_FAILED: 'EMBEDDING_FAILED',
  EMBEDDING_TIMEOUT: 'EMBEDDING_TIMEOUT',
  NETWORK_ERROR: 'NETWORK_ERROR',

  FEATURE_DISABLED: 'FEATURE_DISABLED',
  REQUEST_TIMEOUT: 'REQUEST_TIMEOUT',
  CLIENT_CLOSED_REQUEST: 'CLIENT_CLOSED_REQUEST',

  INTERNAL_ERROR: 'INTERNAL_ERROR',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

// =============================================================================
// Typed errors
// =============================================================================

export type EmbeddingFailureReason = 'timeout' | 'provider_error' | 'invalid_response'

/**
 * The embedding provider did not produce a usable vector.
 * A `timeout` reason is the EmbeddingTimeout case.
 */
export class EmbeddingError extends Error {
  readonly reason: EmbeddingFailureReason
  readonly retryable: boolean

  constructor(reason: EmbeddingFailureReason, message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'EmbeddingError'
    this.reason = reason
    this.retryable = options.retryable ?? reason !== 'invalid_response'
  }
}

/**
 * Retrieval could not run. Distinct from an empty result set.
 */
export class RetrievalError extends Error {
  readonly reason: 'embedding_failed'

  constructor(reason: 'embedding_failed', cause: EmbeddingError) {
    super(`Retrieval failed: ${reason}`, { cause })
    this.name = 'RetrievalError'
    this.reason = reason
  }
}

export class StoreQueryError extends Error {
  readonly timedOut: boolean
  readonly sqlState?: string

  constructor(message: string, options: { timedOut?: boolean; sqlState?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'StoreQueryError'
    this.timedOut = options.timedOut ?? false
    this.sqlState = options.sqlState
  }
}

export type AbortReason = 'client_disconnect' | 'timeout'

export class RequestAbortedError extends Error {
  readonly reason: AbortReason

  constructor(reason: AbortReason) {
    super(reason === 'timeout' ? 'Request timed out' : 'Client disconnected')
    this.name = 'RequestAbortedError'
    this.reason = reason
  }
}

export class ServiceDisabledError extends Error {
  readonly feature: string

  constructor(feature: string) {
    super(`${feature} is disabled`)
    this.name = 'ServiceDisabledError'
    this.feature = feature
  }
}

export class RateLimitExceededError extends Error {
  readonly retryAfterSec: number

  constructor(retryAfterSec: number) {
    super(`Rate limit exceeded, retry in ${retryAfterSec}s`)
    this.name = 'RateLimitExceededError'
    this.retryAfterSec = retryAfterSec
  }
}

// =============================================================================
// Classification
// =============================================================================

export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof ZodError) {
    return {
      category: 'validation',
      code: ERROR_CODES.VALIDATION_FAILED,
      message: 'Validation failed',
      statusCode: 400,
      isOperational: true,
      isRetryable: false,
      details: {
        issues: error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
          code: issue.code,
        })),
      },
      originalError: error,
    }
  }

  if (error instanceof RetrievalError && error.cause instanceof EmbeddingError) {
    return classifyEmbeddingError(error.cause, error)
  }

  if (error instanceof EmbeddingError) {
    return classifyEmbeddingError(error, error)
  }

  if (error instanceof StoreQueryError) {
    return {
      category: error.timedOut ? 'timeout' : 'db',
      code: error.timedOut ? ERROR_CODES.DB_TIMEOUT : ERROR_CODES.DB_QUERY_ERROR,
      message: error.message,
      statusCode: error.timedOut ? 504 : 500,
      isOperational: true,
      isRetryable: error.timedOut,
      details: error.sqlState ? { sqlState: error.sqlState } : undefined,
      originalError: error,
    }
  }

  if (error instanceof RequestAbortedError) {
    const timedOut = error.reason === 'timeout'
    return {
      category: timedOut ? 'timeout' : 'cancelled',
      code: timedOut ? ERROR_CODES.REQUEST_TIMEOUT : ERROR_CODES.CLIENT_CLOSED_REQUEST,
      message: error.message,
      statusCode: timedOut ? 504 : 499,
      isOperational: true,
      isRetryable: timedOut,
      originalError: error,
    }
  }

  if (error instanceof RateLimitExceededError) {
    return {
      category: 'rate_limit',
      code: ERROR_CODES.RATE_LIMIT_EXCEEDED,
      message: error.message,
      statusCode: 429,
      isOperational: true,
      isRetryable: true,
      details: { retryAfterSec: error.retryAfterSec },
      originalError: error,
    }
  }

  if (error instanceof ServiceDisabledError) {
    return {
      category: 'unavailable',
      code: ERROR_CODES.FEATURE_DISABLED,
      message: error.message,
      statusCode: 503,
      isOperational: true,
      isRetryable: false,
      details: { feature: error.feature },
      originalError: error,
    }
  }

  if (error instanceof Error) {
    const classified = classifyByStatus(error) ?? classifyPgError(error) ?? classifyNetworkError(error)
    if (classified) {
      return classified
    }

    return {
      category: 'internal',
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: error.message || 'An unexpected error occurred',
      statusCode: 500,
      isOperational: false,
      isRetryable: false,
      originalError: error,
    }
  }

  return {
    category: 'internal',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: String(error),
    statusCode: 500,
    isOperational: false,
    isRetryable: false,
  }
}

function classifyEmbeddingError(cause: EmbeddingError, original: Error): ClassifiedError {
  const timedOut = cause.reason === 'timeout'
  return {
    category: timedOut ? 'timeout' : 'external',
    code: timedOut ? ERROR_CODES.EMBEDDING_TIMEOUT : ERROR_CODES.EMBEDDING_FAILED,
    message: cause.message,
    statusCode: 503,
    isOperational: true,
    isRetryable: cause.retryable,
    details: { reason: cause.reason },
    originalError: original,
  }
}

function readStringProperty(error: Error, key: string): string | undefined {
  const value: unknown = Reflect.get(error, key)
  return typeof value === 'string' ? value : undefined
}

function readNumberProperty(error: Error, key: string): number | undefined {
  const value: unknown = Reflect.get(error, key)
  return typeof value === 'number' ? value : undefined
}

/**
 * Errors that carry an HTTP status (body-parser, express)
 */
function classifyByStatus(error: Error): ClassifiedError | null {
  const status = readNumberProperty(error, 'status') ?? readNumberProperty(error, 'statusCode')
  if (status === 400) {
    return {
      category: 'validation',
      code: ERROR_CODES.VALIDATION_FAILED,
      message: error.message,
      statusCode: 400,
      isOperational: true,
      isRetryable: false,
      originalError: error,
    }
  }
  if (status === 404) {
    return {
      category: 'not_found',
      code: ERROR_CODES.NOT_FOUND,
      message: error.message,
      statusCode: 404,
      isOperational: true,
      isRetryable: false,
      originalError: error,
    }
  }
  if (status === 429) {
    return {
      category: 'rate_limit',
      code: ERROR_CODES.RATE_LIMIT_EXCEEDED,
      message: error.message,
      statusCode: 429,
      isOperational: true,
      isRetryable: true,
      originalError: error,
    }
  }
  return null
}

/**
 * node-postgres errors carry a five-character SQLSTATE in `code`
 */
function classifyPgError(error: Error): ClassifiedError | null {
  const code = readStringProperty(error, 'code')
  if (!code || !/^[0-9A-Z]{5}$/.test(code)) {
    return null
  }

  if (code.startsWith('08')) {
    return {
      category: 'db',
      code: ERROR_CODES.DB_CONNECTION_ERROR,
      message: 'Database connection error',
      statusCode: 503,
      isOperational: true,
      isRetryable: true,
      details: { sqlState: code },
      originalError: error,
    }
  }

  // 57014: query_canceled (statement_timeout)
  const timedOut = code === '57014'
  return {
    category: timedOut ? 'timeout' : 'db',
    code: timedOut ? ERROR_CODES.DB_TIMEOUT : ERROR_CODES.DB_QUERY_ERROR,
    message: 'Database query error',
    statusCode: timedOut ? 504 : 500,
    isOperational: true,
    isRetryable: timedOut,
    details: { sqlState: code },
    originalError: error,
  }
}

const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
])

function classifyNetworkError(error: Error): ClassifiedError | null {
  const code = readStringProperty(error, 'code')
  if (!code || !NETWORK_ERROR_CODES.has(code)) {
    return null
  }

  return {
    category: code === 'ETIMEDOUT' ? 'timeout' : 'external',
    code: ERROR_CODES.NETWORK_ERROR,
    message: `Network error: ${code}`,
    statusCode: 503,
    isOperational: true,
    isRetryable: true,
    details: { errorCode: code },
    originalError: error,
  }
}

export function formatErrorForLog(classified: ClassifiedError): Record<string, unknown> {
  return {
    error_category: classified.category,
    error_code: classified.code,
    error_message: classified.message,
    error_status_code: classified.statusCode,
    error_is_operational: classified.isOperational,
    error_is_retryable: classified.isRetryable,
    ...(classified.details && { error_details: classified.details }),
    ...(classified.originalError && {
      error_stack: classified.originalError.stack,
      error_name: classified.originalError.name,
    }),
  }
}

/**
 * User-safe error messages (never expose internal details)
 */
const SAFE_MESSAGES: Record<string, string> = {
  VALIDATION_FAILED: 'Please check your input and try again',
  NOT_FOUND: 'The requested resource was not found',
  RATE_LIMIT_EXCEEDED: 'Too many requests. Please wait a moment',

  DB_CONNECTION_ERROR: 'Service temporarily unavailable. Please try again',
  DB_QUERY_ERROR: 'Search is temporarily unavailable. Please try again',
  DB_TIMEOUT: 'Request timed out. Please try again',

  EMBEDDING_FAILED: 'Search is temporarily unavailable. Please try again',
  EMBEDDING_TIMEOUT: 'Search is temporarily unavailable. Please try again',
  NETWORK_ERROR: 'Network error occurred. Please try again',

  FEATURE_DISABLED: 'This feature is temporarily unavailable',
  REQUEST_TIMEOUT: 'Request timed out. Please try again',
  CLIENT_CLOSED_REQUEST: 'Request cancelled',

  INTERNAL_ERROR: 'Something went wrong. Please try again',
  UNEXPECTED_ERROR: 'An unexpected error occurred',
}

export function getSafeMessage(classified: ClassifiedError): string {
  return SAFE_MESSAGES[classified.code] || 'An error occurred'
}
