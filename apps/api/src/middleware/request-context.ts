/**
 * Request Context Middleware
 *
 * Provides request correlation via AsyncLocalStorage.
 * All log entries within a request will include the requestId.
 *
 * Usage:
 * - X-Request-ID header is used if present (for distributed tracing)
 * - Otherwise, a new UUID is generated
 * - The requestId is also added to the response header
 */

import type { Request, Response, NextFunction } from 'express'
import { randomUUID } from 'node:crypto'
import { withRequestContext } from '@searchlight/logger'

const REQUEST_ID_PATTERN = /^[\w.:-]{1,128}$/

function readRequestId(req: Request): string | null {
  const header = req.headers['x-request-id']
  const value = Array.isArray(header) ? header[0] : header
  return value && REQUEST_ID_PATTERN.test(value) ? value : null
}

/**
 * Middleware that wraps each request in a request context
 * providing automatic requestId correlation for all log entries
 */
export function requestContextMiddleware(req: Request, res: Response, next: NextFunction): void {
  // Use existing request ID from header or generate new one
  const requestId = readRequestId(req) ?? randomUUID()

  res.setHeader('X-Request-ID', requestId)
  res.locals.requestId = requestId

  withRequestContext({ requestId }, () => {
    next()
  })
}
