import type { Request, Response, NextFunction } from 'express'
import { classifyError, formatErrorForLog, getSafeMessage } from '../lib/errors'
import { loggers } from '../config/logger'

const log = loggers.server

/**
 * Final error handler. Clients get the error code and a generic message;
 * details go to the log only.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const classified = classifyError(err)
  const meta = { path: req.path, method: req.method, ...formatErrorForLog(classified) }

  if (classified.category === 'cancelled') {
    log.info('Request cancelled by client', meta)
  } else if (classified.isOperational) {
    log.warn('Request failed', meta)
  } else {
    log.error('Unhandled error', meta, err)
  }

  if (res.headersSent || res.destroyed) {
    return
  }

  const requestId: unknown = res.locals.requestId
  res.status(classified.statusCode).json({
    error: getSafeMessage(classified),
    errorCode: classified.code,
    requestId: typeof requestId === 'string' ? requestId : null,
    ...(classified.category === 'validation' && classified.details ? { details: classified.details } : {}),
  })
}
