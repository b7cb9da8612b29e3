import type { Request, Response, NextFunction } from 'express'
import { loggers } from '../config/logger'

const log = loggers.server

const SKIP_PATHS = new Set(['/health'])

/**
 * One `http.request.end` line per request, emitted when the response finishes
 * or the client goes away first.
 */
export function requestLoggerMiddleware(req: Request, res: Response, next: NextFunction): void {
  if (SKIP_PATHS.has(req.path)) {
    next()
    return
  }

  const started = process.hrtime.bigint()
  let logged = false

  const finish = (aborted: boolean) => {
    if (logged) return
    logged = true
    const durationMs = Number(process.hrtime.bigint() - started) / 1e6
    const meta = {
      method: req.method,
      path: req.baseUrl + req.path,
      status: aborted ? 499 : res.statusCode,
      durationMs: Math.round(durationMs * 10) / 10,
      aborted,
    }
    if (!aborted && res.statusCode >= 500) {
      log.warn('http.request.end', meta)
    } else {
      log.info('http.request.end', meta)
    }
  }

  res.on('finish', () => finish(false))
  res.on('close', () => finish(!res.writableFinished))
  next()
}
