import type { Request, Response, NextFunction } from 'express'
import { isMaintenanceMode } from '@searchlight/db'
import { loggers } from '../config/logger'

const log = loggers.server

/**
 * Maintenance mode gate. Health checks always pass; if the setting cannot be
 * read the request is blocked.
 */
export function createMaintenanceMiddleware(check: () => Promise<boolean> = isMaintenanceMode) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    if (req.path === '/health') {
      next()
      return
    }

    try {
      if (await check()) {
        log.info('Request blocked due to maintenance mode', { path: req.path })
        res.status(503).json({
          error: 'Service temporarily unavailable for maintenance',
          errorCode: 'MAINTENANCE_MODE',
        })
        return
      }
    } catch (error) {
      // Fail closed: if we can't check maintenance mode, block the request
      log.error('Failed to check maintenance mode, blocking request (fail-closed)', {}, error)
      res.status(503).json({
        error: 'Service temporarily unavailable',
        errorCode: 'MAINTENANCE_CHECK_FAILED',
      })
      return
    }

    next()
  }
}
