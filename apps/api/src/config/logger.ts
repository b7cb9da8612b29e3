/**
 * API Logger Configuration
 *
 * Pre-configured loggers for API components
 */

import { createLogger } from '@searchlight/logger'

// Root logger for API service
export const logger = createLogger('api')

export const loggers = {
  server: logger.child('server'),
  search: logger.child('search'),
  ai: logger.child('ai'),
  cache: logger.child('cache'),
  products: logger.child('products'),
  analytics: logger.child('analytics'),
  config: logger.child('config'),
}
