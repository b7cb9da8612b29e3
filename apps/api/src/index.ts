// Load environment variables first, before any other imports
import 'dotenv/config'

import { closePool } from '@searchlight/db'
import { createApp } from './app'
import { loggers } from './config/logger'
import { closeRedis, getRedisClient } from './config/redis'
import { getSearchConfig, startSearchConfigReload } from './config/search-config'

const log = loggers.server

const PORT = parseInt(process.env.PORT || '8000', 10)
const SEARCH_CONFIG_RELOAD_MS = parseInt(process.env.SEARCH_CONFIG_RELOAD_MS || '300000', 10)

// Fail at startup on an invalid config artifact, not on the first request
const config = getSearchConfig()
const stopConfigReload = startSearchConfigReload(SEARCH_CONFIG_RELOAD_MS)

// Connect the cache early; requests bypass it until it is ready
getRedisClient()

const app = createApp()

const server = app.listen(PORT, () => {
  log.info('API server started', { port: PORT, configVersion: config.version })
})

// Track if shutdown is in progress
let isShuttingDown = false

// Graceful shutdown
const shutdown = async (signal: string) => {
  if (isShuttingDown) {
    log.warn('Shutdown already in progress')
    return
  }
  isShuttingDown = true

  const shutdownStart = Date.now()
  log.info('Starting graceful shutdown', { signal })

  try {
    stopConfigReload()

    // 1. Stop accepting new connections
    log.info('Closing HTTP server')
    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err)
        else resolve()
      })
    })
    log.info('HTTP server closed')

    // 2. Disconnect from cache and database
    await closeRedis()
    await closePool()

    const durationMs = Date.now() - shutdownStart
    log.info('Graceful shutdown complete', { durationMs })
    process.exit(0)
  } catch (error) {
    log.error('Error during shutdown', {}, error)
    process.exit(1)
  }
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM')
})
process.on('SIGINT', () => {
  void shutdown('SIGINT')
})
