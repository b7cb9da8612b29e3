/**
 * Remove every cached search, listing and autocomplete response.
 * Run after loading a new catalog or a new search config snapshot.
 *
 * Usage:
 *   npm run cache:clear
 */

import 'dotenv/config'

import { createLogger } from '@searchlight/logger'
import { closeRedis } from './src/config/redis'
import { clearSearchCaches } from './src/services/ai-search/cache'

const log = createLogger('api:clear-cache')

async function main(): Promise<number> {
  try {
    const deleted = await clearSearchCaches()
    log.info('Search caches cleared', { deleted })
    return 0
  } catch (error) {
    log.fatal('Clearing search caches failed', {}, error)
    return 1
  } finally {
    await closeRedis()
  }
}

main().then((code) => {
  process.exitCode = code
})
