import { readFileSync, readdirSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { dirname, join } from 'node:path'
import { createLogger } from '@searchlight/logger'
import { getPool, closePool } from './client'

const log = createLogger('db').child('migrate')
const migrationsDir = join(dirname(fileURLToPath(import.meta.url)), 'migrations')

async function applyMigrations(): Promise<void> {
  const files = readdirSync(migrationsDir).filter((f) => f.endsWith('.sql')).sort()

  try {
    for (const file of files) {
      const sql = readFileSync(join(migrationsDir, file), 'utf-8')
      log.info('Applying migration', { file })
      await getPool().query(sql)
    }
    log.info('Migrations applied', { count: files.length })
  } catch (error) {
    log.error('Migration failed', {}, error)
    process.exitCode = 1
  } finally {
    await closePool()
  }
}

applyMigrations().catch((error: unknown) => {
  log.fatal('Unexpected migration error', {}, error)
  process.exitCode = 1
})
