import Redis from 'ioredis'
import type { RedisOptions } from 'ioredis'
import { logger } from './logger'

const log = logger.child('redis')

const redisHost = process.env.REDIS_HOST || 'localhost'
const redisPort = parseInt(process.env.REDIS_PORT || '6379', 10)
const redisPassword = process.env.REDIS_PASSWORD || undefined

/**
 * The cache is optional: commands fail fast instead of queueing while
 * Redis is down, so callers can bypass it.
 */
export const redisConnection: RedisOptions = {
  host: redisHost,
  port: redisPort,
  password: redisPassword,
  maxRetriesPerRequest: 1,
  enableOfflineQueue: false,
  commandTimeout: parseInt(process.env.REDIS_COMMAND_TIMEOUT_MS || '250', 10),
  lazyConnect: false,
}

let redisClient: Redis | null = null

export function getRedisClient(): Redis {
  if (!redisClient) {
    redisClient = new Redis(redisConnection)

    redisClient.on('error', (err: Error) => {
      log.error('Connection error', { message: err.message })
    })

    redisClient.on('connect', () => {
      log.info('Connected successfully')
    })
  }
  return redisClient
}

export function isRedisReady(): boolean {
  return redisClient?.status === 'ready'
}

export async function pingRedis(): Promise<boolean> {
  try {
    return (await getRedisClient().ping()) === 'PONG'
  } catch (error) {
    log.warn('Redis ping failed', {}, error)
    return false
  }
}

export async function closeRedis(): Promise<void> {
  if (!redisClient) return
  const client = redisClient
  redisClient = null
  await client.quit()
}
