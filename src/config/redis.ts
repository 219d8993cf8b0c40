import Redis from 'ioredis'
import { env } from './env'
import { log } from '../platform/logger'

let redis: Redis | null = null

export function initRedis(commandTimeoutMs: number): Redis | null {
  if (redis) return redis
  if (!env.REDIS_URL) {
    log.warn('REDIS_URL not configured, Redis disabled')
    return null
  }
  redis = new Redis(env.REDIS_URL, {
    // 单次命令超时，避免一个卡住的调用拖住整个循环
    commandTimeout: commandTimeoutMs,
    maxRetriesPerRequest: 1,
    retryStrategy: (times) => Math.min(times * 50, 2000),
  })
  redis.on('connect', () => log.info('Redis connected'))
  redis.on('error', (err: Error) => log.error('Redis error', { error: err.message }))
  return redis
}

export async function closeRedis(): Promise<void> {
  if (!redis) return
  await redis.quit()
  redis = null
}
