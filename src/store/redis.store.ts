/**
 * Redis 实现
 *
 * Key 布局（NS = 命名空间）：
 *   NS:campaign_ids           set     campaign id 列表
 *   NS:campaigns:{id}         hash    campaign 字段
 *   NS:snapshots:{id}         zset    score = 时间戳，member = JSON 快照
 *   NS:action_log             list    JSON 操作日志（只追加）
 *   NS:metadata               hash    运行元数据
 *   {liveKey}                 hash    直播监控数据（只读，JSON 值）
 */
import { CampaignFields, RawRecord } from '../campaign/campaign.model'
import { Snapshot } from '../snapshot/snapshot.model'
import { log } from '../platform/logger'
import { ActionLogEntry, RunMetadata, StateStore, StateStoreError } from './state-store'

function toHash(fields: object): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [k, v] of Object.entries(fields)) {
    if (v === undefined || v === null) continue
    out[k] = String(v)
  }
  return out
}

function parseSnapshot(member: string): Snapshot | null {
  try {
    const data: unknown = JSON.parse(member)
    if (!data || typeof data !== 'object') return null
    const r: RawRecord = Object.fromEntries(Object.entries(data))
    const t = Number(r.t)
    if (!Number.isFinite(t)) return null
    return {
      t,
      spent: Number(r.spent) || 0,
      cart: Number(r.cart) || 0,
      clicks: Number(r.clicks) || 0,
      orders: Number(r.orders) || 0,
      sales: Number(r.sales) || 0,
    }
  } catch {
    log.warn('[RedisStore] Skipping malformed snapshot', { member })
    return null
  }
}

/** 用到的 pipeline 命令 */
export interface RedisPipeline {
  hgetall(key: string): unknown
  exec(): Promise<[error: Error | null, result: unknown][] | null>
}

/**
 * 本存储用到的 Redis 命令子集，ioredis 的 Redis 实例直接满足
 */
export interface RedisCommands {
  smembers(key: string): Promise<string[]>
  hgetall(key: string): Promise<Record<string, string>>
  hset(key: string, fields: Record<string, string>): Promise<unknown>
  zadd(key: string, score: number, member: string): Promise<unknown>
  zrangebyscore(key: string, min: number | string, max: number | string): Promise<string[]>
  zremrangebyscore(key: string, min: number | string, max: number | string): Promise<number>
  rpush(key: string, ...values: string[]): Promise<unknown>
  pipeline(): RedisPipeline
}

export class RedisStateStore implements StateStore {
  constructor(
    private readonly redis: RedisCommands,
    private readonly namespace: string,
    private readonly liveMetricsKey: string,
  ) {}

  private key(...parts: string[]): string {
    return [this.namespace, ...parts].join(':')
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err: unknown) {
      throw new StateStoreError(operation, err)
    }
  }

  async listCampaigns(): Promise<Record<string, RawRecord>> {
    return this.run('listCampaigns', async () => {
      const ids = await this.redis.smembers(this.key('campaign_ids'))
      if (ids.length === 0) return {}

      const pipeline = this.redis.pipeline()
      for (const id of ids) pipeline.hgetall(this.key('campaigns', id))
      const results = (await pipeline.exec()) ?? []

      const campaigns: Record<string, RawRecord> = {}
      results.forEach(([err, value], i) => {
        const id = ids[i]
        if (err) {
          log.warn(`[RedisStore] Read campaign ${id} failed`, { error: err.message })
          return
        }
        if (value && typeof value === 'object' && Object.keys(value).length > 0) {
          campaigns[id] = Object.fromEntries(Object.entries(value))
        }
      })
      return campaigns
    })
  }

  async updateCampaign(campaignId: string, fields: CampaignFields): Promise<void> {
    const hash = toHash(fields)
    if (Object.keys(hash).length === 0) return
    await this.run('updateCampaign', () => this.redis.hset(this.key('campaigns', campaignId), hash))
  }

  async readLiveMetrics(): Promise<Record<string, unknown>> {
    return this.run('readLiveMetrics', async () => {
      const raw = await this.redis.hgetall(this.liveMetricsKey)
      const out: Record<string, unknown> = {}
      for (const [k, v] of Object.entries(raw)) {
        try {
          out[k] = JSON.parse(v)
        } catch {
          log.warn(`[RedisStore] Live metrics entry ${k} is not JSON, skipped`)
        }
      }
      return out
    })
  }

  async appendSnapshot(campaignId: string, snapshot: Snapshot): Promise<void> {
    await this.run('appendSnapshot', () =>
      this.redis.zadd(this.key('snapshots', campaignId), snapshot.t, JSON.stringify(snapshot)),
    )
  }

  async readSnapshots(campaignId: string, fromMs: number, toMs: number): Promise<Snapshot[]> {
    return this.run('readSnapshots', async () => {
      const members = await this.redis.zrangebyscore(this.key('snapshots', campaignId), fromMs, toMs)
      const snapshots: Snapshot[] = []
      for (const m of members) {
        const s = parseSnapshot(m)
        if (s) snapshots.push(s)
      }
      return snapshots.sort((a, b) => a.t - b.t)
    })
  }

  async deleteSnapshotsBefore(campaignId: string, cutoffMs: number): Promise<number> {
    // "(" = 开区间，只删严格早于 cutoff 的
    return this.run('deleteSnapshotsBefore', () =>
      this.redis.zremrangebyscore(this.key('snapshots', campaignId), '-inf', `(${cutoffMs}`),
    )
  }

  async appendActionLog(entry: ActionLogEntry): Promise<void> {
    await this.run('appendActionLog', () => this.redis.rpush(this.key('action_log'), JSON.stringify(entry)))
  }

  async updateMetadata(meta: RunMetadata): Promise<void> {
    await this.run('updateMetadata', () => this.redis.hset(this.key('metadata'), toHash(meta)))
  }
}
