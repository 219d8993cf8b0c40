/**
 * Redis 存储：key 布局、命令参数、快照区间边界、异常包装
 */
import { normalizeCampaign } from '../../src/campaign/campaign.model'
import { SnapshotStore } from '../../src/snapshot/snapshot.service'
import { RedisStateStore } from '../../src/store/redis.store'
import { StateStoreError } from '../../src/store/state-store'
import { RecordingRedis } from '../support/recording.redis'
import { at, snap, TestClock } from '../support/fakes'

const SNAP_KEY = 'ns:snapshots:cam-1'

function setup() {
  const redis = new RecordingRedis()
  const store = new RedisStateStore(redis, 'ns', 'live:channels')
  return { redis, store }
}

describe('RedisStateStore campaigns', () => {
  it('reads campaign hashes through one pipeline and skips failed or empty entries', async () => {
    const { redis, store } = setup()
    redis.sets.set('ns:campaign_ids', new Set(['a', 'b', 'c']))
    redis.hashes.set('ns:campaigns:a', { channel: 'ShopA', daily_budget: '300' })
    redis.hashes.set('ns:campaigns:b', { channel: 'ShopB' })
    redis.pipelineErrors.add('ns:campaigns:b')

    expect(await store.listCampaigns()).toEqual({ a: { channel: 'ShopA', daily_budget: '300' } })
    expect(redis.commands).toEqual([
      { name: 'smembers', args: ['ns:campaign_ids'] },
      { name: 'exec', args: ['ns:campaigns:a', 'ns:campaigns:b', 'ns:campaigns:c'] },
    ])
  })

  it('does not open a pipeline without campaign ids', async () => {
    const { redis, store } = setup()
    expect(await store.listCampaigns()).toEqual({})
    expect(redis.commands.map(c => c.name)).toEqual(['smembers'])
  })

  it('writes fields as strings and drops undefined ones', async () => {
    const { redis, store } = setup()
    await store.updateCampaign('cam-1', { daily_budget: 225, status: 'active', last_schedule_action: undefined })
    expect(redis.commands).toEqual([
      { name: 'hset', args: ['ns:campaigns:cam-1', { daily_budget: '225', status: 'active' }] },
    ])
  })

  it('sends nothing for an empty update', async () => {
    const { redis, store } = setup()
    await store.updateCampaign('cam-1', {})
    expect(redis.commands).toEqual([])
  })
})

describe('RedisStateStore live metrics', () => {
  it('parses JSON values and skips the rest', async () => {
    const { redis, store } = setup()
    redis.hashes.set('live:channels', {
      x: JSON.stringify({ channel: 'ShopA', clicks: 3 }),
      y: 'not json',
    })
    expect(await store.readLiveMetrics()).toEqual({ x: { channel: 'ShopA', clicks: 3 } })
  })
})

describe('RedisStateStore snapshots', () => {
  it('stores a snapshot scored by its time', async () => {
    const { redis, store } = setup()
    const s = snap(1000, 150, 3)
    await store.appendSnapshot('cam-1', s)
    expect(redis.commands).toEqual([{ name: 'zadd', args: [SNAP_KEY, 1000, JSON.stringify(s)] }])
  })

  it('reads an inclusive time range', async () => {
    const { redis, store } = setup()
    for (const t of [1000, 2000, 3000, 4000]) await store.appendSnapshot('cam-1', snap(t, t / 100, 0))

    const window = await store.readSnapshots('cam-1', 2000, 3000)

    expect(window.map(s => s.t)).toEqual([2000, 3000])
    expect(redis.commands[redis.commands.length - 1]).toEqual({ name: 'zrangebyscore', args: [SNAP_KEY, 2000, 3000] })
  })

  it('skips malformed members', async () => {
    const { redis, store } = setup()
    redis.zsets.set(SNAP_KEY, [
      { score: 1500, member: 'not-json' },
      { score: 1600, member: '{"spent":1}' },
      { score: 1700, member: '{"t":1700,"spent":"12.5","cart":2}' },
    ])

    expect(await store.readSnapshots('cam-1', 0, 5000)).toEqual([
      { t: 1700, spent: 12.5, cart: 2, clicks: 0, orders: 0, sales: 0 },
    ])
  })

  it('deletes only snapshots strictly before the cutoff', async () => {
    const { redis, store } = setup()
    for (const t of [999, 1000, 1001]) await store.appendSnapshot('cam-1', snap(t, 1, 0))

    expect(await store.deleteSnapshotsBefore('cam-1', 1000)).toBe(1)
    expect(redis.commands[redis.commands.length - 1]).toEqual({
      name: 'zremrangebyscore',
      args: [SNAP_KEY, '-inf', '(1000'],
    })
    expect((await store.readSnapshots('cam-1', 0, 5000)).map(s => s.t)).toEqual([1000, 1001])
  })

  it('keeps the snapshot exactly at the retention boundary', async () => {
    const { store } = setup()
    const T = at(12, 0)
    const HOUR = 3600 * 1000
    for (const t of [T - 5 * HOUR, T - 4 * HOUR - 1, T - 4 * HOUR, T - HOUR]) {
      await store.appendSnapshot('cam-1', snap(t, 1, 0))
    }
    const snapshots = new SnapshotStore(store, { intervalSec: 300, retentionHours: 4 }, new TestClock(T).now)

    expect(await snapshots.cleanup([normalizeCampaign('cam-1', {})])).toBe(2)
    expect((await store.readSnapshots('cam-1', 0, T)).map(s => s.t)).toEqual([T - 4 * HOUR, T - HOUR])
  })
})

describe('RedisStateStore log and metadata', () => {
  it('appends action log entries as JSON', async () => {
    const { redis, store } = setup()
    const entry = { time: '10:00', kind: 'pause' as const, channel: 'ShopA', reason: 'stop', timestamp: 1000 }
    await store.appendActionLog(entry)
    expect(redis.commands).toEqual([{ name: 'rpush', args: ['ns:action_log', JSON.stringify(entry)] }])
  })

  it('writes run metadata as a hash', async () => {
    const { redis, store } = setup()
    await store.updateMetadata({ last_update: '2026-01-15T02:00:00.000Z', update_timestamp: 1000, total_campaigns: 2, cycle_count: 3 })
    expect(redis.hashes.get('ns:metadata')).toEqual({
      last_update: '2026-01-15T02:00:00.000Z',
      update_timestamp: '1000',
      total_campaigns: '2',
      cycle_count: '3',
    })
  })
})

describe('RedisStateStore errors', () => {
  it('wraps command failures in StateStoreError', async () => {
    const { redis, store } = setup()
    redis.failing = true

    await expect(store.listCampaigns()).rejects.toBeInstanceOf(StateStoreError)
    await expect(store.readSnapshots('cam-1', 0, 1)).rejects.toThrow('State store readSnapshots failed: connection lost')
  })
})
