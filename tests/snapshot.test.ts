import { normalizeCampaign, LiveMetrics, buildChannelIndex } from '../src/campaign/campaign.model'
import { SnapshotStore } from '../src/snapshot/snapshot.service'
import { MemoryStateStore } from './support/memory.store'
import { at, snap, TestClock } from './support/fakes'

const T = at(12, 0)
const MIN = 60000
const HOUR = 60 * MIN

function setup() {
  const store = new MemoryStateStore()
  const clock = new TestClock(T)
  const snapshots = new SnapshotStore(store, { intervalSec: 300, retentionHours: 4 }, clock.now)
  return { store, clock, snapshots }
}

describe('SnapshotStore cadence', () => {
  it('takes the first snapshot immediately, then every interval', async () => {
    const { snapshots, clock } = setup()
    expect(snapshots.shouldTakeSnapshot(clock.now())).toBe(true)

    await snapshots.takeSnapshot([], new Map())
    expect(snapshots.shouldTakeSnapshot(T + 299999)).toBe(false)
    expect(snapshots.shouldTakeSnapshot(T + 300000)).toBe(true)
  })
})

describe('SnapshotStore.takeSnapshot', () => {
  it('prefers live metrics and falls back to campaign values', async () => {
    const { store, snapshots } = setup()
    const campaigns = [
      normalizeCampaign('cam-1', { channel: 'ShopA', spent_today: 150, cart: 1, clicks: 2 }),
      normalizeCampaign('cam-2', { channel: 'ShopB', spent_today: 80, cart: 5, clicks: 9, orders: 2, sales: 60 }),
    ]
    const live: LiveMetrics[] = [{ channel: 'shopa', clicks: 12, cart: 3, orders: 1, sales: 99 }]

    const written = await snapshots.takeSnapshot(campaigns, buildChannelIndex(live, m => m.channel))

    expect(written).toBe(2)
    expect(store.snapshots.get('cam-1')).toEqual([{ t: T, spent: 150, cart: 3, clicks: 12, orders: 1, sales: 99 }])
    expect(store.snapshots.get('cam-2')).toEqual([{ t: T, spent: 80, cart: 5, clicks: 9, orders: 2, sales: 60 }])
  })

  it('keeps going when one campaign fails', async () => {
    const { store, snapshots } = setup()
    store.failCampaignIds.add('cam-2')
    const campaigns = ['cam-1', 'cam-2', 'cam-3'].map(id => normalizeCampaign(id, {}))

    expect(await snapshots.takeSnapshot(campaigns, new Map())).toBe(2)
    expect(store.snapshots.has('cam-2')).toBe(false)
    expect(store.snapshots.get('cam-3')).toHaveLength(1)
  })
})

describe('SnapshotStore.window', () => {
  it('returns snapshots in the trailing window, boundary included, oldest first', async () => {
    const { store, snapshots } = setup()
    store.seedSnapshots('cam-1', [
      snap(T, 50, 5),
      snap(T - 200 * MIN, 10, 1),
      snap(T - 60 * MIN, 30, 3),
      snap(T - 170 * MIN, 20, 2),
      snap(T - 10 * MIN, 40, 4),
    ])

    const hour = await snapshots.window('cam-1', 60)
    expect(hour.map(s => s.t)).toEqual([T - 60 * MIN, T - 10 * MIN, T])

    const three = await snapshots.window('cam-1', 180)
    expect(three.map(s => s.spent)).toEqual([20, 30, 40, 50])
  })

  it('is empty for a campaign without history', async () => {
    const { snapshots } = setup()
    expect(await snapshots.window('unknown', 15)).toEqual([])
  })
})

describe('SnapshotStore.cleanup', () => {
  it('removes only snapshots older than the retention period', async () => {
    const { store, snapshots } = setup()
    store.seedSnapshots('cam-1', [
      snap(T - 5 * HOUR, 1, 0),
      snap(T - 4 * HOUR - 1, 2, 0),
      snap(T - 4 * HOUR, 3, 0),
      snap(T - HOUR, 4, 0),
    ])
    store.seedSnapshots('cam-2', [snap(T - 6 * HOUR, 1, 0)])
    const campaigns = ['cam-1', 'cam-2'].map(id => normalizeCampaign(id, {}))

    expect(await snapshots.cleanup(campaigns)).toBe(3)
    expect(store.snapshots.get('cam-1')?.map(s => s.spent)).toEqual([3, 4])
    expect(store.snapshots.get('cam-2')).toEqual([])
  })

  it('counts what it could remove when one campaign fails', async () => {
    const { store, snapshots } = setup()
    store.seedSnapshots('cam-1', [snap(T - 5 * HOUR, 1, 0)])
    store.seedSnapshots('cam-2', [snap(T - 5 * HOUR, 1, 0)])
    store.failCampaignIds.add('cam-1')
    const campaigns = ['cam-1', 'cam-2'].map(id => normalizeCampaign(id, {}))

    expect(await snapshots.cleanup(campaigns)).toBe(1)
    expect(store.snapshots.get('cam-1')).toHaveLength(1)
  })
})
