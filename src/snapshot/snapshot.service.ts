/**
 * 快照管理 — 按固定节奏（默认 5 分钟）给每个 campaign 记一条累计指标，
 * 供 15/60/180 分钟窗口评估使用
 */
import { Campaign, LiveMetrics, lookupChannel } from '../campaign/campaign.model'
import { Clock, systemClock } from '../engine/time'
import { errorMessage, log } from '../platform/logger'
import { StateStore } from '../store/state-store'
import { Snapshot, SnapshotReading } from './snapshot.model'

export interface SnapshotOptions {
  intervalSec: number
  retentionHours: number
}

export class SnapshotStore {
  private lastSnapshotAt = 0

  constructor(
    private readonly store: StateStore,
    private readonly options: SnapshotOptions,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * 与主循环间隔解耦：距离上次快照满 intervalSec 才拍
   */
  shouldTakeSnapshot(now: number = this.clock()): boolean {
    return now - this.lastSnapshotAt >= this.options.intervalSec * 1000
  }

  /**
   * 优先用直播监控数据，没有则用 campaign 上次记录的值；单个 campaign 失败不影响其它
   */
  async takeSnapshot(campaigns: Campaign[], liveIndex: Map<string, LiveMetrics>): Promise<number> {
    const now = this.clock()
    let written = 0

    for (const c of campaigns) {
      const snapshot: Snapshot = { t: now, ...readingFor(c, lookupChannel(liveIndex, c.channel)) }
      try {
        await this.store.appendSnapshot(c.id, snapshot)
        written++
      } catch (err: unknown) {
        log.warn(`[Snapshot] Write failed for ${c.id}`, { error: errorMessage(err) })
      }
    }

    this.lastSnapshotAt = now
    log.info(`[Snapshot] Taken for ${written}/${campaigns.length} campaigns`)
    return written
  }

  /**
   * 最近 minutes 分钟的快照（升序），每次调用都重新读取
   */
  async window(campaignId: string, minutes: number): Promise<Snapshot[]> {
    const now = this.clock()
    return this.store.readSnapshots(campaignId, now - minutes * 60000, now)
  }

  /**
   * 删除超过保留期的快照，返回删除总数
   */
  async cleanup(campaigns: Campaign[]): Promise<number> {
    const cutoff = this.clock() - this.options.retentionHours * 3600 * 1000
    let removed = 0

    for (const c of campaigns) {
      try {
        removed += await this.store.deleteSnapshotsBefore(c.id, cutoff)
      } catch (err: unknown) {
        log.warn(`[Snapshot] Cleanup failed for ${c.id}`, { error: errorMessage(err) })
      }
    }

    log.info(`[Snapshot] Cleanup removed ${removed} snapshots`)
    return removed
  }
}

function readingFor(c: Campaign, live: LiveMetrics | undefined): SnapshotReading {
  const source = live ?? c
  return {
    spent: c.spentToday,
    cart: source.cart,
    clicks: source.clicks,
    orders: source.orders,
    sales: source.sales,
  }
}
