/**
 * 主循环 — 每轮：读 Redis → 平台 API 同步 → 合并直播数据 → 快照 → 决策 → 执行 → 元数据 → 定期清理
 *
 * 轮与轮之间严格串行（上一轮结束 + 固定间隔后才开始下一轮），
 * 单轮内任何异常都在边界处吞掉并记录，进程不因某一轮失败而退出。
 */
import dayjs from 'dayjs'
import {
  buildChannelIndex, Campaign, LiveMetrics, normalizeCampaign, normalizeLiveMetrics,
} from '../campaign/campaign.model'
import { MonitorConfig } from '../config/monitor'
import { ActionExecutor } from '../action/action.executor'
import { DecisionEngine } from '../engine/decision'
import { Clock, systemClock } from '../engine/time'
import { errorMessage, log } from '../platform/logger'
import { ChannelDirectory } from '../platform/channels'
import { SnapshotStore } from '../snapshot/snapshot.service'
import { StateStore } from '../store/state-store'
import { SyncService } from './sync.service'

export interface CycleReport {
  cycle: number
  ok: boolean
  campaigns: number
  actions: number
  applied: number
  snapshotTaken: boolean
  cleanedUp: boolean
  durationMs: number
  error?: string
}

export interface ControlLoopDeps {
  config: MonitorConfig
  store: StateStore
  sync: SyncService
  snapshots: SnapshotStore
  engine: DecisionEngine
  executor: ActionExecutor
  channels: ChannelDirectory
  clock?: Clock
}

export class ControlLoop {
  private cycleCount = 0
  private running = false
  private sleepTimer: NodeJS.Timeout | null = null
  private wake: (() => void) | null = null
  private readonly clock: Clock

  constructor(private readonly deps: ControlLoopDeps) {
    this.clock = deps.clock ?? systemClock
  }

  get cycles(): number {
    return this.cycleCount
  }

  /**
   * 跑一轮，永不抛出
   */
  async runCycle(): Promise<CycleReport> {
    this.cycleCount++
    const started = this.clock()
    const report: CycleReport = {
      cycle: this.cycleCount,
      ok: true,
      campaigns: 0,
      actions: 0,
      applied: 0,
      snapshotTaken: false,
      cleanedUp: false,
      durationMs: 0,
    }
    log.info(`[Loop] --- Cycle #${this.cycleCount} ---`)

    try {
      await this.cycleSteps(report)
    } catch (err: unknown) {
      report.ok = false
      report.error = errorMessage(err)
      log.error(`[Loop] Cycle #${report.cycle} failed`, { error: err instanceof Error ? err.stack : report.error })
    }

    report.durationMs = this.clock() - started
    log.info(`[Loop] Cycle #${report.cycle} completed in ${(report.durationMs / 1000).toFixed(1)}s`, {
      campaigns: report.campaigns, actions: report.actions, applied: report.applied,
    })
    return report
  }

  private async cycleSteps(report: CycleReport): Promise<void> {
    const { config, store, sync, snapshots, engine, executor, channels } = this.deps

    // 1. 读 campaign 和直播数据
    const rawCampaigns = await store.listCampaigns()
    const campaigns: Campaign[] = Object.entries(rawCampaigns).map(([id, raw]) => normalizeCampaign(id, raw))
    report.campaigns = campaigns.length
    log.info(`[Loop] Campaigns in store: ${campaigns.length}`)

    const liveIndex = await this.readLiveIndex()

    // 2. 平台 API 同步（可选）
    let balance: number | null = null
    if (sync.remoteEnabled) {
      try {
        balance = (await sync.syncFromRemote(campaigns)).balance
      } catch (err: unknown) {
        log.warn('[Loop] Remote sync failed, continuing with store data', { error: errorMessage(err) })
      }
    }

    // 3. 合并直播数据
    await sync.mergeLiveMetrics(campaigns, liveIndex)

    // 4. 快照
    if (snapshots.shouldTakeSnapshot(this.clock())) {
      try {
        await snapshots.takeSnapshot(campaigns, liveIndex)
        report.snapshotTaken = true
      } catch (err: unknown) {
        log.warn('[Loop] Snapshot failed', { error: errorMessage(err) })
      }
    }

    // 5. 决策
    const actions = await engine.evaluateAll(campaigns, this.clock())
    report.actions = actions.length

    // 6. 执行
    if (actions.length > 0) {
      log.info(`[Loop] Auto-budget: ${actions.length} actions to execute`)
      for (const action of actions) {
        const result = await executor.execute(action, channels.credentialFor(action.channel))
        if (result.applied) report.applied++
      }
    }

    // 7. 元数据
    const now = this.clock()
    try {
      await store.updateMetadata({
        last_update: dayjs(now).toISOString(),
        update_timestamp: now,
        total_campaigns: campaigns.length,
        cycle_count: this.cycleCount,
        actions_executed: report.applied,
        ...(balance !== null ? { ads_balance: balance } : {}),
      })
    } catch (err: unknown) {
      log.warn('[Loop] Metadata update failed', { error: errorMessage(err) })
    }

    // 8. 每 N 轮清理一次过期快照
    if (this.cycleCount % config.cleanupEveryCycles === 0) {
      await snapshots.cleanup(campaigns)
      report.cleanedUp = true
    }
  }

  private async readLiveIndex(): Promise<Map<string, LiveMetrics>> {
    try {
      const raw = await this.deps.store.readLiveMetrics()
      const records: LiveMetrics[] = []
      for (const value of Object.values(raw)) {
        const m = normalizeLiveMetrics(value)
        if (m) records.push(m)
      }
      log.info(`[Loop] Live channels: ${records.length}`)
      return buildChannelIndex(records, m => m.channel)
    } catch (err: unknown) {
      log.warn('[Loop] Live metrics unavailable', { error: errorMessage(err) })
      return new Map()
    }
  }

  /**
   * 循环运行直到 stop()；stop 只在两轮之间生效，返回的 Promise 在循环退出后 resolve
   */
  async start(): Promise<void> {
    if (this.running) return
    this.running = true
    log.info(`[Loop] Starting monitor loop (interval: ${this.deps.config.fetchIntervalSec}s)`)

    while (this.running) {
      await this.runCycle()
      if (!this.running) break
      log.info(`[Loop] Waiting ${this.deps.config.fetchIntervalSec}s until next cycle...`)
      await this.sleep(this.deps.config.fetchIntervalSec * 1000)
    }

    log.info('[Loop] Stopped')
  }

  stop(): void {
    if (!this.running) return
    this.running = false
    if (this.sleepTimer) clearTimeout(this.sleepTimer)
    this.sleepTimer = null
    this.wake?.()
    this.wake = null
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      this.wake = resolve
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = null
        this.wake = null
        resolve()
      }, ms)
    })
  }
}
