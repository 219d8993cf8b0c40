/**
 * 共享状态存储 — campaign / 快照 / 操作日志 / 运行元数据
 *
 * 本进程是唯一写入方（单实例部署），读-改-写不加事务。
 */
import { CampaignFields, RawRecord } from '../campaign/campaign.model'
import { Snapshot } from '../snapshot/snapshot.model'
import { ActionKind } from '../action/action.model'

export interface ActionLogEntry {
  time: string        // HH:mm
  kind: ActionKind
  channel: string
  reason: string
  timestamp: number   // epoch ms
  newBudget?: number
}

export interface RunMetadata {
  last_update: string
  update_timestamp: number
  total_campaigns: number
  cycle_count: number
  actions_executed?: number
  ads_balance?: number
}

export interface StateStore {
  /** campaignId → 原始字段 */
  listCampaigns(): Promise<Record<string, RawRecord>>
  updateCampaign(campaignId: string, fields: CampaignFields): Promise<void>

  /** 直播监控写入的实时数据（只读） */
  readLiveMetrics(): Promise<Record<string, unknown>>

  appendSnapshot(campaignId: string, snapshot: Snapshot): Promise<void>
  /** [fromMs, toMs] 闭区间，按时间升序 */
  readSnapshots(campaignId: string, fromMs: number, toMs: number): Promise<Snapshot[]>
  /** 删除 t < cutoffMs 的快照，返回删除条数 */
  deleteSnapshotsBefore(campaignId: string, cutoffMs: number): Promise<number>

  appendActionLog(entry: ActionLogEntry): Promise<void>
  updateMetadata(meta: RunMetadata): Promise<void>
}

export class StateStoreError extends Error {
  constructor(operation: string, cause: unknown) {
    super(`State store ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`)
    this.name = 'StateStoreError'
  }
}
