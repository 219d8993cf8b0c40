/**
 * 数据同步 — 平台 API 拉 campaign 列表、合并直播监控指标，写回 Redis 并同步到内存
 */
import dayjs from 'dayjs'
import {
  applyFields, buildChannelIndex, Campaign, CampaignFields, LiveMetrics, lookupChannel, normalizeCampaign,
} from '../campaign/campaign.model'
import { Clock, systemClock } from '../engine/time'
import { errorMessage, log } from '../platform/logger'
import { ChannelDirectory } from '../platform/channels'
import { RemoteAdsApi, RemoteCampaign } from '../platform/ads/types'
import { StateStore } from '../store/state-store'

export interface RemoteSyncResult {
  balance: number | null
  updated: number
}

/**
 * 取第一个有凭证的 channel 的 cookie
 */
export function pickCredential(campaigns: Campaign[], channels: ChannelDirectory): string | undefined {
  for (const c of campaigns) {
    const credential = channels.credentialFor(c.channel)
    if (credential) return credential
  }
  return undefined
}

/**
 * 启动时验证一次凭证；读不到 campaign 或没有凭证只告警，不阻止启动
 */
export async function verifyCredential(store: StateStore, api: RemoteAdsApi, channels: ChannelDirectory): Promise<boolean> {
  try {
    const raw = await store.listCampaigns()
    const campaigns = Object.entries(raw).map(([id, r]) => normalizeCampaign(id, r))
    const credential = pickCredential(campaigns, channels)
    if (!credential) {
      log.warn('[Sync] No channel credential found, remote calls will be skipped')
      return false
    }
    const auth = await api.verifyAuth(credential)
    if (auth.ok) {
      log.info(`[Sync] Ads API authenticated as ${auth.displayName}`)
      return true
    }
    log.warn('[Sync] Ads API credential rejected, remote calls will fail until it is refreshed')
  } catch (err: unknown) {
    log.warn('[Sync] Credential check skipped', { error: errorMessage(err) })
  }
  return false
}

export class SyncService {
  constructor(
    private readonly store: StateStore,
    private readonly api: RemoteAdsApi | null,
    private readonly channels: ChannelDirectory,
    private readonly budgetFullRatio: number,
    private readonly clock: Clock = systemClock,
  ) {}

  get remoteEnabled(): boolean {
    return this.api !== null && this.api.supports('listCampaigns')
  }

  async syncFromRemote(campaigns: Campaign[]): Promise<RemoteSyncResult> {
    const result: RemoteSyncResult = { balance: null, updated: 0 }
    if (!this.api || !this.api.supports('listCampaigns')) return result

    const credential = pickCredential(campaigns, this.channels)
    if (!credential) {
      log.warn('[Sync] No valid credential found for API calls')
      return result
    }

    // 余额和列表并行拉取，一个失败不影响另一个
    const [balance, list] = await Promise.allSettled([
      this.api.supports('balance') ? this.api.getBalance(credential) : Promise.resolve(null),
      this.api.getCampaigns(credential),
    ])

    if (balance.status === 'fulfilled') {
      result.balance = balance.value
      if (balance.value !== null) log.info(`[Sync] Ads balance: ${balance.value}`)
    } else {
      log.warn('[Sync] Balance fetch failed', { error: errorMessage(balance.reason) })
    }

    if (list.status === 'rejected') {
      log.warn('[Sync] Campaign list fetch failed', { error: errorMessage(list.reason) })
      return result
    }

    log.info(`[Sync] API returned ${list.value.length} campaigns`)
    result.updated = await this.applyRemoteCampaigns(campaigns, list.value)
    return result
  }

  private async applyRemoteCampaigns(campaigns: Campaign[], remote: RemoteCampaign[]): Promise<number> {
    const index = buildChannelIndex(campaigns, c => c.channel)
    const now = this.clock()
    let updated = 0

    for (const rc of remote) {
      const campaign = lookupChannel(index, rc.channelName)
      if (!campaign) continue

      const fields: CampaignFields = {
        spent_today: rc.cost,
        roas: rc.roas,
        ad_credit: rc.balance,
        visits: rc.visits,
        conversion_rate: rc.conversionRate,
        last_update: dayjs(now).toISOString(),
      }
      if (rc.cost >= campaign.dailyBudget * this.budgetFullRatio) {
        fields.status = 'budget_full'
      }

      try {
        await this.store.updateCampaign(campaign.id, fields)
        applyFields(campaign, fields)
        updated++
      } catch (err: unknown) {
        log.warn(`[Sync] Update from API failed for ${campaign.id}`, { error: errorMessage(err) })
      }
    }

    return updated
  }

  /**
   * 合并直播监控的 clicks/cart/orders/sales
   */
  async mergeLiveMetrics(campaigns: Campaign[], liveIndex: Map<string, LiveMetrics>): Promise<number> {
    let merged = 0
    for (const campaign of campaigns) {
      const live = lookupChannel(liveIndex, campaign.channel)
      if (!live) continue

      const fields: CampaignFields = {
        clicks: live.clicks,
        cart: live.cart,
        orders: live.orders,
        sales: live.sales,
      }
      try {
        await this.store.updateCampaign(campaign.id, fields)
        applyFields(campaign, fields)
        merged++
      } catch (err: unknown) {
        log.warn(`[Sync] Live merge failed for ${campaign.id}`, { error: errorMessage(err) })
      }
    }
    return merged
  }
}
