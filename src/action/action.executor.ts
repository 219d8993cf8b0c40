/**
 * Action Executor
 *
 * 写入顺序：校验 → Redis（权威，必写）→ 平台 API（尽力而为）→ 操作日志。
 * 平台调用失败只记日志，不回滚 Redis、不重试；远程结果作为返回值给上层观测。
 */
import { validateBudget } from '../budget/budget'
import { CampaignFields } from '../campaign/campaign.model'
import { BudgetRules } from '../config/monitor'
import { Clock, clockTime, systemClock } from '../engine/time'
import { errorMessage, log } from '../platform/logger'
import { RemoteAdsApi } from '../platform/ads/types'
import { StateStore } from '../store/state-store'
import { BudgetAction, isBudgetKind } from './action.model'

export type RemoteOutcome = 'ok' | 'failed' | 'skipped'

export interface ExecutionResult {
  applied: boolean
  remote: RemoteOutcome
  fields?: CampaignFields
  error?: string
}

export class ActionExecutor {
  constructor(
    private readonly store: StateStore,
    private readonly api: RemoteAdsApi | null,
    private readonly budget: BudgetRules,
    private readonly clock: Clock = systemClock,
  ) {}

  async execute(action: BudgetAction, credential?: string): Promise<ExecutionResult> {
    const now = this.clock()
    log.info(`[Executor] ${action.channel}: ${action.kind} - ${action.reason}`)

    const fields: CampaignFields = { last_auto_action: now }
    if (action.scheduleKey) fields.last_schedule_action = action.scheduleKey

    if (isBudgetKind(action.kind)) {
      const amount = action.newBudget ?? Number.NaN
      const check = validateBudget(amount, this.budget)
      if (!check.ok) {
        log.warn(`[Executor] Rejected ${action.kind} for ${action.channel}: invalid budget ${amount} (${check.reason})`)
        return { applied: false, remote: 'skipped', error: check.reason }
      }
      fields.daily_budget = amount
      fields.status = 'active'
    } else if (action.kind === 'pause') {
      fields.status = 'paused'
    } else {
      fields.status = 'active'
    }

    // 1. Redis 为准
    try {
      await this.store.updateCampaign(action.campaignId, fields)
    } catch (err: unknown) {
      log.error(`[Executor] Store write failed for ${action.campaignId}`, { error: errorMessage(err) })
      return { applied: false, remote: 'skipped', error: errorMessage(err) }
    }

    // 2. 同步到平台
    const remote = await this.mirror(action, credential)
    if (remote === 'failed') {
      log.warn(`[Executor] Remote ${action.kind} failed for ${action.channel}, store still updated`)
    }

    // 3. 操作日志
    try {
      await this.store.appendActionLog({
        time: clockTime(now),
        kind: action.kind,
        channel: action.channel,
        reason: action.reason,
        timestamp: now,
        ...(fields.daily_budget !== undefined ? { newBudget: fields.daily_budget } : {}),
      })
    } catch (err: unknown) {
      log.warn(`[Executor] Action log append failed for ${action.channel}`, { error: errorMessage(err) })
    }

    return { applied: true, remote, fields }
  }

  private async mirror(action: BudgetAction, credential: string | undefined): Promise<RemoteOutcome> {
    if (!this.api || !credential) return 'skipped'

    try {
      let ok = false
      switch (action.kind) {
        case 'set_budget':
        case 'increase_budget':
          if (!this.api.supports('setBudget') || action.newBudget === undefined) return 'skipped'
          ok = await this.api.setBudget(credential, action.campaignId, action.newBudget)
          break
        case 'pause':
          if (!this.api.supports('pause')) return 'skipped'
          ok = await this.api.pause(credential, action.campaignId)
          break
        case 'resume':
          if (!this.api.supports('resume')) return 'skipped'
          ok = await this.api.resume(credential, action.campaignId)
          break
      }
      return ok ? 'ok' : 'failed'
    } catch (err: unknown) {
      log.error(`[Executor] Remote ${action.kind} threw for ${action.channel}`, { error: errorMessage(err) })
      return 'failed'
    }
  }
}
