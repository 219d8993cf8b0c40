/**
 * 决策引擎 — 按 campaign_type 分派给对应策略，收集本轮所有动作
 */
import { Campaign, CampaignType } from '../campaign/campaign.model'
import { BudgetRules } from '../config/monitor'
import { BudgetAction } from '../action/action.model'
import { SnapshotStore } from '../snapshot/snapshot.service'
import { errorMessage, log } from '../platform/logger'
import { BudgetPolicy } from './policies/basePolicy'

export class DecisionEngine {
  constructor(
    private readonly policies: Record<CampaignType, BudgetPolicy>,
    private readonly snapshots: Pick<SnapshotStore, 'window'>,
    private readonly budget: BudgetRules,
  ) {}

  async evaluateAll(campaigns: Campaign[], now: number): Promise<BudgetAction[]> {
    const actions: BudgetAction[] = []

    for (const campaign of campaigns) {
      if (!campaign.autoEnabled) continue
      const policy = this.policies[campaign.campaignType]
      try {
        const action = await policy.evaluate({
          campaign,
          now,
          budget: this.budget,
          window: (minutes) => this.snapshots.window(campaign.id, minutes),
        })
        if (action) {
          log.info(`[Decision] Policy ${policy.name} → ${action.kind} for ${campaign.channel}: ${action.reason}`)
          actions.push(action)
        }
      } catch (err: unknown) {
        log.error(`[Decision] Policy ${policy.name} failed for ${campaign.id}`, { error: errorMessage(err) })
      }
    }

    return actions
  }
}
