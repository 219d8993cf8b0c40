import { Campaign } from '../../campaign/campaign.model'
import { BudgetRules } from '../../config/monitor'
import { Snapshot } from '../../snapshot/snapshot.model'
import { BudgetAction } from '../../action/action.model'

export interface PolicyContext {
  campaign: Campaign
  now: number
  budget: BudgetRules
  /** 最近 minutes 分钟的快照窗口 */
  window(minutes: number): Promise<Snapshot[]>
}

export interface BudgetPolicy {
  name: string
  evaluate(ctx: PolicyContext): Promise<BudgetAction | null>
}

export function usageRatio(c: Campaign): number {
  return c.dailyBudget > 0 ? c.spentToday / c.dailyBudget : 0
}
