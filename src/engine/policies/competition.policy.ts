import { calcIncrement } from '../../budget/budget'
import { BudgetAction } from '../../action/action.model'
import { isCartGood } from '../../snapshot/window'
import { inTimeWindow, minutesSince } from '../time'
import { BudgetPolicy, PolicyContext, usageRatio } from './basePolicy'

const CART_WINDOW_MINUTES = 15

/**
 * 竞争型 (Competition)
 * 预算满后每隔 competitionInterval 分钟必加一次：
 * 15 分钟加购达标加 competitionAmount，否则加默认步长。
 * 禁加时段（如 03:00-05:00，可跨零点）内不动。
 */
export class CompetitionPolicy implements BudgetPolicy {
  name = 'competition'

  constructor(private readonly budgetFullRatio = 0.99) {}

  async evaluate(ctx: PolicyContext): Promise<BudgetAction | null> {
    const c = ctx.campaign
    const rules = ctx.budget

    if (inTimeWindow(ctx.now, c.noIncreaseStart, c.noIncreaseEnd)) return null

    if (usageRatio(c) < this.budgetFullRatio && c.status !== 'budget_full') return null

    // 从未自动操作过 → 视为已过无限久
    if (minutesSince(ctx.now, c.lastAutoAction) < c.competitionInterval) return null

    if (isCartGood(await ctx.window(CART_WINDOW_MINUTES), c.cartValue)) {
      return {
        campaignId: c.id,
        kind: 'increase_budget',
        newBudget: calcIncrement(c.dailyBudget, c.competitionAmount, rules),
        reason: `competition: cart good (${CART_WINDOW_MINUTES} min), +${c.competitionAmount}`,
        channel: c.channel,
      }
    }
    return {
      campaignId: c.id,
      kind: 'increase_budget',
      newBudget: calcIncrement(c.dailyBudget, rules.increment, rules),
      reason: `competition: scheduled every ${c.competitionInterval} min, +${rules.increment} regardless of cart`,
      channel: c.channel,
    }
  }
}
