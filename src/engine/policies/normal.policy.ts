import { calcIncrement, roundUpBudget } from '../../budget/budget'
import { Campaign } from '../../campaign/campaign.model'
import { BudgetAction } from '../../action/action.model'
import { isCartGood } from '../../snapshot/window'
import { clockTime, scheduleKey } from '../time'
import { BudgetPolicy, PolicyContext, usageRatio } from './basePolicy'

/**
 * 普通型 (Normal)
 * 1. ROAS < 目标 × 下限比例 → 冻结预算 / 暂停
 * 2. 预算用到阈值 → ROAS 达标，或 180/60/15 分钟内加购达标 → 加预算
 * 3. 预算满 / 已暂停 → 定时点（06:00, 11:30 …）加预算 / 重新开启
 * 按顺序命中第一条即返回
 */
export class NormalPolicy implements BudgetPolicy {
  name = 'normal'

  constructor(private readonly pauseSpendFloor = 200) {}

  async evaluate(ctx: PolicyContext): Promise<BudgetAction | null> {
    const c = ctx.campaign
    const rules = ctx.budget

    // 1. ROAS 过低
    const roasFloor = c.roasTarget * c.roasMinPct
    if (c.roas > 0 && c.roas < roasFloor) {
      return this.onLowRoas(c, roasFloor, ctx)
    }

    // 2. 预算接近用完
    const used = usageRatio(c)
    if (used >= c.budgetThreshold) {
      const pct = (used * 100).toFixed(0)
      if (c.roas >= c.roasTarget) {
        return {
          campaignId: c.id,
          kind: 'increase_budget',
          newBudget: calcIncrement(c.dailyBudget, rules.increment, rules),
          reason: `ROAS good (${c.roas.toFixed(1)} >= ${c.roasTarget}), budget near limit (${pct}%)`,
          channel: c.channel,
        }
      }

      for (const minutes of enabledWindows(c)) {
        if (isCartGood(await ctx.window(minutes), c.cartValue)) {
          return {
            campaignId: c.id,
            kind: 'increase_budget',
            newBudget: calcIncrement(c.dailyBudget, rules.increment, rules),
            reason: `Cart good in last ${minutes} min, budget near limit (${pct}%)`,
            channel: c.channel,
          }
        }
      }
    }

    // 3. 定时重新激活
    if (c.status === 'budget_full' || c.status === 'paused') {
      return checkSchedule(c, ctx)
    }

    return null
  }

  private onLowRoas(c: Campaign, roasFloor: number, ctx: PolicyContext): BudgetAction | null {
    if (c.spentToday > this.pauseSpendFloor) {
      const freezeBudget = roundUpBudget(c.spentToday, ctx.budget)
      if (freezeBudget === c.dailyBudget) return null
      return {
        campaignId: c.id,
        kind: 'set_budget',
        newBudget: freezeBudget,
        reason: `ROAS low (${c.roas.toFixed(1)} < ${roasFloor.toFixed(0)}), freeze budget`,
        channel: c.channel,
      }
    }
    if (c.status === 'paused') return null
    return {
      campaignId: c.id,
      kind: 'pause',
      reason: `ROAS low (${c.roas.toFixed(1)} < ${roasFloor.toFixed(0)}), spend under ${this.pauseSpendFloor}, stop`,
      channel: c.channel,
    }
  }
}

/** 固定优先级：180 → 60 → 15 */
function enabledWindows(c: Campaign): number[] {
  const windows: number[] = []
  if (c.eval180) windows.push(180)
  if (c.eval60) windows.push(60)
  if (c.eval15) windows.push(15)
  return windows
}

function checkSchedule(c: Campaign, ctx: PolicyContext): BudgetAction | null {
  const now = clockTime(ctx.now)
  const time = c.scheduleTimes.find(t => t === now)
  if (!time) return null

  // 同一天同一时刻只触发一次
  const key = scheduleKey(ctx.now, time)
  if (c.lastScheduleAction === key) return null

  if (c.status === 'budget_full') {
    return {
      campaignId: c.id,
      kind: 'increase_budget',
      newBudget: calcIncrement(c.dailyBudget, ctx.budget.increment, ctx.budget),
      reason: `Scheduled ${time}: budget full, +${ctx.budget.increment}`,
      channel: c.channel,
      scheduleKey: key,
    }
  }
  return {
    campaignId: c.id,
    kind: 'resume',
    reason: `Scheduled ${time}: resume`,
    channel: c.channel,
    scheduleKey: key,
  }
}
