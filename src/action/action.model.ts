/**
 * 自动预算动作 — 由策略产出，执行器消费一次后丢弃，只留下 campaign 字段变更和日志
 */
export type ActionKind = 'set_budget' | 'increase_budget' | 'pause' | 'resume'

export interface BudgetAction {
  campaignId: string
  kind: ActionKind
  newBudget?: number
  reason: string
  channel: string
  // 定时触发的幂等键 "YYYY-MM-DD_HH:mm"
  scheduleKey?: string
}

export function isBudgetKind(kind: ActionKind): boolean {
  return kind === 'set_budget' || kind === 'increase_budget'
}
