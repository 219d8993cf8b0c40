/**
 * 预算规则：最低 200，只能以 00/25/50/75 结尾
 */
import { BudgetRules, DEFAULT_BUDGET_RULES } from '../config/monitor'

export interface BudgetCheck {
  ok: boolean
  reason: string
}

export function validateBudget(amount: number, rules: BudgetRules = DEFAULT_BUDGET_RULES): BudgetCheck {
  if (!Number.isFinite(amount) || amount < rules.minBudget) {
    return { ok: false, reason: `below minimum (${rules.minBudget})` }
  }
  const remainder = amount % 100
  if (!rules.validEndings.includes(remainder)) {
    const endings = rules.validEndings.map(e => String(e).padStart(2, '0')).join(', ')
    return { ok: false, reason: `invalid ending (must end in ${endings})` }
  }
  return { ok: true, reason: 'OK' }
}

function ceilToGrid(amount: number, step: number): number {
  return Math.ceil(amount / step) * step
}

/**
 * 向上取整到合法预算；网格固定为 roundingStep，和加预算步长无关
 */
export function roundUpBudget(amount: number, rules: BudgetRules = DEFAULT_BUDGET_RULES): number {
  const step = rules.roundingStep
  return Math.max(ceilToGrid(rules.minBudget, step), ceilToGrid(amount, step))
}

/**
 * 当前预算 + delta（默认 rules.increment）后取整
 */
export function calcIncrement(
  current: number,
  delta?: number,
  rules: BudgetRules = DEFAULT_BUDGET_RULES,
): number {
  return roundUpBudget(current + (delta ?? rules.increment), rules)
}
