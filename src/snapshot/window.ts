import { Snapshot } from './snapshot.model'

// 单次加购成本允许超出目标的幅度
const CART_COST_TOLERANCE = 1.5

/**
 * 窗口内加购效率是否达标：花费够多、有新增加购、单次加购成本 ≤ 目标 × 1.5
 */
export function isCartGood(window: readonly Snapshot[], cartValue: number): boolean {
  if (window.length < 2) return false

  const sorted = [...window].sort((a, b) => a.t - b.t)
  const first = sorted[0]
  const last = sorted[sorted.length - 1]

  const spentDiff = last.spent - first.spent
  const cartDiff = last.cart - first.cart

  if (spentDiff < cartValue) return false
  if (cartDiff <= 0) return false

  return spentDiff / cartDiff <= cartValue * CART_COST_TOLERANCE
}
