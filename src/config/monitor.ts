/**
 * 监控循环配置：启动时从环境变量构建一次，显式传给各组件
 */

export interface BudgetRules {
  minBudget: number
  // 加预算的默认步长（BUDGET_INCREMENT）
  increment: number
  // 取整网格，与 validEndings 对应，不随步长变化
  roundingStep: number
  validEndings: readonly number[]
}

export interface AdsApiEndpoints {
  baseUrl: string
  authPath?: string
  balancePath?: string
  campaignListPath?: string
  setBudgetPath?: string
  pausePath?: string
  resumePath?: string
}

export interface MonitorConfig {
  fetchIntervalSec: number
  snapshotIntervalSec: number
  snapshotRetentionHours: number
  cleanupEveryCycles: number
  requestTimeoutMs: number
  budget: BudgetRules
  // ROAS 过低时：花费超过该值冻结预算，否则暂停
  pauseSpendFloor: number
  // 竞争型 campaign 视为"预算已满"的消耗比例
  budgetFullRatio: number
  namespace: string
  liveMetricsKey: string
  // 未配置 = 无远程 API，仅 Redis 模式
  adsApi?: AdsApiEndpoints
}

export const DEFAULT_BUDGET_RULES: BudgetRules = {
  minBudget: 200,
  increment: 25,
  roundingStep: 25,
  validEndings: [0, 25, 50, 75],
}

export const DEFAULT_MONITOR_CONFIG: MonitorConfig = {
  fetchIntervalSec: 180,
  snapshotIntervalSec: 300,
  snapshotRetentionHours: 4,
  cleanupEveryCycles: 10,
  requestTimeoutMs: 10000,
  budget: DEFAULT_BUDGET_RULES,
  pauseSpendFloor: 200,
  budgetFullRatio: 0.99,
  namespace: 'ads_monitor',
  liveMetricsKey: 'live_monitor:channels',
}

type EnvSource = Record<string, string | undefined>

function positiveNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback
  const n = Number(raw)
  return Number.isFinite(n) && n > 0 ? n : fallback
}

function optionalString(raw: string | undefined): string | undefined {
  const v = raw?.trim()
  return v ? v : undefined
}

export function loadMonitorConfig(source: EnvSource = process.env): MonitorConfig {
  const d = DEFAULT_MONITOR_CONFIG
  const baseUrl = optionalString(source.ADS_API_BASE_URL)

  return {
    fetchIntervalSec: positiveNumber(source.FETCH_INTERVAL_SEC, d.fetchIntervalSec),
    snapshotIntervalSec: positiveNumber(source.SNAPSHOT_INTERVAL_SEC, d.snapshotIntervalSec),
    snapshotRetentionHours: positiveNumber(source.SNAPSHOT_RETENTION_HOURS, d.snapshotRetentionHours),
    cleanupEveryCycles: Math.floor(positiveNumber(source.CLEANUP_EVERY_CYCLES, d.cleanupEveryCycles)),
    requestTimeoutMs: positiveNumber(source.REQUEST_TIMEOUT_MS, d.requestTimeoutMs),
    budget: {
      ...d.budget,
      minBudget: positiveNumber(source.MIN_BUDGET, d.budget.minBudget),
      increment: positiveNumber(source.BUDGET_INCREMENT, d.budget.increment),
    },
    pauseSpendFloor: d.pauseSpendFloor,
    budgetFullRatio: d.budgetFullRatio,
    namespace: optionalString(source.STATE_NAMESPACE) ?? d.namespace,
    liveMetricsKey: optionalString(source.LIVE_METRICS_KEY) ?? d.liveMetricsKey,
    adsApi: baseUrl
      ? {
          baseUrl,
          authPath: optionalString(source.ADS_AUTH_PATH),
          balancePath: optionalString(source.ADS_BALANCE_PATH),
          campaignListPath: optionalString(source.ADS_CAMPAIGN_LIST_PATH),
          setBudgetPath: optionalString(source.ADS_SET_BUDGET_PATH),
          pausePath: optionalString(source.ADS_PAUSE_PATH),
          resumePath: optionalString(source.ADS_RESUME_PATH),
        }
      : undefined,
  }
}
