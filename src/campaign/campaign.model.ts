/**
 * Campaign 数据模型
 *
 * Redis 里存的是扁平的字符串字段（前端/运营直接写），读入时统一规范化一次，
 * 之后所有规则只看 Campaign 类型，不再到处写默认值。
 */

export type CampaignType = 'normal' | 'competition'
export type CampaignStatus = 'active' | 'paused' | 'budget_full'

export const DEFAULT_SCHEDULE_TIMES = ['06:00', '11:30', '18:00', '22:00']

export interface Campaign {
  id: string
  channel: string
  campaignType: CampaignType
  autoEnabled: boolean

  // 预算
  dailyBudget: number
  spentToday: number

  // 表现
  roas: number
  roasTarget: number
  roasMinPct: number       // 比例，0.5 = 目标的 50%
  cartValue: number
  budgetThreshold: number  // 比例，0.9 = 用掉 90% 开始评估

  status: CampaignStatus

  // 定时
  scheduleTimes: string[]
  lastScheduleAction?: string
  noIncreaseStart: string
  noIncreaseEnd: string
  competitionInterval: number  // 分钟
  competitionAmount: number
  lastAutoAction?: number      // epoch ms

  // 评估窗口开关
  eval180: boolean
  eval60: boolean
  eval15: boolean

  // 实时指标（来自直播监控）
  clicks: number
  cart: number
  orders: number
  sales: number
}

/** 存储层字段（snake_case），写回时使用 */
export interface CampaignFields {
  daily_budget?: number
  spent_today?: number
  roas?: number
  status?: CampaignStatus
  last_schedule_action?: string
  last_auto_action?: number
  clicks?: number
  cart?: number
  orders?: number
  sales?: number
  ad_credit?: number
  visits?: number
  conversion_rate?: number
  last_update?: string
}

export type RawRecord = Record<string, unknown>

export interface LiveMetrics {
  channel: string
  clicks: number
  cart: number
  orders: number
  sales: number
}

// ==================== 字段解析 ====================

function num(v: unknown, fallback: number): number {
  if (typeof v === 'number') return Number.isFinite(v) ? v : fallback
  if (typeof v === 'string' && v.trim() !== '') {
    const n = Number(v)
    return Number.isFinite(n) ? n : fallback
  }
  return fallback
}

function str(v: unknown, fallback: string): string {
  if (typeof v === 'string' && v.trim() !== '') return v.trim()
  if (typeof v === 'number' && Number.isFinite(v)) return String(v)
  return fallback
}

function bool(v: unknown, fallback: boolean): boolean {
  if (typeof v === 'boolean') return v
  if (typeof v === 'number') return v !== 0
  if (typeof v === 'string') {
    const s = v.trim().toLowerCase()
    if (s === 'true' || s === '1') return true
    if (s === 'false' || s === '0') return false
  }
  return fallback
}

/**
 * 百分比字段兼容两种写法：90 / 0.9。
 * >= 1 一律按百分数读（1 = 1%，100% 要写 100），< 1 按小数读
 */
function ratio(v: unknown, fallback: number): number {
  const n = num(v, Number.NaN)
  if (Number.isNaN(n) || n < 0) return fallback
  return n >= 1 ? n / 100 : n
}

function optionalNum(v: unknown): number | undefined {
  const n = num(v, Number.NaN)
  return Number.isNaN(n) || n <= 0 ? undefined : n
}

function optionalStr(v: unknown): string | undefined {
  const s = str(v, '')
  return s || undefined
}

function campaignType(v: unknown): CampaignType {
  return v === 'competition' ? 'competition' : 'normal'
}

function campaignStatus(v: unknown): CampaignStatus {
  return v === 'paused' || v === 'budget_full' ? v : 'active'
}

function scheduleTimes(v: unknown): string[] {
  const list = Array.isArray(v) ? v.map(x => String(x)) : str(v, '').split(',')
  const times = list.map(t => t.trim()).filter(Boolean)
  return times.length > 0 ? times : [...DEFAULT_SCHEDULE_TIMES]
}

export function normalizeCampaign(id: string, raw: RawRecord): Campaign {
  return {
    id,
    channel: str(raw.channel, id),
    campaignType: campaignType(raw.campaign_type),
    autoEnabled: bool(raw.auto_enabled, true),
    dailyBudget: num(raw.daily_budget, 200),
    spentToday: num(raw.spent_today, 0),
    roas: num(raw.roas, 0),
    roasTarget: num(raw.roas_target, 30),
    roasMinPct: ratio(raw.roas_min_pct, 0.5),
    cartValue: num(raw.cart_value, 5),
    budgetThreshold: ratio(raw.budget_threshold, 0.9),
    status: campaignStatus(raw.status),
    scheduleTimes: scheduleTimes(raw.schedule_times),
    lastScheduleAction: optionalStr(raw.last_schedule_action),
    noIncreaseStart: str(raw.no_increase_start, '03:00'),
    noIncreaseEnd: str(raw.no_increase_end, '05:00'),
    competitionInterval: num(raw.competition_interval, 30),
    competitionAmount: num(raw.competition_amount, 25),
    lastAutoAction: optionalNum(raw.last_auto_action),
    eval180: bool(raw.eval_180, true),
    eval60: bool(raw.eval_60, true),
    eval15: bool(raw.eval_15, true),
    clicks: num(raw.clicks, 0),
    cart: num(raw.cart, 0),
    orders: num(raw.orders, 0),
    sales: num(raw.sales, 0),
  }
}

/**
 * 直播监控的原始记录，无 channel 字段的跳过
 */
export function normalizeLiveMetrics(raw: unknown): LiveMetrics | null {
  if (!raw || typeof raw !== 'object') return null
  const r: RawRecord = Object.fromEntries(Object.entries(raw))
  const channel = str(r.channel, '')
  if (!channel) return null
  return {
    channel,
    clicks: num(r.clicks, 0),
    cart: num(r.added_to_cart, num(r.cart_count, 0)),
    orders: num(r.orders, 0),
    sales: num(r.sales, 0),
  }
}

/**
 * channel 名（小写）→ 记录，每轮构建一次；同名取第一条
 */
export function buildChannelIndex<T>(items: Iterable<T>, channelOf: (item: T) => string): Map<string, T> {
  const index = new Map<string, T>()
  for (const item of items) {
    const key = channelOf(item).trim().toLowerCase()
    if (key && !index.has(key)) index.set(key, item)
  }
  return index
}

export function lookupChannel<T>(index: Map<string, T>, channel: string): T | undefined {
  return index.get(channel.trim().toLowerCase())
}

/**
 * 把存储字段应用到内存中的 Campaign，保证同一轮后续步骤看到最新值
 */
export function applyFields(campaign: Campaign, fields: CampaignFields): void {
  if (fields.daily_budget !== undefined) campaign.dailyBudget = fields.daily_budget
  if (fields.spent_today !== undefined) campaign.spentToday = fields.spent_today
  if (fields.roas !== undefined) campaign.roas = fields.roas
  if (fields.status !== undefined) campaign.status = fields.status
  if (fields.last_schedule_action !== undefined) campaign.lastScheduleAction = fields.last_schedule_action
  if (fields.last_auto_action !== undefined) campaign.lastAutoAction = fields.last_auto_action
  if (fields.clicks !== undefined) campaign.clicks = fields.clicks
  if (fields.cart !== undefined) campaign.cart = fields.cart
  if (fields.orders !== undefined) campaign.orders = fields.orders
  if (fields.sales !== undefined) campaign.sales = fields.sales
}
