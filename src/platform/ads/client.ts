/**
 * 广告平台 API Client
 *
 * 凭证是后台登录 cookie 串；所有调用单次尝试、带超时，
 * 非 JSON / 错误码一律按失败处理，不重试（下一轮自然会再来）。
 */
import axios, { AxiosInstance } from 'axios'
import { AdsApiEndpoints } from '../../config/monitor'
import { errorMessage, log } from '../logger'
import { AdsOperation, AuthResult, RemoteAdsApi, RemoteCampaign } from './types'

export class AdsApiError extends Error {
  status?: number
  code?: unknown
  constructor(message: string, status?: number, code?: unknown) {
    super(message)
    this.name = 'AdsApiError'
    this.status = status
    this.code = code
  }
}

type JsonObject = Record<string, unknown>

function asObject(v: unknown): JsonObject | null {
  if (!v || typeof v !== 'object' || Array.isArray(v)) return null
  return Object.fromEntries(Object.entries(v))
}

function toNumber(v: unknown): number {
  const n = typeof v === 'number' ? v : Number(v)
  return Number.isFinite(n) ? n : 0
}

export function parseCookies(cookieStr: string): Record<string, string> {
  const cookies: Record<string, string> = {}
  for (const part of cookieStr.split(';')) {
    const idx = part.indexOf('=')
    if (idx <= 0) continue
    cookies[part.slice(0, idx).trim()] = part.slice(idx + 1).trim()
  }
  return cookies
}

function isWriteOk(res: JsonObject): boolean {
  return res.code === 0 || res.success === true
}

function toRemoteCampaign(item: unknown): RemoteCampaign | null {
  const r = asObject(item)
  if (!r) return null
  const name = r.channelName ?? r.username
  if (typeof name !== 'string' || !name.trim()) return null
  return {
    channelName: name.trim(),
    cost: toNumber(r.cost ?? r.spend),
    roas: toNumber(r.roas),
    balance: toNumber(r.balance ?? r.credit),
    visits: toNumber(r.visits ?? r.impressions),
    conversionRate: toNumber(r.conversionRate),
  }
}

export class AdsApiClient implements RemoteAdsApi {
  constructor(
    private readonly endpoints: AdsApiEndpoints,
    private readonly http: AxiosInstance,
  ) {}

  private pathFor(op: AdsOperation): string | undefined {
    switch (op) {
      case 'verifyAuth': return this.endpoints.authPath
      case 'balance': return this.endpoints.balancePath
      case 'listCampaigns': return this.endpoints.campaignListPath
      case 'setBudget': return this.endpoints.setBudgetPath
      case 'pause': return this.endpoints.pausePath
      case 'resume': return this.endpoints.resumePath
    }
  }

  supports(op: AdsOperation): boolean {
    return Boolean(this.pathFor(op))
  }

  private async request(op: AdsOperation, credential: string, method: 'GET' | 'POST', data?: JsonObject): Promise<JsonObject> {
    const path = this.pathFor(op)
    if (!path) throw new AdsApiError(`${op} endpoint not configured`)

    const cookies = parseCookies(credential)
    try {
      const res = await this.http.request({
        method,
        url: path,
        headers: {
          'Content-Type': 'application/json',
          'Accept': 'application/json',
          'Cookie': credential,
          'x-csrftoken': cookies.csrftoken || '',
        },
        data: method === 'POST' ? data : undefined,
        params: method === 'GET' ? data : undefined,
      })
      const body = asObject(res.data)
      if (!body) throw new AdsApiError(`${op}: response is not a JSON object`, res.status)
      return body
    } catch (err: unknown) {
      if (err instanceof AdsApiError) throw err
      if (axios.isAxiosError(err)) {
        throw new AdsApiError(`${op} failed: ${err.message}`, err.response?.status, err.code)
      }
      throw new AdsApiError(`${op} failed: ${errorMessage(err)}`)
    }
  }

  async verifyAuth(credential: string): Promise<AuthResult> {
    try {
      const res = await this.request('verifyAuth', credential, 'GET')
      const data = asObject(res.data)
      if (!data) return { ok: false }
      const name = data.userName ?? data.name
      return { ok: true, displayName: typeof name === 'string' ? name : 'unknown' }
    } catch (err: unknown) {
      log.error('[AdsApi] Auth verify failed', { error: errorMessage(err) })
      return { ok: false }
    }
  }

  async getBalance(credential: string): Promise<number | null> {
    try {
      const res = await this.request('balance', credential, 'GET')
      if (res.data === undefined || res.data === null) return null
      const n = Number(res.data)
      return Number.isFinite(n) ? n : null
    } catch (err: unknown) {
      log.error('[AdsApi] Get balance failed', { error: errorMessage(err) })
      return null
    }
  }

  async getCampaigns(credential: string): Promise<RemoteCampaign[]> {
    try {
      const res = await this.request('listCampaigns', credential, 'GET', { page: 1, pageSize: 100 })
      const data = res.data
      const list = Array.isArray(data) ? data : asObject(data)?.list
      if (!Array.isArray(list)) return []
      const campaigns: RemoteCampaign[] = []
      for (const item of list) {
        const c = toRemoteCampaign(item)
        if (c) campaigns.push(c)
      }
      return campaigns
    } catch (err: unknown) {
      log.error('[AdsApi] Get campaigns failed', { error: errorMessage(err) })
      return []
    }
  }

  private async write(op: AdsOperation, credential: string, payload: JsonObject): Promise<boolean> {
    try {
      const res = await this.request(op, credential, 'POST', payload)
      if (isWriteOk(res)) return true
      log.error(`[AdsApi] ${op} rejected`, { response: res })
    } catch (err: unknown) {
      log.error(`[AdsApi] ${op} failed`, { error: errorMessage(err) })
    }
    return false
  }

  async setBudget(credential: string, campaignId: string, amount: number): Promise<boolean> {
    const ok = await this.write('setBudget', credential, { campaignId, dailyBudget: amount })
    if (ok) log.info(`[AdsApi] Budget set: campaign=${campaignId}, budget=${amount}`)
    return ok
  }

  pause(credential: string, campaignId: string): Promise<boolean> {
    return this.write('pause', credential, { campaignId })
  }

  resume(credential: string, campaignId: string): Promise<boolean> {
    return this.write('resume', credential, { campaignId })
  }
}

/**
 * 未配置 base URL 时返回 null，上层进入仅 Redis 模式
 */
export function createAdsApi(endpoints: AdsApiEndpoints | undefined, timeoutMs: number, http?: AxiosInstance): RemoteAdsApi | null {
  if (!endpoints) return null
  const instance = http ?? axios.create({ baseURL: endpoints.baseUrl, timeout: timeoutMs })
  return new AdsApiClient(endpoints, instance)
}
