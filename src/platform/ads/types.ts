/**
 * 广告平台 API 能力：每个操作是否可用取决于对应 endpoint 是否已配置
 */
export type AdsOperation = 'verifyAuth' | 'balance' | 'listCampaigns' | 'setBudget' | 'pause' | 'resume'

export interface RemoteCampaign {
  channelName: string
  cost: number
  roas: number
  balance: number
  visits: number
  conversionRate: number
}

export interface AuthResult {
  ok: boolean
  displayName?: string
}

export interface RemoteAdsApi {
  supports(op: AdsOperation): boolean
  verifyAuth(credential: string): Promise<AuthResult>
  getBalance(credential: string): Promise<number | null>
  getCampaigns(credential: string): Promise<RemoteCampaign[]>
  setBudget(credential: string, campaignId: string, amount: number): Promise<boolean>
  pause(credential: string, campaignId: string): Promise<boolean>
  resume(credential: string, campaignId: string): Promise<boolean>
}
