/**
 * 渠道目录 — channel 名 → 平台凭证（cookie），查找不区分大小写
 */
import fs from 'fs'
import { errorMessage, log } from './logger'

export interface ChannelDirectory {
  credentialFor(channel: string): string | undefined
  size(): number
}

export function createChannelDirectory(entries: Record<string, string>): ChannelDirectory {
  const index = new Map<string, string>()
  for (const [name, credential] of Object.entries(entries)) {
    const key = name.trim().toLowerCase()
    if (key && credential && !index.has(key)) index.set(key, credential)
  }
  return {
    credentialFor: (channel) => (channel ? index.get(channel.trim().toLowerCase()) : undefined),
    size: () => index.size,
  }
}

/**
 * 文件格式：{ "频道名": "cookie" } 或 { "频道名": { "cookie": "..." } }
 */
export function parseChannelEntries(data: unknown): Record<string, string> {
  const entries: Record<string, string> = {}
  if (!data || typeof data !== 'object' || Array.isArray(data)) return entries
  for (const [name, raw] of Object.entries(data)) {
    const value: unknown = raw
    if (typeof value === 'string') {
      entries[name] = value.trim()
    } else if (value && typeof value === 'object' && 'cookie' in value && typeof value.cookie === 'string') {
      entries[name] = value.cookie.trim()
    }
  }
  return entries
}

/**
 * 读不到文件时返回空目录，系统退化为仅 Redis 模式
 */
export async function loadChannelDirectory(filePath: string): Promise<ChannelDirectory> {
  try {
    const content = await fs.promises.readFile(filePath, 'utf8')
    const directory = createChannelDirectory(parseChannelEntries(JSON.parse(content)))
    log.info(`[Channels] Loaded ${directory.size()} channels from ${filePath}`)
    return directory
  } catch (err: unknown) {
    log.warn(`[Channels] Cannot load ${filePath}, running without credentials`, { error: errorMessage(err) })
    return createChannelDirectory({})
  }
}
