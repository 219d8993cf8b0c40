/**
 * 时间工具：规则里的时刻都按进程本地时区、分钟精度比较
 */
import dayjs from 'dayjs'

export type Clock = () => number

export const systemClock: Clock = () => Date.now()

export function clockTime(nowMs: number): string {
  return dayjs(nowMs).format('HH:mm')
}

export function clockDate(nowMs: number): string {
  return dayjs(nowMs).format('YYYY-MM-DD')
}

/** 定时动作幂等键 */
export function scheduleKey(nowMs: number, time: string): string {
  return `${clockDate(nowMs)}_${time}`
}

function parseHHmm(value: string): number | null {
  const m = /^(\d{1,2}):(\d{2})$/.exec(value.trim())
  if (!m) return null
  const h = Number(m[1])
  const min = Number(m[2])
  if (h > 23 || min > 59) return null
  return h * 60 + min
}

/**
 * now 是否落在 [start, end] 内（两端包含，支持跨零点）；格式错误视为不在窗口内
 */
export function inTimeWindow(nowMs: number, start: string, end: string): boolean {
  const startMin = parseHHmm(start)
  const endMin = parseHHmm(end)
  if (startMin === null || endMin === null) return false
  const d = dayjs(nowMs)
  const nowMin = d.hour() * 60 + d.minute()
  if (startMin <= endMin) return nowMin >= startMin && nowMin <= endMin
  return nowMin >= startMin || nowMin <= endMin
}

export function minutesSince(nowMs: number, thenMs: number | undefined): number {
  if (thenMs === undefined) return Number.POSITIVE_INFINITY
  return (nowMs - thenMs) / 60000
}
